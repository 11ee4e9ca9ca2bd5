import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { toIndex } from "./to-index.js";

export const setBoardCell = ({
  board,
  row,
  col,
  mark
}: {
  readonly board: BoardState;
  readonly row: number;
  readonly col: number;
  readonly mark: PlayerMark;
}): BoardState => {
  const index = toIndex(row, col);
  return Object.freeze(board.map((cell, i) => (i === index ? mark : cell)));
};
