import type { BoardCell } from "../board-cell.js";
import type { BoardState } from "./board-state.js";
import { toIndex } from "./to-index.js";

export const getBoardCell = ({
  board,
  row,
  col
}: {
  readonly board: BoardState;
  readonly row: number;
  readonly col: number;
}): BoardCell => board[toIndex(row, col)];
