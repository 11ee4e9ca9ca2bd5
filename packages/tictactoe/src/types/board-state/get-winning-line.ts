import type { PlayerMark } from "../player-mark/player-mark.js";
import type { WinningLine } from "../winning-line.js";
import type { BoardState } from "./board-state.js";
import { winningLines } from "./winning-lines.js";

export const getWinningLine = (board: BoardState, mark: PlayerMark): WinningLine | null => {
  for (const line of winningLines) {
    const [a, b, c] = line;
    if (board[a] === mark && board[b] === mark && board[c] === mark) {
      return line;
    }
  }
  return null;
};
