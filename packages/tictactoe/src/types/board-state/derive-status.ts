import type { GameStatus } from "../game-status.js";
import type { BoardState } from "./board-state.js";
import { hasWon } from "./has-won.js";
import { isBoardFull } from "./is-board-full.js";

export const deriveStatus = (board: BoardState): GameStatus => {
  if (hasWon(board, "X")) {
    return { type: "won", mark: "X" };
  }
  if (hasWon(board, "O")) {
    return { type: "won", mark: "O" };
  }
  return isBoardFull(board) ? { type: "draw" } : { type: "in_progress" };
};
