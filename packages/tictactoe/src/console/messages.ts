import type { FinishedGameStatus } from "../types/game-outcome.js";
import type { MoveRejectReason } from "../types/move-reject-reason.js";
import type { PlayerMark } from "../types/player-mark/player-mark.js";

export const bannerMessage = "row and col each can be 0, 1, or 2.  Top left is 0,0.";
export const illegalMoveMessage = "Illegal move.";
export const invalidMoveMessage = "Invalid move.";
export const gameOverMessage = "Game over.";
export const invalidBoardMessage = "Invalid board.";

export const formatPrompt = (mark: PlayerMark): string =>
  `Enter row,col for next move for ${mark}, or q to quit: `;

export const formatRejectReason = (reason: MoveRejectReason): string => {
  switch (reason) {
    case "invalid_board":
      return invalidBoardMessage;
    case "invalid_move":
      return invalidMoveMessage;
    case "game_over":
      return gameOverMessage;
    case "out_of_range":
      return illegalMoveMessage;
  }
};

export const formatOutcome = (status: FinishedGameStatus): string =>
  status.type === "won"
    ? `Player ${status.mark} has won -- game over.`
    : "The board is full, no winner -- game over.";
