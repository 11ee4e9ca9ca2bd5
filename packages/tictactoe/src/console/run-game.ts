import { BoardState } from "../types/board-state/board-state.js";
import type { GameOutcome } from "../types/game-outcome.js";
import { GameState } from "../types/game-state/game-state.js";
import { MoveInput } from "../types/move-input/move-input.js";
import type { GameIo } from "./game-io.js";
import { bannerMessage, formatOutcome, formatPrompt, formatRejectReason, illegalMoveMessage } from "./messages.js";
import { renderBoard } from "./render-board.js";

export interface RunGameArgs {
  readonly io: GameIo;
  readonly state?: GameState;
}

const printBoard = (io: GameIo, board: BoardState): void => {
  for (const line of renderBoard(board)) {
    io.print(line);
  }
};

export const runGame = async ({ io, state = GameState.createInitialGameState() }: RunGameArgs): Promise<GameOutcome> => {
  io.print(bannerMessage);
  printBoard(io, state.board);

  let current = state;
  for (;;) {
    const status = BoardState.deriveStatus(current.board);
    if (status.type !== "in_progress") {
      io.print(formatOutcome(status));
      return status;
    }

    const line = await io.prompt(formatPrompt(current.nextPlayer));
    const input: MoveInput = line === null ? { type: "quit" } : MoveInput.parseMoveInput(line);
    if (input.type === "quit") {
      return { type: "quit" };
    }
    if (input.type === "illegal") {
      io.print(illegalMoveMessage);
      continue;
    }

    const result = GameState.applyMove(current, input.request);
    if (!result.ok) {
      io.print(formatRejectReason(result.reason));
      continue;
    }

    current = result.state;
    printBoard(io, current.board);
  }
};
