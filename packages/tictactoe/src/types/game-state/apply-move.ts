import { BoardState } from "../board-state/board-state.js";
import type { MoveRejectReason } from "../move-reject-reason.js";
import { MoveRequest } from "../move-request/move-request.js";
import { PlayerMark } from "../player-mark/player-mark.js";
import type { GameState } from "./game-state.js";

export type ApplyMoveResult =
  | { readonly ok: true; readonly state: GameState }
  | { readonly ok: false; readonly reason: MoveRejectReason };

export const applyMove = (state: GameState, request: MoveRequest): ApplyMoveResult => {
  if (!BoardState.isBoardState(state.board)) {
    return { ok: false, reason: "invalid_board" };
  }

  if (!MoveRequest.isMoveRequest(request)) {
    return { ok: false, reason: "out_of_range" };
  }

  if (BoardState.isGameOver(state.board)) {
    return { ok: false, reason: "game_over" };
  }

  const { row, col } = request;
  if (BoardState.getBoardCell({ board: state.board, row, col }) !== null) {
    return { ok: false, reason: "invalid_move" };
  }

  return {
    ok: true,
    state: {
      board: BoardState.setBoardCell({ board: state.board, row, col, mark: state.nextPlayer }),
      nextPlayer: PlayerMark.otherMark(state.nextPlayer)
    }
  };
};
