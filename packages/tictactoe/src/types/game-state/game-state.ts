import type { BoardState } from "../board-state/board-state.js";
import type { PlayerMark } from "../player-mark/player-mark.js";

export interface GameState {
  readonly board: BoardState;
  readonly nextPlayer: PlayerMark;
}
export * as GameState from "./public.js";
