import { BoardState } from "../board-state/board-state.js";
import { PlayerMark } from "../player-mark/player-mark.js";
import type { GameState } from "./game-state.js";

export const createInitialGameState = (): GameState => ({
  board: BoardState.createInitialBoard(),
  nextPlayer: PlayerMark.first
});
