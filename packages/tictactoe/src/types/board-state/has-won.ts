import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { getWinningLine } from "./get-winning-line.js";

export const hasWon = (board: BoardState, mark: PlayerMark): boolean => getWinningLine(board, mark) !== null;
