import type { BoardCell } from "../board-cell.js";
import type { BoardState } from "./board-state.js";
import { CELL_COUNT } from "./board-size.js";

export const createInitialBoard = (): BoardState =>
  Object.freeze(Array.from({ length: CELL_COUNT }, (): BoardCell => null));
