import type { BoardState } from "./board-state.js";
import { CELL_COUNT } from "./board-size.js";

const isCell = (value: unknown): boolean => value === null || value === "X" || value === "O";

export const isBoardState = (value: unknown): value is BoardState =>
  Array.isArray(value) && value.length === CELL_COUNT && value.every(isCell);
