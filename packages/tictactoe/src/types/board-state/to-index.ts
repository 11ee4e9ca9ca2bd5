import { BOARD_SIZE } from "./board-size.js";

export const toIndex = (row: number, col: number): number => row * BOARD_SIZE + col;
