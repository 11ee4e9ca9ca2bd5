import type { BoardCell } from "../board-cell.js";

export type BoardState = readonly BoardCell[];
export * as BoardState from "./public.js";
