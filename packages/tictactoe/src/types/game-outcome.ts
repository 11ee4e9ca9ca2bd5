import type { GameStatus } from "./game-status.js";

export type FinishedGameStatus = Exclude<GameStatus, { readonly type: "in_progress" }>;

export type GameOutcome = FinishedGameStatus | { readonly type: "quit" };
