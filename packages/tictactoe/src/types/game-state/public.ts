export * from "./create-initial-game-state.js";
export * from "./apply-move.js";
