export * from "./board-size.js";
export * from "./to-index.js";
export * from "./create-initial-board.js";
export * from "./is-board-state.js";
export * from "./get-board-cell.js";
export * from "./set-board-cell.js";
export * from "./winning-lines.js";
export * from "./get-winning-line.js";
export * from "./has-won.js";
export * from "./is-board-full.js";
export * from "./derive-status.js";
export * from "./is-game-over.js";
