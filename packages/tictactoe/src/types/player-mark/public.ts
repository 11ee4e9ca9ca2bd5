export * from "./player-mark-schema.js";
export * from "./first.js";
export * from "./other-mark.js";
