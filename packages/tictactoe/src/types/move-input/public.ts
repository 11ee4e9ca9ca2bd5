export * from "./parse-move-input.js";
