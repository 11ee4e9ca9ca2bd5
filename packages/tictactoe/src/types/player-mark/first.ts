import type { PlayerMark } from "./player-mark.js";

export const first: PlayerMark = "X";
