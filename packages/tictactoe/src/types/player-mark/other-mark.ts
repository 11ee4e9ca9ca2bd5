import type { PlayerMark } from "./player-mark.js";

export const otherMark = (mark: PlayerMark): PlayerMark => (mark === "X" ? "O" : "X");
