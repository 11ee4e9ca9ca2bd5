import type { PlayerMark } from "./player-mark/player-mark.js";

export type BoardCell = PlayerMark | null;
