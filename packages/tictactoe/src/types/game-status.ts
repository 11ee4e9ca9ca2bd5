import type { PlayerMark } from "./player-mark/player-mark.js";

export type GameStatus =
  | { readonly type: "in_progress" }
  | { readonly type: "won"; readonly mark: PlayerMark }
  | { readonly type: "draw" };
