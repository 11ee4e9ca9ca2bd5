import type { MoveRequest } from "../move-request/move-request.js";

export type MoveInput =
  | { readonly type: "quit" }
  | { readonly type: "move"; readonly request: MoveRequest }
  | { readonly type: "illegal" };
export * as MoveInput from "./public.js";
