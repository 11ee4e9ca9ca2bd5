export interface MoveRequest {
  readonly row: number;
  readonly col: number;
}
export * as MoveRequest from "./public.js";
