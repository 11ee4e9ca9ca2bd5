import { validate } from "@adobe/data/schema";
import type { MoveRequest } from "./move-request.js";
import { coordinateSchema } from "./move-request-schema.js";

const isObjectRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isCoordinate = (value: unknown): boolean =>
  value !== undefined && validate(coordinateSchema, value).length === 0;

export const isMoveRequest = (value: unknown): value is MoveRequest =>
  isObjectRecord(value) && isCoordinate(value.row) && isCoordinate(value.col);
