import { Schema } from "@adobe/data/schema";

export const coordinateSchema = {
  type: "integer",
  description: "Row or column index, 0 is the top row or left column",
  minimum: 0,
  maximum: 2
} as const satisfies Schema;
