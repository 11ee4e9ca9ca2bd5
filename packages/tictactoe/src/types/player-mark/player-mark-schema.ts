import { Schema } from "@adobe/data/schema";

export const schema = {
  type: "string",
  enum: ["X", "O"],
  description: "Player mark, X moves first"
} as const satisfies Schema;
