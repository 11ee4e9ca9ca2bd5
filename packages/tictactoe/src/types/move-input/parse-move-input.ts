import type { MoveInput } from "./move-input.js";

const quitCommand = "q";
// col first, then row
const movePattern = /^([0-2]),([0-2])$/;

export const parseMoveInput = (line: string): MoveInput => {
  const input = line.trim();
  if (input === quitCommand) {
    return { type: "quit" };
  }

  const match = movePattern.exec(input);
  if (match === null) {
    return { type: "illegal" };
  }

  const [, col, row] = match;
  return { type: "move", request: { row: Number(row), col: Number(col) } };
};
