import { describe } from "riteway";
import { getBoardCell } from "./get-board-cell.js";

describe("getBoardCell", async (assert) => {
  const board = ["X", null, null, null, "O", null, null, null, "X"] as const;

  assert({
    given: "the top left corner",
    should: "return its mark",
    actual: getBoardCell({ board, row: 0, col: 0 }),
    expected: "X"
  });

  assert({
    given: "the center cell",
    should: "return its mark",
    actual: getBoardCell({ board, row: 1, col: 1 }),
    expected: "O"
  });

  assert({
    given: "an empty cell",
    should: "return null",
    actual: getBoardCell({ board, row: 2, col: 0 }),
    expected: null
  });
});
