import { describe } from "riteway";
import { getWinningLine } from "./get-winning-line.js";

describe("getWinningLine", async (assert) => {
  assert({
    given: "a row win for X",
    should: "return the winning line indexes",
    actual: getWinningLine(["X", "X", "X", "O", "O", null, null, null, null], "X"),
    expected: [0, 1, 2]
  });

  assert({
    given: "a row win for X checked for O",
    should: "return null",
    actual: getWinningLine(["X", "X", "X", "O", "O", null, null, null, null], "O"),
    expected: null
  });

  assert({
    given: "an anti-diagonal win for O",
    should: "return the anti-diagonal indexes",
    actual: getWinningLine(["X", "X", "O", null, "O", null, "O", null, "X"], "O"),
    expected: [2, 4, 6]
  });
});
