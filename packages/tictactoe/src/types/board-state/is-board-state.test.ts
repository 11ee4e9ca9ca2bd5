import { describe } from "riteway";
import { isBoardState } from "./is-board-state.js";

describe("isBoardState", async (assert) => {
  assert({
    given: "nine cells of marks and nulls",
    should: "return true",
    actual: isBoardState(["X", null, "O", null, null, null, null, null, null]),
    expected: true
  });

  assert({
    given: "eight cells",
    should: "return false",
    actual: isBoardState([null, null, null, null, null, null, null, null]),
    expected: false
  });

  assert({
    given: "a cell holding an unknown mark",
    should: "return false",
    actual: isBoardState(["Z", null, null, null, null, null, null, null, null]),
    expected: false
  });

  assert({
    given: "a board encoded as a string",
    should: "return false",
    actual: isBoardState("         "),
    expected: false
  });
});
