import { describe } from "riteway";
import type { PlayerMark } from "../player-mark/player-mark.js";
import type { BoardState } from "./board-state.js";
import { createInitialBoard } from "./create-initial-board.js";
import { hasWon } from "./has-won.js";
import { winningLines } from "./winning-lines.js";

const fillLine = (line: readonly number[], mark: PlayerMark): BoardState =>
  createInitialBoard().map((cell, index) => (line.includes(index) ? mark : cell));

describe("hasWon", async (assert) => {
  for (const line of winningLines) {
    assert({
      given: `X on every cell of line ${line.join(",")}`,
      should: "return true for X",
      actual: hasWon(fillLine(line, "X"), "X"),
      expected: true
    });

    assert({
      given: `O on every cell of line ${line.join(",")}`,
      should: "return false for X",
      actual: hasWon(fillLine(line, "O"), "X"),
      expected: false
    });
  }

  assert({
    given: "an empty board",
    should: "return false for both marks",
    actual: [hasWon(createInitialBoard(), "X"), hasWon(createInitialBoard(), "O")],
    expected: [false, false]
  });

  assert({
    given: "a full board with no complete line",
    should: "return false for both marks",
    actual: [
      hasWon(["X", "O", "X", "X", "O", "O", "O", "X", "X"], "X"),
      hasWon(["X", "O", "X", "X", "O", "O", "O", "X", "X"], "O")
    ],
    expected: [false, false]
  });

  assert({
    given: "a line mixing X and O",
    should: "return false",
    actual: hasWon(["X", "X", "O", null, null, null, null, null, null], "X"),
    expected: false
  });
});
