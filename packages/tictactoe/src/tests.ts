// Test entry: importing a test file registers its riteway suites.
import "./console/create-console-io.test.js";
import "./console/messages.test.js";
import "./console/render-board.test.js";
import "./console/run-game.test.js";
import "./tests.test.js";
import "./types/board-state/create-initial-board.test.js";
import "./types/board-state/derive-status.test.js";
import "./types/board-state/get-board-cell.test.js";
import "./types/board-state/get-winning-line.test.js";
import "./types/board-state/has-won.test.js";
import "./types/board-state/is-board-full.test.js";
import "./types/board-state/is-board-state.test.js";
import "./types/board-state/is-game-over.test.js";
import "./types/board-state/set-board-cell.test.js";
import "./types/game-state/apply-move.test.js";
import "./types/game-state/create-initial-game-state.test.js";
import "./types/move-input/parse-move-input.test.js";
import "./types/move-request/is-move-request.test.js";
import "./types/player-mark/other-mark.test.js";
