#!/usr/bin/env node
import { createConsoleIo } from "./console/create-console-io.js";
import { runGame } from "./console/run-game.js";

const io = createConsoleIo();

try {
  await runGame({ io });
} catch (error: unknown) {
  console.error("Failed to run tictactoe", error);
  process.exitCode = 1;
} finally {
  io.close();
}
