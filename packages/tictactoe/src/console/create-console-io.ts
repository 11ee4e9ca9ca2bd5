import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { GameIo } from "./game-io.js";

export interface CreateConsoleIoArgs {
  readonly input?: Readable;
  readonly output?: Writable;
}

export interface ConsoleIo extends GameIo {
  readonly close: () => void;
}

export const createConsoleIo = ({
  input = process.stdin,
  output = process.stdout
}: CreateConsoleIoArgs = {}): ConsoleIo => {
  const readline = createInterface({ input, crlfDelay: Infinity, terminal: false });
  const lines = readline[Symbol.asyncIterator]();

  return {
    prompt: async (text) => {
      output.write(text);
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },
    print: (line) => {
      output.write(`${line}\n`);
    },
    close: () => {
      readline.close();
    }
  };
};
