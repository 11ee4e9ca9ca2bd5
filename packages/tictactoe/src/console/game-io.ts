export interface GameIo {
  /** Shows `text` and resolves with the next line typed, or null once input has ended. */
  readonly prompt: (text: string) => Promise<string | null>;
  readonly print: (line: string) => void;
}
