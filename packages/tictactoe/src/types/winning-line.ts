export type WinningLine = readonly [number, number, number];
