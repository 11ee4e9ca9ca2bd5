import type { BoardCell } from "../types/board-cell.js";
import { BoardState } from "../types/board-state/board-state.js";

const divider = "-----------";

const renderCell = (cell: BoardCell): string => cell ?? " ";

const renderRow = (board: BoardState, row: number): string => {
  const [left, middle, right] = [0, 1, 2].map((col) => renderCell(BoardState.getBoardCell({ board, row, col })));
  return ` ${left} | ${middle} | ${right} `;
};

export const renderBoard = (board: BoardState): readonly string[] => [
  "",
  renderRow(board, 0),
  divider,
  renderRow(board, 1),
  divider,
  renderRow(board, 2),
  ""
];
