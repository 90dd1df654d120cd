/**
 * 3x3 tic-tac-toe board.
 *
 * Cells are stored row by row, index = row * 3 + column. Boards are never
 * mutated; placing a mark returns a new board.
 */
import { Actor, GameAction } from '../../core/types';
import { InvalidConfigError } from '../../core/errors';

export const FIELD_SIZE = 3;
export const CELL_COUNT = FIELD_SIZE * FIELD_SIZE;

export type Cell = Actor | null;

export interface Board {
  readonly cells: readonly Cell[];
}

export interface Placement extends GameAction {
  readonly column: number;
  readonly row: number;
}

export type GameResult =
  | { readonly kind: 'win'; readonly winner: Actor }
  | { readonly kind: 'draw' };

/** Rows, then columns, then both diagonals. */
export const LINES: readonly (readonly number[])[] = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function emptyBoard(): Board {
  return { cells: new Array<Cell>(CELL_COUNT).fill(null) };
}

export function cellIndex(column: number, row: number): number {
  return row * FIELD_SIZE + column;
}

export function isOnBoard(column: number, row: number): boolean {
  return (
    Number.isInteger(column) &&
    Number.isInteger(row) &&
    column >= 0 &&
    column < FIELD_SIZE &&
    row >= 0 &&
    row < FIELD_SIZE
  );
}

export function at(board: Board, column: number, row: number): Cell {
  return board.cells[cellIndex(column, row)];
}

export function place(board: Board, placement: Placement): Board {
  const cells = [...board.cells];
  cells[cellIndex(placement.column, placement.row)] = placement.actor;
  return { cells };
}

export function emptyCellCount(board: Board): number {
  return board.cells.filter(cell => cell === null).length;
}

/**
 * The finished game's result, or null while it is still going.
 */
export function gameResult(board: Board): GameResult | null {
  for (const [a, b, c] of LINES) {
    const owner = board.cells[a];
    if (owner !== null && board.cells[b] === owner && board.cells[c] === owner) {
      return { kind: 'win', winner: owner };
    }
  }
  return board.cells.includes(null) ? null : { kind: 'draw' };
}

// ─── Text form ───────────────────────────────────────────────────────
//
// 'F' marks the first actor, 'S' the second and '-' an empty cell.
// Whitespace and '/' between rows are ignored: "FS-/---/--F".

const SYMBOLS = new Map<string, Cell>([
  ['f', 'first'],
  ['s', 'second'],
  ['-', null],
]);

export function parseBoard(text: string): Board {
  const symbols = text.replace(/[\s/]/g, '').toLowerCase().split('');
  if (symbols.length !== CELL_COUNT) {
    throw new InvalidConfigError(
      `Invalid board "${text}": expected ${CELL_COUNT} cells, got ${symbols.length}`
    );
  }

  const cells = symbols.map(symbol => {
    const cell = SYMBOLS.get(symbol);
    if (cell === undefined) {
      throw new InvalidConfigError(
        `Invalid board cell "${symbol}". Use F (first), S (second) or - (empty).`
      );
    }
    return cell;
  });

  return { cells };
}

export function cellSymbol(cell: Cell): string {
  return cell === 'first' ? 'F' : cell === 'second' ? 'S' : '-';
}

export function formatBoard(board: Board): string {
  const rows: string[] = [];
  for (let row = 0; row < FIELD_SIZE; row++) {
    const symbols: string[] = [];
    for (let column = 0; column < FIELD_SIZE; column++) {
      symbols.push(cellSymbol(at(board, column, row)));
    }
    rows.push(symbols.join(' '));
  }
  return rows.join('\n');
}

export function formatPlacement(placement: Placement): string {
  return `${placement.actor} places at (${placement.column}, ${placement.row})`;
}
