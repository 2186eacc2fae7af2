/**
 * Grid model for Snake
 *
 * The board is the whole play area including its 1-cell wall border.
 * Coordinates are 1-indexed so they map straight onto terminal
 * cursor positions.
 */

export type Heading = 'up' | 'down' | 'left' | 'right';

export interface Coordinate {
  readonly row: number;
  readonly col: number;
}

export interface Grid {
  /** Total rows, border included */
  readonly rows: number;
  /** Total columns, border included */
  readonly cols: number;
}

export const MIN_GRID_ROWS = 10;
export const MIN_GRID_COLS = 10;

/**
 * Thrown when the play area cannot fit the minimum board
 */
export class TerminalTooSmallError extends Error {
  constructor(
    readonly rows: number,
    readonly cols: number,
  ) {
    super(`Terminal too small: need ${MIN_GRID_COLS}×${MIN_GRID_ROWS}, have ${cols}×${rows}`);
    this.name = 'TerminalTooSmallError';
  }
}

export function createGrid(rows: number, cols: number): Grid {
  if (rows < MIN_GRID_ROWS || cols < MIN_GRID_COLS) {
    throw new TerminalTooSmallError(rows, cols);
  }
  return { rows, cols };
}

export function isWall(grid: Grid, c: Coordinate): boolean {
  return c.row === 1 || c.row === grid.rows || c.col === 1 || c.col === grid.cols;
}

export function isInterior(grid: Grid, c: Coordinate): boolean {
  return c.row > 1 && c.row < grid.rows && c.col > 1 && c.col < grid.cols;
}

/** Number of playable (non-wall) cells */
export function interiorCellCount(grid: Grid): number {
  return (grid.rows - 2) * (grid.cols - 2);
}

export function coordKey(c: Coordinate): string {
  return `${c.row},${c.col}`;
}

export function sameCoordinate(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.col === b.col;
}

/**
 * Step one cell in the given heading (rows grow downward)
 */
export function translate(c: Coordinate, heading: Heading): Coordinate {
  switch (heading) {
    case 'up': return { row: c.row - 1, col: c.col };
    case 'down': return { row: c.row + 1, col: c.col };
    case 'left': return { row: c.row, col: c.col - 1 };
    case 'right': return { row: c.row, col: c.col + 1 };
  }
}

/**
 * Set of coordinates keyed by value, not identity
 */
export class CoordinateSet implements Iterable<Coordinate> {
  private readonly cells = new Map<string, Coordinate>();

  constructor(initial: Iterable<Coordinate> = []) {
    for (const c of initial) this.add(c);
  }

  get size(): number {
    return this.cells.size;
  }

  add(c: Coordinate): this {
    this.cells.set(coordKey(c), c);
    return this;
  }

  has(c: Coordinate): boolean {
    return this.cells.has(coordKey(c));
  }

  values(): Coordinate[] {
    return [...this.cells.values()];
  }

  [Symbol.iterator](): Iterator<Coordinate> {
    return this.cells.values();
  }
}
