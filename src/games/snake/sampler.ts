/**
 * Random free-cell sampling
 */

import { type Coordinate, type Grid, CoordinateSet, interiorCellCount, sameCoordinate } from './grid';
import type { Snake } from './snake';

/** Source of uniform numbers in [0, 1), same contract as Math.random */
export type RandomSource = () => number;

/**
 * Cell that never receives food or a block.
 * Kept free so the top-left interior corner is always open ground.
 */
export const RESERVED_CELL: Coordinate = { row: 2, col: 2 };

export interface SampleOptions {
  /** Extra cells to avoid, e.g. the current food when placing a block */
  exclude?: readonly Coordinate[];
  random?: RandomSource;
  /** Rejected draws before falling back to a scan of the free cells */
  maxAttempts?: number;
}

function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Uniformly pick an interior cell that is not taken by the snake,
 * a block, an excluded cell or the reserved cell.
 *
 * Draws are rejected until one lands on a free cell. If that takes more
 * than `maxAttempts` draws the free cells are listed and one is picked
 * directly, so the result stays uniform on a crowded board.
 *
 * @returns The chosen cell, or null when no free interior cell remains
 */
export function sampleFreePosition(
  grid: Grid,
  snake: Snake,
  blocks: CoordinateSet,
  options: SampleOptions = {},
): Coordinate | null {
  const random = options.random ?? Math.random;
  const excluded = new CoordinateSet(options.exclude ?? []);
  const maxAttempts = options.maxAttempts ?? interiorCellCount(grid) * 4;

  const isTaken = (c: Coordinate): boolean =>
    sameCoordinate(c, RESERVED_CELL) || snake.occupies(c) || blocks.has(c) || excluded.has(c);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const candidate = {
      row: randomInt(random, 2, grid.rows - 1),
      col: randomInt(random, 2, grid.cols - 1),
    };
    if (!isTaken(candidate)) return candidate;
  }

  const free: Coordinate[] = [];
  for (let row = 2; row < grid.rows; row++) {
    for (let col = 2; col < grid.cols; col++) {
      const cell = { row, col };
      if (!isTaken(cell)) free.push(cell);
    }
  }
  if (free.length === 0) return null;
  return free[Math.floor(random() * free.length)];
}

/**
 * Starting cell for the snake's head
 */
export function sampleCenter(grid: Grid): Coordinate {
  return { row: Math.floor(grid.rows / 2), col: Math.floor(grid.cols / 2) };
}
