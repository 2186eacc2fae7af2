/**
 * Game state aggregate
 *
 * Everything a game mutates lives here and is passed explicitly to the
 * operations that need it.
 */

import { type Coordinate, type Grid, CoordinateSet } from './grid';
import { type RandomSource, sampleCenter, sampleFreePosition } from './sampler';
import { Snake } from './snake';

export type GameStatus = 'running' | 'paused' | 'over';

export type EndCause = 'wall' | 'block' | 'self' | 'quit' | 'board-full';

export interface GameEnding {
  cause: EndCause;
  /** Head position when the game ended */
  at: Coordinate;
}

export interface GameState {
  readonly grid: Grid;
  readonly snake: Snake;
  food: Coordinate;
  readonly blocks: CoordinateSet;
  score: number;
  status: GameStatus;
  /** Danger mode: every food eaten leaves a permanent block */
  readonly danger: boolean;
  readonly random: RandomSource;
  ending: GameEnding | null;
}

export interface GameSetup {
  danger?: boolean;
  random?: RandomSource;
}

/**
 * New game: a single-segment snake in the middle heading right,
 * one piece of food and no blocks
 */
export function createGameState(grid: Grid, setup: GameSetup = {}): GameState {
  const random = setup.random ?? Math.random;
  const snake = new Snake([sampleCenter(grid)], 'right');
  const blocks = new CoordinateSet();
  const food = sampleFreePosition(grid, snake, blocks, { random });
  if (!food) {
    throw new Error(`No room for food on a ${grid.cols}×${grid.rows} board`);
  }

  return {
    grid,
    snake,
    food,
    blocks,
    score: 0,
    status: 'running',
    danger: setup.danger ?? false,
    random,
    ending: null,
  };
}
