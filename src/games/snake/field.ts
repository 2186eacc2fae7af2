/**
 * Food and danger-mode blocks
 */

import type { Coordinate } from './grid';
import { sampleFreePosition } from './sampler';
import type { GameState } from './state';

/**
 * Move the food to a fresh free cell.
 *
 * @returns The new food cell, or null when the board is full
 *   (state.food is left unchanged in that case)
 */
export function spawnFood(state: GameState): Coordinate | null {
  const food = sampleFreePosition(state.grid, state.snake, state.blocks, {
    exclude: [state.food],
    random: state.random,
  });
  if (food) state.food = food;
  return food;
}

/**
 * Drop a permanent block on a free cell that is not the food.
 *
 * @returns The new block, or null when no cell is left for it
 */
export function addBlock(state: GameState): Coordinate | null {
  const block = sampleFreePosition(state.grid, state.snake, state.blocks, {
    exclude: [state.food],
    random: state.random,
  });
  if (block) state.blocks.add(block);
  return block;
}
