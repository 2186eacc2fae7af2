/**
 * Collision and scoring engine
 *
 * Pure game rules over a GameState. Each operation mutates the state it is
 * given and returns the draw operations describing what changed.
 */

import { isWall, sameCoordinate } from './grid';
import { addBlock, spawnFood } from './field';
import type { Command } from './input';
import type { DrawOp } from './render';
import type { SnakeMove } from './snake';
import type { EndCause, GameState } from './state';

const COLLISION_CAUSES: ReadonlySet<EndCause> = new Set<EndCause>(['wall', 'block', 'self']);

/**
 * Single transition into the game-over state. Later calls are ignored.
 */
export function endGame(state: GameState, cause: EndCause): void {
  if (state.status === 'over') return;
  state.status = 'over';
  state.ending = { cause, at: state.snake.head() };
}

function statusOp(state: GameState): DrawOp {
  return { kind: 'status', score: state.score, paused: state.status === 'paused', danger: state.danger };
}

/**
 * Check the snake's new head against walls, blocks, its own body and the
 * food, in that order. The first collision ends the game.
 */
export function resolveTurn(state: GameState): DrawOp[] {
  const { grid, snake } = state;
  const head = snake.head();

  if (isWall(grid, head)) {
    endGame(state, 'wall');
    return [];
  }
  if (state.blocks.has(head)) {
    endGame(state, 'block');
    return [];
  }
  if (snake.length > 1 && snake.headOverlapsBody()) {
    endGame(state, 'self');
    return [];
  }
  if (!sameCoordinate(head, state.food)) {
    return [];
  }

  state.score += 1;
  const ops: DrawOp[] = [statusOp(state)];

  const food = spawnFood(state);
  if (!food) {
    endGame(state, 'board-full');
    return ops;
  }
  ops.push({ kind: 'cell', at: food, sprite: 'food', tone: 'normal' });

  if (state.danger) {
    const block = addBlock(state);
    if (block) ops.push({ kind: 'cell', at: block, sprite: 'block', tone: 'normal' });
  }

  snake.grow();
  return ops;
}

function moveOps(state: GameState, move: SnakeMove): DrawOp[] {
  const ops: DrawOp[] = [];
  if (move.vacated) ops.push({ kind: 'clear', at: move.vacated });
  if (state.snake.length > 1) {
    ops.push({ kind: 'cell', at: move.previousHead, sprite: 'body', tone: 'normal' });
  }
  ops.push({ kind: 'cell', at: move.head, sprite: 'head', tone: 'normal' });
  return ops;
}

/**
 * One simulation turn: advance the snake, then resolve collisions and food
 */
export function stepGame(state: GameState): DrawOp[] {
  if (state.status !== 'running') return [];
  const move = state.snake.advance();
  return [...moveOps(state, move), ...resolveTurn(state)];
}

/**
 * Apply a decoded command. Heading changes are taken as-is, even a
 * reversal into the neck.
 */
export function applyCommand(state: GameState, command: Command): DrawOp[] {
  if (state.status === 'over') return [];

  switch (command) {
    case 'up':
    case 'down':
    case 'left':
    case 'right':
      state.snake.setHeading(command);
      return [];
    case 'toggle-pause':
      state.status = state.status === 'paused' ? 'running' : 'paused';
      return [statusOp(state)];
    case 'quit':
      endGame(state, 'quit');
      return [];
    case 'none':
      return [];
    default: {
      const unhandled: never = command;
      throw new Error(`Unhandled command: ${String(unhandled)}`);
    }
  }
}

/**
 * Full redraw of the board, used once before the first turn
 */
export function openingFrame(state: GameState): DrawOp[] {
  const ops: DrawOp[] = [{ kind: 'walls', tone: 'normal' }];
  for (const block of state.blocks) {
    ops.push({ kind: 'cell', at: block, sprite: 'block', tone: 'normal' });
  }
  ops.push({ kind: 'cell', at: state.food, sprite: 'food', tone: 'normal' });
  state.snake.segments().forEach((segment, i) => {
    ops.push({ kind: 'cell', at: segment, sprite: i === 0 ? 'head' : 'body', tone: 'normal' });
  });
  ops.push(statusOp(state));
  return ops;
}

/**
 * Flash shown once after a fatal collision: walls and head in the alert color
 */
export function collisionFrame(state: GameState): DrawOp[] {
  if (!state.ending || !COLLISION_CAUSES.has(state.ending.cause)) return [];
  return [
    { kind: 'walls', tone: 'alert' },
    { kind: 'cell', at: state.ending.at, sprite: 'head', tone: 'alert' },
  ];
}
