/**
 * term-snake game modules
 *
 * Usage:
 * 1. Set the theme: setTheme('cyan')
 * 2. Run the game: runSnakeGame(terminal, { danger: true })
 * 3. Await controller.finished for the final score
 */

// Re-export utilities
export {
  setTheme,
  getTheme,
  getCurrentThemeColor,
  getSubtleBackgroundColor,
  enterAlternateBuffer,
  exitAlternateBuffer,
  isInAlternateBuffer,
  type GameTerminal,
} from './utils';

export type { PhosphorMode } from './utils';

// Game runner and loop
export {
  runSnakeGame,
  playGame,
  createGameState,
  DEFAULT_SNAKE_OPTIONS,
  type SnakeController,
  type SnakeOptions,
  type GameSummary,
  type CommandSource,
  type GameState,
  type GameStatus,
  type EndCause,
  type GameEnding,
} from './snake';

// Core building blocks
export {
  createGrid,
  isWall,
  isInterior,
  coordKey,
  sameCoordinate,
  translate,
  CoordinateSet,
  TerminalTooSmallError,
  MIN_GRID_ROWS,
  MIN_GRID_COLS,
  type Coordinate,
  type Grid,
  type Heading,
} from './snake/grid';

export { Snake, type SnakeMove } from './snake/snake';
export { sampleFreePosition, sampleCenter, RESERVED_CELL, type RandomSource, type SampleOptions } from './snake/sampler';
export { spawnFood, addBlock } from './snake/field';
export { ByteQueue, InputDecoder, decodeKey, decodeEscapeTail, type ByteSource, type Command } from './snake/input';
export { stepGame, resolveTurn, applyCommand, endGame, openingFrame, collisionFrame } from './snake/engine';
export {
  AnsiRenderer,
  encodeFrame,
  formatStatus,
  currentPalette,
  GLYPHS,
  type DrawOp,
  type Renderer,
  type Palette,
  type Sprite,
  type Tone,
} from './snake/render';
