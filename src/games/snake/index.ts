/**
 * Snake Game
 *
 * Turn-based snake on a walled board that fills the terminal. There is no
 * frame timer: every turn waits on keyboard input for at most one turn
 * period, so held keys (auto-repeat) make the snake visibly faster.
 */

import { enterAlternateBuffer, exitAlternateBuffer, type GameTerminal } from '../utils';
import { collisionFrame, endGame, openingFrame, stepGame, applyCommand } from './engine';
import { createGrid } from './grid';
import { ByteQueue, InputDecoder, type Command } from './input';
import { AnsiRenderer, type Renderer } from './render';
import type { RandomSource } from './sampler';
import { createGameState, type EndCause, type GameState } from './state';

export interface SnakeOptions {
  /** Every food eaten leaves a permanent block behind */
  danger: boolean;
  /** Longest wait for input per turn, in ms */
  turnPeriodMs: number;
  /** How long the collision flash stays up before the buffer is restored */
  gameOverHoldMs: number;
  random: RandomSource;
}

export const DEFAULT_SNAKE_OPTIONS: SnakeOptions = {
  danger: false,
  turnPeriodMs: 100,
  gameOverHoldMs: 1500,
  random: Math.random,
};

export interface GameSummary {
  score: number;
  length: number;
  blocks: number;
  cause: EndCause;
}

/**
 * Snake Game Controller
 */
export interface SnakeController {
  /** Same as pressing q; safe to call from a signal handler */
  stop: () => void;
  isRunning: boolean;
  /** Settles once the terminal has been restored */
  finished: Promise<GameSummary>;
}

/**
 * Something that yields one command per call, waiting at most one turn
 */
export interface CommandSource {
  next(): Promise<Command>;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function summarize(state: GameState): GameSummary {
  return {
    score: state.score,
    length: state.snake.length,
    blocks: state.blocks.size,
    cause: state.ending?.cause ?? 'quit',
  };
}

/**
 * Run turns until the game is over.
 *
 * Each iteration advances the snake when running, then reads input exactly
 * once whatever the status, so the input wait paces paused games too.
 */
export async function playGame(
  state: GameState,
  commands: CommandSource,
  renderer: Renderer,
): Promise<GameSummary> {
  renderer.render(openingFrame(state));

  while (state.status !== 'over') {
    renderer.render(stepGame(state));
    if (state.status === 'over') break;

    const command = await commands.next();
    renderer.render(applyCommand(state, command));
  }

  renderer.render(collisionFrame(state));
  return summarize(state);
}

/**
 * Start a game on the given terminal.
 *
 * @throws TerminalTooSmallError when the board would be under 10×10
 *   (the bottom terminal row is kept for the status line)
 */
export function runSnakeGame(terminal: GameTerminal, options: Partial<SnakeOptions> = {}): SnakeController {
  const config: SnakeOptions = { ...DEFAULT_SNAKE_OPTIONS, ...options };
  const grid = createGrid(terminal.rows - 1, terminal.cols);
  const state = createGameState(grid, { danger: config.danger, random: config.random });

  const queue = new ByteQueue();
  const dataListener = terminal.onData(data => queue.push(data));
  const decoder = new InputDecoder(queue, config.turnPeriodMs);
  const renderer = new AnsiRenderer(terminal, grid);

  let running = true;

  enterAlternateBuffer(terminal, 'snake');

  const finished = (async () => {
    try {
      const summary = await playGame(state, decoder, renderer);
      if (summary.cause !== 'quit' && config.gameOverHoldMs > 0) {
        await sleep(config.gameOverHoldMs);
      }
      return summary;
    } finally {
      running = false;
      dataListener.dispose();
      queue.close();
      exitAlternateBuffer(terminal, 'snake');
    }
  })();

  return {
    stop: () => {
      if (!running) return;
      endGame(state, 'quit');
      queue.close();
    },
    get isRunning() { return running; },
    finished,
  };
}

export { createGameState } from './state';
export type { GameState, GameStatus, EndCause, GameEnding } from './state';
