import { describe, it, expect } from 'vitest';
import type { GameTerminal } from '../utils';
import { playGame, runSnakeGame, type CommandSource } from './index';
import { createGrid, TerminalTooSmallError } from './grid';
import type { Command } from './input';
import type { DrawOp, Renderer } from './render';
import { createGameState } from './state';

class ScriptedCommands implements CommandSource {
  calls = 0;

  constructor(private readonly script: Command[]) {}

  async next(): Promise<Command> {
    this.calls++;
    return this.script.shift() ?? 'none';
  }
}

class RecordingRenderer implements Renderer {
  readonly batches: DrawOp[][] = [];

  render(ops: readonly DrawOp[]): void {
    if (ops.length > 0) this.batches.push([...ops]);
  }
}

describe('playGame', () => {
  // Random 0 always lands on the reserved cell, so food ends up at (2,3)
  const newState = (random: () => number = () => 0) => createGameState(createGrid(10, 10), { random });

  it('runs into the wall when left alone', async () => {
    const state = newState();
    const commands = new ScriptedCommands([]);
    const renderer = new RecordingRenderer();

    const summary = await playGame(state, commands, renderer);

    expect(summary).toEqual({ score: 0, length: 1, blocks: 0, cause: 'wall' });
    // (5,6) (5,7) (5,8) (5,9) each followed by one read, then (5,10) is wall
    expect(commands.calls).toBe(4);
    expect(renderer.batches[renderer.batches.length - 1]).toEqual([
      { kind: 'walls', tone: 'alert' },
      { kind: 'cell', at: { row: 5, col: 10 }, sprite: 'head', tone: 'alert' },
    ]);
  });

  it('draws the opening frame first', async () => {
    const renderer = new RecordingRenderer();
    await playGame(newState(), new ScriptedCommands(['quit']), renderer);
    expect(renderer.batches[0]).toEqual([
      { kind: 'walls', tone: 'normal' },
      { kind: 'cell', at: { row: 2, col: 3 }, sprite: 'food', tone: 'normal' },
      { kind: 'cell', at: { row: 5, col: 5 }, sprite: 'head', tone: 'normal' },
      { kind: 'status', score: 0, paused: false, danger: false },
    ]);
  });

  it('stops on quit without the collision flash', async () => {
    const state = newState();
    const renderer = new RecordingRenderer();
    const summary = await playGame(state, new ScriptedCommands(['quit']), renderer);

    expect(summary.cause).toBe('quit');
    expect(state.snake.head()).toEqual({ row: 5, col: 6 });
    expect(renderer.batches.flat().some(op => op.kind === 'walls' && op.tone === 'alert')).toBe(false);
  });

  it('eats, grows and keeps score', async () => {
    // Random 0.5 puts the first food at (6,6)
    const state = newState(() => 0.5);
    expect(state.food).toEqual({ row: 6, col: 6 });

    const summary = await playGame(state, new ScriptedCommands(['down', 'none', 'quit']), new RecordingRenderer());

    expect(summary).toEqual({ score: 1, length: 2, blocks: 0, cause: 'quit' });
    expect(state.snake.segments()).toEqual([{ row: 7, col: 6 }, { row: 6, col: 6 }]);
  });

  it('leaves blocks behind in danger mode', async () => {
    const state = createGameState(createGrid(10, 10), { random: () => 0.5, danger: true });
    const summary = await playGame(state, new ScriptedCommands(['down', 'quit']), new RecordingRenderer());
    expect(summary.blocks).toBe(1);
  });

  it('holds the snake still while paused but keeps reading input', async () => {
    const state = newState();
    const commands = new ScriptedCommands(['toggle-pause', 'none', 'none', 'toggle-pause', 'quit']);

    await playGame(state, commands, new RecordingRenderer());

    expect(commands.calls).toBe(5);
    // Only the first and last iterations moved the snake
    expect(state.snake.head()).toEqual({ row: 5, col: 7 });
  });
});

function createFakeTerminal(rows: number, cols: number) {
  const writes: string[] = [];
  let listener: Parameters<GameTerminal['onData']>[0] | null = null;

  const terminal: GameTerminal = {
    write: (data) => {
      writes.push(typeof data === 'string' ? data : new TextDecoder().decode(data));
    },
    cols,
    rows,
    onData: (next) => {
      listener = next;
      return { dispose: () => { listener = null; } };
    },
  };

  return {
    terminal,
    writes,
    send: (data: string) => listener?.(data),
    isListening: () => listener !== null,
  };
}

describe('runSnakeGame', () => {
  const fastOptions = { turnPeriodMs: 2, gameOverHoldMs: 0, random: () => 0 };

  it('refuses a terminal that cannot fit the board', () => {
    // One row is kept for the status line
    const { terminal, writes } = createFakeTerminal(10, 40);
    expect(() => runSnakeGame(terminal, fastOptions)).toThrow(TerminalTooSmallError);
    expect(writes).toEqual([]);
  });

  it('quits on q and restores the terminal', async () => {
    const { terminal, writes, send, isListening } = createFakeTerminal(11, 10);
    const controller = runSnakeGame(terminal, { ...fastOptions, turnPeriodMs: 1000 });
    expect(controller.isRunning).toBe(true);

    send('q');
    const summary = await controller.finished;

    expect(summary).toEqual({ score: 0, length: 1, blocks: 0, cause: 'quit' });
    expect(controller.isRunning).toBe(false);
    expect(isListening()).toBe(false);
    expect(writes[0]).toBe('\x1b[?1049h');
    expect(writes.slice(-2)).toEqual(['\x1b[?1049l', '\x1b[?25h']);
  });

  it('treats stop() like quit', async () => {
    const { terminal } = createFakeTerminal(11, 10);
    const controller = runSnakeGame(terminal, { ...fastOptions, turnPeriodMs: 1000 });
    controller.stop();
    await expect(controller.finished).resolves.toMatchObject({ cause: 'quit' });
  });

  it('steers with arrow keys until the wall', async () => {
    const { terminal, writes, send } = createFakeTerminal(11, 10);
    const controller = runSnakeGame(terminal, fastOptions);
    send('\x1b[B');

    const summary = await controller.finished;
    expect(summary.cause).toBe('wall');
    expect(writes.some(w => w.includes('\x1b[10;6H\x1b[1;31m█'))).toBe(true);
  });
});
