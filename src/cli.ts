/**
 * CLI entry point for term-snake
 *
 * Provides a Node.js terminal adapter that maps stdin/stdout to the
 * xterm.js-compatible interface the game runs on, checks the terminal
 * before the game starts and prints the final score once it ends.
 */

import * as p from '@clack/prompts';
import { DEFAULT_CLI_ARGS, parseArgs, UsageError, type CliArgs } from './args';
import {
  createGrid,
  runSnakeGame,
  setTheme,
  TerminalTooSmallError,
  type EndCause,
  type GameSummary,
  type GameTerminal,
  type SnakeController,
} from './games';

// ---------------------------------------------------------------------------
// Node Terminal Adapter
// ---------------------------------------------------------------------------

interface NodeTerminal extends GameTerminal {
  /** Leave raw mode and put the terminal back the way we found it */
  restore: () => void;
}

type DataListener = Parameters<GameTerminal['onData']>[0];

// Synchronized output: wrap writes with DEC sync sequences so the
// terminal paints each batch of cell updates at once.
const SYNC_START = '\x1b[?2026h';
const SYNC_END = '\x1b[?2026l';

function createNodeTerminal(onInterrupt: () => void): NodeTerminal {
  const dataListeners = new Set<DataListener>();
  let restored = false;

  process.stdin.setRawMode(true);
  process.stdin.resume();
  process.stdin.setEncoding('utf8');

  process.stdin.on('data', (data: string) => {
    // Raw mode swallows the SIGINT that Ctrl-C would normally raise
    if (data.includes('\x03')) {
      onInterrupt();
      return;
    }
    for (const listener of [...dataListeners]) {
      listener(data);
    }
  });

  function restore() {
    if (restored) return;
    restored = true;
    process.stdin.setRawMode(false);
    process.stdin.pause();
    process.stdout.write('\x1b[?1049l');
    process.stdout.write('\x1b[?25h');
    process.stdout.write('\x1b[0m');
  }

  process.on('exit', restore);

  return {
    write: (data) => {
      process.stdout.write(SYNC_START);
      process.stdout.write(data);
      process.stdout.write(SYNC_END);
    },
    get cols() { return process.stdout.columns || 80; },
    get rows() { return process.stdout.rows || 24; },
    onData: (listener) => {
      dataListeners.add(listener);
      return {
        dispose: () => {
          dataListeners.delete(listener);
        },
      };
    },
    restore,
  };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const CAUSE_MESSAGES: Record<EndCause, string> = {
  wall: 'Hit the wall',
  block: 'Hit a block',
  self: 'Bit your own tail',
  quit: 'Quit',
  'board-full': 'Board full',
};

function printHelp() {
  console.log(`
  term-snake: Snake in your terminal

  Usage:
    term-snake [options]

  Options:
    -d, --danger         Every food eaten leaves a permanent block
    -t, --tick <ms>      Turn period in milliseconds (default ${DEFAULT_CLI_ARGS.turnPeriodMs})
    --theme <theme>      Color theme (default ${DEFAULT_CLI_ARGS.theme})
    -h, --help           Show this help

  Controls:
    Arrow keys           Steer
    P                    Pause / resume
    Q                    Quit

  Examples:
    term-snake
    term-snake --danger --theme amber
    term-snake --tick 60
`);
}

function formatSummary(summary: GameSummary): string {
  return `${CAUSE_MESSAGES[summary.cause]}. Final score: ${summary.score}`;
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      p.log.error(err.message);
      p.log.info('Run term-snake --help for usage.');
      process.exit(1);
    }
    throw err;
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    p.log.error('term-snake needs an interactive terminal.');
    process.exit(1);
  }

  // Precondition: the board (terminal minus the status line) must fit
  try {
    createGrid((process.stdout.rows || 24) - 1, process.stdout.columns || 80);
  } catch (err) {
    if (err instanceof TerminalTooSmallError) {
      p.log.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  setTheme(args.theme);

  let controller: SnakeController | null = null;
  const interrupt = () => controller?.stop();
  const terminal = createNodeTerminal(interrupt);
  process.on('SIGINT', interrupt);
  process.on('SIGTERM', interrupt);

  controller = runSnakeGame(terminal, {
    danger: args.danger,
    turnPeriodMs: args.turnPeriodMs,
  });

  try {
    const summary = await controller.finished;
    terminal.restore();
    p.outro(formatSummary(summary));
    process.exit(0);
  } catch (err) {
    terminal.restore();
    p.log.error(`Game crashed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

main().catch(err => {
  console.error('[cli] Unexpected error:', err);
  process.exit(1);
});
