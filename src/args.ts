/**
 * Command-line flags for the term-snake CLI
 */

import { type PhosphorMode, getThemeModes, isValidThemeMode } from './themes';

export interface CliArgs {
  help: boolean;
  danger: boolean;
  turnPeriodMs: number;
  theme: PhosphorMode;
}

export const DEFAULT_CLI_ARGS: CliArgs = {
  help: false,
  danger: false,
  turnPeriodMs: 100,
  theme: 'cyan',
};

/**
 * Bad flag or flag value; the CLI reports it and exits with status 1
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function valueFor(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

/**
 * Parse argv (without the node and script entries).
 * Flag values may be given as `--tick 80` or `--tick=80`.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { ...DEFAULT_CLI_ARGS };

  for (let i = 0; i < argv.length; i++) {
    const [flag, inline] = argv[i].split('=', 2);
    const takeValue = (): string => {
      if (inline !== undefined) return valueFor(flag, inline);
      i++;
      return valueFor(flag, argv[i]);
    };

    switch (flag) {
      case '-h':
      case '--help':
        args.help = true;
        break;
      case '-d':
      case '--danger':
        args.danger = true;
        break;
      case '-t':
      case '--tick': {
        const raw = takeValue();
        const ms = Number(raw);
        if (!Number.isInteger(ms) || ms <= 0) {
          throw new UsageError(`Invalid turn period: ${raw} (expected a positive number of milliseconds)`);
        }
        args.turnPeriodMs = ms;
        break;
      }
      case '--theme': {
        const theme = takeValue();
        if (!isValidThemeMode(theme)) {
          throw new UsageError(`Unknown theme: ${theme} (available: ${getThemeModes().join(', ')})`);
        }
        args.theme = theme;
        break;
      }
      default:
        throw new UsageError(`Unknown option: ${argv[i]}`);
    }
  }

  return args;
}
