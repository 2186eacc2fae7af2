import { describe, it, expect } from 'vitest';
import { DEFAULT_CLI_ARGS, parseArgs, UsageError } from './args';

describe('parseArgs', () => {
  it('returns defaults with no flags', () => {
    expect(parseArgs([])).toEqual({ help: false, danger: false, turnPeriodMs: 100, theme: 'cyan' });
    expect(parseArgs([])).toEqual(DEFAULT_CLI_ARGS);
  });

  it('enables danger mode', () => {
    expect(parseArgs(['-d']).danger).toBe(true);
    expect(parseArgs(['--danger']).danger).toBe(true);
  });

  it('reads help flags', () => {
    expect(parseArgs(['-h']).help).toBe(true);
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('reads the turn period in both forms', () => {
    expect(parseArgs(['--tick', '80']).turnPeriodMs).toBe(80);
    expect(parseArgs(['-t=60']).turnPeriodMs).toBe(60);
  });

  it('rejects bad turn periods', () => {
    expect(() => parseArgs(['--tick', 'fast'])).toThrow('Invalid turn period: fast');
    expect(() => parseArgs(['--tick', '0'])).toThrow(UsageError);
    expect(() => parseArgs(['--tick', '1.5'])).toThrow(UsageError);
    expect(() => parseArgs(['--tick'])).toThrow('Missing value for --tick');
  });

  it('selects a theme', () => {
    expect(parseArgs(['--theme', 'amber']).theme).toBe('amber');
  });

  it('rejects unknown themes', () => {
    expect(() => parseArgs(['--theme', 'plaid'])).toThrow('Unknown theme: plaid');
  });

  it('rejects unknown options', () => {
    expect(() => parseArgs(['--speed'])).toThrow('Unknown option: --speed');
  });

  it('combines flags', () => {
    expect(parseArgs(['--danger', '--theme', 'green', '-t', '50'])).toEqual({
      help: false,
      danger: true,
      turnPeriodMs: 50,
      theme: 'green',
    });
  });
});
