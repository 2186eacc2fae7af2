import { describe, it, expect, vi } from 'vitest';
import type { GameTerminal } from '../utils';
import { createGrid } from './grid';
import { AnsiRenderer, encodeFrame, formatStatus, type Palette } from './render';

const palette: Palette = { primary: '<P>', subtle: '<S>', food: '<F>', alert: '<A>' };
const grid = createGrid(10, 10);

describe('formatStatus', () => {
  it('pads the score', () => {
    expect(formatStatus(3, false, false)).toBe('SCORE: 0003');
  });

  it('flags danger mode and pause', () => {
    expect(formatStatus(12, true, true)).toBe('SCORE: 0012  DANGER  ══ PAUSED ══');
  });
});

describe('encodeFrame', () => {
  it('positions sprites with their colors', () => {
    const output = encodeFrame([
      { kind: 'cell', at: { row: 3, col: 4 }, sprite: 'head', tone: 'normal' },
      { kind: 'cell', at: { row: 3, col: 5 }, sprite: 'body', tone: 'normal' },
      { kind: 'cell', at: { row: 7, col: 2 }, sprite: 'food', tone: 'normal' },
      { kind: 'cell', at: { row: 8, col: 9 }, sprite: 'block', tone: 'normal' },
    ], grid, palette);

    expect(output).toBe(
      '\x1b[3;4H\x1b[1m<P>█\x1b[0m' +
      '\x1b[3;5H<P>▓\x1b[0m' +
      '\x1b[7;2H<F>◆\x1b[0m' +
      '\x1b[8;9H<S>▒\x1b[0m',
    );
  });

  it('uses the alert color for alert tones', () => {
    const output = encodeFrame([{ kind: 'cell', at: { row: 5, col: 10 }, sprite: 'head', tone: 'alert' }], grid, palette);
    expect(output).toBe('\x1b[5;10H<A>█\x1b[0m');
  });

  it('blanks cleared cells', () => {
    expect(encodeFrame([{ kind: 'clear', at: { row: 2, col: 5 } }], grid, palette)).toBe('\x1b[2;5H ');
  });

  it('writes the status line below the board', () => {
    const output = encodeFrame([{ kind: 'status', score: 1, paused: false, danger: false }], grid, palette);
    expect(output).toBe('\x1b[11;1H\x1b[2K<P>SCORE: 0001\x1b[0m');
  });

  it('draws the wall border', () => {
    const output = encodeFrame([{ kind: 'walls', tone: 'alert' }], grid, palette);
    expect(output.startsWith(`\x1b[1;1H<A>╔${'═'.repeat(8)}╗`)).toBe(true);
    expect(output.endsWith(`\x1b[10;1H╚${'═'.repeat(8)}╝\x1b[0m`)).toBe(true);
    expect(output).toContain('\x1b[5;1H║\x1b[5;10H║');
    expect(output.split('║')).toHaveLength(17);
  });
});

describe('AnsiRenderer', () => {
  function fakeTerminal() {
    const write = vi.fn();
    const terminal: GameTerminal = {
      write,
      cols: 10,
      rows: 11,
      onData: () => ({ dispose: () => {} }),
    };
    return { terminal, write };
  }

  it('writes each batch in one call', () => {
    const { terminal, write } = fakeTerminal();
    const renderer = new AnsiRenderer(terminal, grid, palette);
    renderer.render([
      { kind: 'clear', at: { row: 5, col: 4 } },
      { kind: 'cell', at: { row: 5, col: 6 }, sprite: 'head', tone: 'normal' },
    ]);
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('\x1b[5;4H \x1b[5;6H\x1b[1m<P>█\x1b[0m');
  });

  it('skips empty batches', () => {
    const { terminal, write } = fakeTerminal();
    new AnsiRenderer(terminal, grid, palette).render([]);
    expect(write).not.toHaveBeenCalled();
  });
});
