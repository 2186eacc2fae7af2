/**
 * Snake rendering
 *
 * The engine never writes to the terminal. It describes each change as a
 * DrawOp and a Renderer turns those into output, so only the cells that
 * changed are redrawn on a normal turn.
 */

import { ANSI_ALERT, ANSI_FOOD, ANSI_RESET } from '../../themes';
import { getCurrentThemeColor, getSubtleBackgroundColor, type GameTerminal } from '../utils';
import type { Coordinate, Grid } from './grid';

export type Sprite = 'head' | 'body' | 'food' | 'block';
export type Tone = 'normal' | 'alert';

export type DrawOp =
  | { kind: 'walls'; tone: Tone }
  | { kind: 'cell'; at: Coordinate; sprite: Sprite; tone: Tone }
  | { kind: 'clear'; at: Coordinate }
  | { kind: 'status'; score: number; paused: boolean; danger: boolean };

export interface Renderer {
  render(ops: readonly DrawOp[]): void;
}

export interface Palette {
  primary: string;
  subtle: string;
  food: string;
  alert: string;
}

export const GLYPHS: Record<Sprite, string> = {
  head: '█',
  body: '▓',
  food: '◆',
  block: '▒',
};

/**
 * Palette for the theme that is active right now
 */
export function currentPalette(): Palette {
  return {
    primary: getCurrentThemeColor(),
    subtle: getSubtleBackgroundColor(),
    food: ANSI_FOOD,
    alert: ANSI_ALERT,
  };
}

function moveTo(c: Coordinate): string {
  return `\x1b[${c.row};${c.col}H`;
}

function encodeWalls(grid: Grid, color: string): string {
  let output = `${moveTo({ row: 1, col: 1 })}${color}╔${'═'.repeat(grid.cols - 2)}╗`;
  for (let row = 2; row < grid.rows; row++) {
    output += `${moveTo({ row, col: 1 })}║${moveTo({ row, col: grid.cols })}║`;
  }
  output += `${moveTo({ row: grid.rows, col: 1 })}╚${'═'.repeat(grid.cols - 2)}╝${ANSI_RESET}`;
  return output;
}

function spriteColor(sprite: Sprite, palette: Palette): string {
  switch (sprite) {
    case 'head': return `\x1b[1m${palette.primary}`;
    case 'body': return palette.primary;
    case 'food': return palette.food;
    case 'block': return palette.subtle;
  }
}

/**
 * Status line shown on the terminal row below the board
 */
export function formatStatus(score: number, paused: boolean, danger: boolean): string {
  let text = `SCORE: ${score.toString().padStart(4, '0')}`;
  if (danger) text += '  DANGER';
  if (paused) text += '  ══ PAUSED ══';
  return text;
}

/**
 * Encode draw operations as one string of escape sequences
 */
export function encodeFrame(ops: readonly DrawOp[], grid: Grid, palette: Palette): string {
  let output = '';
  for (const op of ops) {
    switch (op.kind) {
      case 'walls':
        output += encodeWalls(grid, op.tone === 'alert' ? palette.alert : palette.primary);
        break;
      case 'cell': {
        const color = op.tone === 'alert' ? palette.alert : spriteColor(op.sprite, palette);
        output += `${moveTo(op.at)}${color}${GLYPHS[op.sprite]}${ANSI_RESET}`;
        break;
      }
      case 'clear':
        output += `${moveTo(op.at)} `;
        break;
      case 'status':
        output += `${moveTo({ row: grid.rows + 1, col: 1 })}\x1b[2K${palette.primary}${formatStatus(op.score, op.paused, op.danger)}${ANSI_RESET}`;
        break;
    }
  }
  return output;
}

/**
 * Renderer that writes ANSI output to a terminal, one write per batch
 */
export class AnsiRenderer implements Renderer {
  constructor(
    private readonly terminal: GameTerminal,
    private readonly grid: Grid,
    private readonly palette: Palette = currentPalette(),
  ) {}

  render(ops: readonly DrawOp[]): void {
    if (ops.length === 0) return;
    this.terminal.write(encodeFrame(ops, this.grid, this.palette));
  }
}
