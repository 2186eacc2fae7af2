/**
 * Shared utilities for games
 *
 * Theme state and terminal buffer management. The theme is configured by
 * the consuming application via setTheme().
 */

import type { Terminal } from '@xterm/xterm';
import {
  type PhosphorMode,
  getAnsiColor,
  getSubtleColor,
} from '../themes';

/**
 * The part of an xterm.js Terminal the game needs.
 * A real xterm Terminal satisfies it, and so does the Node adapter in cli.ts.
 */
export type GameTerminal = Pick<Terminal, 'write' | 'cols' | 'rows' | 'onData'>;

// ============================================================================
// Theme Configuration
// ============================================================================

/**
 * Current theme mode - configured by the consuming application
 */
let currentTheme: PhosphorMode = 'cyan';

/**
 * Set the current theme mode
 */
export function setTheme(mode: PhosphorMode): void {
  currentTheme = mode;
}

/**
 * Get the current theme mode
 */
export function getTheme(): PhosphorMode {
  return currentTheme;
}

/**
 * Get current theme color code
 */
export function getCurrentThemeColor(): string {
  return getAnsiColor(currentTheme);
}

/**
 * Get a muted color for background elements such as obstacles
 */
export function getSubtleBackgroundColor(): string {
  return getSubtleColor(currentTheme);
}

// ============================================================================
// Alternate Buffer Management
// ============================================================================

/**
 * Track which terminals are currently in alternate buffer.
 * This prevents double-entry/exit issues and provides debugging info.
 */
const alternateBufferState = new WeakMap<GameTerminal, { reason: string; enteredAt: number }>();

/**
 * Enter alternate screen buffer, hide the cursor and clear the screen.
 * Safe to call multiple times - will log warning but not double-enter.
 *
 * @param reason - Description of why we're entering (for debugging)
 * @returns true if buffer was entered, false if already in buffer
 */
export function enterAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  const existing = alternateBufferState.get(terminal);
  if (existing) {
    console.warn(`[AlternateBuffer] Already in buffer (entered by: ${existing.reason}), requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[?1049h'); // Enter alternate screen buffer
  terminal.write('\x1b[?25l');   // Hide cursor
  terminal.write('\x1b[2J\x1b[H'); // Clear screen

  alternateBufferState.set(terminal, { reason, enteredAt: Date.now() });
  return true;
}

/**
 * Exit alternate screen buffer and show the cursor again.
 * Safe to call multiple times - will log warning but not double-exit.
 *
 * @returns true if buffer was exited, false if not in buffer
 */
export function exitAlternateBuffer(terminal: GameTerminal, reason: string): boolean {
  if (!alternateBufferState.has(terminal)) {
    console.warn(`[AlternateBuffer] Not in alternate buffer, exit requested by: ${reason}`);
    return false;
  }

  terminal.write('\x1b[0m');
  terminal.write('\x1b[?1049l'); // Exit alternate screen buffer
  terminal.write('\x1b[?25h');   // Show cursor

  alternateBufferState.delete(terminal);
  return true;
}

/**
 * Check if terminal is currently in alternate buffer
 */
export function isInAlternateBuffer(terminal: GameTerminal): boolean {
  return alternateBufferState.has(terminal);
}

// Re-export PhosphorMode type for convenience
export type { PhosphorMode } from '../themes';
