/**
 * Terminal color themes
 *
 * ANSI escape codes used when drawing the board.
 */

/**
 * Available theme identifiers
 */
export type PhosphorMode =
  | 'cyan'
  | 'amber'
  | 'green'
  | 'white'
  | 'hotpink'
  | 'blood'
  | 'bladerunner'
  | 'solarized'
  | 'nord'
  | 'daylight';

/**
 * ANSI palette for one theme
 */
export interface ThemePalette {
  /** Display name */
  name: string;
  /** Walls, snake and status line */
  primary: string;
  /** Muted tone for static obstacles */
  subtle: string;
}

export const themes: Record<PhosphorMode, ThemePalette> = {
  cyan: { name: 'Cyberpunk', primary: '\x1b[96m', subtle: '\x1b[38;5;24m' },
  amber: { name: 'Amber', primary: '\x1b[93m', subtle: '\x1b[38;5;94m' },
  green: { name: 'Phosphor', primary: '\x1b[92m', subtle: '\x1b[38;5;22m' },
  white: { name: 'Mono', primary: '\x1b[97m', subtle: '\x1b[38;5;240m' },
  hotpink: { name: 'Hot Pink', primary: '\x1b[95m', subtle: '\x1b[38;5;89m' },
  blood: { name: 'Blood', primary: '\x1b[91m', subtle: '\x1b[38;5;52m' },
  bladerunner: { name: 'Blade Runner', primary: '\x1b[38;5;208m', subtle: '\x1b[38;5;94m' },
  solarized: { name: 'Solarized', primary: '\x1b[36m', subtle: '\x1b[38;5;23m' },
  nord: { name: 'Nord', primary: '\x1b[96m', subtle: '\x1b[38;5;60m' },
  daylight: { name: 'Daylight', primary: '\x1b[34m', subtle: '\x1b[38;5;252m' },
};

// ============================================================================
// API Functions
// ============================================================================

/**
 * Get ANSI escape code for a theme
 */
export function getAnsiColor(mode: PhosphorMode): string {
  return themes[mode].primary;
}

/**
 * Get muted ANSI escape code for a theme
 */
export function getSubtleColor(mode: PhosphorMode): string {
  return themes[mode].subtle;
}

/**
 * Get all available theme modes
 */
export function getThemeModes(): PhosphorMode[] {
  return Object.keys(themes).filter(isValidThemeMode);
}

const VALID_THEME_MODES = new Set<string>(Object.keys(themes));

/**
 * Check if a string is a valid theme mode
 */
export function isValidThemeMode(value: string): value is PhosphorMode {
  return VALID_THEME_MODES.has(value);
}

/**
 * ANSI reset code
 */
export const ANSI_RESET = '\x1b[0m';

/** Alert color used for the collision flash */
export const ANSI_ALERT = '\x1b[1;31m';

/** Food color, independent of theme */
export const ANSI_FOOD = '\x1b[1;33m';
