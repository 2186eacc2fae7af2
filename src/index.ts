/**
 * term-snake
 *
 * Snake for xterm.js and the CLI.
 *
 * Library usage (xterm.js):
 *   import { runSnakeGame, setTheme } from 'term-snake';
 *   setTheme('green');
 *   const controller = runSnakeGame(terminal, { danger: true });
 *   const { score } = await controller.finished;
 *
 * CLI usage:
 *   npx term-snake --danger
 */

export * from './games';

export {
  themes,
  getThemeModes,
  isValidThemeMode,
  type ThemePalette,
} from './themes';
