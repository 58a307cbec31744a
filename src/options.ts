/**
 * Command-line options for the grid-snake CLI
 */

import { getThemeNames, isValidThemeName, type ThemeName } from './themes';

export interface CliOptions {
  theme: ThemeName;
  help: boolean;
  keys: boolean;
}

export type ParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export function parseCliArgs(argv: readonly string[]): ParseResult {
  const args = [...argv];
  const options: CliOptions = { theme: 'cyan', help: false, keys: false };

  if (args.includes('--help') || args.includes('-h')) {
    options.help = true;
  }
  if (args.includes('--keys')) {
    options.keys = true;
  }

  const themeIdx = args.indexOf('--theme');
  if (themeIdx !== -1) {
    const value = args[themeIdx + 1];
    if (value === undefined) {
      return { ok: false, error: '--theme needs a value' };
    }
    if (!isValidThemeName(value)) {
      return { ok: false, error: `Unknown theme: ${value} (available: ${getThemeNames().join(', ')})` };
    }
    options.theme = value;
  }

  return { ok: true, options };
}

export function helpText(): string {
  return `
  grid-snake: terminal snake

  Usage:
    grid-snake                   Play
    grid-snake --theme <theme>   Set color theme
    grid-snake --keys            Show the key table
    grid-snake --help            Show this help

  Themes:
    ${getThemeNames().join(', ')}

  Controls:
    h j k l / arrows     Move
    Space                Pause / resume
    i / ESC              Quit
`;
}
