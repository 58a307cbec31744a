/**
 * Terminal color themes
 *
 * ANSI escape codes for the snake body, food and status line.
 */

/**
 * Available theme identifiers
 */
export type ThemeName = 'cyan' | 'amber' | 'green' | 'white';

export interface ThemeColors {
  /** Display name */
  name: string;
  /** Snake body and board text */
  primary: string;
  /** Food */
  accent: string;
  /** Status line */
  dim: string;
}

export const ANSI_RESET = '\x1b[0m';

export const themes: Record<ThemeName, ThemeColors> = {
  cyan: {
    name: 'Cyberpunk',
    primary: '\x1b[96m',
    accent: '\x1b[95m',
    dim: '\x1b[2;96m',
  },
  amber: {
    name: 'Amber',
    primary: '\x1b[33m',
    accent: '\x1b[91m',
    dim: '\x1b[2;33m',
  },
  green: {
    name: 'Phosphor',
    primary: '\x1b[92m',
    accent: '\x1b[93m',
    dim: '\x1b[2;92m',
  },
  white: {
    name: 'Mono',
    primary: '\x1b[97m',
    accent: '\x1b[1;97m',
    dim: '\x1b[2;37m',
  },
};

export function getThemeNames(): ThemeName[] {
  return Object.keys(themes).filter(isValidThemeName);
}

export function isValidThemeName(value: string): value is ThemeName {
  return Object.prototype.hasOwnProperty.call(themes, value);
}

let currentTheme: ThemeName = 'cyan';

/**
 * Set the current theme
 * Call this from the host before starting a game
 */
export function setTheme(name: ThemeName): void {
  currentTheme = name;
}

export function getTheme(): ThemeName {
  return currentTheme;
}

export function getThemeColors(name: ThemeName = currentTheme): ThemeColors {
  return themes[name];
}
