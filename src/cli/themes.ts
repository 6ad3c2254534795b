import type { ChalkInstance } from 'chalk';

export interface CliTheme {
  readonly accent: string;
  readonly success: string;
  readonly error: string;
  readonly muted: string;
}

export const THEMES = {
  default: { accent: '#5fafff', success: '#5fd75f', error: '#ff5f5f', muted: '#8a8a8a' },
  dracula: { accent: '#bd93f9', success: '#50fa7b', error: '#ff5555', muted: '#6272a4' },
  gruvbox: { accent: '#83a598', success: '#b8bb26', error: '#fb4934', muted: '#928374' },
  nord: { accent: '#88c0d0', success: '#a3be8c', error: '#bf616a', muted: '#4c566a' },
} as const satisfies Record<string, CliTheme>;

export type ThemeName = keyof typeof THEMES;

export const THEME_NAMES = Object.keys(THEMES).sort();

export function isThemeName(value: string): value is ThemeName {
  return Object.hasOwn(THEMES, value);
}

/** Unknown or missing names fall back to `default`. */
export function resolveTheme(name: string | null | undefined): CliTheme {
  return name && isThemeName(name) ? THEMES[name] : THEMES.default;
}

export interface ThemePainter {
  readonly accent: (text: string) => string;
  readonly success: (text: string) => string;
  readonly error: (text: string) => string;
  readonly muted: (text: string) => string;
  readonly bold: (text: string) => string;
}

export function themePainter(theme: CliTheme, chalk: ChalkInstance): ThemePainter {
  return {
    accent: (text) => chalk.hex(theme.accent)(text),
    success: (text) => chalk.hex(theme.success)(text),
    error: (text) => chalk.hex(theme.error)(text),
    muted: (text) => chalk.hex(theme.muted)(text),
    bold: (text) => chalk.bold(text),
  };
}
