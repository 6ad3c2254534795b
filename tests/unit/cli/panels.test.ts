import { Chalk } from 'chalk';
import { describe, expect, test } from 'vitest';

import { bannerPanel, boxed, errorPanel, TROUBLESHOOTING_HINTS } from '../../../src/cli/panels.js';
import { resolveTheme, THEME_NAMES, THEMES, themePainter } from '../../../src/cli/themes.js';

const ESC = '\u001b';
const identity = (text: string) => text;
const plainPainter = themePainter(THEMES.default, new Chalk({ level: 0 }));

describe('boxed', () => {
  test('draws a titled box sized to the widest line', () => {
    expect(boxed('T', [{ plain: 'hello', styled: 'hello' }, { plain: 'hi', styled: 'HI' }], identity)).toBe(
      ['╭─ T ───╮', '│ hello │', '│ HI    │', '╰───────╯'].join('\n'),
    );
  });

  test('widens to fit a long title', () => {
    expect(boxed('Title', [{ plain: 'x', styled: 'x' }], identity)).toBe(
      ['╭─ Title ─╮', '│ x       │', '╰─────────╯'].join('\n'),
    );
  });

  test('paints only the border', () => {
    const lines = boxed('T', [{ plain: 'a', styled: 'a' }], (text) => `<${text}>`).split('\n');

    expect(lines[1]).toBe('<│> a   <│>');
  });
});

describe('errorPanel', () => {
  test('shows the message followed by troubleshooting hints', () => {
    const lines = errorPanel('Boom\nsecond line', plainPainter).split('\n');

    expect(lines).toHaveLength(1 + 2 + 1 + 1 + TROUBLESHOOTING_HINTS.length + 1);
    expect(lines[0]?.startsWith('╭─ Error ─')).toBe(true);
    expect(lines[1]?.startsWith('│ Boom ')).toBe(true);
    expect(lines[2]?.startsWith('│ second line ')).toBe(true);
    expect(lines[3]?.trim()).toMatch(/^│\s+│$/);
    expect(lines[4]?.startsWith('│ Troubleshooting ')).toBe(true);
    expect(lines[5]?.startsWith('│ - Try updating yt-dlp')).toBe(true);
    expect(new Set(lines.map((line) => line.length)).size).toBe(1);
  });
});

describe('bannerPanel', () => {
  test('prompts for a URL', () => {
    expect(bannerPanel(plainPainter)).toBe(
      ['╭─ tty-scrape ─────────────╮', '│ Paste a URL to download. │', '╰──────────────────────────╯'].join('\n'),
    );
  });
});

describe('themes', () => {
  test('lists palettes alphabetically', () => {
    expect(THEME_NAMES).toEqual(['default', 'dracula', 'gruvbox', 'nord']);
  });

  test('falls back to the default palette for unknown names', () => {
    expect(resolveTheme('nord')).toBe(THEMES.nord);
    expect(resolveTheme('neon')).toBe(THEMES.default);
    expect(resolveTheme('toString')).toBe(THEMES.default);
    expect(resolveTheme(undefined)).toBe(THEMES.default);
  });

  test('paints with the palette colours', () => {
    const painter = themePainter(THEMES.default, new Chalk({ level: 3 }));

    expect(painter.accent('x')).toBe(`${ESC}[38;2;95;175;255mx${ESC}[39m`);
    expect(painter.bold('x')).toBe(`${ESC}[1mx${ESC}[22m`);
  });
});
