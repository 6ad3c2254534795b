import type { ThemePainter } from './themes.js';

export const TROUBLESHOOTING_HINTS = [
  'Try updating yt-dlp: `yt-dlp -U` (or reinstall it with your package manager)',
  'Install ffmpeg for high-res merges',
  'Some sites require login/cookies',
  'Run with LOG_LEVEL=debug for details on stderr',
] as const;

/**
 * Draws `lines` inside a rounded box titled `title`. `paint` colours the
 * border; content is expected to be styled by the caller already, so widths
 * are measured on the unstyled text given in `plain`.
 */
export function boxed(
  title: string,
  lines: readonly { readonly plain: string; readonly styled: string }[],
  paint: (text: string) => string,
): string {
  const width = Math.max(title.length + 2, ...lines.map((line) => line.plain.length));

  const top = paint(`╭─ ${title} ${'─'.repeat(width - title.length - 1)}╮`);
  const body = lines.map(
    (line) => `${paint('│')} ${line.styled}${' '.repeat(width - line.plain.length)} ${paint('│')}`,
  );
  const bottom = paint(`╰${'─'.repeat(width + 2)}╯`);

  return [top, ...body, bottom].join('\n');
}

export function errorPanel(message: string, painter: ThemePainter): string {
  const plain = (text: string, style: (value: string) => string = (value) => value) => ({
    plain: text,
    styled: style(text),
  });

  return boxed(
    'Error',
    [
      ...message.split('\n').map((line) => plain(line, painter.error)),
      plain(''),
      plain('Troubleshooting', painter.bold),
      ...TROUBLESHOOTING_HINTS.map((hint) => plain(`- ${hint}`)),
    ],
    painter.error,
  );
}

export function bannerPanel(painter: ThemePainter): string {
  return boxed(
    'tty-scrape',
    [{ plain: 'Paste a URL to download.', styled: 'Paste a URL to download.' }],
    painter.accent,
  );
}
