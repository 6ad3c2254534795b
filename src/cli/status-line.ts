import { CLEAR_LINE, type TerminalStream } from './terminal-surface.js';

/**
 * Single rewritable progress line on a terminal; one line per update when the
 * stream is piped.
 */
export class StatusLine {
  private active = false;

  public constructor(private readonly stream: TerminalStream) {}

  public update(message: string): void {
    if (this.stream.isTTY) {
      this.stream.write(`\r${CLEAR_LINE}${message}`);
      this.active = true;
      return;
    }
    this.stream.write(`${message}\n`);
  }

  public finish(): void {
    if (this.active) {
      this.stream.write('\n');
      this.active = false;
    }
  }
}
