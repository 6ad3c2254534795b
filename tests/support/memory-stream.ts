import type { TerminalStream } from '../../src/cli/terminal-surface.js';

/** Collects everything written to it. */
export class MemoryStream implements TerminalStream {
  public readonly chunks: string[] = [];

  public constructor(public readonly isTTY = false) {}

  public write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  public get text(): string {
    return this.chunks.join('');
  }
}
