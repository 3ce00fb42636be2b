/**
 * Newline framing for byte streams.
 *
 * Accumulates decoded chunks and hands back complete lines. A multi-byte
 * UTF-8 character split across two chunks is held by the decoder until the
 * rest arrives.
 */

import { StringDecoder } from 'node:string_decoder';

export class LineFramer {
  private buffer = '';
  private decoder = new StringDecoder('utf8');

  /**
   * Feed a chunk; returns every line completed by it (without the newline).
   */
  push(chunk: Buffer | string): string[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    const lines: string[] = [];
    let newlineIndex = this.buffer.indexOf('\n');
    while (newlineIndex !== -1) {
      lines.push(this.buffer.slice(0, newlineIndex));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf('\n');
    }
    return lines;
  }

  /**
   * Flush whatever is left at end of stream. Returns the trailing partial
   * line, or null if nothing is buffered.
   */
  end(): string | null {
    this.buffer += this.decoder.end();
    const rest = this.buffer;
    this.buffer = '';
    return rest.length > 0 ? rest : null;
  }

  /** Number of buffered characters not yet terminated by a newline */
  get pending(): number {
    return this.buffer.length;
  }
}

/**
 * Serialize one message to its wire form: a single JSON object plus `\n`.
 */
export function encodeLine(message: unknown): string {
  return `${JSON.stringify(message)}\n`;
}
