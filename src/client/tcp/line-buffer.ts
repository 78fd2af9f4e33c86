/**
 * Newline framing for the text protocol.
 *
 * Accumulates incoming chunks and hands out complete lines. Unlike a JSON
 * stream, blank lines are kept: an empty handshake reply means something.
 */
import { StringDecoder } from 'node:string_decoder';

export class LineBuffer {
  /** Decodes UTF-8 across chunk boundaries */
  private decoder = new StringDecoder('utf8');
  /** Accumulated string chunks waiting to be split */
  private chunks: string[] = [];
  /** Partial line from previous extraction */
  private remainder = '';

  /**
   * Appends new data to the buffer.
   *
   * @param data - Raw data from socket
   */
  append(data: Buffer | string): void {
    this.chunks.push(typeof data === 'string' ? data : this.decoder.write(data));
  }

  /**
   * Extracts all complete lines, without terminators (`\n` or `\r\n`).
   * A trailing partial line is kept for the next call.
   */
  extractLines(): string[] {
    const fullBuffer = this.remainder + this.chunks.join('');
    this.chunks.length = 0;

    const lines = fullBuffer.split('\n');
    this.remainder = lines.pop() ?? '';

    return lines.map(stripCarriageReturn);
  }

  /**
   * Returns the unterminated tail left at end of stream, if any, and clears it.
   */
  flush(): string | undefined {
    const tail = this.remainder + this.chunks.join('') + this.decoder.end();
    this.reset();
    return tail === '' ? undefined : stripCarriageReturn(tail);
  }

  reset(): void {
    this.chunks.length = 0;
    this.remainder = '';
    this.decoder = new StringDecoder('utf8');
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
