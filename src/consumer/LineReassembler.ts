const NEWLINE = 0x0a;

/**
 * Splits a chunked byte stream into lines. The unterminated tail of each
 * chunk is kept as raw bytes and prepended to the next one, so a multi-byte
 * character split across reads decodes intact.
 */
export class LineReassembler {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Add a chunk and return every line it completes, in order, without the
   * newline or a trailing carriage return.
   */
  push(chunk: Buffer | string): string[] {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    this.buffer = this.buffer.length === 0 ? bytes : Buffer.concat([this.buffer, bytes]);

    const lines: string[] = [];
    let start = 0;
    let end = this.buffer.indexOf(NEWLINE, start);
    while (end !== -1) {
      lines.push(this.decode(this.buffer.subarray(start, end)));
      start = end + 1;
      end = this.buffer.indexOf(NEWLINE, start);
    }
    this.buffer = this.buffer.subarray(start);
    return lines;
  }

  /** The unterminated remainder, if any; clears it. */
  flush(): string | null {
    if (this.buffer.length === 0) {
      return null;
    }
    const rest = this.decode(this.buffer);
    this.buffer = Buffer.alloc(0);
    return rest;
  }

  get pendingBytes(): number {
    return this.buffer.length;
  }

  private decode(bytes: Buffer): string {
    const text = bytes.toString('utf8');
    return text.endsWith('\r') ? text.slice(0, -1) : text;
  }
}
