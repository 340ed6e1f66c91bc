import debounce from 'lodash.debounce';

export type OutputStreamName = 'stdout' | 'stderr';

export type TextSink = (text: string) => void;

interface Debounced {
  (): void;
  cancel(): void;
}

export interface PassthroughWriterOptions {
  stdout: TextSink;
  stderr: TextSink;
  /** Idle time before an unterminated line is written anyway */
  partialLineDelay?: number;
}

const PARTIAL_LINE_DELAY = 500;

/**
 * Writes the test process's own output to the terminal.
 *
 * Whole lines go straight through. Copied output can arrive in pieces, so a
 * trailing partial line is held until its newline arrives or the stream has
 * been quiet for a while.
 */
export class PassthroughWriter {
  private readonly sinks: Record<OutputStreamName, TextSink>;
  private readonly pending: Record<OutputStreamName, string> = { stdout: '', stderr: '' };
  private readonly debouncedFlush: Debounced;

  constructor(options: PassthroughWriterOptions) {
    this.sinks = { stdout: options.stdout, stderr: options.stderr };
    this.debouncedFlush = debounce(() => this.flush(), options.partialLineDelay ?? PARTIAL_LINE_DELAY);
  }

  /** Write one complete line; a held partial line on the same stream goes first. */
  writeLine(stream: OutputStreamName, line: string): void {
    this.flushStream(stream);
    this.sinks[stream](line + '\n');
  }

  /** Write arbitrary text, holding back an unterminated tail. */
  writeText(stream: OutputStreamName, text: string): void {
    const combined = this.pending[stream] + text;
    const lastNewline = combined.lastIndexOf('\n');
    if (lastNewline !== -1) {
      this.sinks[stream](combined.slice(0, lastNewline + 1));
    }
    this.pending[stream] = combined.slice(lastNewline + 1);
    if (this.pending[stream]) {
      this.debouncedFlush();
    }
  }

  hasPending(stream: OutputStreamName): boolean {
    return this.pending[stream] !== '';
  }

  /** Write every held partial line now. */
  flush(): void {
    this.flushStream('stdout');
    this.flushStream('stderr');
  }

  close(): void {
    this.debouncedFlush.cancel();
    this.flush();
  }

  private flushStream(stream: OutputStreamName): void {
    const text = this.pending[stream];
    if (text) {
      this.pending[stream] = '';
      this.sinks[stream](text);
    }
  }
}
