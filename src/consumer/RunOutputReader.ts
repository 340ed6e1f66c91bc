import type { Readable } from 'stream';
import { ChildProcessError } from '../errors';
import { Logger } from '../utils/logger';
import { LineReassembler } from './LineReassembler';
import { MessageDispatcher } from './MessageDispatcher';

/** The parts of a running test process the reader needs */
export interface ChildStreams {
  stdout: Readable;
  stderr?: Readable;
  /** Resolves with the exit status, or null when the process was killed by a signal */
  exitCode: Promise<number | null>;
  kill(): void;
}

export interface RunExit {
  exitCode: number | null;
  /** The child sent its shutdown message and exited with a status */
  clean: boolean;
  error?: ChildProcessError;
}

export interface RunOutputReaderOptions {
  dispatcher: MessageDispatcher;
  logger: Logger;
  /** Receives stderr lines; they are never parsed as frames */
  stderr: (line: string) => void;
  /** Called exactly once per consumed child, after the exit status is known */
  onFinish?: (exit: RunExit) => void;
}

/**
 * Reads one child's output streams to the end and feeds the dispatcher.
 */
export class RunOutputReader {
  private readonly dispatcher: MessageDispatcher;
  private readonly logger: Logger;
  private readonly stderrSink: (line: string) => void;
  private readonly onFinish?: (exit: RunExit) => void;
  private current: ChildStreams | null = null;

  constructor(options: RunOutputReaderOptions) {
    this.dispatcher = options.dispatcher;
    this.logger = options.logger;
    this.stderrSink = options.stderr;
    this.onFinish = options.onFinish;
  }

  get running(): boolean {
    return this.current !== null;
  }

  /** Kill the child being read, if any. Reading ends with its streams. */
  cancel(): void {
    if (this.current) {
      this.logger.lifecycle('Cancelling test process');
      this.current.kill();
    }
  }

  async consume(child: ChildStreams): Promise<RunExit> {
    this.current = child;
    this.dispatcher.beginStream();

    // Both readers run to completion before the exit is classified
    const reads = await Promise.allSettled([
      this.readStdout(child.stdout),
      child.stderr ? this.readStderr(child.stderr) : Promise.resolve()
    ]);
    for (const [index, read] of reads.entries()) {
      if (read.status === 'rejected') {
        this.logger.error(`Reading test process ${index === 0 ? 'stdout' : 'stderr'} failed`, read.reason);
      }
    }
    this.dispatcher.releaseHeldBack();

    let exitCode: number | null = null;
    try {
      exitCode = await child.exitCode;
    } catch (error) {
      this.logger.error('Could not get test process exit status', error);
    } finally {
      this.current = null;
    }

    const exit = this.classify(exitCode);
    this.finish(exit);
    return exit;
  }

  private async readStdout(stream: Readable): Promise<void> {
    const lines = new LineReassembler();
    for await (const chunk of stream) {
      this.dispatcher.processLines(lines.push(toChunk(chunk)));
    }
    const rest = lines.flush();
    if (rest !== null) {
      this.dispatcher.processLine(rest);
    }
  }

  private async readStderr(stream: Readable): Promise<void> {
    const lines = new LineReassembler();
    for await (const chunk of stream) {
      for (const line of lines.push(toChunk(chunk))) {
        this.stderrSink(line);
      }
    }
    const rest = lines.flush();
    if (rest !== null) {
      this.stderrSink(rest);
    }
  }

  private classify(exitCode: number | null): RunExit {
    if (exitCode === null) {
      return { exitCode, clean: false, error: new ChildProcessError('signal', null) };
    }
    if (!this.dispatcher.sawShutdown) {
      return { exitCode, clean: false, error: new ChildProcessError('stream-closed', exitCode) };
    }
    return { exitCode, clean: true };
  }

  private finish(exit: RunExit): void {
    if (exit.error) {
      this.logger.error('Test process did not shut down cleanly', exit.error, { exitCode: exit.exitCode });
    } else {
      this.logger.lifecycle('Test process finished', { exitCode: exit.exitCode });
    }
    if (!this.onFinish) {
      return;
    }
    try {
      this.onFinish(exit);
    } catch (error) {
      this.logger.error('Run finish handler failed', error);
    }
  }
}

function toChunk(chunk: unknown): Buffer | string {
  if (typeof chunk === 'string' || Buffer.isBuffer(chunk)) {
    return chunk;
  }
  return String(chunk);
}
