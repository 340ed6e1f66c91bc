import { once } from 'events';
import { RelayError } from '../errors';
import { Codec } from '../protocol/codec';
import { EmitArgs, MessageName } from '../protocol/messages';
import { NodeId } from '../protocol/NodeId';
import { formatFrame } from '../protocol/wire';
import {
  EngineCollectReport,
  EngineConfig,
  EngineItem,
  EngineSession,
  EngineTestReport,
  EngineWarning
} from '../types/engine';
import { Logger } from '../utils/logger';
import { MessageQueue } from './MessageQueue';
import type { PipeOutput } from './pipe-output';
import { CapturedStream, captureStdio, CaptureTargets, StdioCapture } from './stdio-capture';

export type EmitterPhase = 'init' | 'collecting' | 'running' | 'done';

export interface PipeEmitterOptions {
  codec: Codec;
  output: PipeOutput;
  logger: Logger;
}

/**
 * Producer side of the protocol, living in the test process.
 *
 * Lifecycle callbacks from the adapter are turned into frames and pushed onto
 * one queue; a single writer loop drains the queue onto the real output
 * stream, so frames reach the wire whole and in push order no matter which
 * callback produced them.
 */
export class PipeEmitter {
  private readonly codec: Codec;
  private readonly output: PipeOutput;
  private readonly logger: Logger;
  private readonly queue = new MessageQueue<string | null>();
  private readonly writer: Promise<void>;
  private readonly seenCollectReports = new Set<string>();
  private readonly seenWarnings = new Set<string>();
  private phase: EmitterPhase = 'init';
  private collecting = false;
  private runPhaseStarted = false;
  private testsStarted = 0;
  private closed = false;
  private capture: StdioCapture | null = null;
  private framesWritten = 0;

  constructor(options: PipeEmitterOptions) {
    this.codec = options.codec;
    this.output = options.output;
    this.logger = options.logger;
    this.writer = this.drain();
  }

  get currentPhase(): EmitterPhase {
    return this.phase;
  }

  get written(): number {
    return this.framesWritten;
  }

  /**
   * Encode a message and queue its frame. Never throws; after `close()` the
   * message is dropped with a log note.
   */
  put<K extends MessageName>(name: K, ...args: EmitArgs[K]): void {
    if (this.closed) {
      this.logger.warn('Message after close dropped', { name });
      return;
    }
    const values: readonly unknown[] = args;
    const encoded = values.map(arg => this.codec.encode(arg));
    this.logger.protocol('send', name, { args: encoded.length });
    this.queue.push(formatFrame(name, encoded));
  }

  /**
   * Send everything written to stdout and stderr as copy messages from now on.
   */
  redirectStdio(targets?: CaptureTargets): void {
    if (this.capture) {
      return;
    }
    this.capture = captureStdio((stream: CapturedStream, text: string) => {
      if (stream === 'stdout') {
        this.put('copyStdout', text);
      } else {
        this.put('copyStderr', text);
      }
    }, targets);
    this.logger.decision('Output redirection', 'enabled', 'protocol frames own stdout');
  }

  init(config: EngineConfig): void {
    this.put('init', config);
  }

  sessionStart(session: EngineSession): void {
    this.put('sessionStart', session);
  }

  runTestLoop(): void {
    this.put('runTestLoop');
  }

  collectionStart(): void {
    if (this.collecting) {
      return;
    }
    this.collecting = true;
    if (this.phase === 'init') {
      this.phase = 'collecting';
    }
    this.put('collectionStart');
  }

  collectReport(report: EngineCollectReport): void {
    if (!this.collecting) {
      this.logger.warn('Collect report outside collection dropped', { nodeid: report.nodeid });
      return;
    }
    if (this.seenCollectReports.has(report.nodeid)) {
      this.logger.info('Dropping duplicate collect report', { nodeid: report.nodeid });
      return;
    }
    this.seenCollectReports.add(report.nodeid);
    this.put('collectReport', report);
  }

  deselected(items: EngineItem[]): void {
    if (items.length > 0) {
      this.put('deselectTests', items);
    }
  }

  collectionFinish(): void {
    if (!this.collecting) {
      return;
    }
    this.collecting = false;
    this.put('collectionFinish');
    if (this.testsStarted > 0) {
      this.enterRunPhase('tests started during collection');
    }
  }

  testStart(nodeid: string): void {
    this.testsStarted++;
    if (!this.collecting) {
      this.enterRunPhase('first test start after collection');
    }
    this.put('startTest', new NodeId(nodeid));
  }

  testReport(report: EngineTestReport): void {
    this.put('testReport', report);
  }

  testFinish(nodeid: string): void {
    this.put('endTest', new NodeId(nodeid));
  }

  warning(warning: EngineWarning): void {
    if (this.seenWarnings.has(warning.key)) {
      return;
    }
    this.seenWarnings.add(warning.key);
    this.put('warningRecorded', warning);
  }

  internalError(error: unknown): void {
    const text = error instanceof Error ? (error.stack ?? error.message) : String(error);
    this.put('internalError', text);
  }

  keyboardInterrupt(): void {
    this.put('keyboardInterrupt');
  }

  sessionFinish(exitStatus: number): void {
    if (this.testsStarted > 0) {
      this.enterRunPhase('session ending');
    }
    this.phase = 'done';
    this.put('sessionEnd', exitStatus);
  }

  /**
   * Send `unconfigure`, stop accepting messages and wait until every queued
   * frame has been written.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return this.writer;
    }
    this.put('unconfigure');
    this.closed = true;
    this.phase = 'done';
    this.capture?.restore();
    this.capture = null;
    this.queue.push(null);
    await this.writer;
    this.logger.lifecycle('Emitter closed', { frames: this.framesWritten });
  }

  private enterRunPhase(reason: string): void {
    if (this.runPhaseStarted) {
      return;
    }
    this.runPhaseStarted = true;
    if (this.phase !== 'done') {
      this.phase = 'running';
    }
    this.logger.decision('Run phase start inferred', reason);
    this.put('startRunPhase');
  }

  private async drain(): Promise<void> {
    for (;;) {
      const frame = await this.queue.take();
      if (frame === null) {
        return;
      }
      try {
        await this.writeFrame(frame + '\n');
        this.framesWritten++;
      } catch (error) {
        this.logger.error('Protocol stream unavailable, discarding remaining frames', error, {
          pending: this.queue.size
        });
        await this.discardUntilSentinel();
        return;
      }
    }
  }

  /**
   * Write one frame. When the stream signals backpressure, wait for `drain`;
   * a stream that closes or fails first ends the writer.
   */
  private async writeFrame(data: string): Promise<void> {
    const { stream } = this.output;
    if (stream.destroyed || stream.writableEnded) {
      throw new RelayError('Protocol stream already closed');
    }
    if (this.output.write(data)) {
      return;
    }
    const waiting = new AbortController();
    const closed = once(stream, 'close', { signal: waiting.signal }).then(() => {
      throw new RelayError('Protocol stream closed while waiting for drain');
    });
    try {
      await Promise.race([once(stream, 'drain', { signal: waiting.signal }), closed]);
    } finally {
      waiting.abort();
    }
  }

  private async discardUntilSentinel(): Promise<void> {
    for (;;) {
      const frame = await this.queue.take();
      if (frame === null) {
        return;
      }
    }
  }
}
