import { DecodeError, ProtocolViolation } from '../errors';
import { Codec } from '../protocol/codec';
import {
  isMessageName,
  MessageArgs,
  MessageHandler,
  MessageName,
  parseMessageArgs,
  RUN_PHASE_MESSAGES
} from '../protocol/messages';
import { parseFrame } from '../protocol/wire';
import { Logger } from '../utils/logger';

export interface DispatcherOptions {
  codec: Codec;
  logger: Logger;
  /** Receives every line that is not a protocol frame */
  passthrough: (line: string) => void;
}

interface HeldMessage {
  line: string;
  deliver: () => void;
}

const PHASE_RESET_MESSAGES: ReadonlySet<MessageName> = new Set<MessageName>([
  'init',
  'sessionStart',
  'collectionStart'
]);

/**
 * Turns lines into handler calls.
 *
 * Frames are decoded, validated against the message's argument schema and
 * delivered to every registered handler implementing the message, in
 * registration order. Run-phase messages that arrive before `startRunPhase`
 * are held and replayed right after it. Dispatch is synchronous: one line is
 * fully delivered before the next is looked at.
 */
export class MessageDispatcher {
  private readonly codec: Codec;
  private readonly logger: Logger;
  private readonly passthrough: (line: string) => void;
  private readonly handlers: MessageHandler[] = [];
  private readonly reportedNames = new Set<string>();
  private heldBack: HeldMessage[] = [];
  private runPhaseConfirmed = false;
  private shutdownSeen = false;

  constructor(options: DispatcherOptions) {
    this.codec = options.codec;
    this.logger = options.logger;
    this.passthrough = options.passthrough;
  }

  addHandler(handler: MessageHandler): void {
    if (!this.handlers.includes(handler)) {
      this.handlers.push(handler);
    }
  }

  removeHandler(handler: MessageHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  get runPhaseStarted(): boolean {
    return this.runPhaseConfirmed;
  }

  get heldBackCount(): number {
    return this.heldBack.length;
  }

  /** True once `unconfigure` has been delivered for the current stream */
  get sawShutdown(): boolean {
    return this.shutdownSeen;
  }

  /** Forget per-stream state before reading a new child's output. */
  beginStream(): void {
    this.shutdownSeen = false;
    this.runPhaseConfirmed = false;
    this.heldBack = [];
  }

  processLines(lines: Iterable<string>): void {
    for (const line of lines) {
      this.processLine(line);
    }
  }

  processLine(line: string): void {
    const frame = parseFrame(line);
    if (!frame) {
      this.forwardPassthrough(line);
      return;
    }
    if (!isMessageName(frame.name)) {
      this.reportOnce(frame.name, () => {
        this.logger.warn('Ignoring message', { violation: new ProtocolViolation(frame.name).message });
      });
      return;
    }
    this.dispatch(frame.name, frame.args, line);
  }

  /**
   * Deliver anything still held back. Used at end of stream when the run
   * phase was never confirmed.
   */
  releaseHeldBack(): void {
    if (this.heldBack.length === 0) {
      return;
    }
    this.logger.warn('Releasing messages held without a run phase start', {
      count: this.heldBack.length,
      first: this.heldBack[0].line
    });
    this.replayHeldBack();
  }

  private dispatch<K extends MessageName>(name: K, tokens: string[], line: string): void {
    const decoded: unknown[] = [];
    for (const token of tokens) {
      try {
        decoded.push(this.codec.decode(token));
      } catch (error) {
        this.logger.error('Skipping undecodable message', error, {
          name,
          diagnostic: error instanceof DecodeError ? error.diagnostic() : undefined
        });
        return;
      }
    }

    const parsed = parseMessageArgs(name, decoded);
    if (!parsed.success) {
      this.logger.error('Skipping message with invalid arguments', parsed.error, {
        name,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
      return;
    }
    const args = parsed.data;
    this.logger.protocol('receive', name);

    if (RUN_PHASE_MESSAGES.has(name) && !this.runPhaseConfirmed) {
      this.logger.debug('Holding back message until run phase starts', { name });
      this.heldBack.push({ line, deliver: () => this.deliver(name, args, line) });
      return;
    }

    if (PHASE_RESET_MESSAGES.has(name)) {
      this.runPhaseConfirmed = false;
    }
    this.deliver(name, args, line);

    if (name === 'startRunPhase') {
      this.runPhaseConfirmed = true;
      this.replayHeldBack();
    } else if (name === 'unconfigure') {
      this.shutdownSeen = true;
    }
  }

  private replayHeldBack(): void {
    const held = this.heldBack;
    this.heldBack = [];
    if (held.length > 0) {
      this.logger.debug('Replaying held back messages', { count: held.length });
    }
    for (const message of held) {
      message.deliver();
    }
  }

  private deliver<K extends MessageName>(name: K, args: MessageArgs[K], line: string): void {
    let delivered = false;
    for (const handler of [...this.handlers]) {
      const method = handler[name];
      if (!method) {
        continue;
      }
      delivered = true;
      try {
        method.apply(handler, args);
      } catch (error) {
        this.logger.error('Message handler failed', error, { name, line });
      }
    }
    if (!delivered) {
      this.reportOnce(name, () => {
        this.logger.info('No handler for message', { name });
      });
    }
  }

  private forwardPassthrough(line: string): void {
    try {
      this.passthrough(line);
    } catch (error) {
      this.logger.error('Passthrough sink failed', error, { line });
    }
  }

  private reportOnce(name: string, report: () => void): void {
    if (!this.reportedNames.has(name)) {
      this.reportedNames.add(name);
      report();
    }
  }
}
