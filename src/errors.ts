/**
 * Error taxonomy for the relay. None of these abort a run: each is logged at
 * the point it is raised and the affected message or record is skipped or
 * recovered.
 */
export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A value the codec has no Representation for. */
export class EncodingError extends RelayError {
  constructor(
    readonly typeName: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot represent ${typeName}: ${reason}`, options);
  }
}

const DIAGNOSTIC_WIDTH = 60;

function chop(text: string, width: number): string[] {
  const lines: string[] = [];
  for (let i = 0; i < text.length; i += width) {
    lines.push(text.slice(i, i + width));
  }
  return lines;
}

/** A payload that is not valid hex or not a valid serialization. */
export class DecodeError extends RelayError {
  readonly before: string;
  readonly after: string;

  constructor(
    readonly input: string,
    readonly offset: number,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Bad payload at offset ${offset}: ${reason}`, options);
    this.before = input.slice(0, offset);
    this.after = input.slice(offset);
  }

  /**
   * Both halves of the input, split into fixed-width lines for the log.
   */
  diagnostic(width: number = DIAGNOSTIC_WIDTH): string[] {
    return [
      `Decode error at offset ${this.offset} of ${this.input.length}`,
      'Before:',
      ...chop(this.before, width).map(line => `  ${line}`),
      'After:',
      ...chop(this.after, width).map(line => `  ${line}`)
    ];
  }
}

/** A frame whose message name is not part of the protocol. */
export class ProtocolViolation extends RelayError {
  constructor(readonly messageName: string) {
    super(`Unknown message: ${messageName}`);
  }
}

/** A phase report or transition for an unknown or already-reported test. */
export class LifecycleOrderError extends RelayError {
  constructor(
    readonly nodeid: string,
    detail: string
  ) {
    super(`${nodeid}: ${detail}`);
  }
}

export type ChildFailureReason = 'stream-closed' | 'signal' | 'spawn-failed';

/** The child went away without completing the protocol shutdown. */
export class ChildProcessError extends RelayError {
  constructor(
    readonly reason: ChildFailureReason,
    readonly exitCode: number | null,
    options?: { cause?: unknown }
  ) {
    super(
      reason === 'spawn-failed'
        ? 'Test process could not be started'
        : `Test process ended abruptly (${reason}, exit code ${exitCode ?? 'none'})`,
      options
    );
  }
}
