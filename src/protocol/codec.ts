import { decode as msgpackDecode, encode as msgpackEncode, ExtensionCodec } from '@msgpack/msgpack';
import { DecodeError, EncodingError } from '../errors';
import {
  EngineCollectReport,
  EngineCollector,
  EngineConfig,
  EngineItem,
  EngineSession,
  EngineTestReport,
  EngineWarning
} from '../types/engine';
import { Logger } from '../utils/logger';
import { NodeId } from './NodeId';
import {
  CollectReportRepresentation,
  CollectorRepresentation,
  ConfigRepresentation,
  ItemRepresentation,
  SessionRepresentation,
  TestReportRepresentation,
  UnrepresentableRepresentation,
  WarningRepresentation,
  unrepresentable
} from './representations';

/** MessagePack extension type carrying a NodeId string */
export const NODE_ID_EXT_TYPE = 1;

const MAX_DEPTH = 32;

const NON_HEX = /[^0-9a-fA-F]/;

export function typeName(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value !== 'object') {
    return typeof value;
  }
  const ctor: unknown = value.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Where in the hex text a MessagePack failure points. Truncated payloads fault
 * at the end; trailing garbage reports its byte position.
 */
function payloadFaultOffset(error: unknown, text: string): number {
  const message = errorMessage(error);
  if (/insufficient data|outside the bounds/i.test(message)) {
    return text.length;
  }
  const position = /buffer\[(\d+)\]/.exec(message);
  if (position) {
    return Math.min(Number(position[1]) * 2, text.length);
  }
  return 0;
}

/**
 * Converts engine objects to hex text and back.
 *
 * Encoding never throws: anything without a Representation is logged as an
 * EncodingError and replaced by an `unrepresentable` placeholder. Decoding
 * throws DecodeError for malformed text. The first decoded config fixes the
 * root path used for every NodeId decoded afterwards.
 */
export class Codec {
  private root: string | null = null;
  private readonly extensionCodec = new ExtensionCodec();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
    this.extensionCodec.register({
      type: NODE_ID_EXT_TYPE,
      encode: (input: unknown) => (input instanceof NodeId ? Buffer.from(input.value, 'utf8') : null),
      decode: (data: Uint8Array) =>
        new NodeId(Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf8'), this.root ?? '')
    });
  }

  get rootPath(): string | null {
    return this.root;
  }

  encode(value: unknown): string {
    const represented = this.represent(value);
    let bytes: Uint8Array;
    try {
      bytes = msgpackEncode(represented, { extensionCodec: this.extensionCodec, ignoreUndefined: true });
    } catch (error) {
      const failure = new EncodingError(typeName(value), errorMessage(error), { cause: error });
      this.logger.error('Serialization failed, sending placeholder', failure);
      bytes = msgpackEncode(unrepresentable(failure.typeName, failure.message));
    }
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
  }

  decode(text: string): unknown {
    const bad = NON_HEX.exec(text);
    if (bad) {
      throw new DecodeError(text, bad.index, `unexpected character ${JSON.stringify(bad[0])}`);
    }
    if (text.length % 2 !== 0) {
      throw new DecodeError(text, text.length - 1, 'odd number of hex digits');
    }

    let value: unknown;
    try {
      value = msgpackDecode(Buffer.from(text, 'hex'), { extensionCodec: this.extensionCodec });
    } catch (error) {
      throw new DecodeError(text, payloadFaultOffset(error, text), errorMessage(error), { cause: error });
    }
    this.captureRoot(value);
    return value;
  }

  /**
   * Replace engine objects with their Representations. Sequences and plain
   * objects are walked; primitives pass through.
   */
  represent(value: unknown): unknown {
    return this.representField(value, 0);
  }

  private captureRoot(value: unknown): void {
    if (this.root !== null || !isPlainObject(value)) {
      return;
    }
    const config = value.kind === 'session' ? value.config : value;
    if (isPlainObject(config) && config.kind === 'config' && typeof config.rootPath === 'string') {
      this.root = config.rootPath;
      this.logger.debug('Captured root path', { rootPath: this.root });
    }
  }

  private representField(value: unknown, depth: number): unknown {
    try {
      return this.representValue(value, depth);
    } catch (error) {
      const failure = error instanceof EncodingError
        ? error
        : new EncodingError(typeName(value), errorMessage(error), { cause: error });
      this.logger.warn('Unrepresentable value replaced by placeholder', {
        typeName: failure.typeName,
        reason: failure.message
      });
      return unrepresentable(failure.typeName, failure.message);
    }
  }

  private representValue(value: unknown, depth: number): unknown {
    if (depth > MAX_DEPTH) {
      throw new EncodingError(typeName(value), `nested deeper than ${MAX_DEPTH} levels`);
    }
    if (value === null || value === undefined) {
      return value;
    }
    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
        return value;
      case 'bigint':
        if (value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
          return Number(value);
        }
        throw new EncodingError('bigint', 'outside the safe integer range');
      case 'function':
      case 'symbol':
        throw new EncodingError(typeof value, 'not data');
    }

    if (value instanceof NodeId || value instanceof Uint8Array || value instanceof Date) {
      return value;
    }
    if (value instanceof EngineConfig) {
      return this.representConfig(value, depth);
    }
    if (value instanceof EngineSession) {
      return this.representSession(value, depth);
    }
    if (value instanceof EngineItem) {
      return this.representItem(value);
    }
    if (value instanceof EngineCollector) {
      return this.representCollector(value);
    }
    if (value instanceof EngineCollectReport) {
      return this.representCollectReport(value);
    }
    if (value instanceof EngineTestReport) {
      return this.representTestReport(value);
    }
    if (value instanceof EngineWarning) {
      return this.representWarning(value);
    }
    if (Array.isArray(value)) {
      const entries: unknown[] = value;
      return entries.map(entry => this.representField(entry, depth + 1));
    }
    if (isPlainObject(value)) {
      return this.representRecord(value, depth + 1);
    }
    throw new EncodingError(typeName(value), 'no representation for this kind');
  }

  private representRecord(record: Record<string, unknown>, depth: number): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(record)) {
      result[key] = this.representField(entry, depth);
    }
    return result;
  }

  private representLongRepr(value: unknown): string | UnrepresentableRepresentation | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value === 'string') {
      return value;
    }
    if (value instanceof Error) {
      return value.stack ?? `${value.name}: ${value.message}`;
    }
    this.logger.warn('Failure detail is not text', { typeName: typeName(value) });
    return unrepresentable(typeName(value), 'failure detail is not text');
  }

  private representConfig(config: EngineConfig, depth: number): ConfigRepresentation {
    return {
      kind: 'config',
      rootPath: config.rootPath,
      args: [...config.args],
      options: this.representRecord(config.options, depth + 1),
      workerCount: config.workerCount
    };
  }

  private representSession(session: EngineSession, depth: number): SessionRepresentation {
    return {
      kind: 'session',
      config: this.representConfig(session.config, depth + 1),
      startTime: session.startTime
    };
  }

  private representItem(item: EngineItem): ItemRepresentation {
    return {
      kind: 'item',
      nodeid: new NodeId(item.nodeid),
      name: item.name,
      path: item.path,
      originalName: item.originalName,
      markers: [...item.markers],
      location: item.location
    };
  }

  private representCollector(collector: EngineCollector): CollectorRepresentation {
    return {
      kind: 'collector',
      nodeid: new NodeId(collector.nodeid),
      name: collector.name,
      path: collector.path,
      nodeType: collector.nodeType
    };
  }

  private representCollectReport(report: EngineCollectReport): CollectReportRepresentation {
    const result: Array<ItemRepresentation | CollectorRepresentation> = [];
    for (const node of report.result) {
      if (node instanceof EngineItem) {
        result.push(this.representItem(node));
      } else if (node instanceof EngineCollector) {
        result.push(this.representCollector(node));
      } else {
        this.logger.warn('Dropping unrecognised collected node', {
          report: report.nodeid,
          typeName: typeName(node)
        });
      }
    }
    return {
      kind: 'collect_report',
      nodeid: new NodeId(report.nodeid),
      outcome: report.outcome,
      result,
      longrepr: this.representLongRepr(report.longrepr),
      sections: report.sections.map(([title, body]): [string, string] => [title, body])
    };
  }

  private representTestReport(report: EngineTestReport): TestReportRepresentation {
    return {
      kind: 'test_report',
      nodeid: new NodeId(report.nodeid),
      when: report.when,
      outcome: report.outcome,
      duration: report.duration,
      start: report.start,
      stop: report.stop,
      location: report.location,
      longrepr: this.representLongRepr(report.longrepr),
      sections: report.sections.map(([title, body]): [string, string] => [title, body]),
      wasxfail: report.wasxfail,
      workerId: report.workerId
    };
  }

  private representWarning(warning: EngineWarning): WarningRepresentation {
    return {
      kind: 'warning',
      message: warning.message,
      when: warning.when,
      nodeid: warning.nodeid,
      category: warning.category,
      filename: warning.filename,
      lineNumber: warning.lineNumber
    };
  }
}
