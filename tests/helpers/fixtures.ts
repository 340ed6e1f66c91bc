import os from 'os';
import path from 'path';
import { PassThrough } from 'stream';
import type { RelayConfig } from '../../src/config';
import { Codec } from '../../src/protocol/codec';
import { NodeId } from '../../src/protocol/NodeId';
import type {
  CollectReportRepresentation,
  ItemRepresentation,
  TestReportRepresentation
} from '../../src/protocol/representations';
import { formatFrame, parseFrame } from '../../src/protocol/wire';
import type { Outcome, Phase } from '../../src/types/engine';
import { Logger } from '../../src/utils/logger';

export function testLogger(component = 'test'): Logger {
  return Logger.create(component);
}

export function testConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  const logDir = path.join(os.tmpdir(), 'testrelay-test-logs');
  return {
    command: ['npx', 'vitest', 'run'],
    cwd: '/repo',
    width: 80,
    height: 24,
    standardSymbols: false,
    reportDir: logDir,
    logDir,
    debug: false,
    ...overrides
  };
}

export function item(id: string): ItemRepresentation {
  const nodeid = new NodeId(id);
  return { kind: 'item', nodeid, name: nodeid.name, path: nodeid.filePath, markers: [] };
}

export function collected(file: string, ids: string[]): CollectReportRepresentation {
  return {
    kind: 'collect_report',
    nodeid: new NodeId(file),
    outcome: 'passed',
    result: ids.map(item),
    sections: []
  };
}

export function phaseReport(
  id: string,
  when: Phase,
  outcome: Outcome,
  extra: Partial<TestReportRepresentation> = {}
): TestReportRepresentation {
  return {
    kind: 'test_report',
    nodeid: new NodeId(id),
    when,
    outcome,
    duration: 0,
    start: 0,
    stop: 0,
    sections: [],
    ...extra
  };
}

/** A protocol line carrying `args`, encoded with `codec` */
export function frame(codec: Codec, name: string, ...args: unknown[]): string {
  return formatFrame(name, args.map(arg => codec.encode(arg)));
}

/** Everything written to `stream` so far, as text */
export function collectText(stream: PassThrough): () => string {
  const chunks: Buffer[] = [];
  stream.on('data', (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString('utf8');
}

/** Message names of the protocol lines in `text`, in order */
export function frameNames(text: string): string[] {
  const names: string[] = [];
  for (const line of text.split('\n')) {
    const parsed = parseFrame(line);
    if (parsed) {
      names.push(parsed.name);
    }
  }
  return names;
}

/** Decoded arguments of every frame named `name` in `text` */
export function frameArgs(codec: Codec, text: string, name: string): unknown[][] {
  const result: unknown[][] = [];
  for (const line of text.split('\n')) {
    const parsed = parseFrame(line);
    if (parsed && parsed.name === name) {
      result.push(parsed.args.map(arg => codec.decode(arg)));
    }
  }
  return result;
}
