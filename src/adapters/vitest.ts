import path from 'path';
import type { Writable } from 'stream';
import type { Reporter } from 'vitest/reporters';
import { PipeEmitter } from '../emitter/PipeEmitter';
import { claimOutput } from '../emitter/pipe-output';
import { Codec } from '../protocol/codec';
import { SCOPE_SEPARATOR } from '../protocol/NodeId';
import { PIPE_ENV } from '../runners/spawn';
import {
  EngineCollector,
  EngineCollectReport,
  EngineConfig,
  EngineItem,
  EngineSession,
  EngineTestReport,
  EngineTestReportInit,
  EngineWarning,
  Location,
  Outcome
} from '../types/engine';
import { Logger } from '../utils/logger';

/*
 * Structural views of the Vitest objects the adapter reads. Vitest's own
 * types are assignable to these.
 */

interface TaskError {
  message: string;
  stack?: string;
  name?: string;
}

interface TaskResultLike {
  state: string;
  duration?: number;
  startTime?: number;
  errors?: TaskError[];
}

export interface TaskLike {
  id: string;
  name: string;
  type: string;
  mode: string;
  fails?: boolean;
  suite?: TaskLike;
  file?: TaskLike;
  filepath?: string;
  location?: { line: number; column: number };
  result?: TaskResultLike;
  tasks?: TaskLike[];
}

export interface VitestLike {
  config: {
    root: string;
    testNamePattern?: RegExp;
    maxWorkers?: number;
  };
  state: {
    idMap: ReadonlyMap<string, TaskLike>;
  };
  onCancel?(listener: (reason: string) => void): void;
}

interface ConsoleLogLike {
  content: string;
  type: 'stdout' | 'stderr';
}

type TaskPack = readonly [string, ...unknown[]];

export interface VitestAdapterOptions {
  /** Protocol stream; the process's stdout by default */
  output?: Writable;
  /** Turn stdout and stderr writes into copy messages (default true) */
  captureStdio?: boolean;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

interface AdapterSession {
  ctx: VitestLike;
  emitter: PipeEmitter;
  logger: Logger;
}

const TERMINAL_STATES = new Set(['pass', 'fail', 'skip', 'todo']);
const XFAIL_REASON = 'expected to fail';

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function flattenTests(task: TaskLike): TaskLike[] {
  if (task.type === 'test') {
    return [task];
  }
  return (task.tasks ?? []).flatMap(flattenTests);
}

/** Files are suites too, told apart by their path */
function isFile(task: TaskLike): boolean {
  return task.filepath !== undefined;
}

function flattenSuites(task: TaskLike): TaskLike[] {
  const nested = (task.tasks ?? []).flatMap(flattenSuites);
  return task.type === 'suite' && !isFile(task) ? [task, ...nested] : nested;
}

/** Enclosing named suites, outermost first */
function suiteChain(task: TaskLike): string[] {
  const names: string[] = [];
  for (let suite = task.suite; suite && suite.type === 'suite' && !isFile(suite); suite = suite.suite) {
    if (suite.name) {
      names.unshift(suite.name);
    }
  }
  return names;
}

/**
 * Node id segment of a task. Vitest allows siblings with the same name; the
 * second and later ones are told apart as `name[2]`, `name[3]`...
 */
function segment(task: TaskLike): string {
  const siblings = ((task.suite ?? task.file)?.tasks ?? []).filter(
    sibling => sibling.name === task.name && (sibling.type === 'test') === (task.type === 'test')
  );
  const occurrence = siblings.findIndex(sibling => sibling.id === task.id) + 1;
  return occurrence > 1 ? `${task.name}[${occurrence}]` : task.name;
}

/** Node id segments of the enclosing suites, outermost first */
function scopeSegments(task: TaskLike): string[] {
  const segments: string[] = [];
  for (let suite = task.suite; suite && suite.type === 'suite' && !isFile(suite); suite = suite.suite) {
    if (suite.name) {
      segments.unshift(segment(suite));
    }
  }
  return segments;
}

function errorsText(errors: TaskError[] | undefined): string | undefined {
  if (!errors || errors.length === 0) {
    return undefined;
  }
  return errors.map(error => error.stack ?? `${error.name ?? 'Error'}: ${error.message}`).join('\n\n');
}

function hasFailure(task: TaskLike): boolean {
  return task.result?.state === 'fail' || (task.tasks ?? []).some(hasFailure);
}

/**
 * Vitest reporter that streams the run to a parent testrelay process.
 * Inert unless the parent switched the protocol on through the environment.
 */
export default class TestRelayVitestReporter implements Reporter {
  private readonly enabled: boolean;
  private readonly options: VitestAdapterOptions;
  private session: AdapterSession | null = null;
  private pendingPaths = new Set<string>();
  private readonly collectedFiles = new Set<string>();
  private readonly deselectedIds = new Set<string>();
  private readonly startedIds = new Set<string>();
  private readonly reportedIds = new Set<string>();
  private collectionDone = false;
  private interrupted = false;

  constructor(options: VitestAdapterOptions = {}) {
    this.options = options;
    this.enabled = (options.env ?? process.env)[PIPE_ENV] === '1';
  }

  onInit(ctx: VitestLike): void {
    if (!this.enabled) {
      return;
    }
    const logger = this.options.logger ?? Logger.create('vitest-adapter');
    logger.startupPreamble([
      '==================================',
      'testrelay Vitest adapter',
      `  - Root: ${ctx.config.root}`,
      `  - Process ID: ${process.pid}`,
      '=================================='
    ]);

    const output = claimOutput(this.options.output ?? process.stdout);
    const emitter = new PipeEmitter({ codec: new Codec(logger.child('codec')), output, logger: logger.child('emitter') });
    if (this.options.captureStdio ?? true) {
      emitter.redirectStdio();
    }
    this.session = { ctx, emitter, logger };

    const options: Record<string, unknown> = {};
    if (ctx.config.testNamePattern) {
      options.testNamePattern = ctx.config.testNamePattern.source;
    }
    const config = new EngineConfig(ctx.config.root, process.argv.slice(2), options, ctx.config.maxWorkers ?? 1);
    emitter.init(config);
    emitter.sessionStart(new EngineSession(config, Date.now() / 1000));
    process.on('warning', this.onProcessWarning);
    ctx.onCancel?.(reason => this.onCancel(reason));
    logger.initComplete({ root: ctx.config.root });
  }

  onPathsCollected(paths: string[] = []): void {
    if (!this.session) {
      return;
    }
    this.pendingPaths = new Set(paths);
    this.session.emitter.collectionStart();
  }

  onCollected(files: TaskLike[] = []): void {
    if (!this.session || this.collectionDone) {
      return;
    }
    this.session.emitter.collectionStart();
    for (const file of files) {
      this.reportCollected(this.session, file);
    }
    if (this.pendingPaths.size > 0 && [...this.pendingPaths].every(p => this.collectedFiles.has(p))) {
      this.finishCollection(this.session);
    }
  }

  onTaskUpdate(packs: readonly TaskPack[]): void {
    const session = this.session;
    if (!session) {
      return;
    }
    for (const [id] of packs) {
      const task = session.ctx.state.idMap.get(id);
      if (!task || task.type !== 'test' || this.deselectedIds.has(id)) {
        continue;
      }
      const state = task.result?.state;
      if (state === 'run') {
        this.startTest(session, task);
      } else if (state !== undefined && TERMINAL_STATES.has(state)) {
        this.reportTest(session, task);
      }
    }
  }

  onUserConsoleLog(log: ConsoleLogLike): void {
    // With stdio captured the console reporter's own echo of the log arrives as copied output
    if (!this.session || (this.options.captureStdio ?? true)) {
      return;
    }
    if (log.type === 'stderr') {
      this.session.emitter.put('copyStderr', log.content);
    } else {
      this.session.emitter.put('copyStdout', log.content);
    }
  }

  async onFinished(files: TaskLike[] = [], errors: unknown[] = []): Promise<void> {
    const session = this.session;
    if (!session) {
      return;
    }
    const { emitter, logger } = session;
    logger.lifecycle('Test run finishing', { files: files.length, errors: errors.length });

    if (!this.collectionDone) {
      emitter.collectionStart();
      for (const file of files) {
        this.reportCollected(session, file);
      }
      this.finishCollection(session);
    }

    for (const test of files.flatMap(flattenTests)) {
      if (this.deselectedIds.has(test.id)) {
        continue;
      }
      const state = test.result?.state;
      if ((state !== undefined && TERMINAL_STATES.has(state)) || test.mode === 'skip' || test.mode === 'todo') {
        this.reportTest(session, test);
      }
    }

    for (const error of errors) {
      emitter.internalError(error);
    }

    const failed = errors.length > 0 || files.some(hasFailure);
    emitter.sessionFinish(failed ? 1 : 0);
    process.off('warning', this.onProcessWarning);
    this.session = null;
    await emitter.close();
    logger.lifecycle('Vitest adapter shutdown complete');
  }

  private onCancel(reason: string): void {
    const session = this.session;
    if (!session || this.interrupted) {
      return;
    }
    this.interrupted = true;
    session.logger.lifecycle('Run cancelled', { reason });
    session.emitter.keyboardInterrupt();
  }

  private readonly onProcessWarning = (warning: Error): void => {
    this.session?.emitter.warning(new EngineWarning({
      message: warning.message,
      when: 'runtest',
      category: warning.name
    }));
  };

  private relativeFile(session: AdapterSession, task: TaskLike): string {
    const filepath = task.filepath ?? task.file?.filepath ?? '';
    return toPosix(path.relative(session.ctx.config.root, filepath));
  }

  private nodeIdOf(session: AdapterSession, test: TaskLike): string {
    return [this.relativeFile(session, test), ...scopeSegments(test), segment(test)].join(SCOPE_SEPARATOR);
  }

  private locationOf(session: AdapterSession, test: TaskLike): Location {
    const line = test.location ? test.location.line : null;
    return [this.relativeFile(session, test), line, [...suiteChain(test), test.name].join(' ')];
  }

  private reportCollected(session: AdapterSession, file: TaskLike): void {
    const filepath = file.filepath ?? '';
    if (this.collectedFiles.has(filepath)) {
      return;
    }
    this.collectedFiles.add(filepath);
    const fileId = this.relativeFile(session, file);
    const tests = flattenTests(file);

    if (tests.length === 0 && file.result?.state === 'fail') {
      session.emitter.collectReport(new EngineCollectReport({
        nodeid: fileId,
        outcome: 'failed',
        longrepr: errorsText(file.result.errors)
      }));
      return;
    }

    const pattern = session.ctx.config.testNamePattern;
    const items: EngineItem[] = [];
    const deselected: EngineItem[] = [];
    for (const test of tests) {
      const nodeid = this.nodeIdOf(session, test);
      const markers = [test.mode === 'run' ? null : test.mode, test.fails ? 'fails' : null]
        .filter((marker): marker is string => marker !== null);
      const item = new EngineItem({
        nodeid,
        name: test.name,
        path: filepath,
        markers,
        location: this.locationOf(session, test)
      });
      items.push(item);
      if (pattern && !pattern.test([...suiteChain(test), test.name].join(' '))) {
        deselected.push(item);
        this.deselectedIds.add(test.id);
      }
    }

    const collectors = flattenSuites(file).map(suite => new EngineCollector(
      [fileId, ...scopeSegments(suite), segment(suite)].join(SCOPE_SEPARATOR),
      suite.name,
      filepath,
      'suite'
    ));

    session.emitter.collectReport(new EngineCollectReport({
      nodeid: fileId,
      outcome: 'passed',
      result: [new EngineCollector(fileId, path.basename(filepath), filepath, 'file'), ...collectors, ...items]
    }));
    session.emitter.deselected(deselected);
  }

  private finishCollection(session: AdapterSession): void {
    if (this.collectionDone) {
      return;
    }
    this.collectionDone = true;
    session.emitter.collectionFinish();
    session.emitter.runTestLoop();
  }

  private startTest(session: AdapterSession, test: TaskLike): void {
    if (this.startedIds.has(test.id)) {
      return;
    }
    this.startedIds.add(test.id);
    session.emitter.testStart(this.nodeIdOf(session, test));
  }

  private reportTest(session: AdapterSession, test: TaskLike): void {
    if (this.reportedIds.has(test.id)) {
      return;
    }
    this.startTest(session, test);
    this.reportedIds.add(test.id);

    const { emitter } = session;
    const nodeid = this.nodeIdOf(session, test);
    const location = this.locationOf(session, test);
    const result = test.result;
    const state = result?.state ?? test.mode;
    const start = (result?.startTime ?? Date.now()) / 1000;
    const duration = (result?.duration ?? 0) / 1000;
    const phase = (when: 'setup' | 'call' | 'teardown', outcome: Outcome, extra: Partial<EngineTestReportInit> = {}) =>
      new EngineTestReport({ nodeid, when, outcome, location, start, ...extra });

    if (state === 'skip' || state === 'todo') {
      emitter.testReport(phase('setup', 'skipped', { longrepr: state === 'todo' ? 'todo' : 'skipped' }));
    } else {
      emitter.testReport(phase('setup', 'passed'));
      const passed = state === 'pass';
      if (test.fails) {
        emitter.testReport(phase('call', passed ? 'failed' : 'passed', {
          duration,
          wasxfail: XFAIL_REASON,
          longrepr: passed ? undefined : errorsText(result?.errors)
        }));
      } else {
        emitter.testReport(phase('call', passed ? 'passed' : 'failed', {
          duration,
          longrepr: passed ? undefined : errorsText(result?.errors)
        }));
      }
    }
    emitter.testReport(phase('teardown', 'passed', { start: start + duration }));
    emitter.testFinish(nodeid);
  }
}
