import path from 'path';
import { ChildStreams, RunExit, RunOutputReader } from './consumer/RunOutputReader';
import { MessageDispatcher } from './consumer/MessageDispatcher';
import type { RunContext } from './context';
import { ChildProcessError, RelayError } from './errors';
import { TestState } from './model/TestState';
import { TimeStatsCollector } from './model/TimeStats';
import { PassthroughWriter } from './PassthroughWriter';
import { ProgressGroup, ProgressMapper, SurfaceSize } from './progress/ProgressMapper';
import type { MessageHandler } from './protocol/messages';
import { NodeId } from './protocol/NodeId';
import {
  CollectReportRepresentation,
  ConfigRepresentation,
  ItemRepresentation,
  longReprText,
  TestReportRepresentation,
  WarningRepresentation
} from './protocol/representations';
import type { ExitInterpretation, TestRunnerDefinition, TestSelection } from './runners/base/TestRunnerDefinition';
import { SpawnTestProcess, spawnTestProcess } from './runners/spawn';
import { VitestDefinition } from './runners/vitest/VitestDefinition';
import { Logger } from './utils/logger';

export type { RunExit } from './consumer/RunOutputReader';

export interface RunControllerOptions {
  context: RunContext;
  output: PassthroughWriter;
  runner?: TestRunnerDefinition;
  spawn?: SpawnTestProcess;
}

const TIMERS = ['init', 'collection', 'execution'];

/**
 * Runs the test engine in a child process and keeps the TestState in step
 * with what it reports.
 *
 * The controller is itself the first message handler on its dispatcher;
 * observers added later see every message after the state has been updated.
 */
export class RunController implements MessageHandler {
  readonly state: TestState;
  private readonly context: RunContext;
  private readonly logger: Logger;
  private readonly output: PassthroughWriter;
  private readonly runner: TestRunnerDefinition;
  private readonly spawn: SpawnTestProcess;
  private readonly dispatcher: MessageDispatcher;
  private readonly reader: RunOutputReader;
  private stats = new TimeStatsCollector();
  private size: SurfaceSize;
  private mapper: ProgressMapper | null = null;
  private active = false;
  private rootPath = '';

  constructor(options: RunControllerOptions) {
    const { context } = options;
    this.context = context;
    this.logger = context.logger('controller');
    this.output = options.output;
    this.runner = options.runner ?? new VitestDefinition();
    this.spawn = options.spawn ?? spawnTestProcess;
    this.size = { width: context.config.width, height: context.config.height };
    this.state = new TestState(context.logger('state'), {
      standardSymbols: context.config.standardSymbols
    });

    this.dispatcher = new MessageDispatcher({
      codec: context.codec,
      logger: context.logger('dispatcher'),
      passthrough: line => this.output.writeLine('stdout', line)
    });
    this.dispatcher.addHandler(this);

    this.reader = new RunOutputReader({
      dispatcher: this.dispatcher,
      logger: context.logger('reader'),
      stderr: line => this.output.writeLine('stderr', line),
      onFinish: exit => this.finishRun(exit)
    });
  }

  get running(): boolean {
    return this.active;
  }

  get timeStats(): TimeStatsCollector {
    return this.stats;
  }

  addMessageHandler(handler: MessageHandler): void {
    this.dispatcher.addHandler(handler);
  }

  removeMessageHandler(handler: MessageHandler): void {
    this.dispatcher.removeHandler(handler);
  }

  /**
   * Run the whole suite, or only `selection` when it is not empty. Records
   * outside a selection keep their results from earlier runs.
   */
  async startRun(selection: Iterable<string | NodeId> = []): Promise<RunExit> {
    if (this.active) {
      throw new RelayError('A run is already in progress');
    }
    const ids = [...new Set([...selection].map(String))];
    this.state.prepareForRun(ids);
    if (ids.length > 0) {
      this.state.parkAndReset(ids);
    }
    this.stats = new TimeStatsCollector();
    this.stats.start('init');

    const selected = ids.map(id => this.selectionOf(id));
    const command = this.runner.buildMainCommand(this.context.config.command, this.adapterPath(), selected);
    this.logger.lifecycle('Starting run', { selection: ids.length, command });

    let child: ChildStreams;
    try {
      child = this.spawn(command, { cwd: this.context.config.cwd, logger: this.logger });
    } catch (error) {
      const failure = new ChildProcessError('spawn-failed', null, { cause: error });
      this.logger.error('Could not start test process', failure);
      return { exitCode: null, clean: false, error: failure };
    }

    this.active = true;
    try {
      return await this.reader.consume(child);
    } finally {
      this.active = false;
    }
  }

  cancelRun(): void {
    if (!this.active) {
      return;
    }
    this.logger.lifecycle('Run cancelled');
    this.reader.cancel();
  }

  resize(size: SurfaceSize): void {
    if (size.width === this.size.width && size.height === this.size.height) {
      return;
    }
    this.size = { ...size };
    this.mapper = null;
  }

  progressGroups(): ProgressGroup[] {
    return this.progressMapper().groups;
  }

  /** One line per progress group: label, one indicator per test, percentage done */
  progressLines(): string[] {
    const mapper = this.progressMapper();
    const width = mapper.nameWidth;
    const std = this.state.standardSymbols;
    return mapper.groups.map(group => {
      let cells = '';
      let done = 0;
      for (const id of group.members) {
        const record = this.state.get(id);
        cells += record ? record.indicator(std) : ' ';
        if (record?.finished) done++;
      }
      const percent = group.members.length === 0 ? 100 : Math.floor((done * 100) / group.members.length);
      return `  ${group.label.padEnd(width)} [${cells}]${String(percent).padStart(3)}%`;
    });
  }

  /** What the runner's exit status means; a run that never started is a system error */
  interpretExit(exit: RunExit): ExitInterpretation {
    return this.runner.interpretExitCode(exit.exitCode);
  }

  summaryLines(): string[] {
    return this.state.formatSummary({ full: true, timeStats: this.stats });
  }

  // Message handlers

  init(config: ConfigRepresentation): void {
    this.rootPath = config.rootPath;
    this.logger.lifecycle('Test engine configured', {
      rootPath: config.rootPath,
      workers: config.workerCount
    });
  }

  runTestLoop(): void {
    this.logger.lifecycle('Test loop started');
  }

  collectionStart(): void {
    this.state.prepareForCollection();
    this.stats.stop('init');
    if (!this.stats.isRunning('collection')) {
      this.stats.start('collection');
    }
  }

  collectReport(report: CollectReportRepresentation): void {
    const { failed } = this.state.addCollected(report);
    if (failed) {
      this.logger.warn('Collection failed', {
        nodeid: report.nodeid.value,
        longrepr: longReprText(report.longrepr)
      });
    }
  }

  deselectTests(items: ItemRepresentation[]): void {
    this.state.deselect(items);
  }

  collectionFinish(): void {
    this.stats.stop('collection');
    this.logger.info(`Collection ${this.state.formatCollectionProgress(true)}`);
  }

  startRunPhase(): void {
    this.stats.start('execution');
  }

  startTest(nodeid: NodeId): void {
    this.state.startTest(nodeid);
  }

  testReport(report: TestReportRepresentation): void {
    this.state.storePhaseReport(report.nodeid, report.when, report);
  }

  endTest(nodeid: NodeId): void {
    this.state.endTest(nodeid);
  }

  sessionEnd(exitStatus: number): void {
    this.stats.stop('execution');
    this.logger.lifecycle('Test session ended', { exitStatus });
  }

  warningRecorded(warning: WarningRepresentation): void {
    this.logger.warn(`Test engine warning: ${warning.message}`, {
      when: warning.when,
      nodeid: warning.nodeid,
      category: warning.category
    });
  }

  internalError(text: string): void {
    this.logger.error('Test engine internal error', undefined, { text });
    for (const line of text.split('\n')) {
      this.output.writeLine('stderr', `INTERNALERROR> ${line}`);
    }
  }

  keyboardInterrupt(): void {
    this.logger.lifecycle('Test engine interrupted');
  }

  copyStdout(text: string): void {
    this.output.writeText('stdout', text);
  }

  copyStderr(text: string): void {
    this.output.writeText('stderr', text);
  }

  private finishRun(exit: RunExit): void {
    this.output.flush();
    for (const name of TIMERS) {
      this.stats.stop(name);
    }
    if (!exit.clean) {
      this.state.settleInterrupted();
    }
    const [finished, total] = this.state.completionCounts();
    this.logger.lifecycle('Run finished', { exitCode: exit.exitCode, clean: exit.clean, finished, total });
  }

  private progressMapper(): ProgressMapper {
    const ids = this.state.nodeIds;
    if (!this.mapper || !this.mapper.matches(ids)) {
      this.mapper = new ProgressMapper(this.size, ids);
    }
    return this.mapper;
  }

  /**
   * The engine filters by the name it reported in the item location; node ids
   * of same-named siblings carry an occurrence suffix the engine knows nothing of.
   */
  private selectionOf(id: string): TestSelection {
    const record = this.state.get(id);
    const nodeid = record?.nodeid ?? new NodeId(id, this.rootPath);
    return { filePath: nodeid.filePath, fullName: record?.item.location?.[2] ?? nodeid.fullName };
  }

  private adapterPath(): string {
    return path.join(__dirname, 'adapters', this.runner.getAdapterFileName(path.extname(__filename)));
  }
}
