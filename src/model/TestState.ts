import { LifecycleOrderError } from '../errors';
import { NodeId } from '../protocol/NodeId';
import {
  CollectReportRepresentation,
  ItemRepresentation,
  TestReportRepresentation
} from '../protocol/representations';
import { Phase } from '../types/engine';
import { Logger } from '../utils/logger';
import { indicatorFor, TestOutcomeState, TestRecord } from './TestRecord';
import { TimeStatsCollector } from './TimeStats';

export interface CollectResult {
  /** One or more tests were recorded for the first time */
  added: boolean;
  /** A new collection failure was recorded */
  failed: boolean;
}

export type ResultView =
  | 'passed'
  | 'failed'
  | 'xfailed'
  | 'xpassed'
  | 'notRun'
  | 'skipped'
  | 'setupErrored'
  | 'teardownErrored';

const VIEW_LABELS: Array<[ResultView, string, TestOutcomeState | null]> = [
  ['passed', 'Passed', 'passed'],
  ['failed', 'Failed', 'failed'],
  ['xfailed', 'Expected failures', 'xfailed'],
  ['xpassed', 'Unexpected passes', 'xpassed'],
  ['notRun', 'Not run', null],
  ['skipped', 'Skipped', 'skipped'],
  ['setupErrored', 'Setup errors', 'setup_errored'],
  ['teardownErrored', 'Teardown errors', 'teardown_errored']
];

const LABEL_WIDTH = 22;

function summaryLine(label: string, value: string): string {
  return `${label}:`.padEnd(LABEL_WIDTH) + value;
}

function synthesizedTeardown(nodeid: NodeId): TestReportRepresentation {
  return {
    kind: 'test_report',
    nodeid,
    when: 'teardown',
    outcome: 'passed',
    duration: 0,
    start: 0,
    stop: 0,
    sections: []
  };
}

/**
 * The run's collection set and every TestRecord in it, keyed by node id.
 *
 * Other components keep node ids and look records up here; nothing else
 * holds a copy of a record.
 */
export class TestState {
  private records = new Map<string, TestRecord>();
  private failures = new Map<string, CollectReportRepresentation>();
  private skippedCollections = new Map<string, CollectReportRepresentation>();
  private deselectedIds = new Set<string>();
  private processedCollectReports = new Set<string>();
  private finished = 0;
  private readonly logger: Logger;
  readonly standardSymbols: boolean;

  constructor(logger: Logger, options: { standardSymbols?: boolean } = {}) {
    this.logger = logger;
    this.standardSymbols = options.standardSymbols ?? false;
  }

  get size(): number {
    return this.records.size;
  }

  get finishedCount(): number {
    return this.finished;
  }

  get collectFailures(): ReadonlyMap<string, CollectReportRepresentation> {
    return this.failures;
  }

  get collectSkipped(): ReadonlyMap<string, CollectReportRepresentation> {
    return this.skippedCollections;
  }

  get deselected(): ReadonlySet<string> {
    return this.deselectedIds;
  }

  get nodeIds(): NodeId[] {
    return [...this.records.values()].map(record => record.nodeid);
  }

  get(nodeid: string | NodeId): TestRecord | undefined {
    return this.records.get(String(nodeid));
  }

  /**
   * Get ready for a run. An empty selection is a whole-suite run and forgets
   * everything; otherwise only the collect-report dedup set is cleared.
   */
  prepareForRun(selection: Iterable<string> = []): void {
    if ([...selection].length === 0) {
      this.records = new Map();
      this.failures = new Map();
      this.skippedCollections = new Map();
      this.deselectedIds = new Set();
      this.processedCollectReports = new Set();
      this.finished = 0;
    } else {
      this.processedCollectReports.clear();
    }
  }

  /** Reset the selected records and park every other one. */
  parkAndReset(selection: Iterable<string>): void {
    const selected = new Set(selection);
    for (const id of this.records.keys()) {
      if (selected.has(id)) {
        this.reset(id);
      } else {
        this.park(id);
      }
    }
  }

  prepareForCollection(): void {
    this.processedCollectReports.clear();
  }

  addCollected(report: CollectReportRepresentation): CollectResult {
    const key = report.nodeid.value;
    if (this.processedCollectReports.has(key)) {
      this.logger.debug('Duplicate collect report ignored', { nodeid: key });
      return { added: false, failed: false };
    }
    this.processedCollectReports.add(key);

    if (report.outcome === 'failed') {
      this.failures.set(key, report);
      return { added: false, failed: true };
    }
    if (report.outcome === 'skipped') {
      this.skippedCollections.set(key, report);
      return { added: false, failed: false };
    }

    let added = false;
    for (const node of report.result) {
      if (node.kind !== 'item') {
        continue;
      }
      const existing = this.records.get(node.nodeid.value);
      if (existing) {
        existing.item = node;
      } else {
        this.records.set(node.nodeid.value, new TestRecord(node.nodeid, node));
        added = true;
      }
    }
    return { added, failed: false };
  }

  /**
   * Drop deselected tests from the collection. Parked records belong to an
   * earlier run and are kept.
   */
  deselect(items: ItemRepresentation[]): void {
    for (const item of items) {
      const id = item.nodeid.value;
      const record = this.records.get(id);
      if (record?.parked) {
        continue;
      }
      this.deselectedIds.add(id);
      if (record) {
        this.forget(id, record);
      }
    }
  }

  startTest(nodeid: string | NodeId): TestRecord | undefined {
    const record = this.lookup(nodeid, 'start');
    if (record) {
      record.started = true;
    }
    return record;
  }

  storePhaseReport(
    nodeid: string | NodeId,
    phase: Phase,
    report: TestReportRepresentation
  ): TestRecord | undefined {
    const record = this.lookup(nodeid, `${phase} report`);
    if (!record) {
      return undefined;
    }
    const wasFinished = record.finished;
    if (!record.storeReport(phase, report)) {
      this.logger.warn('Phase report ignored', {
        error: new LifecycleOrderError(record.nodeid.value, `second ${phase} report in one run`).message
      });
      return record;
    }
    if (!wasFinished && record.finished) {
      this.finished++;
    }
    return record;
  }

  endTest(nodeid: string | NodeId): TestRecord | undefined {
    return this.records.get(String(nodeid));
  }

  park(nodeid: string | NodeId): void {
    const record = this.records.get(String(nodeid));
    if (record) {
      record.parked = true;
    }
  }

  reset(nodeid: string | NodeId): void {
    const record = this.records.get(String(nodeid));
    if (record) {
      if (record.finished) {
        this.finished--;
      }
      record.reset();
    }
  }

  /**
   * Bring records left mid-flight by an abrupt end of the run into a settled
   * state. Returns the number of records changed.
   */
  settleInterrupted(): number {
    let settled = 0;
    for (const record of this.records.values()) {
      if (!record.inFlight) {
        continue;
      }
      settled++;
      if (record.call || (record.setup && record.setup.outcome !== 'passed')) {
        record.storeReport('teardown', synthesizedTeardown(record.nodeid));
        this.finished++;
      } else {
        record.reset();
      }
    }
    if (settled > 0) {
      this.logger.info('Settled interrupted tests', { count: settled });
    }
    return settled;
  }

  /** Records for the given ids, or every record when none are given. */
  queryResults(nodeids: Iterable<string | NodeId> = []): TestRecord[] {
    const ids = [...nodeids].map(String);
    if (ids.length === 0) {
      return [...this.records.values()];
    }
    const found: TestRecord[] = [];
    for (const id of ids) {
      const record = this.records.get(id);
      if (record) {
        found.push(record);
      }
    }
    return found;
  }

  /** [finished, total] */
  completionCounts(): [number, number] {
    return [this.finished, this.records.size];
  }

  /*
   * The views overlap: a test whose call and teardown both failed is in
   * `failed` and in `teardownErrored`.
   */

  get passed(): TestRecord[] {
    return this.where(record => Boolean(record.passedReport) && !record.xpassedReport && record.finished);
  }

  get failed(): TestRecord[] {
    return this.where(record => Boolean(record.failedReport) && !record.xfailedReport && !record.setupErrorReport);
  }

  get xfailed(): TestRecord[] {
    return this.where(record => Boolean(record.xfailedReport));
  }

  get xpassed(): TestRecord[] {
    return this.where(record => Boolean(record.xpassedReport));
  }

  get skipped(): TestRecord[] {
    return this.where(record => Boolean(record.skippedReport) && !record.xfailedReport);
  }

  get setupErrored(): TestRecord[] {
    return this.where(record => Boolean(record.setupErrorReport));
  }

  get teardownErrored(): TestRecord[] {
    return this.where(record => Boolean(record.teardownErrorReport));
  }

  get notRun(): TestRecord[] {
    return this.where(record => !record.finished);
  }

  view(name: ResultView): TestRecord[] {
    return this[name];
  }

  formatCollectionProgress(final: boolean = false): string {
    const parts = [`${final ? 'complete' : 'running'}: selected=${this.records.size}`];
    if (this.skippedCollections.size > 0) {
      parts.push(`skipped=${this.skippedCollections.size}`);
    }
    if (this.deselectedIds.size > 0) {
      parts.push(`deselected=${this.deselectedIds.size}`);
    }
    if (this.failures.size > 0) {
      parts.push(`failed=${this.failures.size}`);
    }
    return parts.join(' ');
  }

  formatSummary(options: { full?: boolean; timeStats?: TimeStatsCollector } = {}): string[] {
    const lines = [summaryLine('TOTAL tests', String(this.records.size + this.deselectedIds.size).padStart(4))];
    if (this.deselectedIds.size > 0) {
      lines.push(summaryLine('Deselected', String(this.deselectedIds.size).padStart(4)));
    }
    if (!options.full) {
      return lines;
    }

    for (const [view, label, state] of VIEW_LABELS) {
      const count = this.view(view).length;
      if (count === 0) {
        continue;
      }
      const indicator = indicatorFor(state ?? 'not_started', this.standardSymbols);
      lines.push(summaryLine(`${label} (${indicator})`, String(count).padStart(4)));
    }

    if (options.timeStats) {
      let total = 0;
      for (const [name, elapsed] of options.timeStats) {
        lines.push(summaryLine(name, `${elapsed.toFixed(3).padStart(8)}s`));
        total += elapsed;
      }
      lines.push(summaryLine('Overall', `${total.toFixed(3).padStart(8)}s`));
    }
    return lines;
  }

  private where(predicate: (record: TestRecord) => boolean): TestRecord[] {
    return [...this.records.values()].filter(predicate);
  }

  private forget(id: string, record: TestRecord): void {
    if (record.finished) {
      this.finished--;
    }
    this.records.delete(id);
  }

  private lookup(nodeid: string | NodeId, what: string): TestRecord | undefined {
    const id = String(nodeid);
    const record = this.records.get(id);
    if (!record) {
      this.logger.warn('Lifecycle event for unknown test', {
        error: new LifecycleOrderError(id, `${what} for a test that was never collected`).message
      });
    }
    return record;
  }
}
