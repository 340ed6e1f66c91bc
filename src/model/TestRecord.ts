import { NodeId } from '../protocol/NodeId';
import { ItemRepresentation, TestReportRepresentation } from '../protocol/representations';
import { Phase } from '../types/engine';

export type TestOutcomeState =
  | 'not_started'
  | 'setup_running'
  | 'running'
  | 'teardown_running'
  | 'xfailed'
  | 'xpassed'
  | 'setup_errored'
  | 'teardown_errored'
  | 'failed'
  | 'passed'
  | 'skipped'
  | 'unknown';

export const IN_FLIGHT_STATES: ReadonlySet<TestOutcomeState> = new Set<TestOutcomeState>([
  'setup_running',
  'running',
  'teardown_running'
]);

const INDICATORS: Record<TestOutcomeState, string> = {
  not_started: '.',
  setup_running: '↑',
  running: 'r',
  teardown_running: '↓',
  xfailed: 'f',
  xpassed: 'p',
  setup_errored: 'u',
  teardown_errored: 'd',
  failed: '✕',
  passed: '✔',
  skipped: 's',
  unknown: '?'
};

const STANDARD_INDICATORS: Record<TestOutcomeState, string> = {
  ...INDICATORS,
  setup_running: '.',
  running: '.',
  teardown_running: '.',
  xfailed: 'x',
  xpassed: 'X',
  setup_errored: 'E',
  teardown_errored: 'E',
  failed: 'F',
  passed: '.'
};

export function indicatorFor(state: TestOutcomeState, standardSymbols: boolean = false): string {
  return (standardSymbols ? STANDARD_INDICATORS : INDICATORS)[state];
}

/**
 * Everything known about one test in the current run. Phase slots are
 * written once per run; `reset` is the only way to clear them.
 */
export class TestRecord {
  private reports: Partial<Record<Phase, TestReportRepresentation>> = {};
  private cachedState: TestOutcomeState | null = null;
  private startedFlag = false;
  private parkedFlag = false;

  constructor(
    readonly nodeid: NodeId,
    public item: ItemRepresentation
  ) {}

  get setup(): TestReportRepresentation | undefined {
    return this.reports.setup;
  }

  get call(): TestReportRepresentation | undefined {
    return this.reports.call;
  }

  get teardown(): TestReportRepresentation | undefined {
    return this.reports.teardown;
  }

  get started(): boolean {
    return this.startedFlag;
  }

  set started(value: boolean) {
    if (value !== this.startedFlag) {
      this.startedFlag = value;
      this.cachedState = null;
    }
  }

  get parked(): boolean {
    return this.parkedFlag;
  }

  set parked(value: boolean) {
    if (value !== this.parkedFlag) {
      this.parkedFlag = value;
      this.cachedState = null;
    }
  }

  report(phase: Phase): TestReportRepresentation | undefined {
    return this.reports[phase];
  }

  hasReport(phase: Phase): boolean {
    return this.reports[phase] !== undefined;
  }

  /** Store a phase report. Returns false if the slot was already filled. */
  storeReport(phase: Phase, report: TestReportRepresentation): boolean {
    if (this.reports[phase]) {
      return false;
    }
    this.reports[phase] = report;
    this.cachedState = null;
    return true;
  }

  /** Clear phase reports and flags so the test can run again. */
  reset(): void {
    this.reports = {};
    this.startedFlag = false;
    this.parkedFlag = false;
    this.cachedState = null;
  }

  get finished(): boolean {
    return this.reports.teardown !== undefined;
  }

  /** Started and still waiting for its teardown report */
  get inFlight(): boolean {
    return this.startedFlag && !this.finished;
  }

  get state(): TestOutcomeState {
    if (this.cachedState === null) {
      this.cachedState = this.classify();
    }
    return this.cachedState;
  }

  indicator(standardSymbols: boolean = false): string {
    return indicatorFor(this.state, standardSymbols);
  }

  /** The report explaining a failure, if the test failed */
  get failureReport(): TestReportRepresentation | undefined {
    const { setup, call, teardown } = this.reports;
    if (setup?.outcome === 'failed') return setup;
    if (call?.outcome === 'failed' && !call.wasxfail) return call;
    if (call?.outcome === 'passed' && call.wasxfail) return call;
    if (teardown?.outcome === 'failed') return teardown;
    return undefined;
  }

  // Per-outcome reports; a record can have several, unlike `state`

  get passedReport(): TestReportRepresentation | undefined {
    return this.reports.call?.outcome === 'passed' ? this.reports.call : undefined;
  }

  /** Failing call, or failing setup */
  get failedReport(): TestReportRepresentation | undefined {
    return this.reports.call?.outcome === 'failed' ? this.reports.call : this.setupErrorReport;
  }

  get setupErrorReport(): TestReportRepresentation | undefined {
    return this.reports.setup?.outcome === 'failed' ? this.reports.setup : undefined;
  }

  get teardownErrorReport(): TestReportRepresentation | undefined {
    return this.reports.teardown?.outcome === 'failed' ? this.reports.teardown : undefined;
  }

  get xfailedReport(): TestReportRepresentation | undefined {
    const { call } = this.reports;
    return call?.wasxfail !== undefined && (call.outcome === 'failed' || call.outcome === 'skipped')
      ? call
      : undefined;
  }

  get xpassedReport(): TestReportRepresentation | undefined {
    const { call } = this.reports;
    return call?.wasxfail !== undefined && call.outcome === 'passed' ? call : undefined;
  }

  get skippedReport(): TestReportRepresentation | undefined {
    const { setup, call } = this.reports;
    if (setup?.outcome === 'skipped') return setup;
    return call?.outcome === 'skipped' ? call : undefined;
  }

  get duration(): number {
    const { setup, call, teardown } = this.reports;
    return (setup?.duration ?? 0) + (call?.duration ?? 0) + (teardown?.duration ?? 0);
  }

  private classify(): TestOutcomeState {
    const { setup, call, teardown } = this.reports;
    if (!this.startedFlag && !setup && !call && !teardown) {
      return 'not_started';
    }
    if (this.inFlight) {
      if (!setup) return 'setup_running';
      if (!call) return 'running';
      return 'teardown_running';
    }
    if (call?.wasxfail !== undefined && (call.outcome === 'failed' || call.outcome === 'skipped')) {
      return 'xfailed';
    }
    if (call?.wasxfail !== undefined && call.outcome === 'passed') {
      return 'xpassed';
    }
    if (setup?.outcome === 'failed') return 'setup_errored';
    if (teardown?.outcome === 'failed') return 'teardown_errored';
    if (call?.outcome === 'failed') return 'failed';
    if (call?.outcome === 'passed') return 'passed';
    if (setup?.outcome === 'skipped' || call?.outcome === 'skipped') return 'skipped';
    return 'unknown';
  }
}
