import { describe, it, expect, beforeEach } from 'vitest';
import { TestState } from '../../../src/model/TestState';
import { TimeStatsCollector } from '../../../src/model/TimeStats';
import { NodeId } from '../../../src/protocol/NodeId';
import type { CollectReportRepresentation } from '../../../src/protocol/representations';
import { collected, item, phaseReport, testLogger } from '../../helpers/fixtures';

const A = 'a.test.ts::first';
const B = 'a.test.ts::second';

describe('TestState', () => {
  let state: TestState;

  const runThrough = (id: string, callOutcome: 'passed' | 'failed'): void => {
    state.startTest(id);
    state.storePhaseReport(id, 'setup', phaseReport(id, 'setup', 'passed'));
    state.storePhaseReport(id, 'call', phaseReport(id, 'call', callOutcome));
    state.storePhaseReport(id, 'teardown', phaseReport(id, 'teardown', 'passed'));
    state.endTest(id);
  };

  beforeEach(() => {
    state = new TestState(testLogger('state'));
    state.prepareForRun();
    state.prepareForCollection();
    state.addCollected(collected('a.test.ts', [A, B]));
  });

  describe('collection', () => {
    it('records every collected item once', () => {
      expect(state.size).toBe(2);
      expect(state.nodeIds.map(String)).toEqual([A, B]);
      expect(state.addCollected(collected('a.test.ts', [A, B]))).toEqual({ added: false, failed: false });
    });

    it('reports newly added items', () => {
      expect(state.addCollected(collected('b.test.ts', ['b.test.ts::third']))).toEqual({ added: true, failed: false });
      expect(state.size).toBe(3);
    });

    it('keeps failed and skipped collections apart', () => {
      const failed: CollectReportRepresentation = { ...collected('broken.test.ts', []), outcome: 'failed', longrepr: 'SyntaxError' };
      const skipped: CollectReportRepresentation = { ...collected('skipped.test.ts', []), outcome: 'skipped' };

      expect(state.addCollected(failed)).toEqual({ added: false, failed: true });
      expect(state.addCollected(skipped)).toEqual({ added: false, failed: false });
      expect([...state.collectFailures.keys()]).toEqual(['broken.test.ts']);
      expect([...state.collectSkipped.keys()]).toEqual(['skipped.test.ts']);
      expect(state.formatCollectionProgress()).toBe('running: selected=2 skipped=1 failed=1');
    });

    it('drops deselected items', () => {
      state.deselect([item(B)]);

      expect(state.size).toBe(1);
      expect([...state.deselected]).toEqual([B]);
      expect(state.formatCollectionProgress(true)).toBe('complete: selected=1 deselected=1');
    });

    it('keeps parked items when they are deselected', () => {
      state.park(B);
      state.deselect([item(B)]);

      expect(state.get(B)).toBeDefined();
      expect(state.deselected.size).toBe(0);
    });
  });

  describe('lifecycle', () => {
    it('aggregates phase reports into records', () => {
      runThrough(A, 'passed');

      expect(state.finishedCount).toBe(1);
      expect(state.completionCounts()).toEqual([1, 2]);
      expect(state.passed.map(r => r.nodeid.value)).toEqual([A]);
      expect(state.notRun.map(r => r.nodeid.value)).toEqual([B]);
      expect(state.view('failed')).toEqual([]);
    });

    it('ignores reports for tests that were never collected', () => {
      expect(state.startTest('ghost.test.ts::boo')).toBeUndefined();
      expect(state.storePhaseReport('ghost.test.ts::boo', 'call', phaseReport('ghost.test.ts::boo', 'call', 'passed'))).toBeUndefined();
    });

    it('ignores a second report for the same phase', () => {
      state.storePhaseReport(A, 'call', phaseReport(A, 'call', 'passed'));
      const record = state.storePhaseReport(A, 'call', phaseReport(A, 'call', 'failed'));

      expect(record?.call?.outcome).toBe('passed');
    });

    it('accepts node ids as objects or strings', () => {
      state.startTest(new NodeId(A));

      expect(state.get(A)?.state).toBe('setup_running');
    });
  });

  describe('views', () => {
    const ids = (view: Array<{ nodeid: NodeId }>): string[] => view.map(r => r.nodeid.value);

    const store = (id: string, setup: 'passed' | 'failed' | 'skipped', call?: 'passed' | 'failed' | 'skipped', teardown: 'passed' | 'failed' = 'passed', wasxfail?: string): void => {
      state.startTest(id);
      state.storePhaseReport(id, 'setup', phaseReport(id, 'setup', setup));
      if (call) {
        state.storePhaseReport(id, 'call', phaseReport(id, 'call', call, wasxfail === undefined ? {} : { wasxfail }));
      }
      state.storePhaseReport(id, 'teardown', phaseReport(id, 'teardown', teardown));
    };

    it('counts a failing call with a failing teardown as failed and teardown errored', () => {
      store(A, 'passed', 'failed', 'failed');

      expect(ids(state.failed)).toEqual([A]);
      expect(ids(state.teardownErrored)).toEqual([A]);
      expect(state.get(A)?.state).toBe('teardown_errored');
    });

    it('counts a passing call with a failing teardown as passed and teardown errored', () => {
      store(A, 'passed', 'passed', 'failed');

      expect(ids(state.passed)).toEqual([A]);
      expect(ids(state.teardownErrored)).toEqual([A]);
      expect(state.failed).toEqual([]);
    });

    it('keeps setup errors out of failed', () => {
      store(A, 'failed');

      expect(ids(state.setupErrored)).toEqual([A]);
      expect(state.failed).toEqual([]);
    });

    it('keeps expected failures out of failed and skipped', () => {
      store(A, 'passed', 'failed', 'passed', 'expected to fail');
      store(B, 'passed', 'skipped', 'passed', 'expected to fail');

      expect(ids(state.xfailed)).toEqual([A, B]);
      expect(state.failed).toEqual([]);
      expect(state.skipped).toEqual([]);
    });

    it('keeps unexpected passes out of passed', () => {
      store(A, 'passed', 'passed', 'passed', 'expected to fail');
      store(B, 'skipped');

      expect(ids(state.xpassed)).toEqual([A]);
      expect(state.passed).toEqual([]);
      expect(ids(state.skipped)).toEqual([B]);
    });

    it('needs a teardown report before a test counts as passed', () => {
      state.startTest(A);
      state.storePhaseReport(A, 'setup', phaseReport(A, 'setup', 'passed'));
      state.storePhaseReport(A, 'call', phaseReport(A, 'call', 'passed'));

      expect(state.passed).toEqual([]);
      expect(ids(state.notRun)).toEqual([A, B]);
    });
  });

  describe('settleInterrupted', () => {
    it('brings in-flight records to a settled state', () => {
      const C = 'a.test.ts::third';
      state.addCollected(collected('c.test.ts', [C]));

      state.startTest(A);
      state.storePhaseReport(A, 'setup', phaseReport(A, 'setup', 'passed'));
      state.storePhaseReport(A, 'call', phaseReport(A, 'call', 'passed'));

      state.startTest(B);
      state.storePhaseReport(B, 'setup', phaseReport(B, 'setup', 'passed'));

      state.startTest(C);
      state.storePhaseReport(C, 'setup', phaseReport(C, 'setup', 'failed'));

      expect(state.settleInterrupted()).toBe(3);
      expect(state.get(A)?.state).toBe('passed');
      expect(state.get(B)?.state).toBe('not_started');
      expect(state.get(C)?.state).toBe('setup_errored');
      expect(state.finishedCount).toBe(2);
    });

    it('leaves finished records alone', () => {
      runThrough(A, 'failed');

      expect(state.settleInterrupted()).toBe(0);
      expect(state.get(A)?.state).toBe('failed');
    });
  });

  describe('runs', () => {
    it('forgets everything before a whole-suite run', () => {
      runThrough(A, 'passed');
      state.prepareForRun([]);

      expect(state.size).toBe(0);
      expect(state.finishedCount).toBe(0);
    });

    it('resets the selection and parks the rest before a subset run', () => {
      runThrough(A, 'passed');
      runThrough(B, 'failed');

      state.prepareForRun([A]);
      state.parkAndReset([A]);

      expect(state.size).toBe(2);
      expect(state.get(A)?.state).toBe('not_started');
      expect(state.get(A)?.parked).toBe(false);
      expect(state.get(B)?.state).toBe('failed');
      expect(state.get(B)?.parked).toBe(true);
      expect(state.finishedCount).toBe(1);
    });

    it('returns the requested records', () => {
      expect(state.queryResults([B, 'missing']).map(r => r.nodeid.value)).toEqual([B]);
      expect(state.queryResults()).toHaveLength(2);
    });
  });

  describe('formatSummary', () => {
    it('gives only the total by default', () => {
      expect(state.formatSummary()).toEqual(['TOTAL tests:             2']);
    });

    it('lists every non-empty view and the timings', () => {
      runThrough(A, 'passed');
      runThrough(B, 'failed');
      let now = 0;
      const stats = new TimeStatsCollector(() => now);
      stats.start('collection');
      now = 1500;
      stats.stop('collection');
      stats.start('execution');
      now = 2000;
      stats.stop('execution');

      expect(state.formatSummary({ full: true, timeStats: stats })).toEqual([
        'TOTAL tests:             2',
        'Passed (✔):              1',
        'Failed (✕):              1',
        'collection:              1.500s',
        'execution:               0.500s',
        'Overall:                 2.000s'
      ]);
    });

    it('uses the standard symbols when configured', () => {
      const standard = new TestState(testLogger('state'), { standardSymbols: true });
      standard.addCollected(collected('a.test.ts', [A]));
      standard.startTest(A);
      standard.storePhaseReport(A, 'call', phaseReport(A, 'call', 'failed'));
      standard.storePhaseReport(A, 'teardown', phaseReport(A, 'teardown', 'passed'));

      expect(standard.formatSummary({ full: true })).toEqual([
        'TOTAL tests:             1',
        'Failed (F):              1'
      ]);
    });
  });
});
