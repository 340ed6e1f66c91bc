import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { existsSync } from 'fs';
import os from 'os';
import path from 'path';
import { TestState } from '../../src/model/TestState';
import { NodeId } from '../../src/protocol/NodeId';
import { ReportManager, ReportSource } from '../../src/ReportManager';
import { collected, phaseReport, testLogger } from '../helpers/fixtures';

const NOW = new Date('2026-01-02T03:04:05.000Z');

describe('ReportManager', () => {
  let tempDir: string;
  let state: TestState;
  let source: ReportSource;
  let report: ReportManager;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'testrelay-report-'));
    state = new TestState(testLogger('state'));
    source = {
      state,
      progressLines: () => ['  a [.F]100%'],
      summaryLines: () => ['2 tests collected']
    };
    report = new ReportManager({
      runId: 'run-1',
      command: 'npx vitest run',
      reportDir: tempDir,
      source,
      logger: testLogger('report'),
      clock: () => NOW
    });
  });

  afterEach(async () => {
    await report.finalize({ exitCode: 0, clean: true });
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('places the report under runs/<runId>', () => {
    expect(report.getReportPath()).toBe(path.join(tempDir, 'runs', 'run-1', 'test-run.md'));
  });

  it('writes the output log header and an initial report', async () => {
    await report.initialize();

    const log = await fs.readFile(path.join(tempDir, 'runs', 'run-1', 'output.log'), 'utf8');
    expect(log).toBe([
      '# Test Output Log',
      '# Timestamp: 2026-01-02T03:04:05.000Z',
      '# Command: npx vitest run',
      '# ---',
      ''
    ].join('\n'));

    const markdown = await fs.readFile(report.getReportPath(), 'utf8');
    expect(markdown.split('\n').slice(0, 5)).toEqual([
      '# Test Run Summary',
      '',
      '- Run: run-1',
      '- Status: RUNNING (updated 2026-01-02T03:04:05.000Z)',
      '- Command: `npx vitest run`'
    ]);
  });

  it('renders collection errors and failures', () => {
    state.addCollected(collected('a.test.ts', ['a.test.ts::ok', 'a.test.ts::bad']));
    state.addCollected({
      kind: 'collect_report',
      nodeid: new NodeId('broken.test.ts'),
      outcome: 'failed',
      result: [],
      longrepr: 'SyntaxError: boom',
      sections: []
    });
    for (const id of ['a.test.ts::ok', 'a.test.ts::bad']) {
      state.startTest(id);
      state.storePhaseReport(id, 'setup', phaseReport(id, 'setup', 'passed'));
    }
    state.storePhaseReport('a.test.ts::ok', 'call', phaseReport('a.test.ts::ok', 'call', 'passed'));
    state.storePhaseReport('a.test.ts::bad', 'call', phaseReport('a.test.ts::bad', 'call', 'failed', {
      longrepr: 'AssertionError: expected 1 to be 2'
    }));
    for (const id of ['a.test.ts::ok', 'a.test.ts::bad']) {
      state.storePhaseReport(id, 'teardown', phaseReport(id, 'teardown', 'passed'));
    }

    expect(report.render()).toBe([
      '# Test Run Summary',
      '',
      '- Run: run-1',
      '- Status: RUNNING (updated 2026-01-02T03:04:05.000Z)',
      '- Command: `npx vitest run`',
      '',
      '## Summary',
      '```',
      '2 tests collected',
      '```',
      '',
      '## Progress',
      '```',
      '  a [.F]100%',
      '```',
      '',
      '## Collection errors',
      '',
      '### broken.test.ts',
      '```',
      'SyntaxError: boom',
      '```',
      '',
      '## Failures',
      '',
      '### a.test.ts::bad (failed)',
      '```',
      'AssertionError: expected 1 to be 2',
      '```',
      '',
      'Full test output: [output.log](./output.log)',
      ''
    ].join('\n'));
  });

  it('leaves out the progress section when there is nothing to show', () => {
    source.progressLines = () => [];

    expect(report.render()).not.toContain('## Progress');
  });

  it('appends copied output to the log and marks a clean run complete', async () => {
    await report.initialize();
    report.copyStdout('hello\n');
    report.copyStderr('warning: slow\n');
    await report.finalize({ exitCode: 1, clean: true });

    const log = await fs.readFile(path.join(tempDir, 'runs', 'run-1', 'output.log'), 'utf8');
    expect(log.endsWith('# ---\nhello\nwarning: slow\n')).toBe(true);

    const markdown = await fs.readFile(report.getReportPath(), 'utf8');
    expect(markdown.split('\n')[3]).toBe('- Status: COMPLETE (updated 2026-01-02T03:04:05.000Z)');
  });

  it('marks a run that did not shut down cleanly as interrupted', async () => {
    await report.initialize();
    await report.finalize({ exitCode: null, clean: false });

    const markdown = await fs.readFile(report.getReportPath(), 'utf8');
    expect(markdown.split('\n')[3]).toBe('- Status: INTERRUPTED (updated 2026-01-02T03:04:05.000Z)');
  });

  it('writes nothing before it is initialized', async () => {
    report.copyStdout('early\n');
    report.testReport();
    await report.finalize({ exitCode: 0, clean: true });

    expect(existsSync(path.join(tempDir, 'runs', 'run-1'))).toBe(false);
  });
});
