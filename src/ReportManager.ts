import { promises as fs } from 'fs';
import path from 'path';
import debounce from 'lodash.debounce';
import type { RunExit } from './consumer/RunOutputReader';
import { TestState } from './model/TestState';
import type { MessageHandler } from './protocol/messages';
import { longReprText } from './protocol/representations';
import { Logger } from './utils/logger';

export type RunStatus = 'RUNNING' | 'COMPLETE' | 'INTERRUPTED';

/** What the report is rendered from */
export interface ReportSource {
  readonly state: TestState;
  progressLines(): string[];
  summaryLines(): string[];
}

export interface ReportManagerOptions {
  runId: string;
  command: string;
  reportDir: string;
  source: ReportSource;
  logger: Logger;
  clock?: () => Date;
}

interface Debounced {
  (): void;
  cancel(): void;
}

const FAILURE_STATES = new Set(['failed', 'setup_errored', 'teardown_errored', 'xpassed']);

/**
 * Keeps `<reportDir>/runs/<runId>/test-run.md` current while a run is going
 * and collects the test process output in `output.log` beside it.
 */
export class ReportManager implements MessageHandler {
  private readonly runDirectory: string;
  private readonly testRunPath: string;
  private readonly outputLogPath: string;
  private readonly source: ReportSource;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly runId: string;
  private readonly command: string;
  private readonly debouncedWrite: Debounced;
  private status: RunStatus = 'RUNNING';
  private outputChain: Promise<void> = Promise.resolve();
  private ready = false;

  constructor(options: ReportManagerOptions) {
    this.runId = options.runId;
    this.command = options.command;
    this.source = options.source;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
    this.runDirectory = path.join(options.reportDir, 'runs', options.runId);
    this.testRunPath = path.join(this.runDirectory, 'test-run.md');
    this.outputLogPath = path.join(this.runDirectory, 'output.log');

    // Batches updates every 250ms
    this.debouncedWrite = debounce(() => {
      this.writeTestRunReport().catch((error: unknown) => {
        this.logger.error('Failed to write test run report', error);
      });
    }, 250, { maxWait: 1000 });
  }

  getReportPath(): string {
    return this.testRunPath;
  }

  async initialize(): Promise<void> {
    this.logger.lifecycle('Initializing report', { runDirectory: this.runDirectory });
    await fs.mkdir(this.runDirectory, { recursive: true });
    const header = [
      '# Test Output Log',
      `# Timestamp: ${this.clock().toISOString()}`,
      `# Command: ${this.command}`,
      '# ---',
      ''
    ].join('\n');
    await fs.writeFile(this.outputLogPath, header);
    this.ready = true;
    await this.writeTestRunReport();
  }

  collectReport(): void {
    this.debouncedWrite();
  }

  deselectTests(): void {
    this.debouncedWrite();
  }

  testReport(): void {
    this.debouncedWrite();
  }

  sessionEnd(): void {
    this.debouncedWrite();
  }

  copyStdout(text: string): void {
    this.appendOutput(text);
  }

  copyStderr(text: string): void {
    this.appendOutput(text);
  }

  async finalize(exit: RunExit): Promise<void> {
    this.logger.lifecycle('Finalizing report', { exitCode: exit.exitCode, clean: exit.clean });
    this.debouncedWrite.cancel();
    this.status = exit.clean ? 'COMPLETE' : 'INTERRUPTED';
    await this.outputChain;
    await this.writeTestRunReport();
  }

  render(): string {
    const { state } = this.source;
    const lines = [
      '# Test Run Summary',
      '',
      `- Run: ${this.runId}`,
      `- Status: ${this.status} (updated ${this.clock().toISOString()})`,
      `- Command: \`${this.command}\``,
      '',
      '## Summary',
      '```',
      ...this.source.summaryLines(),
      '```',
      ''
    ];

    const progress = this.source.progressLines();
    if (progress.length > 0) {
      lines.push('## Progress', '```', ...progress, '```', '');
    }

    if (state.collectFailures.size > 0) {
      lines.push('## Collection errors', '');
      for (const [nodeid, report] of state.collectFailures) {
        lines.push(`### ${nodeid}`, '```', longReprText(report.longrepr) ?? '(no details)', '```', '');
      }
    }

    const failures = state.queryResults().filter(record => FAILURE_STATES.has(record.state));
    if (failures.length > 0) {
      lines.push('## Failures', '');
      for (const record of failures) {
        const detail = longReprText(record.failureReport?.longrepr) ?? '(no details)';
        lines.push(`### ${record.nodeid.value} (${record.state})`, '```', detail, '```', '');
      }
    }

    lines.push('Full test output: [output.log](./output.log)', '');
    return lines.join('\n');
  }

  private appendOutput(text: string): void {
    if (!this.ready) {
      this.logger.debug('Report not initialized, dropping output', { size: text.length });
      return;
    }
    this.outputChain = this.outputChain
      .then(() => fs.appendFile(this.outputLogPath, text))
      .catch((error: unknown) => {
        this.logger.error('Failed to append to output log', error);
      });
  }

  private async writeTestRunReport(): Promise<void> {
    if (!this.ready) {
      return;
    }
    const markdown = this.render();
    await fs.writeFile(this.testRunPath, markdown);
    this.logger.debug('Test run report written', { size: markdown.length });
  }
}
