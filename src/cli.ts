#!/usr/bin/env node

import { Command } from 'commander';
import { promises as fs } from 'fs';
import path from 'path';
import { $ } from 'zx';
import { ConfigOverrides, loadConfig, RelayConfig } from './config';
import { createRunContext } from './context';
import { PassthroughWriter } from './PassthroughWriter';
import { ReportManager } from './ReportManager';
import { RunController } from './RunController';
import { VitestDefinition } from './runners/vitest/VitestDefinition';

$.verbose = false;

export interface RunCommandOptions {
  width?: number;
  height?: number;
  stdSymbols?: boolean;
  reportDir?: string;
  debug?: boolean;
}

export type RunAction = (tests: string[], overrides: ConfigOverrides) => Promise<void>;

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

export function toOverrides(options: RunCommandOptions): ConfigOverrides {
  return {
    width: options.width,
    height: options.height,
    standardSymbols: options.stdSymbols,
    reportDir: options.reportDir === undefined ? undefined : path.resolve(options.reportDir),
    debug: options.debug
  };
}

class CLIOrchestrator {
  constructor(private readonly config: RelayConfig) {}

  async run(tests: string[]): Promise<number> {
    const { config } = this;
    const context = createRunContext(config);
    const logger = context.logger('cli');

    await this.checkRunner(logger.warn.bind(logger));

    const output = new PassthroughWriter({
      stdout: text => process.stdout.write(text),
      stderr: text => process.stderr.write(text)
    });
    const controller = new RunController({ context, output });
    const runId = new Date().toISOString().replace(/[:.]/g, '');
    const report = new ReportManager({
      runId,
      command: config.command.join(' '),
      reportDir: config.reportDir,
      source: controller,
      logger: context.logger('report')
    });
    await report.initialize();
    controller.addMessageHandler(report);

    console.log(`Running: ${config.command.join(' ')}${tests.length > 0 ? ` (${tests.length} selected)` : ''}`);
    console.log(`Full report: ${report.getReportPath()}`);
    console.log();

    const onInterrupt = (): void => controller.cancelRun();
    const onResize = (): void => controller.resize({
      width: process.stdout.columns || config.width,
      height: process.stdout.rows || config.height
    });
    process.on('SIGINT', onInterrupt);
    process.stdout.on('resize', onResize);

    try {
      const exit = await controller.startRun(tests);
      output.close();
      await report.finalize(exit);

      console.log();
      for (const line of controller.progressLines()) {
        console.log(line);
      }
      console.log();
      for (const line of controller.summaryLines()) {
        console.log(line);
      }
      if (exit.error) {
        console.error(`\n${exit.error.message}`);
      } else if (controller.interpretExit(exit) === 'system-error') {
        console.error(`\nTest process failed to run the suite (exit code ${exit.exitCode ?? 'none'})`);
      }
      return exit.exitCode ?? 1;
    } finally {
      process.off('SIGINT', onInterrupt);
      process.stdout.off('resize', onResize);
    }
  }

  private async checkRunner(warn: (message: string) => void): Promise<void> {
    let packageJsonContent: string | undefined;
    try {
      packageJsonContent = await fs.readFile(path.join(this.config.cwd, 'package.json'), 'utf8');
    } catch {
      packageJsonContent = undefined;
    }
    if (!new VitestDefinition().matches(this.config.command, packageJsonContent)) {
      const message = `Command does not look like a Vitest run: ${this.config.command.join(' ')}`;
      warn(message);
      console.error(`Warning: ${message}`);
    }
  }
}

export function createProgram(action: RunAction): Command {
  const program = new Command();

  program
    .name('testrelay')
    .description('Run Vitest in a child process and follow every test as it runs')
    .version('0.1.0');

  program
    .command('run')
    .description('Run the test suite, or only the given test node ids')
    .argument('[tests...]', 'node ids to run (file::suite::test)')
    .option('--width <columns>', 'width of the progress surface', parseInteger)
    .option('--height <lines>', 'height of the progress surface', parseInteger)
    .option('--std-symbols', 'use F . E x X indicators')
    .option('--report-dir <dir>', 'where run reports are written')
    .option('--debug', 'write debug lines to the log')
    .action(async (tests: string[], options: RunCommandOptions) => {
      await action(tests, toOverrides(options));
    });

  return program;
}

async function runTests(tests: string[], overrides: ConfigOverrides): Promise<void> {
  const config = loadConfig(process.env, overrides);
  process.exitCode = await new CLIOrchestrator(config).run(tests);
}

if (require.main === module) {
  createProgram(runTests)
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error('testrelay failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
