import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import path from 'path';
import { createProgram, RunAction, toOverrides } from '../../src/cli';

describe('CLI', () => {
  function programWith(): { run: Mock<RunAction>; parse: (...args: string[]) => Promise<unknown> } {
    const run = vi.fn<RunAction>().mockResolvedValue(undefined);
    const program = createProgram(run);
    program.exitOverride();
    return { run, parse: (...args) => program.parseAsync(['node', 'testrelay', ...args]) };
  }

  it('passes the selected tests and options to the run action', async () => {
    const { run, parse } = programWith();

    await parse('run', 'a.test.ts::adds', 'b.test.ts::reads', '--width', '100', '--std-symbols');

    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith(['a.test.ts::adds', 'b.test.ts::reads'], {
      width: 100,
      height: undefined,
      standardSymbols: true,
      reportDir: undefined,
      debug: undefined
    });
  });

  it('runs the whole suite when no tests are named', async () => {
    const { run, parse } = programWith();

    await parse('run', '--height', '30', '--debug');

    expect(run).toHaveBeenCalledWith([], expect.objectContaining({ height: 30, debug: true }));
  });

  it('resolves the report directory', () => {
    expect(toOverrides({ reportDir: 'reports' }).reportDir).toBe(path.resolve('reports'));
    expect(toOverrides({}).reportDir).toBeUndefined();
  });
});
