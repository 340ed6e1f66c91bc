import { describe, it, expect } from 'vitest';
import { DEFAULT_COMMAND, loadConfig } from '../../src/config';
import { RelayError } from '../../src/errors';

describe('loadConfig', () => {
  const env = { COLUMNS: '120', LINES: '40' };

  it('fills in defaults relative to the working directory', () => {
    expect(loadConfig(env, { cwd: '/work' })).toEqual({
      command: DEFAULT_COMMAND,
      cwd: '/work',
      width: 120,
      height: 40,
      standardSymbols: false,
      reportDir: '/work/.testrelay',
      logDir: '/work/.testrelay',
      debug: false
    });
  });

  it('reads the environment', () => {
    const config = loadConfig({
      ...env,
      TESTRELAY_COMMAND: '  npx vitest run --pool forks ',
      TESTRELAY_STD_SYMBOLS: '1',
      TESTRELAY_REPORT_DIR: '/reports',
      TESTRELAY_LOG_DIR: '/logs',
      TESTRELAY_DEBUG: 'true'
    }, { cwd: '/work' });

    expect(config.command).toEqual(['npx', 'vitest', 'run', '--pool', 'forks']);
    expect(config.standardSymbols).toBe(true);
    expect(config.reportDir).toBe('/reports');
    expect(config.logDir).toBe('/logs');
    expect(config.debug).toBe(true);
  });

  it('lets overrides win and ignores undefined ones', () => {
    const config = loadConfig(env, { cwd: '/work', width: 100, height: undefined, debug: true });

    expect(config.width).toBe(100);
    expect(config.height).toBe(40);
    expect(config.debug).toBe(true);
  });

  it('ignores surface sizes that are not positive integers', () => {
    const config = loadConfig({ COLUMNS: 'wide', LINES: '-3' }, { cwd: '/work' });

    expect(Number.isInteger(config.width) && config.width > 0).toBe(true);
    expect(Number.isInteger(config.height) && config.height > 0).toBe(true);
  });

  it('rejects invalid overrides', () => {
    expect(() => loadConfig(env, { cwd: '/work', width: 0 })).toThrow(RelayError);
    expect(() => loadConfig(env, { cwd: '/work', width: 0 })).toThrow(/^Invalid configuration: width: /);
    expect(() => loadConfig(env, { cwd: '/work', command: [] })).toThrow(/command/);
  });
});
