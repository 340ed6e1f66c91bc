import { describe, it, expect } from 'vitest';
import { NodeId } from '../../../src/protocol/NodeId';
import { escapeRegExp, namePattern, VitestDefinition } from '../../../src/runners/vitest/VitestDefinition';

describe('VitestDefinition', () => {
  const vitest = new VitestDefinition();
  const adapterPath = '/path/to/adapters/vitest.js';

  describe('buildMainCommand', () => {
    it('adds the default reporter and the adapter', () => {
      expect(vitest.buildMainCommand(['npx', 'vitest', 'run'], adapterPath)).toEqual([
        'npx', 'vitest', 'run',
        '--reporter', 'default',
        '--reporter', adapterPath
      ]);
    });

    it('keeps a reporter the user chose', () => {
      expect(vitest.buildMainCommand(['vitest', 'run', '--reporter=dot'], adapterPath)).toEqual([
        'vitest', 'run', '--reporter=dot',
        '--reporter', adapterPath
      ]);
    });

    it('puts the arguments of npm run after a separator', () => {
      expect(vitest.buildMainCommand(['npm', 'run', 'test'], adapterPath)).toEqual([
        'npm', 'run', 'test', '--',
        '--reporter', 'default',
        '--reporter', adapterPath
      ]);
      expect(vitest.buildMainCommand(['npm', 'run', 'test', '--', '--run'], adapterPath)).toEqual([
        'npm', 'run', 'test', '--', '--run',
        '--reporter', 'default',
        '--reporter', adapterPath
      ]);
    });

    it('narrows the run to the selected tests', () => {
      const selection = [
        new NodeId('tests/math.test.ts::arithmetic::adds'),
        new NodeId('tests/math.test.ts::top level'),
        new NodeId('tests/io.test.ts::reads (utf8)')
      ];

      expect(vitest.buildMainCommand(['npx', 'vitest', 'run'], adapterPath, selection)).toEqual([
        'npx', 'vitest', 'run',
        'tests/math.test.ts', 'tests/io.test.ts',
        '-t', '^(?:arithmetic adds|top level|reads \\(utf8\\))$',
        '--reporter', 'default',
        '--reporter', adapterPath
      ]);
    });
  });

  it('escapes regular expression syntax in names', () => {
    expect(escapeRegExp('a.b*c [d]')).toBe('a\\.b\\*c \\[d\\]');
    expect(new RegExp(namePattern([new NodeId('x.test.ts::1 + 1')])).test('1 + 1')).toBe(true);
  });

  describe('matches', () => {
    it('recognises direct invocations', () => {
      expect(vitest.matches(['vitest'])).toBe(true);
      expect(vitest.matches(['npx', 'vitest', 'run'])).toBe(true);
      expect(vitest.matches(['pnpm', 'vitest'])).toBe(true);
      expect(vitest.matches(['npx', 'jest'])).toBe(false);
    });

    it('looks at package.json for npm scripts', () => {
      const scripts = JSON.stringify({ scripts: { test: 'vitest run', lint: 'eslint .' } });
      const deps = JSON.stringify({ scripts: { check: 'run-tests' }, devDependencies: { vitest: '^2.1.0' } });

      expect(vitest.matches(['npm', 'test'], scripts)).toBe(true);
      expect(vitest.matches(['npm', 'run', 'check'], deps)).toBe(true);
      expect(vitest.matches(['npm', 'run', 'lint'], JSON.stringify({ scripts: { lint: 'eslint .' } }))).toBe(false);
      expect(vitest.matches(['npm', 'test'], 'not json')).toBe(false);
      expect(vitest.matches(['npm', 'test'])).toBe(false);
    });
  });

  it('interprets exit codes', () => {
    expect(vitest.interpretExitCode(0)).toBe('success');
    expect(vitest.interpretExitCode(1)).toBe('test-failure');
    expect(vitest.interpretExitCode(2)).toBe('system-error');
    expect(vitest.interpretExitCode(null)).toBe('system-error');
  });

  it('names the adapter after the build extension', () => {
    expect(vitest.getAdapterFileName('.js')).toBe('vitest.js');
    expect(vitest.getAdapterFileName('.ts')).toBe('vitest.ts');
  });
});
