import { z } from 'zod';
import type { ExitInterpretation, TestRunnerDefinition, TestSelection } from '../base/TestRunnerDefinition';

const PackageJsonSchema = z.object({
  scripts: z.record(z.string()).optional(),
  dependencies: z.record(z.string()).optional(),
  devDependencies: z.record(z.string()).optional()
});

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

export function escapeRegExp(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Name filter matching exactly the selected tests' full names.
 */
export function namePattern(selection: readonly TestSelection[]): string {
  const names = [...new Set(selection.map(id => escapeRegExp(id.fullName)))];
  return `^(?:${names.join('|')})$`;
}

export class VitestDefinition implements TestRunnerDefinition {
  name = 'vitest';

  matches(args: string[], packageJsonContent?: string): boolean {
    const command = args[0];

    if (command === 'vitest') return true;
    if ((command === 'npx' || command === 'yarn' || command === 'pnpm') && args[1] === 'vitest') {
      return true;
    }

    if (command === 'npm' && (args[1] === 'test' || args[1] === 'run') && packageJsonContent) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(packageJsonContent);
      } catch {
        return false;
      }
      const packageJson = PackageJsonSchema.safeParse(parsed);
      if (!packageJson.success) {
        return false;
      }
      const { scripts, dependencies, devDependencies } = packageJson.data;
      const scriptName = args[1] === 'test' ? 'test' : args[2];
      if (scriptName && scripts?.[scriptName]?.includes('vitest')) return true;
      return Boolean(dependencies?.vitest ?? devDependencies?.vitest);
    }

    return false;
  }

  buildMainCommand(args: string[], adapterPath: string, selection: readonly TestSelection[] = []): string[] {
    const extra: string[] = [];

    if (selection.length > 0) {
      extra.push(...new Set(selection.map(id => id.filePath)));
      extra.push('-t', namePattern(selection));
    }

    const hasReporter = args.some(arg => arg.includes('--reporter'));
    if (!hasReporter) {
      extra.push('--reporter', 'default');
    }
    extra.push('--reporter', adapterPath);

    // npm run needs everything after a -- separator
    if (args[0] === 'npm' && args[1] === 'run' && !args.includes('--')) {
      return [...args, '--', ...extra];
    }
    return [...args, ...extra];
  }

  getAdapterFileName(extension: string): string {
    return `vitest${extension}`;
  }

  interpretExitCode(exitCode: number | null): ExitInterpretation {
    switch (exitCode) {
      case 0: return 'success';
      case 1: return 'test-failure';
      default: return 'system-error';
    }
  }
}
