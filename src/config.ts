import path from 'path';
import { z } from 'zod';
import { RelayError } from './errors';

export const DEFAULT_COMMAND = ['npx', 'vitest', 'run'];

export const RelayConfigSchema = z
  .object({
    /** Command that starts the test engine; the reporter arguments are appended */
    command: z.array(z.string()).min(1),
    cwd: z.string(),
    /** Surface the progress groups are laid out for */
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    /** Use F/E/x/X style indicators */
    standardSymbols: z.boolean(),
    /** Where run reports are written */
    reportDir: z.string(),
    /** Where debug.log is written */
    logDir: z.string(),
    debug: z.boolean()
  })
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export type ConfigOverrides = Partial<RelayConfig>;

function positiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function flag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

/**
 * Build the configuration from the environment, then apply explicit
 * overrides (normally from the command line).
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): RelayConfig {
  const cwd = overrides.cwd ?? process.cwd();
  const command = env.TESTRELAY_COMMAND?.trim()
    ? env.TESTRELAY_COMMAND.trim().split(/\s+/)
    : DEFAULT_COMMAND;

  const base: RelayConfig = {
    command,
    cwd,
    width: positiveInt(env.COLUMNS) ?? process.stdout.columns ?? 80,
    height: positiveInt(env.LINES) ?? process.stdout.rows ?? 24,
    standardSymbols: flag(env.TESTRELAY_STD_SYMBOLS),
    reportDir: env.TESTRELAY_REPORT_DIR || path.join(cwd, '.testrelay'),
    logDir: env.TESTRELAY_LOG_DIR || path.join(cwd, '.testrelay'),
    debug: flag(env.TESTRELAY_DEBUG)
  };

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = RelayConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new RelayError(`Invalid configuration: ${problems.join('; ')}`, { cause: result.error });
  }
  return result.data;
}
