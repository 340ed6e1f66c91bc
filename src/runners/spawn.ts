import { $ } from 'zx';
import type { ChildStreams } from '../consumer/RunOutputReader';
import { Logger } from '../utils/logger';

export const PIPE_ENV = 'TESTRELAY_PIPE';

export interface SpawnOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  logger: Logger;
}

export type SpawnTestProcess = (command: string[], options: SpawnOptions) => ChildStreams;

/**
 * Start the test command with the protocol switched on and its output piped
 * back to us.
 */
export const spawnTestProcess: SpawnTestProcess = (command, options) => {
  const { logger } = options;
  const env = { ...(options.env ?? process.env), [PIPE_ENV]: '1' };

  logger.command(command.join(' '), command);
  const proc = $({ cwd: options.cwd, env, nothrow: true, quiet: true, verbose: false })`${command}`;

  return {
    stdout: proc.stdout,
    stderr: proc.stderr,
    exitCode: proc.exitCode,
    kill: () => {
      proc.kill().catch((error: unknown) => {
        logger.error('Failed to kill test process', error);
      });
    }
  };
};
