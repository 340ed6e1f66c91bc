import { RelayConfig } from './config';
import { Codec } from './protocol/codec';
import { Logger } from './utils/logger';

/**
 * Shared services for one front-end process, built once at startup and
 * handed to every component that needs them.
 */
export interface RunContext {
  readonly config: RelayConfig;
  readonly codec: Codec;
  logger(component: string): Logger;
}

export function createRunContext(config: RelayConfig): RunContext {
  const root = Logger.create('testrelay', { logDir: config.logDir, debug: config.debug });
  const codec = new Codec(root.child('codec'));
  return {
    config,
    codec,
    logger: (component: string) => root.child(component)
  };
}
