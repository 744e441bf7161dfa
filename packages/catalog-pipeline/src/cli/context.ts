/**
 * Per-invocation CLI state, built once the global options are parsed
 */

import type { CLIConfig } from './lib/config.js';
import type { CLILogger } from './lib/logger.js';

export interface CLIContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

export type ContextProvider = () => CLIContext;
