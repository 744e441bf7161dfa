/**
 * Catalog Pipeline CLI
 *
 * @module cli
 */

export * from './lib/index.js';
export * from './commands/index.js';
export { EXIT_CODES, type ExitCode } from './exit-codes.js';
export type { CLIContext, ContextProvider } from './context.js';

export const CLI_VERSION = '0.1.0';
export const CLI_NAME = 'catalog-pipeline';
