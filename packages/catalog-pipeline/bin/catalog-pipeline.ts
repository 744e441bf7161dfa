#!/usr/bin/env node
/**
 * Catalog Pipeline CLI Entry Point
 *
 * Incremental catalog ETL: fetch products, geocode store names, clean,
 * grade and persist.
 *
 * @module catalog-pipeline-cli
 */

import { Command } from 'commander';

import { loadConfig } from '../src/cli/lib/config.js';
import type { StorageBackend } from '../src/cli/lib/config.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { printError } from '../src/cli/lib/output.js';
import { registerRunCommand, registerScoreCommand } from '../src/cli/commands/index.js';
import type { CLIContext } from '../src/cli/context.js';
import { EXIT_CODES } from '../src/cli/exit-codes.js';
import { CLI_NAME, CLI_VERSION } from '../src/cli/index.js';
import { isConfigValidationError } from '../src/core/errors.js';

export { EXIT_CODES };

// ============================================================================
// Global State
// ============================================================================

let globalContext: CLIContext | null = null;

/**
 * Aborted on the first SIGINT; the running pipeline stops before its
 * next stage and persists nothing
 */
const interruption = new AbortController();

export function getGlobalContext(): CLIContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

interface ContextOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  category?: string;
  maxItems?: number;
  storage?: string;
}

function parseStorage(value: string | undefined): StorageBackend | undefined {
  if (value === undefined) return undefined;
  if (value === 'ndjson' || value === 'sqlite') return value;
  throw new Error(`Unknown storage backend "${value}", expected ndjson or sqlite`);
}

async function initializeContext(options: ContextOptions): Promise<CLIContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      category: options.category,
      maxItems: options.maxItems,
      storage: parseStorage(options.storage),
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Incremental catalog ETL with geocoding enrichment and quality grading')
    .version(CLI_VERSION, '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .catalog-pipelinerc)')
    .hook('preAction', async (thisCommand, actionCommand) => {
      const options: ContextOptions = { ...thisCommand.opts(), ...actionCommand.opts() };
      try {
        await initializeContext(options);
      } catch (error) {
        printError(`Configuration: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerRunCommand(program, getGlobalContext, () => interruption.signal);
  registerScoreCommand(program, getGlobalContext);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

process.on('SIGINT', () => {
  if (interruption.signal.aborted) {
    // Second Ctrl-C: stop waiting for in-flight requests
    process.exit(EXIT_CODES.SUCCESS);
  }
  console.error('\nInterrupted, stopping after the current stage...');
  interruption.abort();
});

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      printError(error instanceof Error ? error.message : String(error));
    }
    process.exit(isConfigValidationError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
