/**
 * Catalog Pipeline CLI Configuration Management
 *
 * Loads configuration from .catalog-pipelinerc (YAML or JSON) with
 * environment variable overrides and sensible defaults. Provides typed
 * configuration for every CLI operation.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (CATALOG_PIPELINE_*)
 * 3. Config file (.catalog-pipelinerc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigValidationError } from '../../core/errors.js';
import {
  DEFAULT_CATEGORY,
  DEFAULT_MAX_ITEMS,
  DEFAULT_TEXT_PLACEHOLDER,
  GEOCODE_ADDRESS_LIMIT,
  GEOCODED_SCORE_THRESHOLD,
} from '../../core/constants.js';
import type { NumericFillStrategy } from '../../transformation/transform-chain.js';

// ============================================================================
// Configuration Types
// ============================================================================

export type StorageBackend = 'ndjson' | 'sqlite';

export const STORAGE_BACKENDS: readonly StorageBackend[] = ['ndjson', 'sqlite'];

export interface PathsConfig {
  /** Raw fetched batches */
  readonly raw: string;
  /** Cleaned NDJSON datasets */
  readonly processed: string;
  /** Markdown quality reports */
  readonly reports: string;
  /** SQLite database file */
  readonly database: string;
}

export interface DefaultsConfig {
  readonly category: string;
  readonly maxItems: number;
  readonly geocodeLimit: number;
  readonly geocodeConcurrency: number;
  readonly numericStrategy: NumericFillStrategy;
  readonly textPlaceholder: string;
}

export interface CatalogServiceConfig {
  readonly baseUrl: string;
  readonly pageSize: number;
  readonly timeout: number;
}

export interface GeocoderServiceConfig {
  readonly baseUrl: string;
  readonly minScore: number;
  readonly timeout: number;
}

export interface RecommendationsServiceConfig {
  readonly enabled: boolean;
  readonly baseUrl: string;
  readonly model: string;
  readonly timeout: number;
}

export interface ServicesConfig {
  readonly catalog: CatalogServiceConfig;
  readonly geocoder: GeocoderServiceConfig;
  readonly recommendations: RecommendationsServiceConfig;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly paths: PathsConfig;
  readonly storage: StorageBackend;
  readonly defaults: DefaultsConfig;
  readonly services: ServicesConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Schemas
// ============================================================================

const positiveInt = z.number().int().positive();

/**
 * Config file structure. Every key is optional; unknown keys are rejected
 * so typos surface instead of silently falling back to defaults.
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    storage: z.enum(['ndjson', 'sqlite']).optional(),
    paths: z
      .object({
        raw: z.string().optional(),
        processed: z.string().optional(),
        reports: z.string().optional(),
        database: z.string().optional(),
      })
      .strict()
      .optional(),
    defaults: z
      .object({
        category: z.string().optional(),
        max_items: positiveInt.optional(),
        geocode_limit: z.number().int().nonnegative().optional(),
        geocode_concurrency: positiveInt.optional(),
        numeric_strategy: z.enum(['median', 'mean', 'zero', 'none']).optional(),
        text_placeholder: z.string().optional(),
      })
      .strict()
      .optional(),
    services: z
      .object({
        catalog: z
          .object({
            base_url: z.string().url().optional(),
            page_size: positiveInt.max(100).optional(),
            timeout: positiveInt.optional(),
          })
          .strict()
          .optional(),
        geocoder: z
          .object({
            base_url: z.string().url().optional(),
            min_score: z.number().min(0).max(1).optional(),
            timeout: positiveInt.optional(),
          })
          .strict()
          .optional(),
        recommendations: z
          .object({
            enabled: z.boolean().optional(),
            base_url: z.string().url().optional(),
            model: z.string().optional(),
            timeout: positiveInt.optional(),
          })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Merged configuration, checked after every layer is applied
 */
const MergedConfigSchema = z.object({
  version: z.literal(1, { errorMap: () => ({ message: 'Unsupported config version, expected 1' }) }),
  storage: z.enum(['ndjson', 'sqlite']),
  defaults: z.object({
    category: z.string().min(1, 'Category must not be empty'),
    maxItems: positiveInt,
    geocodeLimit: z.number().int().nonnegative(),
    geocodeConcurrency: positiveInt.max(20),
    numericStrategy: z.enum(['median', 'mean', 'zero', 'none']),
  }),
});

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  paths: {
    raw: './data/raw',
    processed: './data/processed',
    reports: './data/reports',
    database: './data/catalog.db',
  },

  storage: 'ndjson',

  defaults: {
    category: DEFAULT_CATEGORY,
    maxItems: DEFAULT_MAX_ITEMS,
    geocodeLimit: GEOCODE_ADDRESS_LIMIT,
    geocodeConcurrency: 1,
    numericStrategy: 'median',
    textPlaceholder: DEFAULT_TEXT_PLACEHOLDER,
  },

  services: {
    catalog: {
      baseUrl: 'https://world.openfoodfacts.org',
      pageSize: 50,
      timeout: 30000,
    },
    geocoder: {
      baseUrl: 'https://api-adresse.data.gouv.fr',
      minScore: GEOCODED_SCORE_THRESHOLD,
      timeout: 10000,
    },
    recommendations: {
      enabled: true,
      baseUrl: 'http://localhost:11434',
      model: 'llama3.2',
      timeout: 60000,
    },
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.catalog-pipelinerc',
  '.catalog-pipelinerc.yaml',
  '.catalog-pipelinerc.yml',
  '.catalog-pipelinerc.json',
];

const ENV_PREFIX = 'CATALOG_PIPELINE_';

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

/**
 * Parse and validate config file content
 */
export function parseConfigContent(content: string, filePath: string): ConfigFile {
  let raw: unknown;
  try {
    // YAML also accepts plain JSON
    raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigValidationError(
      `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // An empty YAML document parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigValidationError(`Invalid config file ${filePath}`, formatIssues(result.error));
  }
  return result.data;
}

function parseConfigFile(filePath: string): ConfigFile {
  return parseConfigContent(readFileSync(filePath, 'utf-8'), filePath);
}

/**
 * Typed readers over one environment snapshot
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (!Number.isFinite(num)) {
      throw new ConfigValidationError(`${ENV_PREFIX}${name} must be a number, got "${value}"`);
    }
    return num;
  }

  storage(name: string): StorageBackend | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    if (value === 'ndjson' || value === 'sqlite') return value;
    throw new ConfigValidationError(
      `${ENV_PREFIX}${name} must be one of ${STORAGE_BACKENDS.join(', ')}, got "${value}"`
    );
  }
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment snapshot (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    storage?: StorageBackend;
    category?: string;
    maxItems?: number;
  };
}

function locateConfigFile(options: LoadConfigOptions, env: EnvReader): string | null {
  const explicit = options.configPath ?? env.string('CONFIG');
  if (explicit) {
    const configPath = resolve(options.cwd ?? process.cwd(), explicit);
    if (!existsSync(configPath)) {
      throw new ConfigValidationError(`Config file not found: ${configPath}`);
    }
    return configPath;
  }
  return findConfigFile(options.cwd ?? process.cwd());
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigValidationError} When a layer or the merged result is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const configPath = locateConfigFile(options, env);
  const file: ConfigFile = configPath ? parseConfigFile(configPath) : {};
  const overrides = options.overrides ?? {};
  const services = file.services ?? {};

  const config: CLIConfig = {
    version: file.version ?? DEFAULT_CONFIG.version,

    paths: {
      raw: env.string('RAW_DIR') ?? file.paths?.raw ?? DEFAULT_CONFIG.paths.raw,
      processed: env.string('PROCESSED_DIR') ?? file.paths?.processed ?? DEFAULT_CONFIG.paths.processed,
      reports: env.string('REPORTS_DIR') ?? file.paths?.reports ?? DEFAULT_CONFIG.paths.reports,
      database: env.string('DATABASE') ?? file.paths?.database ?? DEFAULT_CONFIG.paths.database,
    },

    storage: overrides.storage ?? env.storage('STORAGE') ?? file.storage ?? DEFAULT_CONFIG.storage,

    defaults: {
      category:
        overrides.category ??
        env.string('CATEGORY') ??
        file.defaults?.category ??
        DEFAULT_CONFIG.defaults.category,
      maxItems:
        overrides.maxItems ??
        env.number('MAX_ITEMS') ??
        file.defaults?.max_items ??
        DEFAULT_CONFIG.defaults.maxItems,
      geocodeLimit:
        env.number('GEOCODE_LIMIT') ??
        file.defaults?.geocode_limit ??
        DEFAULT_CONFIG.defaults.geocodeLimit,
      geocodeConcurrency:
        env.number('GEOCODE_CONCURRENCY') ??
        file.defaults?.geocode_concurrency ??
        DEFAULT_CONFIG.defaults.geocodeConcurrency,
      numericStrategy: file.defaults?.numeric_strategy ?? DEFAULT_CONFIG.defaults.numericStrategy,
      textPlaceholder: file.defaults?.text_placeholder ?? DEFAULT_CONFIG.defaults.textPlaceholder,
    },

    services: {
      catalog: {
        baseUrl: services.catalog?.base_url ?? DEFAULT_CONFIG.services.catalog.baseUrl,
        pageSize: services.catalog?.page_size ?? DEFAULT_CONFIG.services.catalog.pageSize,
        timeout: services.catalog?.timeout ?? DEFAULT_CONFIG.services.catalog.timeout,
      },
      geocoder: {
        baseUrl: services.geocoder?.base_url ?? DEFAULT_CONFIG.services.geocoder.baseUrl,
        minScore: services.geocoder?.min_score ?? DEFAULT_CONFIG.services.geocoder.minScore,
        timeout: services.geocoder?.timeout ?? DEFAULT_CONFIG.services.geocoder.timeout,
      },
      recommendations: {
        enabled:
          env.bool('RECOMMENDATIONS') ??
          services.recommendations?.enabled ??
          DEFAULT_CONFIG.services.recommendations.enabled,
        baseUrl:
          env.string('RECOMMENDATIONS_URL') ??
          services.recommendations?.base_url ??
          DEFAULT_CONFIG.services.recommendations.baseUrl,
        model: services.recommendations?.model ?? DEFAULT_CONFIG.services.recommendations.model,
        timeout: services.recommendations?.timeout ?? DEFAULT_CONFIG.services.recommendations.timeout,
      },
    },

    // Runtime flags
    verbose: overrides.verbose ?? env.bool('VERBOSE') ?? false,
    json: overrides.json ?? env.bool('JSON') ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate merged configuration
 *
 * @throws {ConfigValidationError} Listing every failing field
 */
export function validateConfig(config: CLIConfig): void {
  const result = MergedConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError('Invalid configuration', formatIssues(result.error));
  }
}

/**
 * Resolve a configured path against the config file's directory
 * (or the working directory when no file was found)
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths[pathKey]);
}
