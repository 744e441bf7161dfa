/**
 * CLI Configuration Tests
 *
 * Each test gets its own directory and an explicit environment, so the
 * host's CATALOG_PIPELINE_* variables never leak in.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadConfig, parseConfigContent, resolvePath } from '../../../cli/lib/config.js';
import { ConfigValidationError } from '../../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'catalog-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a file', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.storage).toBe('ndjson');
    expect(config.defaults).toEqual(DEFAULT_CONFIG.defaults);
    expect(config.services.recommendations.enabled).toBe(true);
    expect(config.verbose).toBe(false);
  });

  it('reads a YAML file found in a parent directory', async () => {
    await writeFile(
      join(dir, '.catalog-pipelinerc.yaml'),
      ['storage: sqlite', 'paths:', '  processed: ./out', 'defaults:', '  max_items: 25', '  numeric_strategy: mean'].join(
        '\n'
      )
    );
    const nested = join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.catalog-pipelinerc.yaml'));
    expect(config.storage).toBe('sqlite');
    expect(config.defaults.maxItems).toBe(25);
    expect(config.defaults.numericStrategy).toBe('mean');
    expect(resolvePath(config, 'processed')).toBe(join(dir, 'out'));
    expect(resolvePath(config, 'reports')).toBe(join(dir, 'data', 'reports'));
  });

  it('reads an explicit JSON file', async () => {
    await writeFile(join(dir, 'pipeline.json'), JSON.stringify({ defaults: { category: 'biscuits' } }));

    const config = await loadConfig({ cwd: dir, configPath: 'pipeline.json', env: {} });

    expect(config.defaults.category).toBe('biscuits');
  });

  it('applies flags over environment over file', async () => {
    await writeFile(join(dir, '.catalog-pipelinerc'), 'defaults:\n  max_items: 25\n  category: biscuits\n');

    const config = await loadConfig({
      cwd: dir,
      env: {
        CATALOG_PIPELINE_MAX_ITEMS: '30',
        CATALOG_PIPELINE_CATEGORY: 'bonbons',
        CATALOG_PIPELINE_RECOMMENDATIONS: 'false',
        CATALOG_PIPELINE_STORAGE: 'sqlite',
      },
      overrides: { maxItems: 5 },
    });

    expect(config.defaults.maxItems).toBe(5);
    expect(config.defaults.category).toBe('bonbons');
    expect(config.services.recommendations.enabled).toBe(false);
    expect(config.storage).toBe('sqlite');
  });

  it('accepts an empty file', async () => {
    await writeFile(join(dir, '.catalog-pipelinerc.yml'), '');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBe(join(dir, '.catalog-pipelinerc.yml'));
    expect(config.defaults.category).toBe('chocolats');
  });

  it('rejects a missing explicit file', async () => {
    await expect(loadConfig({ cwd: dir, configPath: 'absent.yaml', env: {} })).rejects.toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`
    );
  });

  it('rejects a non-numeric environment value', async () => {
    await expect(loadConfig({ cwd: dir, env: { CATALOG_PIPELINE_MAX_ITEMS: 'lots' } })).rejects.toThrow(
      'CATALOG_PIPELINE_MAX_ITEMS must be a number, got "lots"'
    );
  });

  it('rejects an unknown storage backend', async () => {
    await expect(loadConfig({ cwd: dir, env: { CATALOG_PIPELINE_STORAGE: 'postgres' } })).rejects.toThrow(
      'CATALOG_PIPELINE_STORAGE must be one of ndjson, sqlite, got "postgres"'
    );
  });

  it('validates the merged result', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, overrides: { maxItems: 0 } })).rejects.toThrow(
      'Invalid configuration: defaults.maxItems: Number must be greater than 0'
    );
  });

  it('rejects an unsupported config version', async () => {
    await writeFile(join(dir, '.catalog-pipelinerc'), 'version: 2\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow('version: Unsupported config version, expected 1');
  });
});

describe('parseConfigContent', () => {
  it('rejects unknown keys', () => {
    expect(() => parseConfigContent('defaults:\n  max_itmes: 3\n', 'rc.yaml')).toThrow(
      "defaults: Unrecognized key(s) in object: 'max_itmes'"
    );
  });

  it('rejects out-of-range values', () => {
    expect(() => parseConfigContent('services:\n  catalog:\n    page_size: 500\n', 'rc.yaml')).toThrow(
      ConfigValidationError
    );
  });

  it('reports unparseable content', () => {
    expect(() => parseConfigContent('{ "storage": ', 'rc.json')).toThrow('Cannot parse config file rc.json');
  });
});
