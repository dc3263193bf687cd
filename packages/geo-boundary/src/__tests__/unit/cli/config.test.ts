/**
 * Configuration Loading Tests
 *
 * Precedence of CLI overrides, H3_FILTER_* variables, config files and
 * defaults, plus validation failures.
 */

import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigurationError } from '../../../core/errors.js';
import {
  DEFAULT_CONFIG,
  findConfigFile,
  loadConfig,
  parseStrictInteger,
  toFilterOptions,
} from '../../../cli/lib/config.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'h3-filter-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('uses defaults when nothing is configured', () => {
    const config = loadConfig({ cwd: dir, env: {} });

    expect(config).toEqual({ ...DEFAULT_CONFIG, configPath: null });
    expect(toFilterOptions(config)).toEqual({
      maxRecordLength: 256,
      onRecordError: 'fail',
      closeKmlOnError: false,
    });
  });

  it('reads a YAML rc file found in a parent directory', async () => {
    await writeFile(
      join(dir, '.h3filterrc'),
      'version: 1\nmax_record_length: 64\non_error: skip\nclose_on_error: true\n'
    );
    const nested = join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });

    const config = loadConfig({ cwd: nested, env: {} });

    expect(config.configPath).toBe(join(dir, '.h3filterrc'));
    expect(config.maxRecordLength).toBe(64);
    expect(config.onError).toBe('skip');
    expect(config.closeOnError).toBe(true);
  });

  it('reads a JSON rc file', async () => {
    await writeFile(join(dir, '.h3filterrc.json'), '{"verbose": true, "json": true}');

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.verbose).toBe(true);
    expect(config.json).toBe(true);
  });

  it('lets environment variables override the file', async () => {
    await writeFile(join(dir, '.h3filterrc'), 'max_record_length: 64\non_error: skip\n');

    const config = loadConfig({
      cwd: dir,
      env: { H3_FILTER_MAX_RECORD_LENGTH: '32', H3_FILTER_ON_ERROR: 'fail' },
    });

    expect(config.maxRecordLength).toBe(32);
    expect(config.onError).toBe('fail');
  });

  it('lets CLI overrides win over environment variables', () => {
    const config = loadConfig({
      cwd: dir,
      env: { H3_FILTER_MAX_RECORD_LENGTH: '32', H3_FILTER_VERBOSE: 'true' },
      overrides: { maxRecordLength: 16, verbose: false },
    });

    expect(config.maxRecordLength).toBe(16);
    expect(config.verbose).toBe(false);
  });

  it('loads an explicit config path relative to the working directory', async () => {
    await writeFile(join(dir, 'custom.yaml'), 'on_error: skip\n');

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'custom.yaml' });

    expect(config.configPath).toBe(join(dir, 'custom.yaml'));
    expect(config.onError).toBe('skip');
  });

  it('takes the config path from H3_FILTER_CONFIG', async () => {
    await writeFile(join(dir, 'env.yaml'), 'close_on_error: true\n');

    const config = loadConfig({ cwd: dir, env: { H3_FILTER_CONFIG: 'env.yaml' } });

    expect(config.closeOnError).toBe(true);
  });

  it('treats an empty file as no settings', async () => {
    await writeFile(join(dir, '.h3filterrc'), '');

    expect(loadConfig({ cwd: dir, env: {} }).maxRecordLength).toBe(256);
  });

  describe('failures', () => {
    it('rejects a missing explicit config file', () => {
      expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'missing.yaml' })).toThrow(
        `Config file not found: ${join(dir, 'missing.yaml')}`
      );
    });

    it('rejects a file that is not a mapping', async () => {
      await writeFile(join(dir, '.h3filterrc'), '- a\n- b\n');

      expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigurationError);
    });

    it('rejects an unknown error policy', () => {
      expect(() => loadConfig({ cwd: dir, env: {}, overrides: { onError: 'retry' } })).toThrow(
        'Invalid --on-error: "retry". Must be one of: fail, skip'
      );
    });

    it('rejects a non-numeric environment value', () => {
      expect(() =>
        loadConfig({ cwd: dir, env: { H3_FILTER_MAX_RECORD_LENGTH: '12abc' } })
      ).toThrow('H3_FILTER_MAX_RECORD_LENGTH must be an integer, got "12abc"');
    });

    it('rejects a wrongly typed file value', async () => {
      await writeFile(join(dir, '.h3filterrc'), 'close_on_error: "yes"\n');

      expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(
        'Config key close_on_error must be true or false'
      );
    });

    it('rejects a non-positive maximum record length', () => {
      expect(() => loadConfig({ cwd: dir, env: {}, overrides: { maxRecordLength: 0 } })).toThrow(
        'Max record length must be a positive integer'
      );
    });

    it('rejects an unsupported file version', async () => {
      await writeFile(join(dir, '.h3filterrc'), 'version: 2\n');

      expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(
        'Unsupported config version: 2. Expected 1.'
      );
    });
  });
});

describe('findConfigFile', () => {
  it('prefers .h3filterrc over the suffixed names in the same directory', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'h3-filter-find-'));
    try {
      await writeFile(join(dir, '.h3filterrc.yml'), '');
      await writeFile(join(dir, '.h3filterrc'), '');

      expect(findConfigFile(dir)).toBe(join(dir, '.h3filterrc'));
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('parseStrictInteger', () => {
  it.each([
    ['0', 0],
    ['1', 1],
    [' 42 ', 42],
    ['+7', 7],
    ['-3', -3],
  ])('parses %j as %d', (input, expected) => {
    expect(parseStrictInteger(input, 'n')).toBe(expected);
  });

  it.each(['', 'x', '1x', '1.5', '0x1'])('rejects %j', (input) => {
    expect(() => parseStrictInteger(input, 'n')).toThrow(ConfigurationError);
  });
});
