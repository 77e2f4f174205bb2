/**
 * CLI configuration tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  loadConfig,
  parseSeverityOverrides,
  resolvePath,
  validateConfig,
} from '../../../cli/lib/config.js';
import { ConfigError } from '../../../core/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'feed-validator-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults', async () => {
    const config = await loadConfig({ env: {}, cwd: dir });

    expect(config.defaults).toEqual(DEFAULT_CONFIG.defaults);
    expect(config.ocd).toEqual(DEFAULT_CONFIG.ocd);
    expect(config.rules.severity).toEqual({});
    expect(config.verbose).toBe(false);
    expect(config.json).toBe(false);
  });

  it('layers flags over environment over file', async () => {
    await writeFile(
      join(dir, '.feedvalidatorrc'),
      [
        'defaults:',
        '  timeout: 5000',
        '  ruleSet: officeholder',
        'ocd:',
        '  country: CA',
        '  localFile: data/ca.csv',
        'rules:',
        '  severity:',
        '    AllCaps: info',
        '    PercentSum: warning',
      ].join('\n')
    );

    const config = await loadConfig({
      cwd: dir,
      env: { FEED_VALIDATOR_TIMEOUT: '7000', FEED_VALIDATOR_COUNTRY: 'br', FEED_VALIDATOR_GITHUB_TOKEN: 'test-token' },
      overrides: { country: 'MX', severity: { PercentSum: 'error' } },
    });

    expect(config.configPath).toBe(join(dir, '.feedvalidatorrc'));
    expect(config.defaults.timeout).toBe(7000);
    expect(config.defaults.ruleSet).toBe('officeholder');
    expect(config.ocd.country).toBe('mx');
    expect(config.ocd.localFile).toBe(join(dir, 'data', 'ca.csv'));
    expect(config.ocd.token).toBe('test-token');
    expect(config.rules.severity).toEqual({ AllCaps: 'info', PercentSum: 'error' });
  });

  it('resolves a dataset path from the command line against the working directory', async () => {
    const config = await loadConfig({ env: {}, cwd: dir, overrides: { ocdIdFile: 'ids.csv' } });

    expect(config.ocd.localFile).toBe(join(dir, 'ids.csv'));
  });

  it('reads list and boolean environment variables', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { FEED_VALIDATOR_REQUIRED_LANGUAGES: 'en, es,', FEED_VALIDATOR_JSON: '1', FEED_VALIDATOR_VERBOSE: 'no' },
    });

    expect(config.defaults.requiredLanguages).toEqual(['en', 'es']);
    expect(config.json).toBe(true);
    expect(config.verbose).toBe(false);
  });

  it('rejects keys the file format does not know', async () => {
    await writeFile(join(dir, '.feedvalidatorrc'), 'defaults:\n  colour: red\n');

    await expect(loadConfig({ env: {}, cwd: dir })).rejects.toThrow('Invalid config file: defaults:');
  });

  it('rejects an explicit config path that does not exist', async () => {
    await expect(loadConfig({ env: {}, cwd: dir, configPath: 'missing.yml' })).rejects.toThrow(
      `Config file not found: ${join(dir, 'missing.yml')}`
    );
  });

  it('rejects malformed environment values', async () => {
    await expect(loadConfig({ cwd: dir, env: { FEED_VALIDATOR_TIMEOUT: 'soon' } })).rejects.toThrow(
      "FEED_VALIDATOR_TIMEOUT must be a number, got 'soon'"
    );
    await expect(loadConfig({ cwd: dir, env: { FEED_VALIDATOR_RULE_SET: 'primary' } })).rejects.toBeInstanceOf(
      ConfigError
    );
  });
});

describe('parseSeverityOverrides', () => {
  it('parses Rule=level pairs', () => {
    expect(parseSeverityOverrides(['AllCaps=info', 'DuplicateID=warning'])).toEqual({
      AllCaps: 'info',
      DuplicateID: 'warning',
    });
  });

  it('rejects malformed pairs and unknown levels', () => {
    expect(() => parseSeverityOverrides(['AllCaps'])).toThrow("Severity override must look like Rule=level, got 'AllCaps'");
    expect(() => parseSeverityOverrides(['AllCaps=loud'])).toThrow(
      "Unknown severity 'loud' for AllCaps; use error, warning or info"
    );
  });
});

describe('validateConfig', () => {
  it('rejects a country code that is not two letters', async () => {
    const config = await loadConfig({ env: {}, cwd: tmpdir(), overrides: { country: 'usa' } });

    expect(() => validateConfig(config)).toThrow("Country must be a two-letter code, got 'usa'");
  });
});

describe('resolvePath', () => {
  it('resolves against the working directory without a config file', async () => {
    const config = await loadConfig({ env: {}, cwd: tmpdir() });

    expect(resolvePath({ ...config, configPath: null }, 'cache', '/work')).toBe(resolve('/work', '.feed-validator/cache'));
  });
});
