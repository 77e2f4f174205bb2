/**
 * CLI Configuration Management
 *
 * Loads configuration from .feedvalidatorrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (FEED_VALIDATOR_*)
 * 3. Config file (.feedvalidatorrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { isSeverity, type Severity } from '../../core/issues.js';
import { DEFAULT_OCD_REPOSITORY } from '../../ocd/github-source.js';
import { isRuleSetName, type RuleSetName } from '../../rules/registry.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Directory holding downloaded OCD-ID datasets */
  readonly cache: string;
}

export interface DefaultsConfig {
  /** HTTP timeout in milliseconds */
  readonly timeout: number;
  readonly ruleSet: RuleSetName;
  readonly requiredLanguages: readonly string[];
}

export interface OcdConfig {
  /** GitHub owner/name of the OCD division id repository */
  readonly repository: string;
  readonly country: string;
  /** Local dataset used instead of the remote one */
  readonly localFile: string | null;
  readonly token: string | null;
}

export interface RulesConfig {
  /** Rule id to the severity its issues take */
  readonly severity: Readonly<Record<string, Severity>>;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly defaults: DefaultsConfig;
  readonly ocd: OcdConfig;
  readonly rules: RulesConfig;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const severitySchema = z.enum(['error', 'warning', 'info']);

/**
 * Config file structure
 */
const configFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z.object({ cache: z.string().min(1).optional() }).strict().optional(),
    defaults: z
      .object({
        timeout: z.number().int().positive().optional(),
        ruleSet: z.enum(['election', 'officeholder']).optional(),
        requiredLanguages: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
    ocd: z
      .object({
        repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/, 'expected owner/name').optional(),
        country: z.string().regex(/^[a-z]{2}$/i, 'expected a two-letter country code').optional(),
        localFile: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    rules: z.object({ severity: z.record(severitySchema).optional() }).strict().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,
  paths: {
    cache: './.feed-validator/cache',
  },
  defaults: {
    timeout: 30000,
    ruleSet: 'election',
    requiredLanguages: [],
  },
  ocd: {
    repository: DEFAULT_OCD_REPOSITORY,
    country: 'us',
    localFile: null,
    token: null,
  },
  rules: {
    severity: {},
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

export const CONFIG_FILE_NAMES = [
  '.feedvalidatorrc',
  '.feedvalidatorrc.yaml',
  '.feedvalidatorrc.yml',
  '.feedvalidatorrc.json',
];

export const ENV_PREFIX = 'FEED_VALIDATOR_';

/**
 * Find a config file in `startDir` or its parents
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
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Read and validate a config file. YAML is a superset of JSON, so one
 * parser covers every supported file name.
 *
 * @throws {ConfigError} When the file cannot be read, parsed or validated
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Config file could not be read: ${error instanceof Error ? error.message : String(error)}`, filePath);
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config file: ${problems.join('; ')}`, filePath);
  }
  return parsed.data;
}

type Environment = Readonly<Record<string, string | undefined>>;

function envVar(env: Environment, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === undefined || value === '' ? undefined : value;
}

function envBool(env: Environment, name: string): boolean | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function envNumber(env: Environment, name: string): number | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new ConfigError(`${ENV_PREFIX}${name} must be a number, got '${value}'`, 'environment');
  }
  return num;
}

function envList(env: Environment, name: string): string[] | undefined {
  const value = envVar(env, name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function envRuleSet(env: Environment): RuleSetName | undefined {
  const value = envVar(env, 'RULE_SET');
  if (value === undefined) return undefined;
  if (!isRuleSetName(value)) {
    throw new ConfigError(`${ENV_PREFIX}RULE_SET must be election or officeholder, got '${value}'`, 'environment');
  }
  return value;
}

/**
 * Parse "Rule=level" pairs
 *
 * @throws {ConfigError} On a malformed pair or unknown level
 */
export function parseSeverityOverrides(pairs: readonly string[]): Record<string, Severity> {
  const overrides: Record<string, Severity> = {};
  for (const pair of pairs) {
    const [ruleId, level, ...rest] = pair.split('=');
    if (ruleId === undefined || ruleId === '' || level === undefined || rest.length > 0) {
      throw new ConfigError(`Severity override must look like Rule=level, got '${pair}'`, 'cli');
    }
    if (!isSeverity(level)) {
      throw new ConfigError(`Unknown severity '${level}' for ${ruleId}; use error, warning or info`, 'cli');
    }
    overrides[ruleId] = level;
  }
  return overrides;
}

export interface ConfigOverrides {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly timeout?: number;
  readonly ruleSet?: RuleSetName;
  readonly requiredLanguages?: readonly string[];
  readonly country?: string;
  readonly ocdIdFile?: string;
  readonly severity?: Readonly<Record<string, Severity>>;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** CLI flag overrides */
  readonly overrides?: ConfigOverrides;
  readonly env?: Environment;
  /** Directory the config file search starts from */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} When a config file is missing or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? envVar(env, 'CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath !== null) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  // Paths given on the command line or in the environment are relative to
  // the working directory; paths in the file, to the file
  const flagFile = overrides.ocdIdFile ?? envVar(env, 'OCDID_FILE');
  const fileLocal = fileConfig.ocd?.localFile;
  let localFile: string | null = null;
  if (flagFile !== undefined) {
    localFile = resolve(cwd, flagFile);
  } else if (fileLocal !== undefined) {
    localFile = resolve(configPath !== null ? dirname(configPath) : cwd, fileLocal);
  }

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      cache: envVar(env, 'CACHE_DIR') ?? fileConfig.paths?.cache ?? DEFAULT_CONFIG.paths.cache,
    },

    defaults: {
      timeout:
        overrides.timeout ?? envNumber(env, 'TIMEOUT') ?? fileConfig.defaults?.timeout ?? DEFAULT_CONFIG.defaults.timeout,
      ruleSet: overrides.ruleSet ?? envRuleSet(env) ?? fileConfig.defaults?.ruleSet ?? DEFAULT_CONFIG.defaults.ruleSet,
      requiredLanguages:
        overrides.requiredLanguages ??
        envList(env, 'REQUIRED_LANGUAGES') ??
        fileConfig.defaults?.requiredLanguages ??
        DEFAULT_CONFIG.defaults.requiredLanguages,
    },

    ocd: {
      repository: envVar(env, 'OCD_REPOSITORY') ?? fileConfig.ocd?.repository ?? DEFAULT_CONFIG.ocd.repository,
      country: (overrides.country ?? envVar(env, 'COUNTRY') ?? fileConfig.ocd?.country ?? DEFAULT_CONFIG.ocd.country).toLowerCase(),
      localFile,
      token: envVar(env, 'GITHUB_TOKEN') ?? DEFAULT_CONFIG.ocd.token,
    },

    rules: {
      severity: { ...DEFAULT_CONFIG.rules.severity, ...fileConfig.rules?.severity, ...overrides.severity },
    },

    verbose: overrides.verbose ?? envBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? envBool(env, 'JSON') ?? false,
    configPath,
  };
}

/**
 * Resolve a configured path relative to the config file, or to `cwd` when
 * there is none
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig, cwd: string = process.cwd()): string {
  const basePath = config.configPath !== null ? dirname(config.configPath) : cwd;
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`, config.configPath ?? undefined);
  }
  if (config.defaults.timeout <= 0) {
    throw new ConfigError('Timeout must be a positive number', config.configPath ?? undefined);
  }
  if (!/^[a-z]{2}$/.test(config.ocd.country)) {
    throw new ConfigError(`Country must be a two-letter code, got '${config.ocd.country}'`, config.configPath ?? undefined);
  }
}
