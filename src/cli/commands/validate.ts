/**
 * Validate Command
 *
 * Validate one feed against a schema and the selected rule set.
 *
 * Usage:
 *   feed-validator validate <feed> --xsd <path> [options]
 *
 * Options:
 *   --rule-set <name>             election|officeholder
 *   --include <rules...>          Add rules to the set
 *   --exclude <rules...>          Remove rules from the set
 *   --country <code>              Country of the OCD-ID dataset
 *   --ocdid-file <path>           Local OCD-ID CSV instead of the remote dataset
 *   --required-languages <langs>  Languages every name must be given in
 *   --override <Rule=level...>    Severity overrides
 *   --min-severity <level>        Least severe issue printed
 *   --no-stats                    Omit entity counts
 *
 * @module cli/commands/validate
 */

import { ConfigError } from '../../core/errors.js';
import { HTTPClient } from '../../core/http-client.js';
import type { Severity } from '../../core/issues.js';
import { OcdDatasetCache } from '../../ocd/ocd-dataset-cache.js';
import { GitHubOcdSource } from '../../ocd/github-source.js';
import { selectRules, unknownRuleIds } from '../../rules/registry.js';
import type { OcdIdProvider } from '../../rules/rule.js';
import { validateFeed } from '../../validator/orchestrator.js';
import { formatTextReport, toJsonReport } from '../../validator/report.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import type { CLILogger } from '../lib/logger.js';
import { formatJson, printOutput } from '../lib/output.js';

export interface ValidateOptions {
  readonly feed: string;
  readonly xsd: string;
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
  readonly minSeverity?: Severity;
  /** Print entity counts (default: true) */
  readonly stats?: boolean;
}

export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Where command output is written (default: stdout) */
  readonly print?: (output: string) => void;
}

/**
 * Dataset provider for the OCD rules; nothing is fetched until a rule asks
 */
export function createOcdProvider(config: CLIConfig, logger?: CLILogger): OcdIdProvider {
  return new OcdDatasetCache({
    cacheDir: resolvePath(config, 'cache'),
    localFile: config.ocd.localFile,
    logger,
    source: new GitHubOcdSource({
      repository: config.ocd.repository,
      token: config.ocd.token ?? undefined,
      client: new HTTPClient({ timeoutMs: config.defaults.timeout }),
    }),
  });
}

/**
 * @throws {ConfigError} On unknown rule ids
 * @throws {FeedParseError} When the feed cannot be parsed
 * @throws {SchemaParseError} When the schema cannot be parsed
 */
export async function validateCommand(options: ValidateOptions, context: CommandContext): Promise<ExitCode> {
  const { config, logger } = context;
  const print = context.print ?? printOutput;

  const unknown = unknownRuleIds([...(options.include ?? []), ...(options.exclude ?? [])]);
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown rule ids: ${unknown.join(', ')}. Run list-rules to see them.`, 'cli');
  }
  const unknownOverrides = unknownRuleIds(Object.keys(config.rules.severity));
  if (unknownOverrides.length > 0) {
    logger.warn('Severity overrides name unknown rules', { rules: unknownOverrides });
  }

  const rules = selectRules({
    ruleSet: config.defaults.ruleSet,
    include: options.include,
    exclude: options.exclude,
  });
  logger.debug('Rules selected', { ruleSet: config.defaults.ruleSet, count: rules.length });

  const result = await validateFeed({
    feedPath: options.feed,
    schemaPath: options.xsd,
    rules,
    severityOverrides: config.rules.severity,
    logger,
    ruleOptions: {
      requiredLanguages: config.defaults.requiredLanguages,
      countryCode: config.ocd.country,
      ocdIds: createOcdProvider(config, logger),
    },
  });

  const reportOptions = { minSeverity: options.minSeverity, stats: options.stats ?? true };
  print(config.json ? formatJson(toJsonReport(result, reportOptions)) : formatTextReport(result, reportOptions));

  if (!result.passed) return EXIT_CODES.ERRORS;
  return result.counts.warning > 0 ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
