#!/usr/bin/env node
/**
 * Feed Validator CLI Entry Point
 *
 * Validates election reporting feeds against an XSD and the rule catalogue.
 *
 * @module feed-validator-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { listRulesCommand } from '../src/cli/commands/list-rules.js';
import { validateCommand } from '../src/cli/commands/validate.js';
import {
  loadConfig,
  parseSeverityOverrides,
  validateConfig,
  type CLIConfig,
  type LoadConfigOptions,
} from '../src/cli/lib/config.js';
import { EXIT_CODES, exitCodeFor } from '../src/cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { printError } from '../src/cli/lib/output.js';
import { FeedParseError } from '../src/core/errors.js';

// ============================================================================
// Global State
// ============================================================================

interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// Option parsing
// ============================================================================

const globalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  config: z.string().optional(),
  timeout: z.number().optional(),
});

const ruleSetSchema = z.enum(['election', 'officeholder']);

const validateOptionsSchema = z.object({
  xsd: z.string(),
  ruleSet: ruleSetSchema.optional(),
  include: z.array(z.string()).optional(),
  exclude: z.array(z.string()).optional(),
  country: z.string().optional(),
  ocdidFile: z.string().optional(),
  requiredLanguages: z.array(z.string()).optional(),
  override: z.array(z.string()).optional(),
  minSeverity: z.enum(['error', 'warning', 'info']).optional(),
  stats: z.boolean(),
});

const listRulesOptionsSchema = z.object({
  ruleSet: ruleSetSchema.optional(),
});

function positiveInt(value: string): number {
  const num = parseInt(value, 10);
  if (isNaN(num) || num <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return num;
}

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  // Source runs from bin/, the build from dist/bin/
  for (const packageJsonPath of [join(__dirname, '..', 'package.json'), join(__dirname, '..', '..', 'package.json')]) {
    try {
      const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
      if (parsed.success) return parsed.data.version;
    } catch {
      continue;
    }
  }
  return '0.0.0';
}

async function initializeContext(
  globalOptions: z.infer<typeof globalOptionsSchema>,
  commandOverrides: LoadConfigOptions = {}
): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: globalOptions.config,
    overrides: {
      verbose: globalOptions.verbose,
      json: globalOptions.json,
      timeout: globalOptions.timeout,
      ...commandOverrides.overrides,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'warn',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

/**
 * Config overrides carried by the validate command's own flags
 */
function validateOverrides(opts: z.infer<typeof validateOptionsSchema>): LoadConfigOptions {
  return {
    overrides: {
      ruleSet: opts.ruleSet,
      country: opts.country,
      ocdIdFile: opts.ocdidFile,
      requiredLanguages: opts.requiredLanguages,
      severity: opts.override === undefined ? undefined : parseSeverityOverrides(opts.override),
    },
  };
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('feed-validator')
    .description('Validate election reporting XML feeds against an XSD and business rules')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .feedvalidatorrc)')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds', positiveInt)
    .hook('preAction', async (thisCommand, actionCommand) => {
      try {
        const globalOptions = globalOptionsSchema.parse(thisCommand.opts());
        const overrides =
          actionCommand.name() === 'validate'
            ? validateOverrides(validateOptionsSchema.parse(actionCommand.opts()))
            : {};
        await initializeContext(globalOptions, overrides);
      } catch (error) {
        console.error(`Configuration error: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  program
    .command('validate <feed>')
    .description('Validate a feed file')
    .requiredOption('--xsd <path>', 'XSD schema file')
    .option('--rule-set <name>', 'Rule set: election|officeholder')
    .option('--include <rules...>', 'Rules to add to the set')
    .option('--exclude <rules...>', 'Rules to remove from the set')
    .option('--country <code>', 'Country of the OCD-ID dataset (e.g., us)')
    .option('--ocdid-file <path>', 'Local OCD-ID CSV instead of the remote dataset')
    .option('--required-languages <langs...>', 'Languages every name must be given in')
    .option('--override <pairs...>', 'Severity overrides as Rule=level')
    .option('--min-severity <level>', 'Least severe issue printed: error|warning|info')
    .option('--no-stats', 'Omit entity counts')
    .action(async (feed: string, rawOptions: unknown) => {
      const opts = validateOptionsSchema.parse(rawOptions);
      const context = getGlobalContext();
      context.logger.commandStart('validate', { feed, xsd: opts.xsd });

      const code = await validateCommand(
        {
          feed,
          xsd: opts.xsd,
          include: opts.include,
          exclude: opts.exclude,
          minSeverity: opts.minSeverity,
          stats: opts.stats,
        },
        context
      );
      context.logger.commandEnd(code !== EXIT_CODES.ERRORS, { exitCode: code });
      process.exitCode = code;
    });

  program
    .command('list-rules')
    .description('List the rules and the feeds they apply to')
    .option('--rule-set <name>', 'Only rules of this set: election|officeholder')
    .action(async (rawOptions: unknown) => {
      const opts = listRulesOptionsSchema.parse(rawOptions);
      process.exitCode = await listRulesCommand({ ruleSet: opts.ruleSet }, getGlobalContext());
    });

  program.on('command:*', (operands: string[]) => {
    console.error(`Unknown command: ${operands.join(' ')}`);
    process.exit(EXIT_CODES.UNKNOWN_COMMAND);
  });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof FeedParseError ? error.getSummary() : error instanceof Error ? error.message : String(error);
    if (globalContext) {
      globalContext.logger.error('Command failed', {
        error: message,
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      printError(message);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
