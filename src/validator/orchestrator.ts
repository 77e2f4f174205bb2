/**
 * Validation Orchestrator
 *
 * One run: load the feed and schema, instantiate the selected rules, await
 * their setup, dispatch them in registry order and collect what they
 * report.
 *
 * Feed and schema failures are fatal and propagate. A rule whose setup
 * rejects is reported and skipped; a rule that throws while checking is
 * reported and the run continues.
 *
 * @module orchestrator
 */

import { SchemaParseError } from '../core/errors.js';
import { IssueCollector, type Issue, type Severity } from '../core/issues.js';
import { loadSchemaFacts, type SchemaFacts } from '../core/schema/schema-facts.js';
import type { FeedDocument } from '../core/tree/feed-element.js';
import { loadFeed } from '../core/tree/xml-loader.js';
import { createLogger, type LoggerLike } from '../core/utils/logger.js';
import type { RuleDefinition } from '../rules/registry.js';
import { DEFAULT_RULE_OPTIONS, type Rule, type RuleContext, type RuleOptions } from '../rules/rule.js';

const log = createLogger({ module: 'orchestrator' });

/** Entities counted for the run summary, in print order */
export const COUNTED_ENTITIES = ['Party', 'Person', 'Candidate', 'Office', 'GpUnit', 'Contest'] as const;

export type EntityName = (typeof COUNTED_ENTITIES)[number];

export type EntityStats = Record<EntityName, number>;

export interface RunOptions {
  readonly rules: readonly RuleDefinition[];
  readonly ruleOptions?: Partial<RuleOptions>;
  /** Rule id to the severity every issue of that rule takes */
  readonly severityOverrides?: Readonly<Record<string, Severity>>;
  readonly logger?: LoggerLike;
}

export interface ValidationRequest extends RunOptions {
  readonly feedPath: string;
  readonly schemaPath: string;
}

export interface ValidationResult {
  readonly issues: readonly Issue[];
  readonly counts: Record<Severity, number>;
  readonly stats: EntityStats;
  /** Ids of the rules that ran, registry order */
  readonly rulesRun: readonly string[];
  /** False when any error-severity issue was reported */
  readonly passed: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function countEntities(document: FeedDocument): EntityStats {
  const stats: EntityStats = { Party: 0, Person: 0, Candidate: 0, Office: 0, GpUnit: 0, Contest: 0 };
  if (document.root === null) return stats;
  for (const name of COUNTED_ENTITIES) {
    stats[name] = document.root.descendants(name).length;
  }
  return stats;
}

/**
 * Schema facts are only usable when every type they reference resolves
 *
 * @throws {SchemaParseError}
 */
export function assertSchemaResolved(schema: SchemaFacts, schemaPath: string): void {
  if (schema.unresolvedTypes.length > 0) {
    throw new SchemaParseError('The schema file could not be parsed correctly', schemaPath, schema.unresolvedTypes);
  }
}

interface Instantiated {
  readonly definition: RuleDefinition;
  readonly rule: Rule;
}

function dispatch(rule: Rule, document: FeedDocument, collector: IssueCollector, id: string, override?: Severity): void {
  const sink = collector.sinkFor(id, override);
  if (rule.kind === 'tree') {
    rule.check(sink);
    return;
  }

  const targets = rule.elements();
  if (targets.length === 0 || document.root === null) return;
  for (const element of document.root.iter()) {
    if (targets.some((name) => element.is(name))) {
      rule.check(element, sink);
    }
  }
}

/**
 * Run rules over an already loaded document
 */
export async function runRules(
  document: FeedDocument,
  schema: SchemaFacts,
  options: RunOptions
): Promise<ValidationResult> {
  const logger = options.logger ?? log;
  const context: RuleContext = {
    document,
    schema,
    options: { ...DEFAULT_RULE_OPTIONS, ...options.ruleOptions },
  };
  const collector = new IssueCollector();
  const overrides = options.severityOverrides ?? {};

  const instances: Instantiated[] = options.rules.map((definition) => ({
    definition,
    rule: new definition.ctor(context),
  }));

  const setups = await Promise.allSettled(instances.map(({ rule }) => rule.setup()));
  const ready: Instantiated[] = [];
  setups.forEach((outcome, index) => {
    const instance = instances[index];
    if (instance === undefined) return;
    if (outcome.status === 'fulfilled') {
      ready.push(instance);
      return;
    }
    const id = instance.definition.id;
    logger.warn('Rule setup failed; rule skipped', { rule: id, error: errorMessage(outcome.reason) });
    collector.sinkFor(id).error(`Rule ${id} could not be set up: ${errorMessage(outcome.reason)}`);
  });

  for (const { definition, rule } of ready) {
    try {
      dispatch(rule, document, collector, definition.id, overrides[definition.id]);
    } catch (error) {
      logger.error('Rule crashed', { rule: definition.id, error: errorMessage(error) });
      collector.sinkFor(definition.id).error(`Rule ${definition.id} failed unexpectedly: ${errorMessage(error)}`);
    }
  }

  const counts = collector.counts();
  logger.debug('Rules finished', { rules: ready.length, ...counts });

  return {
    issues: collector.all(),
    counts,
    stats: countEntities(document),
    rulesRun: ready.map(({ definition }) => definition.id),
    passed: !collector.hasErrors(),
  };
}

/**
 * Validate a feed file against a schema file
 *
 * @throws {FeedParseError} When the feed cannot be read or parsed
 * @throws {SchemaParseError} When the schema cannot be read, parsed or resolved
 */
export async function validateFeed(request: ValidationRequest): Promise<ValidationResult> {
  const logger = request.logger ?? log;
  const schema = await loadSchemaFacts(request.schemaPath);
  assertSchemaResolved(schema, request.schemaPath);
  const document = await loadFeed(request.feedPath);

  logger.info('Validating feed', { feed: request.feedPath, rules: request.rules.length });
  return runRules(document, schema, request);
}
