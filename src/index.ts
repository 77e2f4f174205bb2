/**
 * Election Feed Validator
 *
 * Schema and business-rule validation for election reporting XML feeds.
 *
 * @example
 * ```typescript
 * import { validateFeed, selectRules, formatTextReport } from 'election-feed-validator';
 *
 * const result = await validateFeed({
 *   feedPath: 'feed.xml',
 *   schemaPath: 'schema.xsd',
 *   rules: selectRules({ ruleSet: 'election' }),
 * });
 * console.log(formatTextReport(result));
 * ```
 *
 * @packageDocumentation
 */

// Tree model and loading
export { FeedElement, el, splitIds, isBlank, type FeedDocument, type ElementSpec } from './core/tree/feed-element.js';
export { parseFeed, parseFeedBytes, loadFeed } from './core/tree/xml-loader.js';
export { parseSchemaFacts, loadSchemaFacts, type SchemaFacts } from './core/schema/schema-facts.js';

// Issues and errors
export {
  IssueCollector,
  finding,
  isSeverity,
  type Issue,
  type IssueSink,
  type Severity,
  type SubFinding,
} from './core/issues.js';
export {
  ConfigError,
  DatasetError,
  DatasetVerificationError,
  FeedParseError,
  SchemaParseError,
} from './core/errors.js';

// Rules
export {
  ElementRule,
  TreeRule,
  ruleContext,
  type OcdIdProvider,
  type Rule,
  type RuleContext,
  type RuleOptions,
} from './rules/rule.js';
export { ValidReferenceRule, checkReferences, type ReferenceGatherer } from './rules/reference-integrity.js';
export { RULES, selectRules, findRule, type RuleDefinition, type RuleSetName } from './rules/registry.js';
export * from './rules/catalogue/index.js';

// OCD-ID datasets
export { OcdDatasetCache, type OcdDatasetCacheOptions } from './ocd/ocd-dataset-cache.js';
export { GitHubOcdSource, type OcdSource } from './ocd/github-source.js';
export { isValidOcdIdSyntax, encodeOcdIdValue } from './ocd/ocd-id.js';

// Running and reporting
export { validateFeed, runRules, type ValidationResult, type EntityStats } from './validator/orchestrator.js';
export { formatTextReport, toJsonReport, type JsonReport } from './validator/report.js';
