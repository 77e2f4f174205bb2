/**
 * Rule Framework
 *
 * Two dispatch shapes:
 * - ElementRule: names the element tags (or xsi:types) it targets and is
 *   called once per match, in document order
 * - TreeRule: called once per run with the whole document
 *
 * Rules report through the IssueSink they are handed and never mutate the
 * tree. A rule instance lives for one run. Only setup stores data on it;
 * lookups a check builds are locals of that check.
 *
 * @module rule
 */

import type { IssueSink } from '../core/issues.js';
import { EMPTY_SCHEMA_FACTS, type SchemaFacts } from '../core/schema/schema-facts.js';
import type { FeedDocument, FeedElement } from '../core/tree/feed-element.js';

/**
 * Supplies OCD division ids for a country
 */
export interface OcdIdProvider {
  ids(countryCode: string): Promise<ReadonlySet<string>>;
}

export interface RuleOptions {
  /** Languages every internationalized name must be given in */
  readonly requiredLanguages: readonly string[];
  /** Country whose OCD-ID dataset the OCD rules load */
  readonly countryCode: string;
  readonly ocdIds: OcdIdProvider | null;
  /** Clock for date rules */
  readonly now: () => Date;
}

export interface RuleContext {
  readonly document: FeedDocument;
  readonly schema: SchemaFacts;
  readonly options: RuleOptions;
}

export const DEFAULT_RULE_OPTIONS: RuleOptions = {
  requiredLanguages: [],
  countryCode: 'us',
  ocdIds: null,
  now: () => new Date(),
};

/**
 * Context with defaults filled in
 *
 * @example
 * ```typescript
 * const rule = new DuplicateID(ruleContext({ root }));
 * ```
 */
export function ruleContext(init: {
  root?: FeedElement | null;
  document?: FeedDocument;
  schema?: SchemaFacts;
  options?: Partial<RuleOptions>;
} = {}): RuleContext {
  return {
    document: init.document ?? { root: init.root ?? null, encoding: null },
    schema: init.schema ?? EMPTY_SCHEMA_FACTS,
    options: { ...DEFAULT_RULE_OPTIONS, ...init.options },
  };
}

abstract class BaseRule {
  constructor(protected readonly context: RuleContext) {}

  protected get root(): FeedElement | null {
    return this.context.document.root;
  }

  protected get schema(): SchemaFacts {
    return this.context.schema;
  }

  protected get options(): RuleOptions {
    return this.context.options;
  }

  /**
   * Load whatever external data the rule needs. Runs once before any
   * check; a rejection disables the rule for the run.
   */
  async setup(): Promise<void> {
    return undefined;
  }
}

export abstract class ElementRule extends BaseRule {
  readonly kind = 'element';

  /**
   * Tags or xsi:types this rule is called for. Empty means never called.
   */
  abstract elements(): readonly string[];

  abstract check(element: FeedElement, issues: IssueSink): void;
}

export abstract class TreeRule extends BaseRule {
  readonly kind = 'tree';

  abstract check(issues: IssueSink): void;
}

export type Rule = ElementRule | TreeRule;

export type RuleConstructor = new (context: RuleContext) => Rule;
