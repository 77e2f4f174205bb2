/**
 * Orchestrator tests
 */

import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { SchemaParseError } from '../../../core/errors.js';
import type { IssueSink } from '../../../core/issues.js';
import { EMPTY_SCHEMA_FACTS, loadSchemaFacts, parseSchemaFacts } from '../../../core/schema/schema-facts.js';
import type { FeedElement } from '../../../core/tree/feed-element.js';
import { loadFeed } from '../../../core/tree/xml-loader.js';
import { selectRules, type RuleDefinition } from '../../../rules/registry.js';
import { ElementRule, TreeRule, type OcdIdProvider, type RuleConstructor } from '../../../rules/rule.js';
import { assertSchemaResolved, countEntities, runRules, validateFeed } from '../../../validator/orchestrator.js';
import { report } from '../../fixtures/rule-harness.js';

const XSD_PATH = fileURLToPath(new URL('../../fixtures/mini-election.xsd', import.meta.url));
const FEED_PATH = fileURLToPath(new URL('../../fixtures/sample-feed.xml', import.meta.url));

const ocdIds: OcdIdProvider = {
  ids: async () => new Set(['ocd-division/country:us', 'ocd-division/country:us/state:va']),
};

class FlagsParties extends ElementRule {
  elements(): readonly string[] {
    return ['Party'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    issues.warning(`Party ${element.objectId ?? '?'}`, { element });
  }
}

class NeedsMissingData extends TreeRule {
  async setup(): Promise<void> {
    throw new Error('no data');
  }

  check(issues: IssueSink): void {
    issues.error('never reported');
  }
}

class Crashes extends TreeRule {
  check(): void {
    throw new Error('boom');
  }
}

class NeedsSchema extends TreeRule {
  async setup(): Promise<void> {
    throw new SchemaParseError('schema unusable', 'broken.xsd');
  }

  check(): void {}
}

function definition(ctor: RuleConstructor): RuleDefinition {
  return { id: ctor.name, description: '', scope: 'common', ctor };
}

describe('runRules', () => {
  const document = report('<PartyCollection><Party objectId="par1"/><Party objectId="par2"/></PartyCollection>');

  it('skips rules whose setup fails and survives rules that crash', async () => {
    const result = await runRules(document, EMPTY_SCHEMA_FACTS, {
      rules: [definition(FlagsParties), definition(NeedsMissingData), definition(Crashes)],
    });

    expect(result.issues.map((issue) => [issue.ruleId, issue.severity, issue.message])).toEqual([
      ['NeedsMissingData', 'error', 'Rule NeedsMissingData could not be set up: no data'],
      ['FlagsParties', 'warning', 'Party par1'],
      ['FlagsParties', 'warning', 'Party par2'],
      ['Crashes', 'error', 'Rule Crashes failed unexpectedly: boom'],
    ]);
    expect(result.rulesRun).toEqual(['FlagsParties', 'Crashes']);
    expect(result.counts).toEqual({ error: 2, warning: 2, info: 0 });
    expect(result.passed).toBe(false);
  });

  it('applies severity overrides to every issue of a rule', async () => {
    const result = await runRules(document, EMPTY_SCHEMA_FACTS, {
      rules: [definition(FlagsParties)],
      severityOverrides: { FlagsParties: 'info' },
    });

    expect(result.issues.map((issue) => issue.severity)).toEqual(['info', 'info']);
    expect(result.passed).toBe(true);
  });

  it('does not override the severity of a setup failure', async () => {
    const result = await runRules(document, EMPTY_SCHEMA_FACTS, {
      rules: [definition(NeedsMissingData)],
      severityOverrides: { NeedsMissingData: 'info' },
    });

    expect(result.issues.map((issue) => issue.severity)).toEqual(['error']);
  });

  it('reports a schema failure during setup like any other and keeps running', async () => {
    const result = await runRules(document, EMPTY_SCHEMA_FACTS, {
      rules: [definition(NeedsSchema), definition(NeedsMissingData), definition(FlagsParties)],
    });

    expect(result.issues.map((issue) => [issue.ruleId, issue.message])).toEqual([
      ['NeedsSchema', 'Rule NeedsSchema could not be set up: schema unusable'],
      ['NeedsMissingData', 'Rule NeedsMissingData could not be set up: no data'],
      ['FlagsParties', 'Party par1'],
      ['FlagsParties', 'Party par2'],
    ]);
    expect(result.rulesRun).toEqual(['FlagsParties']);
  });

  it('runs the whole election rule set over a clean feed', async () => {
    const feed = await loadFeed(FEED_PATH);
    const schema = await loadSchemaFacts(XSD_PATH);

    const result = await runRules(feed, schema, { rules: selectRules({ ruleSet: 'election' }), ruleOptions: { ocdIds } });

    expect(result.rulesRun).toHaveLength(47);
    expect(result.issues).toEqual([]);
  });
});

describe('countEntities', () => {
  it('counts entities anywhere in the feed', () => {
    const document = report(
      '<PartyCollection><Party/><Party/></PartyCollection>' +
        '<GpUnitCollection><GpUnit/></GpUnitCollection>' +
        '<Election><ContestCollection><Contest/></ContestCollection></Election>'
    );

    expect(countEntities(document)).toEqual({ Party: 2, Person: 0, Candidate: 0, Office: 0, GpUnit: 1, Contest: 1 });
  });

  it('counts nothing without a root', () => {
    expect(countEntities({ root: null, encoding: null })).toEqual({
      Party: 0,
      Person: 0,
      Candidate: 0,
      Office: 0,
      GpUnit: 0,
      Contest: 0,
    });
  });
});

describe('assertSchemaResolved', () => {
  it('rejects schema facts with unresolved types', () => {
    const facts = parseSchemaFacts(
      '<xs:schema xmlns:xs="http://www.w3.org/2001/XMLSchema"><xs:element name="Root" type="Missing"/></xs:schema>'
    );

    expect(() => assertSchemaResolved(facts, 'broken.xsd')).toThrow('The schema file could not be parsed correctly');
    expect(() => assertSchemaResolved(EMPTY_SCHEMA_FACTS, 'empty.xsd')).not.toThrow();
  });
});

describe('validateFeed', () => {
  it('validates the sample feed against the sample schema', async () => {
    const result = await validateFeed({
      feedPath: FEED_PATH,
      schemaPath: XSD_PATH,
      rules: selectRules({ ruleSet: 'election' }),
      ruleOptions: { ocdIds },
    });

    expect(result.passed).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.stats).toEqual({ Party: 1, Person: 1, Candidate: 0, Office: 0, GpUnit: 1, Contest: 0 });
  });

  it('reports unknown OCD-IDs in an otherwise clean feed', async () => {
    const result = await validateFeed({
      feedPath: FEED_PATH,
      schemaPath: XSD_PATH,
      rules: selectRules({ ruleSet: 'election' }),
      ruleOptions: { ocdIds: { ids: async () => new Set(['ocd-division/country:us']) } },
    });

    expect(result.issues.map((issue) => [issue.ruleId, issue.severity, issue.message, issue.line])).toEqual([
      ['GpUnitOcdId', 'warning', 'The OCD ID ocd-division/country:us/state:va of GpUnit ru1 is not valid', 8],
    ]);
    expect(result.passed).toBe(true);
  });
});
