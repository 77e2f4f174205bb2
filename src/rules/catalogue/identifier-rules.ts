/**
 * Identifier Rules
 *
 * objectId uniqueness, IDREF resolution, objectId naming prefixes and
 * external identifier hygiene.
 *
 * @module identifier-rules
 */

import { finding, type IssueSink, type SubFinding } from '../../core/issues.js';
import { isBlank, splitIds, type FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule, TreeRule } from '../rule.js';
import { describe, externalIdentifiers, reportFindings, trimmedText } from './helpers.js';

/**
 * No two elements may share an objectId
 */
export class DuplicateID extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    const seen = new Set<string>();
    const findings: SubFinding[] = [];
    for (const element of this.root.iter()) {
      const id = element.objectId;
      if (id === null || id === '') continue;
      if (seen.has(id)) {
        findings.push(finding(`${id} is a duplicate object ID.`, element));
      } else {
        seen.add(id);
      }
    }

    reportFindings(issues, 'error', 'The feed contains duplicate object IDs.', findings);
  }
}

/**
 * Non-empty objectIds anywhere under root
 */
export function objectIdsIn(root: FeedElement): Set<string> {
  const ids = new Set<string>();
  for (const element of root.iter()) {
    const id = element.objectId;
    if (id !== null && id !== '') ids.add(id);
  }
  return ids;
}

/**
 * Every token of an IDREF or IDREFS element names an objectId in the feed
 */
export class ValidIDREF extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    const known = objectIdsIn(this.root);
    const referenceElements = this.schema.referenceElements;
    for (const element of this.root.iter()) {
      if (!referenceElements.some((name) => element.is(name))) continue;
      const missing = splitIds(element.text).filter((id) => !known.has(id));
      if (missing.length === 0) continue;

      issues.error(`${element.tag} refers to ${missing.join(', ')}, which is not an object ID in the feed.`, {
        element,
      });
    }
  }
}

// ============================================================================
// Hungarian notation
// ============================================================================

export const OBJECT_ID_PREFIXES: ReadonlyMap<string, string> = new Map([
  ['BallotMeasureContest', 'bmc'],
  ['BallotMeasureSelection', 'bms'],
  ['BallotStyle', 'bs'],
  ['Candidate', 'can'],
  ['CandidateContest', 'cc'],
  ['CandidateSelection', 'cs'],
  ['Coalition', 'coa'],
  ['ContactInformation', 'ci'],
  ['Hours', 'hours'],
  ['Office', 'off'],
  ['OfficeGroup', 'og'],
  ['Party', 'par'],
  ['PartyContest', 'pc'],
  ['PartySelection', 'ps'],
  ['Person', 'per'],
  ['ReportingDevice', 'rd'],
  ['ReportingUnit', 'ru'],
  ['RetentionContest', 'rc'],
  ['Schedule', 'sched'],
]);

/**
 * objectIds start with the short prefix of their element type
 */
export class HungarianStyleNotation extends ElementRule {
  elements(): readonly string[] {
    return [...OBJECT_ID_PREFIXES.keys()];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const id = element.objectId;
    if (id === null || id === '') return;

    const typeName = element.xsiType !== null && OBJECT_ID_PREFIXES.has(element.xsiType) ? element.xsiType : element.tag;
    const prefix = OBJECT_ID_PREFIXES.get(typeName);
    if (prefix === undefined || id.startsWith(prefix)) return;

    issues.info(`${typeName} ID ${id} is not in Hungarian Style Notation. Should start with ${prefix}`, { element });
  }
}

// ============================================================================
// External identifiers
// ============================================================================

const STABLE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/;

/**
 * Stable ids are a non-empty run of letters, digits, '-' and '_'
 */
export class ValidStableID extends ElementRule {
  elements(): readonly string[] {
    return ['ExternalIdentifier'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (trimmedText(element, 'Type') !== 'other') return;
    if (trimmedText(element, 'OtherType') !== 'stable') return;

    const value = element.childText('Value') ?? '';
    if (!STABLE_ID_PATTERN.test(value.trim())) {
      issues.error(`Stable ID '${value.trim()}' is not in the correct format.`, { element });
    }
  }
}

/**
 * Contests, candidates and parties each carry external identifiers whose
 * values are unique across the feed. Contest-stage identifiers describe a
 * reporting phase and may repeat.
 */
export class CheckIdentifiers extends TreeRule {
  static readonly CHECKED_ELEMENTS = ['Contest', 'Candidate', 'Party'] as const;

  check(issues: IssueSink): void {
    if (this.root === null) return;

    const findings: SubFinding[] = [];
    const owners = new Map<string, FeedElement>();

    for (const name of CheckIdentifiers.CHECKED_ELEMENTS) {
      for (const element of this.root.descendants(name)) {
        if (element.find('ExternalIdentifiers') === null) {
          findings.push(finding(`${describe(element)} is missing ExternalIdentifiers.`, element));
          continue;
        }
        const identifiers = externalIdentifiers(element);
        if (identifiers.length === 0) {
          findings.push(finding(`${describe(element)} has no ExternalIdentifier.`, element));
          continue;
        }

        for (const identifier of identifiers) {
          if (trimmedText(identifier, 'OtherType') === 'contest-stage') continue;

          const value = identifier.childText('Value');
          if (value === null || isBlank(value)) {
            findings.push(finding(`${describe(element)} has an ExternalIdentifier with no Value.`, identifier));
            continue;
          }

          const owner = owners.get(value.trim());
          if (owner !== undefined && owner !== element) {
            findings.push(
              finding(`External identifier '${value.trim()}' is used by both ${describe(owner)} and ${describe(element)}.`, identifier)
            );
          } else {
            owners.set(value.trim(), element);
          }
        }
      }
    }

    reportFindings(issues, 'error', 'The feed has missing or duplicate external identifiers.', findings);
  }
}
