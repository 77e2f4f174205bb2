/**
 * Person and Office Rules
 *
 * People, the offices they hold, party leadership and the jurisdictions
 * offices belong to. Most are reference-integrity checks.
 *
 * @module person-office-rules
 */

import { finding, type IssueSink, type SubFinding } from '../../core/issues.js';
import { isBlank, splitIds, type FeedElement } from '../../core/tree/feed-element.js';
import { ValidReferenceRule } from '../reference-integrity.js';
import { ElementRule } from '../rule.js';
import { describe, objectIdsOf, otherTypedIdentifierValues, reportFindings } from './helpers.js';

// ============================================================================
// People
// ============================================================================

/**
 * Name and birth date identifying a person, null when the person has no
 * name at all
 */
function personKey(person: FeedElement): string | null {
  let name = person
    .findAll('FullName/Text')
    .map((text) => text.text.trim())
    .filter((text) => text !== '')
    .join(' / ');
  if (name === '') {
    name = ['FirstName', 'MiddleName', 'LastName']
      .map((part) => person.childText(part)?.trim() ?? '')
      .filter((part) => part !== '')
      .join(' ');
  }
  if (name === '') return null;
  return `${name}|${person.childText('DateOfBirth')?.trim() ?? ''}`;
}

/**
 * Two people with the same name and birth date are probably one person
 */
export class PersonHasUniqueFullName extends ElementRule {
  elements(): readonly string[] {
    return ['PersonCollection'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const people = element.findAll('Person');
    const findings: SubFinding[] = [];
    if (people.length === 0) {
      findings.push(finding('The PersonCollection has no people.', element));
    }

    const owners = new Map<string, string>();
    for (const person of people) {
      const key = personKey(person);
      if (key === null) {
        findings.push(finding(`${describe(person)} has no name.`, person));
        continue;
      }
      const owner = owners.get(key);
      if (owner === undefined) {
        owners.set(key, describe(person));
      } else {
        findings.push(finding(`${describe(person)} has the same name and birth date as ${owner}.`, person));
      }
    }

    reportFindings(issues, 'info', 'The feed contains people with duplicated name', findings);
  }
}

export const VALID_GENDERS: ReadonlySet<string> = new Set([
  'female',
  'male',
  'f',
  'm',
  'x',
  'nonbinary',
  'non-binary',
  'other',
  'unknown',
]);

export class PersonsHaveValidGender extends ElementRule {
  elements(): readonly string[] {
    return ['Gender'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const gender = element.text.trim();
    if (gender === '') return;
    if (!VALID_GENDERS.has(gender.toLowerCase())) {
      issues.error(`Person has an invalid gender: ${gender}`, { element });
    }
  }
}

// ============================================================================
// Offices and leadership
// ============================================================================

function officeHolderIds(root: FeedElement): Set<string> {
  const ids = new Set<string>();
  for (const office of root.descendants('Office')) {
    for (const holders of office.findAll('OfficeHolderPersonIds')) {
      for (const id of splitIds(holders.text)) ids.add(id);
    }
  }
  return ids;
}

function partyLeaderIds(root: FeedElement): Set<string> {
  return new Set([
    ...otherTypedIdentifierValues(root, 'party-leader-id'),
    ...otherTypedIdentifierValues(root, 'party-chair-id'),
  ]);
}

/**
 * Office holders are people of the PersonCollection
 */
export class OfficeMissingOfficeHolderPersonData extends ValidReferenceRule {
  protected readonly label = 'Person';

  referenceValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : officeHolderIds(this.root);
  }

  definedValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : objectIdsOf(this.root, 'Person');
  }

  protected checkAdditional(issues: IssueSink): void {
    for (const office of this.root?.descendants('Office') ?? []) {
      for (const holders of office.findAll('OfficeHolderPersonIds')) {
        if (isBlank(holders.text)) {
          issues.error('Office is missing IDs of Officeholders.', { element: holders });
        }
      }
    }
  }
}

/**
 * Every person holds an office or leads a party, and no office has more
 * than one holder
 */
export class PersonHasOffice extends ValidReferenceRule {
  protected readonly label = 'data';

  referenceValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : objectIdsOf(this.root, 'Person');
  }

  definedValues(): ReadonlySet<string> {
    if (this.root === null) return new Set();
    return new Set([...officeHolderIds(this.root), ...partyLeaderIds(this.root)]);
  }

  protected checkAdditional(issues: IssueSink): void {
    for (const office of this.root?.descendants('Office') ?? []) {
      const holders = office.findAll('OfficeHolderPersonIds').flatMap((element) => splitIds(element.text));
      if (holders.length > 1) {
        issues.error(`${describe(office)} has ${holders.length} OfficeHolders. Must have exactly one.`, {
          element: office,
        });
      }
    }
  }
}

/**
 * Party leaders and chairs named by external identifiers are people of the feed
 */
export class PartyLeadershipMustExist extends ValidReferenceRule {
  protected readonly label = 'Person';

  referenceValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : partyLeaderIds(this.root);
  }

  definedValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : objectIdsOf(this.root, 'Person');
  }
}

// ============================================================================
// Jurisdictions
// ============================================================================

/**
 * Non-blank jurisdiction ids of an office, from typed AdditionalData and
 * from "other"-typed external identifiers
 */
export function jurisdictionIds(office: FeedElement): string[] {
  const ids: string[] = [];
  for (const data of office.findAll('AdditionalData')) {
    if (data.attr('type') === 'jurisdiction-id' && !isBlank(data.text)) ids.push(data.text.trim());
  }
  ids.push(...otherTypedIdentifierValues(office, 'jurisdiction-id'));
  return ids;
}

export class OfficesHaveJurisdictionID extends ElementRule {
  elements(): readonly string[] {
    return ['Office'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const ids = jurisdictionIds(element);
    if (ids.length === 0) {
      issues.error(`${describe(element)} is missing a jurisdiction-id.`, { element });
    } else if (ids.length > 1) {
      issues.error(`${describe(element)} has more than one jurisdiction-id.`, { element });
    }
  }
}

/**
 * Jurisdiction ids name GpUnits of the feed
 */
export class ValidJurisdictionID extends ValidReferenceRule {
  protected readonly label = 'GpUnit';

  referenceValues(): ReadonlySet<string> {
    return new Set((this.root?.descendants('Office') ?? []).flatMap(jurisdictionIds));
  }

  definedValues(): ReadonlySet<string> {
    return this.root === null ? new Set() : objectIdsOf(this.root, 'GpUnit');
  }
}
