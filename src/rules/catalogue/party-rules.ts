/**
 * Party Rules
 *
 * Party colors, names, abbreviations and their translations, and the
 * party references people and candidates make.
 *
 * @module party-rules
 */

import { finding, type IssueSink, type SubFinding } from '../../core/issues.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';
import { ValidReferenceRule } from '../reference-integrity.js';
import { ElementRule } from '../rule.js';
import { collectionMembers, describe, reportFindings } from './helpers.js';

const HEX_COLOR_PATTERN = /^[0-9a-f]{6}$/i;

/**
 * A party has at most one color, written as six hex digits without '#'
 */
export class PartiesHaveValidColors extends ElementRule {
  elements(): readonly string[] {
    return ['Party'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const colors = element.findAll('Color');
    if (colors.length === 0) return;
    if (colors.length > 1) {
      issues.warning(`The ${describe(element)} has more than one color.`, { element });
      return;
    }

    const [color] = colors;
    if (color === undefined) return;
    const value = color.text.trim();
    if (value === '') {
      issues.warning(`Color tag in ${describe(element)} is missing a value.`, { element: color });
    } else if (!HEX_COLOR_PATTERN.test(value)) {
      issues.warning(`${value} in ${describe(element)} is not a valid hex color.`, { element: color });
    }
  }
}

// ============================================================================
// Party collection checks
// ============================================================================

/**
 * Info-level checks across every Party of a PartyCollection, reported as
 * one aggregate. An empty collection is itself a finding.
 */
abstract class PartyCollectionRule extends ElementRule {
  protected abstract readonly summary: string;

  elements(): readonly string[] {
    return ['PartyCollection'];
  }

  protected abstract inspect(parties: readonly FeedElement[]): SubFinding[];

  check(element: FeedElement, issues: IssueSink): void {
    const parties = element.findAll('Party');
    const findings =
      parties.length === 0 ? [finding('The PartyCollection has no parties.', element)] : this.inspect(parties);
    reportFindings(issues, 'info', this.summary, findings);
  }
}

export class ValidateDuplicateColors extends PartyCollectionRule {
  protected readonly summary = 'The feed contains parties with duplicate colors';

  protected inspect(parties: readonly FeedElement[]): SubFinding[] {
    const owners = new Map<string, string>();
    const findings: SubFinding[] = [];
    for (const party of parties) {
      const color = party.childText('Color')?.trim().toLowerCase();
      if (color === undefined || color === '') continue;
      const owner = owners.get(color);
      if (owner === undefined) {
        owners.set(color, describe(party));
      } else {
        findings.push(finding(`${describe(party)} has the same color ${color} as ${owner}.`, party));
      }
    }
    return findings;
  }
}

/**
 * Same text in the same language used by two parties
 */
abstract class DuplicatedPartyText extends PartyCollectionRule {
  protected abstract readonly textElement: string;

  protected inspect(parties: readonly FeedElement[]): SubFinding[] {
    const owners = new Map<string, string>();
    const findings: SubFinding[] = [];
    for (const party of parties) {
      const container = party.find(this.textElement);
      if (container === null) {
        findings.push(finding(`${describe(party)} is missing ${this.textElement}.`, party));
        continue;
      }
      for (const text of container.findAll('Text')) {
        const language = text.attr('language') ?? '';
        const value = text.text.trim();
        const key = `${language}\n${value}`;
        const owner = owners.get(key);
        if (owner === undefined) {
          owners.set(key, describe(party));
        } else {
          findings.push(finding(`${describe(party)} and ${owner} share the ${this.textElement} '${value}' (${language}).`, text));
        }
      }
    }
    return findings;
  }
}

export class DuplicatedPartyAbbreviation extends DuplicatedPartyText {
  protected readonly summary = 'The feed contains duplicated party abbreviations';
  protected readonly textElement = 'InternationalizedAbbreviation';
}

export class DuplicatedPartyName extends DuplicatedPartyText {
  protected readonly summary = 'The feed contains duplicated party names';
  protected readonly textElement = 'Name';
}

/**
 * Every party translates a text into the same languages as the first
 */
abstract class MissingPartyTranslation extends PartyCollectionRule {
  protected abstract readonly textElement: string;

  private languages(party: FeedElement): string[] | null {
    const container = party.find(this.textElement);
    if (container === null) return null;
    const languages = container.findAll('Text').map((text) => text.attr('language') ?? '');
    return [...new Set(languages)].sort();
  }

  protected inspect(parties: readonly FeedElement[]): SubFinding[] {
    const findings: SubFinding[] = [];
    let reference: string[] | null = null;
    for (const party of parties) {
      const languages = this.languages(party);
      if (languages === null) {
        findings.push(finding(`${describe(party)} is missing ${this.textElement}.`, party));
        continue;
      }
      if (reference === null) {
        reference = languages;
        continue;
      }
      if (languages.join(',') !== reference.join(',')) {
        findings.push(
          finding(`${describe(party)} has ${this.textElement} in [${languages.join(', ')}] instead of [${reference.join(', ')}].`, party)
        );
      }
    }
    return findings;
  }
}

export class MissingPartyNameTranslation extends MissingPartyTranslation {
  protected readonly summary = 'The feed is missing several parties name translation';
  protected readonly textElement = 'Name';
}

export class MissingPartyAbbreviationTranslation extends MissingPartyTranslation {
  protected readonly summary = 'The feed is missing several parties abbreviation translation';
  protected readonly textElement = 'InternationalizedAbbreviation';
}

// ============================================================================
// Party references
// ============================================================================

/**
 * PartyIds on people and candidates name parties of the PartyCollection
 */
export class MissingPartyAffiliation extends ValidReferenceRule {
  protected readonly label = 'Party';

  referenceValues(): ReadonlySet<string> {
    const references = new Set<string>();
    if (this.root === null) return references;
    for (const holder of [...this.root.descendants('Person'), ...this.root.descendants('Candidate')]) {
      for (const partyId of holder.findAll('PartyId')) {
        if (!isBlank(partyId.text)) references.add(partyId.text.trim());
      }
    }
    return references;
  }

  definedValues(): ReadonlySet<string> {
    if (this.root === null) return new Set();
    const ids = new Set<string>();
    for (const party of collectionMembers(this.root, 'PartyCollection', 'Party')) {
      const id = party.objectId;
      if (id !== null && id !== '') ids.add(id);
    }
    return ids;
  }
}

export class PersonsMissingPartyData extends ElementRule {
  elements(): readonly string[] {
    return ['Person'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (isBlank(element.childText('PartyId'))) {
      issues.warning(`${describe(element)} is missing party data`, { element });
    }
  }
}
