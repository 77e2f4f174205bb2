/**
 * Election Rules
 *
 * Election-level structure: how many elections a report holds, primaries,
 * coalitions, dates, and keeping election data out of officeholder feeds.
 *
 * @module election-rules
 */

import { finding, type IssueSink, type SubFinding } from '../../core/issues.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule, TreeRule } from '../rule.js';
import { describe, reportFindings, trimmedText } from './helpers.js';

export class OnlyOneElection extends ElementRule {
  elements(): readonly string[] {
    return ['ElectionReport'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const elections = element.findAll('Election');
    if (elections.length > 1) {
      issues.error(`ElectionReport has ${elections.length} Election elements; only one is allowed.`, {
        element: elections[1],
      });
    }
  }
}

/**
 * Officeholder feeds describe people and offices only
 */
export class ProhibitElectionData extends TreeRule {
  check(issues: IssueSink): void {
    const election = this.root?.descendants('Election')[0];
    if (election !== undefined) {
      issues.error('Election data is prohibited in officeholder feeds.', { element: election });
    }
  }
}

export class CoalitionParties extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    const findings: SubFinding[] = this.root
      .descendants('Coalition')
      .filter((coalition) => isBlank(coalition.childText('PartyIds')))
      .map((coalition) => finding(`${describe(coalition)} must define PartyIds.`, coalition));

    reportFindings(issues, 'error', 'Coalitions must reference the parties they are made of.', findings);
  }
}

// ============================================================================
// Primaries
// ============================================================================

export const PRIMARY_ELECTION_TYPES: ReadonlySet<string> = new Set([
  'primary',
  'partisan-primary-open',
  'partisan-primary-closed',
]);

/**
 * Type of the first Election in the feed, null when absent
 */
export function electionType(root: FeedElement | null): string | null {
  const election = root?.descendants('Election')[0];
  if (election === undefined) return null;
  return trimmedText(election, 'Type');
}

/**
 * In a primary every candidate contest says which parties it is for
 */
export class PartisanPrimary extends ElementRule {
  get electionType(): string | null {
    return electionType(this.root);
  }

  elements(): readonly string[] {
    const type = this.electionType;
    return type !== null && PRIMARY_ELECTION_TYPES.has(type) ? ['CandidateContest'] : [];
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (isBlank(element.childText('PrimaryPartyIds'))) {
      issues.warning(
        `Election is of ElectionType ${this.electionType ?? 'unknown'} but ${describe(element)} does not have PrimaryPartyIds.`,
        { element }
      );
    }
  }
}

const PARTY_SUFFIX_PATTERN = /\((dem|rep|lib)\)/i;

/**
 * Outside primaries, a contest named like "Governor (Dem)" is probably a
 * party primary the feed forgot to declare
 */
export class PartisanPrimaryHeuristic extends ElementRule {
  elements(): readonly string[] {
    const type = electionType(this.root);
    return type !== null && PRIMARY_ELECTION_TYPES.has(type) ? [] : ['CandidateContest'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const name = element.childText('Name');
    if (name === null || !PARTY_SUFFIX_PATTERN.test(name)) return;

    issues.warning(`Name of ${describe(element)} indicates this might be a partisan primary: ${name.trim()}`, {
      element,
    });
  }
}

// ============================================================================
// Dates
// ============================================================================

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}/;

/**
 * Elections dates compared as calendar days against the run's clock
 */
abstract class ElectionDateRule extends ElementRule {
  elements(): readonly string[] {
    return ['Election'];
  }

  /** YYYY-MM-DD of the run's current local calendar day */
  protected today(): string {
    const now = this.options.now();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${now.getFullYear()}-${month}-${day}`;
  }

  /** YYYY-MM-DD of a date child, null when absent or not a date */
  protected dateOf(election: FeedElement, child: string): string | null {
    const text = trimmedText(election, child);
    if (text === null || !DATE_PATTERN.test(text)) return null;
    return text.slice(0, 10);
  }
}

export class ElectionStartDates extends ElectionDateRule {
  check(element: FeedElement, issues: IssueSink): void {
    const start = this.dateOf(element, 'StartDate');
    if (start !== null && start < this.today()) {
      issues.warning(`The election start date ${start} is in the past.`, { element });
    }
  }
}

export class ElectionEndDates extends ElectionDateRule {
  check(element: FeedElement, issues: IssueSink): void {
    const end = this.dateOf(element, 'EndDate');
    if (end === null) return;

    if (end < this.today()) {
      issues.error(`The election end date ${end} is in the past.`, { element });
    }
    const start = this.dateOf(element, 'StartDate');
    if (start !== null && end < start) {
      issues.error(`The election end date ${end} is before the start date ${start}.`, { element });
    }
  }
}
