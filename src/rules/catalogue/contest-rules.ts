/**
 * Contest Rules
 *
 * Ballot selections, vote counts, candidate references, office links and
 * names of contests.
 *
 * @module contest-rules
 */

import { finding, type IssueSink, type SubFinding } from '../../core/issues.js';
import { isBlank, splitIds, type FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule, TreeRule } from '../rule.js';
import { collectionMembers, describe, reportFindings, trimmedText } from './helpers.js';

// ============================================================================
// Vote counts
// ============================================================================

const PERCENT_TOLERANCE = 0.01;

/**
 * total-percent counts of a contest add up to 0 (nothing reported yet) or 100
 */
export class PercentSum extends ElementRule {
  elements(): readonly string[] {
    return ['Contest'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    let sum = 0;
    for (const voteCounts of element.descendants('VoteCounts')) {
      if (trimmedText(voteCounts, 'OtherType') !== 'total-percent') continue;
      const count = Number(trimmedText(voteCounts, 'Count') ?? '');
      if (!Number.isNaN(count)) sum += count;
    }

    if (Math.abs(sum) > PERCENT_TOLERANCE && Math.abs(sum - 100) > PERCENT_TOLERANCE) {
      issues.error(`${describe(element)} percents do not add up to 0 or 100: ${sum}`, { element });
    }
  }
}

export const PARTY_VOTE_COUNT_TYPES: readonly string[] = [
  'seats-won',
  'seats-leading',
  'party-votes',
  'seats-no-election',
  'seats-total',
  'seats-delta',
];

export const CANDIDATE_VOTE_COUNT_TYPES: readonly string[] = ['candidate-votes'];

/**
 * Party-level vote count types belong to party contests and candidate
 * ones to candidate contests
 */
export class VoteCountTypesCoherency extends ElementRule {
  elements(): readonly string[] {
    return ['Contest'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const contestType = element.xsiType ?? element.attr('type');
    let invalidTypes: readonly string[];
    if (contestType === 'PartyContest') {
      invalidTypes = CANDIDATE_VOTE_COUNT_TYPES;
    } else if (contestType === 'CandidateContest') {
      invalidTypes = PARTY_VOTE_COUNT_TYPES;
    } else {
      return;
    }

    const found: string[] = [];
    for (const voteCounts of element.descendants('VoteCounts')) {
      const otherType = trimmedText(voteCounts, 'OtherType');
      if (otherType !== null && invalidTypes.includes(otherType) && !found.includes(otherType)) {
        found.push(otherType);
      }
    }

    if (found.length > 0) {
      const contest = element.objectId === null ? contestType : `${contestType} ${element.objectId}`;
      issues.error(`VoteCount types ${found.join(', ')} should not be nested in ${contest}`, { element });
    }
  }
}

// ============================================================================
// Candidates and selections
// ============================================================================

/**
 * Candidate objectId to the ids of contests that reference it, document
 * order. Every candidate of a CandidateCollection is present, with an empty
 * list when nothing references it. References come from CandidateIds of
 * candidate selections and from a contest's own CandidateId.
 */
export function candidateRegistry(root: FeedElement): Map<string, string[]> {
  const registry = new Map<string, string[]>();
  for (const candidate of collectionMembers(root, 'CandidateCollection', 'Candidate')) {
    const id = candidate.objectId;
    if (id !== null && id !== '') registry.set(id, []);
  }

  for (const contest of root.descendants('Contest')) {
    const contestId = contest.objectId;
    if (contestId === null || contestId === '') continue;

    const referenced: string[] = [];
    for (const selection of contest.findAll('BallotSelection')) {
      if (selection.xsiType !== 'CandidateSelection') continue;
      for (const idsElement of selection.findAll('CandidateIds')) {
        referenced.push(...splitIds(idsElement.text));
      }
    }
    for (const candidateId of contest.findAll('CandidateId')) {
      referenced.push(...splitIds(candidateId.text));
    }

    for (const candidateId of referenced) {
      const contests = registry.get(candidateId);
      if (contests !== undefined && !contests.includes(contestId)) contests.push(contestId);
    }
  }
  return registry;
}

/**
 * Each candidate appears in exactly one contest
 */
export class CandidatesReferencedOnce extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    const findings: SubFinding[] = [];
    for (const [candidateId, contests] of candidateRegistry(this.root)) {
      if (contests.length === 0) {
        findings.push(finding(`A Candidate should be referenced in a Contest. Candidate ${candidateId} is not referenced.`));
      } else if (contests.length > 1) {
        findings.push(
          finding(`A Candidate object should only be referenced from one Contest. Candidate ${candidateId} is referenced by the following Contests: ${contests.join(', ')}`)
        );
      }
    }

    reportFindings(issues, 'error', 'The Election File contains invalid Candidate references', findings);
  }
}

export const SELECTION_TYPE_BY_CONTEST: ReadonlyMap<string, string> = new Map([
  ['BallotMeasureContest', 'BallotMeasureSelection'],
  ['CandidateContest', 'CandidateSelection'],
  ['PartyContest', 'PartySelection'],
  ['RetentionContest', 'BallotMeasureSelection'],
]);

/**
 * Ballot selections match the kind of their contest
 */
export class ProperBallotSelection extends ElementRule {
  elements(): readonly string[] {
    return [...SELECTION_TYPE_BY_CONTEST.keys()];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const contestType = [...SELECTION_TYPE_BY_CONTEST.keys()].find((type) => element.is(type));
    if (contestType === undefined) return;
    const expected = SELECTION_TYPE_BY_CONTEST.get(contestType);
    if (expected === undefined) return;

    const mismatched = element
      .findAll('BallotSelection')
      .filter((selection) => selection.typeName !== expected)
      .map((selection) => selection.objectId ?? selection.typeName);

    if (mismatched.length > 0) {
      issues.error(`${describe(element)} contains BallotSelections that are not ${expected}: ${mismatched.join(', ')}`, {
        element,
      });
    }
  }
}

// ============================================================================
// Names and offices
// ============================================================================

/**
 * Every contest has a name and no two share one
 */
export class DuplicateContestNames extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    const findings: SubFinding[] = [];
    const byName = new Map<string, FeedElement[]>();
    for (const contest of this.root.descendants('Contest')) {
      const name = contest.childText('Name');
      if (name === null || isBlank(name)) {
        findings.push(finding(`${describe(contest)} is missing a Name.`, contest));
        continue;
      }
      const key = name.trim();
      byName.set(key, [...(byName.get(key) ?? []), contest]);
    }

    for (const [name, contests] of byName) {
      if (contests.length > 1) {
        const ids = contests.map((contest) => contest.objectId ?? '').join(', ');
        findings.push(finding(`Contest name '${name}' is used by contests ${ids}.`, contests[1]));
      }
    }

    reportFindings(issues, 'error', 'The feed has contests with missing or duplicate names.', findings);
  }
}

/**
 * A contest names exactly one office when it names any
 */
export class ContestHasMultipleOffices extends ElementRule {
  elements(): readonly string[] {
    return ['Contest'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const officeIds = element.find('OfficeIds');
    if (officeIds === null) return;

    const ids = splitIds(officeIds.text);
    if (ids.length > 1) {
      issues.error(`${describe(element)} has more than one associated office.`, { element: officeIds });
    } else if (ids.length === 0) {
      issues.error(`${describe(element)} has no associated offices.`, { element: officeIds });
    }
  }
}
