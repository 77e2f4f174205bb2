/**
 * Election rule tests
 */

import { describe, it, expect } from 'vitest';
import {
  CoalitionParties,
  ElectionEndDates,
  ElectionStartDates,
  OnlyOneElection,
  PartisanPrimary,
  PartisanPrimaryHeuristic,
  ProhibitElectionData,
  electionType,
} from '../../../rules/catalogue/election-rules.js';
import { messages, report, runRule } from '../../fixtures/rule-harness.js';

const now = (): Date => new Date(2026, 2, 1, 12, 0);

function election(type: string, contests: string): string {
  return `<Election><Type>${type}</Type><ContestCollection>${contests}</ContestCollection></Election>`;
}

describe('OnlyOneElection', () => {
  it('allows a single election', async () => {
    expect(await messages(OnlyOneElection, report('<Election/>'))).toEqual([]);
  });

  it('reports a second election', async () => {
    expect(await messages(OnlyOneElection, report('<Election/><Election/>'))).toEqual([
      'ElectionReport has 2 Election elements; only one is allowed.',
    ]);
  });
});

describe('ProhibitElectionData', () => {
  it('rejects any election element', async () => {
    expect(await messages(ProhibitElectionData, report('<ElectionCollection><Election/></ElectionCollection>'))).toEqual([
      'Election data is prohibited in officeholder feeds.',
    ]);
    expect(await messages(ProhibitElectionData, report('<OfficeCollection/>'))).toEqual([]);
  });
});

describe('CoalitionParties', () => {
  it('aggregates coalitions without PartyIds', async () => {
    const document = report(
      '<Coalition objectId="coa1"><PartyIds>par1</PartyIds></Coalition><Coalition objectId="coa2"><PartyIds> </PartyIds></Coalition>'
    );

    const issues = await runRule(CoalitionParties, document);

    expect(issues).toHaveLength(1);
    expect(issues[0]?.message).toBe('Coalitions must reference the parties they are made of.');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual(['Coalition coa2 must define PartyIds.']);
  });
});

describe('primaries', () => {
  const contests =
    '<Contest xsi:type="CandidateContest" objectId="cc1"><Name>Governor (Dem)</Name><PrimaryPartyIds>par1</PrimaryPartyIds></Contest>' +
    '<Contest xsi:type="CandidateContest" objectId="cc2"><Name>Sheriff</Name></Contest>';

  it('reads the type of the first election', () => {
    expect(electionType(report(election(' primary ', '')).root)).toBe('primary');
    expect(electionType(report('').root)).toBeNull();
  });

  it('requires PrimaryPartyIds on candidate contests of a primary', async () => {
    const document = report(election('primary', contests));

    expect(await messages(PartisanPrimary, document)).toEqual([
      'Election is of ElectionType primary but CandidateContest cc2 does not have PrimaryPartyIds.',
    ]);
    expect(await messages(PartisanPrimaryHeuristic, document)).toEqual([]);
  });

  it('flags party-suffixed contest names outside primaries', async () => {
    const document = report(election('general', contests));

    expect(await messages(PartisanPrimary, document)).toEqual([]);
    expect(await messages(PartisanPrimaryHeuristic, document)).toEqual([
      'Name of CandidateContest cc1 indicates this might be a partisan primary: Governor (Dem)',
    ]);
  });
});

describe('election dates', () => {
  it('reports past and inverted dates', async () => {
    const document = report('<Election><StartDate>2026-02-28</StartDate><EndDate>2026-02-27</EndDate></Election>');

    const start = await runRule(ElectionStartDates, document, { options: { now } });
    const end = await runRule(ElectionEndDates, document, { options: { now } });

    expect(start.map((issue) => [issue.severity, issue.message])).toEqual([
      ['warning', 'The election start date 2026-02-28 is in the past.'],
    ]);
    expect(end.map((issue) => [issue.severity, issue.message])).toEqual([
      ['error', 'The election end date 2026-02-27 is in the past.'],
      ['error', 'The election end date 2026-02-27 is before the start date 2026-02-28.'],
    ]);
  });

  it('treats today as not past and ignores values that are not dates', async () => {
    const document = report('<Election><StartDate>2026-03-01</StartDate><EndDate>soon</EndDate></Election>');

    expect(await messages(ElectionStartDates, document, { options: { now } })).toEqual([]);
    expect(await messages(ElectionEndDates, document, { options: { now } })).toEqual([]);
  });

  it('takes today from the local calendar', async () => {
    const document = report('<Election><StartDate>2026-02-28</StartDate></Election>');
    const lateEvening = (): Date => new Date(2026, 1, 28, 23, 30);
    const pastMidnight = (): Date => new Date(2026, 2, 1, 0, 30);

    expect(await messages(ElectionStartDates, document, { options: { now: lateEvening } })).toEqual([]);
    expect(await messages(ElectionStartDates, document, { options: { now: pastMidnight } })).toEqual([
      'The election start date 2026-02-28 is in the past.',
    ]);
  });
});
