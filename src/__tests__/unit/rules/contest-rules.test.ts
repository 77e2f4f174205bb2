/**
 * Contest rule tests
 */

import { describe, it, expect } from 'vitest';
import {
  CandidatesReferencedOnce,
  ContestHasMultipleOffices,
  DuplicateContestNames,
  PercentSum,
  ProperBallotSelection,
  VoteCountTypesCoherency,
  candidateRegistry,
} from '../../../rules/catalogue/contest-rules.js';
import { messages, report, runRule } from '../../fixtures/rule-harness.js';

function voteCounts(otherType: string, count: string): string {
  return `<VoteCounts><Type>other</Type><OtherType>${otherType}</OtherType><Count>${count}</Count></VoteCounts>`;
}

function candidateContest(id: string, counts: string[]): string {
  return (
    `<Contest xsi:type="CandidateContest" objectId="${id}">` +
    `<BallotSelection xsi:type="CandidateSelection" objectId="${id}-cs"><VoteCountsCollection>${counts.join('')}</VoteCountsCollection></BallotSelection>` +
    '</Contest>'
  );
}

describe('PercentSum', () => {
  it('requires total-percent counts to sum to 0 or 100', async () => {
    const document = report(
      candidateContest('cc1', [voteCounts('total-percent', '60'), voteCounts('total-percent', '30')]) +
        candidateContest('cc2', [
          voteCounts('total-percent', '33.33'),
          voteCounts('total-percent', '33.33'),
          voteCounts('total-percent', '33.34'),
          voteCounts('candidate-votes', '500'),
        ]) +
        candidateContest('cc3', [voteCounts('candidate-votes', '12')])
    );

    expect(await messages(PercentSum, document)).toEqual(['CandidateContest cc1 percents do not add up to 0 or 100: 90']);
  });
});

describe('VoteCountTypesCoherency', () => {
  it('rejects vote count types of the other contest kind', async () => {
    const document = report(
      '<Contest xsi:type="PartyContest" objectId="pc1">' +
        voteCounts('candidate-votes', '1') +
        voteCounts('candidate-votes', '2') +
        voteCounts('seats-won', '3') +
        '</Contest>' +
        candidateContest('cc1', [voteCounts('seats-won', '1'), voteCounts('party-votes', '2')]) +
        `<Contest xsi:type="BallotMeasureContest" objectId="bmc1">${voteCounts('seats-won', '1')}</Contest>`
    );

    expect(await messages(VoteCountTypesCoherency, document)).toEqual([
      'VoteCount types candidate-votes should not be nested in PartyContest pc1',
      'VoteCount types seats-won, party-votes should not be nested in CandidateContest cc1',
    ]);
  });
});

describe('candidate references', () => {
  const document = report(
    '<CandidateCollection><Candidate objectId="can1"/><Candidate objectId="can2"/><Candidate objectId="can3"/></CandidateCollection>' +
      '<ContestCollection>' +
      '<Contest xsi:type="CandidateContest" objectId="cc1"><BallotSelection xsi:type="CandidateSelection" objectId="cs1"><CandidateIds>can1 can2</CandidateIds></BallotSelection></Contest>' +
      '<Contest xsi:type="CandidateContest" objectId="cc2"><BallotSelection xsi:type="CandidateSelection" objectId="cs2"><CandidateIds>can2</CandidateIds></BallotSelection></Contest>' +
      '</ContestCollection>'
  );

  it('maps each candidate to the contests referencing it', () => {
    expect(document.root === null ? null : Object.fromEntries(candidateRegistry(document.root))).toEqual({
      can1: ['cc1'],
      can2: ['cc1', 'cc2'],
      can3: [],
    });
  });

  it('reports unreferenced and multiply referenced candidates', async () => {
    const issues = await runRule(CandidatesReferencedOnce, document);

    expect(issues).toHaveLength(1);
    expect(issues[0]?.message).toBe('The Election File contains invalid Candidate references');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual([
      'A Candidate object should only be referenced from one Contest. Candidate can2 is referenced by the following Contests: cc1, cc2',
      'A Candidate should be referenced in a Contest. Candidate can3 is not referenced.',
    ]);
  });
});

describe('ProperBallotSelection', () => {
  it('lists selections that do not match the contest kind', async () => {
    const document = report(
      '<Contest xsi:type="CandidateContest" objectId="cc1">' +
        '<BallotSelection xsi:type="CandidateSelection" objectId="cs1"/>' +
        '<BallotSelection xsi:type="PartySelection" objectId="ps1"/>' +
        '<BallotSelection/>' +
        '</Contest>' +
        '<Contest xsi:type="RetentionContest" objectId="rc1"><BallotSelection xsi:type="BallotMeasureSelection" objectId="bms1"/></Contest>'
    );

    expect(await messages(ProperBallotSelection, document)).toEqual([
      'CandidateContest cc1 contains BallotSelections that are not CandidateSelection: ps1, BallotSelection',
    ]);
  });
});

describe('DuplicateContestNames', () => {
  it('reports missing names before shared ones', async () => {
    const document = report(
      '<Contest objectId="cc1"><Name>Mayor</Name></Contest>' +
        '<Contest objectId="cc2"><Name> Mayor </Name></Contest>' +
        '<Contest objectId="cc3"/>' +
        '<Contest objectId="cc4"><Name>Sheriff</Name></Contest>'
    );

    const issues = await runRule(DuplicateContestNames, document);

    expect(issues).toHaveLength(1);
    expect(issues[0]?.message).toBe('The feed has contests with missing or duplicate names.');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual([
      'Contest cc3 is missing a Name.',
      "Contest name 'Mayor' is used by contests cc1, cc2.",
    ]);
  });
});

describe('ContestHasMultipleOffices', () => {
  it('requires exactly one office id when OfficeIds is present', async () => {
    const document = report(
      '<Contest objectId="cc1"><OfficeIds>off1 off2</OfficeIds></Contest>' +
        '<Contest objectId="cc2"><OfficeIds> </OfficeIds></Contest>' +
        '<Contest objectId="cc3"><OfficeIds>off3</OfficeIds></Contest>' +
        '<Contest objectId="cc4"/>'
    );

    expect(await messages(ContestHasMultipleOffices, document)).toEqual([
      'Contest cc1 has more than one associated office.',
      'Contest cc2 has no associated offices.',
    ]);
  });
});
