/**
 * Party rule tests
 */

import { describe, it, expect } from 'vitest';
import {
  DuplicatedPartyAbbreviation,
  DuplicatedPartyName,
  MissingPartyAffiliation,
  MissingPartyNameTranslation,
  PartiesHaveValidColors,
  PersonsMissingPartyData,
  ValidateDuplicateColors,
} from '../../../rules/catalogue/party-rules.js';
import { messages, report, runRule } from '../../fixtures/rule-harness.js';

function party(id: string, body = ''): string {
  return `<Party objectId="${id}">${body}</Party>`;
}

function texts(element: string, entries: Array<[string, string]>): string {
  return `<${element}>${entries.map(([language, value]) => `<Text language="${language}">${value}</Text>`).join('')}</${element}>`;
}

describe('PartiesHaveValidColors', () => {
  it('warns on repeated, empty and malformed colors', async () => {
    const document = report(
      party('par1', '<Color>ff0000</Color>') +
        party('par2', '<Color>ff0000</Color><Color>00ff00</Color>') +
        party('par3', '<Color> </Color>') +
        party('par4', '<Color>#ff0000</Color>') +
        party('par5')
    );

    const issues = await runRule(PartiesHaveValidColors, document);

    expect(issues.map((issue) => [issue.severity, issue.message])).toEqual([
      ['warning', 'The Party par2 has more than one color.'],
      ['warning', 'Color tag in Party par3 is missing a value.'],
      ['warning', '#ff0000 in Party par4 is not a valid hex color.'],
    ]);
  });
});

describe('ValidateDuplicateColors', () => {
  it('compares colors case-insensitively', async () => {
    const document = report(
      `<PartyCollection>${party('par1', '<Color>FF0000</Color>')}${party('par2', '<Color>ff0000</Color>')}${party('par3')}</PartyCollection>`
    );

    const issues = await runRule(ValidateDuplicateColors, document);

    expect(issues).toHaveLength(1);
    expect(issues[0]?.severity).toBe('info');
    expect(issues[0]?.message).toBe('The feed contains parties with duplicate colors');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual([
      'Party par2 has the same color ff0000 as Party par1.',
    ]);
  });

  it('reports an empty collection', async () => {
    const issues = await runRule(ValidateDuplicateColors, report('<PartyCollection/>'));

    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual(['The PartyCollection has no parties.']);
  });
});

describe('DuplicatedPartyName', () => {
  it('reports shared names per language and missing names', async () => {
    const document = report(
      '<PartyCollection>' +
        party('par1', texts('Name', [['en', 'Green']])) +
        party('par2', texts('Name', [['en', ' Green '], ['es', 'Green']])) +
        party('par3') +
        '</PartyCollection>'
    );

    const issues = await runRule(DuplicatedPartyName, document);

    expect(issues[0]?.message).toBe('The feed contains duplicated party names');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual([
      "Party par2 and Party par1 share the Name 'Green' (en).",
      'Party par3 is missing Name.',
    ]);
  });
});

describe('DuplicatedPartyAbbreviation', () => {
  it('checks InternationalizedAbbreviation texts', async () => {
    const document = report(
      '<PartyCollection>' +
        party('par1', texts('InternationalizedAbbreviation', [['en', 'G']])) +
        party('par2', texts('InternationalizedAbbreviation', [['en', 'G']])) +
        '</PartyCollection>'
    );

    expect(await messages(DuplicatedPartyAbbreviation, document)).toEqual([
      'The feed contains duplicated party abbreviations',
    ]);
  });
});

describe('MissingPartyNameTranslation', () => {
  it('compares each party with the languages of the first', async () => {
    const document = report(
      '<PartyCollection>' +
        party('par1', texts('Name', [['es', 'Verde'], ['en', 'Green']])) +
        party('par2', texts('Name', [['en', 'Blue']])) +
        party('par3') +
        party('par4', texts('Name', [['en', 'Red'], ['es', 'Rojo']])) +
        '</PartyCollection>'
    );

    const issues = await runRule(MissingPartyNameTranslation, document);

    expect(issues[0]?.message).toBe('The feed is missing several parties name translation');
    expect(issues[0]?.subFindings.map((sub) => sub.message)).toEqual([
      'Party par2 has Name in [en] instead of [en, es].',
      'Party par3 is missing Name.',
    ]);
  });
});

describe('MissingPartyAffiliation', () => {
  it('lists party ids that no collection party defines', async () => {
    const document = report(
      `<PartyCollection>${party('par1')}</PartyCollection>` +
        '<Person objectId="per1"><PartyId>par1</PartyId></Person>' +
        '<Candidate objectId="can1"><PartyId>par9</PartyId></Candidate>' +
        '<Person objectId="per2"><PartyId>par8</PartyId></Person>'
    );

    const issues = await runRule(MissingPartyAffiliation, document);

    expect(issues).toEqual([
      {
        ruleId: 'MissingPartyAffiliation',
        severity: 'error',
        message: 'No defined Party for par8, par9 found in the feed.',
        line: null,
        subFindings: [
          { message: 'No defined Party for par8 found in the feed.', line: null },
          { message: 'No defined Party for par9 found in the feed.', line: null },
        ],
      },
    ]);
  });
});

describe('PersonsMissingPartyData', () => {
  it('warns on people without a party', async () => {
    const document = report('<Person objectId="per1"/><Person objectId="per2"><PartyId>par1</PartyId></Person>');

    expect(await messages(PersonsMissingPartyData, document)).toEqual(['Person per1 is missing party data']);
  });
});
