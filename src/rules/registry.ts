/**
 * Rule Registry
 *
 * Static, ordered list of every rule. Rules run in this order, so cheap
 * structural checks come first and dataset-backed ones later. Each entry
 * is scoped to the feed kinds it applies to; the two named rule sets are
 * derived from those scopes.
 *
 * @module registry
 */

import * as catalogue from './catalogue/index.js';
import type { RuleConstructor } from './rule.js';

export type RuleSetName = 'election' | 'officeholder';

export const RULE_SET_NAMES: readonly RuleSetName[] = ['election', 'officeholder'] as const;

export function isRuleSetName(value: string): value is RuleSetName {
  return value === 'election' || value === 'officeholder';
}

/** Feed kinds a rule applies to */
type RuleScope = 'common' | RuleSetName;

export interface RuleDefinition {
  readonly id: string;
  readonly description: string;
  readonly scope: RuleScope;
  readonly ctor: RuleConstructor;
}

function rule(ctor: RuleConstructor, scope: RuleScope, description: string): RuleDefinition {
  return { id: ctor.name, description, scope, ctor };
}

export const RULES: readonly RuleDefinition[] = [
  // Document structure
  rule(catalogue.Schema, 'common', 'Feed conforms to the XSD'),
  rule(catalogue.OptionalAndEmpty, 'common', 'Optional elements are not present but empty'),
  rule(catalogue.Encoding, 'common', 'Feed is encoded as UTF-8'),
  rule(catalogue.HungarianStyleNotation, 'common', 'objectIds start with the prefix of their type'),
  rule(catalogue.LanguageCode, 'common', 'Text language attributes are known language tags'),
  rule(catalogue.EmptyText, 'common', 'Text elements are not whitespace only'),
  rule(catalogue.DuplicateID, 'common', 'objectIds are unique'),
  rule(catalogue.ValidIDREF, 'common', 'IDREF values name objects in the feed'),
  rule(catalogue.OtherType, 'common', "Type 'other' comes with an OtherType"),
  rule(catalogue.ValidEnumerations, 'common', 'OtherType does not repeat a valid enumeration'),
  rule(catalogue.UniqueLabel, 'common', 'Labels are unique'),

  // Elections and contests
  rule(catalogue.OnlyOneElection, 'election', 'An ElectionReport holds one Election'),
  rule(catalogue.PercentSum, 'election', 'total-percent vote counts add up to 0 or 100'),
  rule(catalogue.ElectoralDistrictOcdId, 'election', 'Contest districts carry a known OCD-ID'),
  rule(catalogue.PartisanPrimary, 'election', 'Primary contests name their parties'),
  rule(catalogue.PartisanPrimaryHeuristic, 'election', 'Contest names do not suggest an undeclared primary'),
  rule(catalogue.CandidatesReferencedOnce, 'election', 'Each candidate belongs to exactly one contest'),
  rule(catalogue.ProperBallotSelection, 'election', 'Ballot selections match their contest type'),
  rule(catalogue.DuplicateContestNames, 'election', 'Contests have unique names'),
  rule(catalogue.ContestHasMultipleOffices, 'election', 'A contest names one office'),
  rule(catalogue.VoteCountTypesCoherency, 'election', 'Vote count types fit the contest type'),
  rule(catalogue.ElectionStartDates, 'election', 'Election start date is not in the past'),
  rule(catalogue.ElectionEndDates, 'election', 'Election end date is in the future and after the start'),
  rule(catalogue.ProhibitElectionData, 'officeholder', 'Officeholder feeds hold no election'),

  // Geography
  rule(catalogue.DuplicateGpUnits, 'common', 'GpUnits are not duplicated'),
  rule(catalogue.GpUnitsHaveSingleRoot, 'common', 'GpUnit hierarchy has a single root'),
  rule(catalogue.GpUnitsCyclesRefsValidation, 'common', 'GpUnit hierarchy has no cycles'),
  rule(catalogue.GpUnitOcdId, 'common', 'District GpUnits carry a known OCD-ID'),
  rule(catalogue.ValidateOcdidLowerCase, 'common', 'OCD-IDs are lower case'),

  // Parties
  rule(catalogue.CoalitionParties, 'common', 'Coalitions list their parties'),
  rule(catalogue.PartiesHaveValidColors, 'common', 'Party colors are single hex values'),
  rule(catalogue.ValidateDuplicateColors, 'common', 'Parties have distinct colors'),
  rule(catalogue.DuplicatedPartyAbbreviation, 'common', 'Parties have distinct abbreviations'),
  rule(catalogue.DuplicatedPartyName, 'common', 'Parties have distinct names'),
  rule(catalogue.MissingPartyNameTranslation, 'common', 'Party names are translated alike'),
  rule(catalogue.MissingPartyAbbreviationTranslation, 'common', 'Party abbreviations are translated alike'),
  rule(catalogue.MissingPartyAffiliation, 'common', 'PartyIds name parties in the feed'),
  rule(catalogue.PartyLeadershipMustExist, 'officeholder', 'Party leaders and chairs are people in the feed'),

  // People and offices
  rule(catalogue.PersonHasUniqueFullName, 'common', 'People have distinct names'),
  rule(catalogue.PersonsMissingPartyData, 'common', 'People carry a PartyId'),
  rule(catalogue.PersonsHaveValidGender, 'common', 'Gender values are recognised'),
  rule(catalogue.OfficeMissingOfficeHolderPersonData, 'officeholder', 'Office holders are people in the feed'),
  rule(catalogue.PersonHasOffice, 'officeholder', 'People hold an office or lead a party'),
  rule(catalogue.OfficesHaveJurisdictionID, 'common', 'Offices carry one jurisdiction-id'),
  rule(catalogue.ValidJurisdictionID, 'common', 'Jurisdiction ids name GpUnits in the feed'),

  // Identifiers and text
  rule(catalogue.ValidStableID, 'common', 'Stable ids use letters, digits, dashes and underscores'),
  rule(catalogue.CheckIdentifiers, 'common', 'Contests, candidates and parties have unique external ids'),
  rule(catalogue.AllCaps, 'common', 'Names are not all upper case'),
  rule(catalogue.AllLanguages, 'common', 'Names are given in every required language'),

  // Links
  rule(catalogue.URIValidator, 'common', 'URIs are absolute http(s) ASCII URLs'),
  rule(catalogue.ValidURIAnnotation, 'common', 'URI annotations fit the link'),
];

export function findRule(id: string): RuleDefinition | undefined {
  return RULES.find((definition) => definition.id === id);
}

export interface RuleSelection {
  readonly ruleSet: RuleSetName;
  /** Rule ids added to the set */
  readonly include?: readonly string[];
  /** Rule ids removed from the set; wins over include */
  readonly exclude?: readonly string[];
}

/**
 * Rule ids that are not in the registry
 */
export function unknownRuleIds(ids: readonly string[]): string[] {
  return ids.filter((id) => findRule(id) === undefined);
}

/**
 * Definitions selected for a run, in registry order
 */
export function selectRules(selection: RuleSelection): RuleDefinition[] {
  const include = new Set(selection.include ?? []);
  const exclude = new Set(selection.exclude ?? []);
  return RULES.filter((definition) => {
    if (exclude.has(definition.id)) return false;
    if (include.has(definition.id)) return true;
    return definition.scope === 'common' || definition.scope === selection.ruleSet;
  });
}
