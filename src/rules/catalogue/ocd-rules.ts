/**
 * OCD Division Identifier Rules
 *
 * Checks that district GpUnits carry Open Civic Data division ids that
 * exist in the published dataset for the feed's country. The dataset is
 * loaded once, in setup, through the run's OcdIdProvider.
 *
 * @module ocd-rules
 */

import { DatasetError } from '../../core/errors.js';
import type { IssueSink } from '../../core/issues.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';
import { encodeOcdIdValue, isValidOcdIdSyntax } from '../../ocd/ocd-id.js';
import { ElementRule } from '../rule.js';
import { externalIdentifiers, trimmedText } from './helpers.js';

/**
 * GpUnit Type values that name an electoral or administrative district
 */
export const DISTRICT_TYPES: ReadonlySet<string> = new Set([
  'borough',
  'city',
  'combined-precinct',
  'congressional',
  'country',
  'county',
  'district',
  'drainage',
  'judicial',
  'locality',
  'municipality',
  'national',
  'parish',
  'precinct',
  'province',
  'region',
  'school',
  'special',
  'split-precinct',
  'state',
  'state-house',
  'state-senate',
  'town',
  'township',
  'village',
  'ward',
  'water',
]);

/**
 * Element rule holding the run's OCD id set
 */
abstract class OcdDatasetRule extends ElementRule {
  protected ocdIds: ReadonlySet<string> = new Set();

  async setup(): Promise<void> {
    const provider = this.options.ocdIds;
    if (provider === null) {
      throw new DatasetError('No OCD-ID source is configured', this.options.countryCode);
    }
    this.ocdIds = await provider.ids(this.options.countryCode);
  }

  protected isKnownOcdId(value: string): boolean {
    return isValidOcdIdSyntax(value) && this.ocdIds.has(value);
  }
}

/**
 * A contest's ElectoralDistrictId resolves to a GpUnit whose ocd-id is real
 */
export class ElectoralDistrictOcdId extends OcdDatasetRule {
  elements(): readonly string[] {
    return ['ElectoralDistrictId'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const contest = element.parent;
    if (contest === null || !contest.is('Contest')) return;
    const contestId = contest.objectId;
    if (contestId === null || contestId === '') return;

    const districtId = element.text.trim();
    const unit = this.root?.descendants('GpUnit').find((candidate) => candidate.objectId === districtId);
    if (unit === undefined) {
      issues.error(`The contest ${contestId} does not refer to a GpUnit in the feed.`, { element });
      return;
    }

    const identifiers = externalIdentifiers(unit);
    if (identifiers.length === 0) {
      issues.error(`The GpUnit ${unit.objectId ?? ''} for contest ${contestId} does not have any external identifiers.`, {
        element: unit,
      });
      return;
    }

    let ocdIdFound = false;
    for (const identifier of identifiers) {
      const type = trimmedText(identifier, 'Type') ?? '';
      if (type.toLowerCase() !== 'ocd-id') continue;
      if (type !== 'ocd-id') {
        issues.error(`The External Identifier case is incorrect. Should be ocd-id and not ${type}.`, {
          element: identifier,
        });
        return;
      }

      ocdIdFound = true;
      const value = encodeOcdIdValue(identifier.childText('Value')?.trim() ?? '');
      if (!this.isKnownOcdId(value)) {
        issues.error(`The ElectoralDistrictId of contest ${contestId} does not have a valid OCD ID: ${value}`, {
          element: identifier,
        });
      }
    }

    if (!ocdIdFound) {
      issues.error(`The ElectoralDistrictId of contest ${contestId} does not have a valid OCD ID.`, { element });
    }
  }
}

/**
 * District ReportingUnits with an ocd-id should use one from the dataset
 */
export class GpUnitOcdId extends OcdDatasetRule {
  elements(): readonly string[] {
    return ['ReportingUnit'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const id = element.objectId;
    if (id === null || id === '') return;
    if (!DISTRICT_TYPES.has(trimmedText(element, 'Type') ?? '')) return;

    for (const identifier of externalIdentifiers(element)) {
      if (trimmedText(identifier, 'Type') !== 'ocd-id') continue;
      const raw = identifier.childText('Value');
      if (raw === null || isBlank(raw)) continue;

      const value = encodeOcdIdValue(raw.trim());
      if (!this.isKnownOcdId(value)) {
        issues.warning(`The OCD ID ${value} of GpUnit ${id} is not valid`, { element: identifier });
      }
    }
  }
}

/**
 * OCD ids are lower case; no dataset needed
 */
export class ValidateOcdidLowerCase extends ElementRule {
  elements(): readonly string[] {
    return ['ExternalIdentifier'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (trimmedText(element, 'Type') !== 'ocd-id') return;
    const value = element.childText('Value');
    if (value === null || isBlank(value)) return;

    if (value !== value.toLowerCase()) {
      issues.warning(`OCD-ID ${value.trim()} is not in all lower case letters. Valid OCD-IDs should be all lowercase.`, {
        element,
      });
    }
  }
}
