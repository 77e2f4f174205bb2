/**
 * Reference Integrity
 *
 * "Every referencing id resolves to a defined entity", written once over
 * two gathered sets. Concrete rules only decide where the ids come from.
 *
 * @module reference-integrity
 */

import { finding, type IssueSink } from '../core/issues.js';
import { TreeRule } from './rule.js';

export interface ReferenceGatherer {
  /** Ids referenced somewhere in the document */
  referenceValues(): ReadonlySet<string>;
  /** Ids formally defined by the document */
  definedValues(): ReadonlySet<string>;
}

/**
 * Referenced ids with no definition, sorted
 */
export function danglingReferences(gatherer: ReferenceGatherer): string[] {
  const defined = gatherer.definedValues();
  return [...gatherer.referenceValues()].filter((id) => !defined.has(id)).sort();
}

/**
 * Report one error listing every dangling reference, with one sub-finding
 * per id. Reports nothing when every reference resolves.
 */
export function checkReferences(gatherer: ReferenceGatherer, issues: IssueSink, label: string): void {
  const missing = danglingReferences(gatherer);
  if (missing.length === 0) return;

  issues.error(`No defined ${label} for ${missing.join(', ')} found in the feed.`, {
    subFindings: missing.map((id) => finding(`No defined ${label} for ${id} found in the feed.`)),
  });
}

/**
 * Tree rule whose check is the reference-integrity template. Subclasses
 * add further findings by overriding `checkAdditional`.
 */
export abstract class ValidReferenceRule extends TreeRule implements ReferenceGatherer {
  /** Entity name used in messages, e.g. "Party" */
  protected abstract readonly label: string;

  abstract referenceValues(): ReadonlySet<string>;

  abstract definedValues(): ReadonlySet<string>;

  check(issues: IssueSink): void {
    if (this.root === null) return;
    checkReferences(this, issues, this.label);
    this.checkAdditional(issues);
  }

  protected checkAdditional(_issues: IssueSink): void {
    return undefined;
  }
}
