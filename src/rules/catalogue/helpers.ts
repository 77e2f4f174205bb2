/**
 * Shared lookups for catalogue rules
 *
 * @module catalogue-helpers
 */

import type { IssueSink, Severity, SubFinding } from '../../core/issues.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';

/**
 * "Party par0001", or just "Party" when the element has no objectId
 */
export function describe(element: FeedElement): string {
  const id = element.objectId;
  return id === null || id === '' ? element.typeName : `${element.typeName} ${id}`;
}

/**
 * Trimmed text of the first child at `path`, null when absent
 */
export function trimmedText(element: FeedElement, path: string): string | null {
  const text = element.childText(path);
  return text === null ? null : text.trim();
}

/**
 * ExternalIdentifier children under ExternalIdentifiers
 */
export function externalIdentifiers(element: FeedElement): FeedElement[] {
  return element.findAll('ExternalIdentifiers/ExternalIdentifier');
}

/**
 * Non-blank Values of external identifiers with Type "other" and the given
 * OtherType, searched anywhere under `scope`
 */
export function otherTypedIdentifierValues(scope: FeedElement, otherType: string): string[] {
  const values: string[] = [];
  for (const identifier of scope.descendants('ExternalIdentifier')) {
    if (trimmedText(identifier, 'Type')?.toLowerCase() !== 'other') continue;
    if (trimmedText(identifier, 'OtherType') !== otherType) continue;
    const value = identifier.childText('Value');
    if (value !== null && !isBlank(value)) values.push(value.trim());
  }
  return values;
}

/**
 * Collection children of a root, e.g. every Party under PartyCollection
 */
export function collectionMembers(root: FeedElement, collection: string, member: string): FeedElement[] {
  return root.descendants(collection).flatMap((element) => element.findAll(member));
}

/**
 * Non-empty objectIds of every element named `name` under `root`
 */
export function objectIdsOf(root: FeedElement, name: string): Set<string> {
  const ids = new Set<string>();
  for (const element of root.descendants(name)) {
    const id = element.objectId;
    if (id !== null && id.trim() !== '') ids.add(id.trim());
  }
  return ids;
}

/**
 * One aggregate issue carrying every finding, located at the first. Reports
 * nothing when there are no findings.
 */
export function reportFindings(
  issues: IssueSink,
  severity: Severity,
  summary: string,
  findings: readonly SubFinding[]
): void {
  if (findings.length === 0) return;
  issues[severity](summary, { line: findings[0]?.line ?? null, subFindings: findings });
}
