/**
 * GpUnit Composition Graph
 *
 * Pure checks over the "composed of" hierarchy of GpUnits. Each unit is a
 * node keyed by objectId with an edge to every id in its
 * ComposingGpUnitIds. The functions return findings and never choose a
 * severity; the rules that call them do.
 *
 * @module composition-graph
 */

import { finding, type SubFinding } from '../core/issues.js';
import { splitIds, type FeedElement } from '../core/tree/feed-element.js';

export interface CompositionUnit {
  readonly id: string | null;
  readonly composingIds: readonly string[];
  readonly element: FeedElement | null;
}

export function toCompositionUnit(element: FeedElement): CompositionUnit {
  const objectId = element.objectId;
  return {
    id: objectId === null || objectId.trim() === '' ? null : objectId.trim(),
    composingIds: splitIds(element.childText('ComposingGpUnitIds')),
    element,
  };
}

/**
 * Every GpUnit in the subtree, document order
 */
export function compositionUnits(root: FeedElement): CompositionUnit[] {
  return root.descendants('GpUnit').map(toCompositionUnit);
}

// ============================================================================
// Single root
// ============================================================================

/**
 * Ids of units never listed as anybody's child, document order
 */
export function findRoots(units: readonly CompositionUnit[]): string[] {
  const children = new Set<string>();
  for (const unit of units) {
    for (const id of unit.composingIds) children.add(id);
  }

  const roots: string[] = [];
  for (const unit of units) {
    if (unit.id !== null && !children.has(unit.id) && !roots.includes(unit.id)) {
      roots.push(unit.id);
    }
  }
  return roots;
}

/**
 * Findings when the identified units do not form a single-rooted tree.
 * Zero roots means every unit is somebody's child, so a cycle exists.
 */
export function checkSingleRoot(units: readonly CompositionUnit[]): SubFinding[] {
  const identified = units.filter((unit) => unit.id !== null);
  if (identified.length === 0) return [];

  const roots = findRoots(identified);
  if (roots.length === 0) {
    return [finding('GpUnits have no geo district root.')];
  }
  if (roots.length > 1) {
    return [finding(`GpUnits tree has more than one root: ${roots.join(', ')}`)];
  }
  return [];
}

// ============================================================================
// Cycles
// ============================================================================

interface Frame {
  readonly id: string;
  next: number;
}

/**
 * Ids at which a cycle closes, in discovery order
 *
 * Depth-first from every unvisited unit with an explicit stack, so input
 * depth never grows the call stack. A child already on the current path
 * closes a cycle; fully explored units are never entered again. Ids with
 * no unit of their own are leaves.
 */
export function findCycles(units: readonly CompositionUnit[]): string[] {
  const edges = new Map<string, string[]>();
  for (const unit of units) {
    if (unit.id === null) continue;
    const existing = edges.get(unit.id) ?? [];
    edges.set(unit.id, [...existing, ...unit.composingIds]);
  }

  const state = new Map<string, 'on-path' | 'done'>();
  const closing: string[] = [];

  for (const start of edges.keys()) {
    if (state.has(start)) continue;

    const stack: Frame[] = [{ id: start, next: 0 }];
    state.set(start, 'on-path');

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;
      const children = edges.get(frame.id) ?? [];

      if (frame.next >= children.length) {
        state.set(frame.id, 'done');
        stack.pop();
        continue;
      }

      const child = children[frame.next];
      frame.next++;
      if (child === undefined) continue;

      const childState = state.get(child);
      if (childState === 'on-path') {
        if (!closing.includes(child)) closing.push(child);
      } else if (childState === undefined) {
        state.set(child, 'on-path');
        stack.push({ id: child, next: 0 });
      }
    }
  }

  return closing;
}

export function checkCycles(units: readonly CompositionUnit[]): SubFinding[] {
  const lineOf = new Map<string, number | null>();
  for (const unit of units) {
    if (unit.id !== null && !lineOf.has(unit.id)) lineOf.set(unit.id, unit.element?.line ?? null);
  }
  return findCycles(units).map((id) => ({
    message: `Cycle detected at node ${id}`,
    line: lineOf.get(id) ?? null,
  }));
}

// ============================================================================
// Structural duplicates
// ============================================================================

/**
 * Groups of identified units sharing the same non-empty set of composing
 * ids, members in document order
 */
export function findStructuralDuplicates(units: readonly CompositionUnit[]): CompositionUnit[][] {
  const groups = new Map<string, CompositionUnit[]>();
  for (const unit of units) {
    if (unit.id === null) continue;
    const key = [...new Set(unit.composingIds)].sort().join(' ');
    if (key === '') continue;
    const group = groups.get(key);
    if (group) {
      group.push(unit);
    } else {
      groups.set(key, [unit]);
    }
  }
  return [...groups.values()].filter((group) => group.length > 1);
}

/**
 * objectIds used by more than one unit, first occurrence order
 */
export function findDuplicateIds(units: readonly CompositionUnit[]): CompositionUnit[] {
  const seen = new Set<string>();
  const reported = new Set<string>();
  const duplicates: CompositionUnit[] = [];
  for (const unit of units) {
    if (unit.id === null) continue;
    if (seen.has(unit.id) && !reported.has(unit.id)) {
      reported.add(unit.id);
      duplicates.push(unit);
    }
    seen.add(unit.id);
  }
  return duplicates;
}

export function checkDuplicates(units: readonly CompositionUnit[]): SubFinding[] {
  const findings: SubFinding[] = [];
  for (const group of findStructuralDuplicates(units)) {
    const names = group.map((unit) => `'${unit.id ?? ''}'`).join(', ');
    findings.push(finding(`GpUnits (${names}) are duplicates`, group[0]?.element));
  }
  for (const unit of findDuplicateIds(units)) {
    findings.push(finding(`GpUnit with object_id ${unit.id ?? ''} is duplicated`, unit.element));
  }
  return findings;
}
