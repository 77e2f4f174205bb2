/**
 * GpUnit Hierarchy Rules
 *
 * Thin wrappers over the composition-graph checks; each picks the units it
 * inspects and the severity of what the graph check finds.
 *
 * @module gpunit-rules
 */

import type { IssueSink } from '../../core/issues.js';
import type { FeedElement } from '../../core/tree/feed-element.js';
import {
  checkCycles,
  checkDuplicates,
  checkSingleRoot,
  compositionUnits,
  toCompositionUnit,
} from '../composition-graph.js';
import { ElementRule, TreeRule } from '../rule.js';
import { reportFindings } from './helpers.js';

/**
 * GpUnits in one collection that share an id, or that are composed of
 * exactly the same units
 */
export class DuplicateGpUnits extends ElementRule {
  elements(): readonly string[] {
    return ['GpUnitCollection'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const units = element.findAll('GpUnit').map(toCompositionUnit);
    reportFindings(issues, 'error', 'The feed contains duplicate GpUnits.', checkDuplicates(units));
  }
}

export class GpUnitsHaveSingleRoot extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;
    const findings = checkSingleRoot(compositionUnits(this.root));
    reportFindings(issues, 'error', findings[0]?.message ?? '', findings);
  }
}

export class GpUnitsCyclesRefsValidation extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;
    reportFindings(
      issues,
      'error',
      'The GpUnit composition graph contains cycles.',
      checkCycles(compositionUnits(this.root))
    );
  }
}
