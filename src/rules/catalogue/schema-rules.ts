/**
 * Schema-Conditioned Rules
 *
 * Rules whose targets or vocabulary come from the XSD: conformance,
 * optional-element emptiness, OtherType usage and label uniqueness on
 * internationalized text.
 *
 * @module schema-rules
 */

import type { IssueSink } from '../../core/issues.js';
import { checkConformance } from '../../core/schema/schema-conformance.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule, TreeRule } from '../rule.js';
import { describe, reportFindings, trimmedText } from './helpers.js';

/**
 * Approximate structural conformance to the schema. Unresolvable type
 * references are caught when the schema is loaded, before any rule runs.
 */
export class Schema extends TreeRule {
  check(issues: IssueSink): void {
    if (this.root === null) return;

    reportFindings(issues, 'error', "The election file didn't validate against schema.", checkConformance(this.root, this.schema));
  }
}

/**
 * Optional elements present with nothing in them
 */
export class OptionalAndEmpty extends ElementRule {
  private previous: FeedElement | null = null;

  elements(): readonly string[] {
    return this.schema.optionalElements;
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (element === this.previous) return;
    this.previous = element;

    if (element.children.length === 0 && isBlank(element.text)) {
      issues.warning(`This optional element ${element.tag} is included but is empty.`, { element });
    }
  }
}

/**
 * A Type of "other" needs an OtherType saying what it is
 */
export class OtherType extends ElementRule {
  elements(): readonly string[] {
    return this.schema.otherTypeParents;
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (trimmedText(element, 'Type') !== 'other') return;
    if (!isBlank(element.childText('OtherType'))) return;

    issues.error(`Type on element ${describe(element)} is set to 'other' but OtherType element is not defined.`, {
      element,
    });
  }
}

/**
 * OtherType must not spell out a value the enumeration already has
 */
export class ValidEnumerations extends ElementRule {
  elements(): readonly string[] {
    return this.schema.otherTypeParents;
  }

  get validEnumerations(): readonly string[] {
    return this.schema.enumerations;
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (trimmedText(element, 'Type') !== 'other') return;
    const otherType = element.childText('OtherType');
    if (otherType === null) return;

    const value = otherType.trim();
    if (this.validEnumerations.includes(value)) {
      issues.error(
        `Type of ${element.typeName} is set to 'other' even though '${value}' is a valid enumeration.`,
        { element }
      );
    }
  }
}

/**
 * Labels on internationalized text must be unique across the feed
 */
export class UniqueLabel extends ElementRule {
  private readonly labels = new Set<string>();

  elements(): readonly string[] {
    return [...new Set(this.schema.internationalizedTextElements)];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const label = element.attr('label');
    if (label === null || label === '') return;

    if (this.labels.has(label)) {
      issues.error(`Duplicate label '${label}'. Label already defined.`, { element });
      return;
    }
    this.labels.add(label);
  }
}
