/**
 * Issue Model
 *
 * Rules report findings through an IssueSink instead of throwing. The
 * collector tags each issue with its rule, applies any per-rule severity
 * override, and leaves the pass/fail decision to the orchestrator.
 *
 * @module issues
 */

import type { FeedElement } from './tree/feed-element.js';

export type Severity = 'info' | 'warning' | 'error';

export const SEVERITIES: readonly Severity[] = ['error', 'warning', 'info'] as const;

const SEVERITY_RANK: Record<Severity, number> = { info: 0, warning: 1, error: 2 };

export function isSeverity(value: string): value is Severity {
  return value === 'info' || value === 'warning' || value === 'error';
}

export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[minimum];
}

/**
 * One instance inside an aggregate issue
 */
export interface SubFinding {
  readonly message: string;
  readonly line: number | null;
}

export interface Issue {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly message: string;
  readonly line: number | null;
  readonly subFindings: readonly SubFinding[];
}

export interface IssueDetails {
  /** Element the issue is about; its source line is recorded */
  readonly element?: FeedElement | null;
  readonly line?: number | null;
  readonly subFindings?: readonly SubFinding[];
}

/**
 * What a rule sees: one method per severity
 */
export interface IssueSink {
  error(message: string, details?: IssueDetails): void;
  warning(message: string, details?: IssueDetails): void;
  info(message: string, details?: IssueDetails): void;
}

/**
 * Sub-finding located at an element
 */
export function finding(message: string, element?: FeedElement | null): SubFinding {
  return { message, line: element?.line ?? null };
}

function lineFrom(details: IssueDetails | undefined): number | null {
  if (details?.line !== undefined && details.line !== null) return details.line;
  return details?.element?.line ?? null;
}

// ============================================================================
// Collector
// ============================================================================

export class IssueCollector {
  private readonly issues: Issue[] = [];

  /**
   * Sink that records issues for `ruleId`. When `override` is set every
   * issue the rule reports takes that severity instead.
   */
  sinkFor(ruleId: string, override?: Severity): IssueSink {
    const add = (severity: Severity, message: string, details?: IssueDetails): void => {
      this.issues.push({
        ruleId,
        severity: override ?? severity,
        message,
        line: lineFrom(details),
        subFindings: [...(details?.subFindings ?? [])],
      });
    };
    return {
      error: (message, details) => add('error', message, details),
      warning: (message, details) => add('warning', message, details),
      info: (message, details) => add('info', message, details),
    };
  }

  all(): readonly Issue[] {
    return this.issues;
  }

  ofSeverity(severity: Severity): Issue[] {
    return this.issues.filter((issue) => issue.severity === severity);
  }

  forRule(ruleId: string): Issue[] {
    return this.issues.filter((issue) => issue.ruleId === ruleId);
  }

  hasErrors(): boolean {
    return this.issues.some((issue) => issue.severity === 'error');
  }

  counts(): Record<Severity, number> {
    const counts: Record<Severity, number> = { error: 0, warning: 0, info: 0 };
    for (const issue of this.issues) {
      counts[issue.severity]++;
    }
    return counts;
  }
}
