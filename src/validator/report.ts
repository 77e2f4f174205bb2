/**
 * Validation Report
 *
 * Renders a ValidationResult as text or as a JSON document. Filtering by
 * minimum severity changes what is shown, never the verdict.
 *
 * @module report
 */

import { SEVERITIES, severityAtLeast, type Issue, type Severity } from '../core/issues.js';
import { COUNTED_ENTITIES, type EntityStats, type ValidationResult } from './orchestrator.js';

export interface ReportOptions {
  /** Least severe issue shown (default: info) */
  readonly minSeverity?: Severity;
  /** Include entity counts (default: true) */
  readonly stats?: boolean;
}

const SEVERITY_HEADINGS: Record<Severity, string> = {
  error: 'ERRORS',
  warning: 'WARNINGS',
  info: 'INFO',
};

export function visibleIssues(result: ValidationResult, minSeverity: Severity = 'info'): Issue[] {
  return result.issues.filter((issue) => severityAtLeast(issue.severity, minSeverity));
}

function location(line: number | null): string {
  return line === null ? '' : `line ${line}: `;
}

function formatIssue(issue: Issue): string[] {
  const lines = [`  [${issue.ruleId}] ${location(issue.line)}${issue.message}`];
  for (const sub of issue.subFindings) {
    lines.push(`      - ${location(sub.line)}${sub.message}`);
  }
  return lines;
}

export function formatStats(stats: EntityStats): string[] {
  return COUNTED_ENTITIES.map((name) => `  ${name}: ${stats[name]}`);
}

export function formatVerdict(result: ValidationResult): string {
  const { error, warning, info } = result.counts;
  const outcome = result.passed ? 'passed' : 'failed';
  return `Validation ${outcome}: ${error} errors, ${warning} warnings, ${info} info`;
}

/**
 * Human-readable report, grouped by severity, most severe first
 */
export function formatTextReport(result: ValidationResult, options: ReportOptions = {}): string {
  const issues = visibleIssues(result, options.minSeverity);
  const lines: string[] = [];

  for (const severity of SEVERITIES) {
    const group = issues.filter((issue) => issue.severity === severity);
    if (group.length === 0) continue;
    lines.push(`${SEVERITY_HEADINGS[severity]} (${group.length})`);
    for (const issue of group) {
      lines.push(...formatIssue(issue));
    }
    lines.push('');
  }

  if (options.stats ?? true) {
    lines.push('Feed contents', ...formatStats(result.stats), '');
  }

  lines.push(formatVerdict(result));
  return lines.join('\n');
}

export interface JsonReport {
  readonly passed: boolean;
  readonly counts: Record<Severity, number>;
  readonly stats?: EntityStats;
  readonly rulesRun: readonly string[];
  readonly issues: readonly Issue[];
}

export function toJsonReport(result: ValidationResult, options: ReportOptions = {}): JsonReport {
  return {
    passed: result.passed,
    counts: result.counts,
    ...((options.stats ?? true) ? { stats: result.stats } : {}),
    rulesRun: result.rulesRun,
    issues: visibleIssues(result, options.minSeverity),
  };
}
