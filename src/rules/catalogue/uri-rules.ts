/**
 * URI Rules
 *
 * Shape of Uri values and the annotations that say what a contact link
 * points at.
 *
 * @module uri-rules
 */

import type { IssueSink } from '../../core/issues.js';
import type { FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule } from '../rule.js';

// ============================================================================
// URI syntax
// ============================================================================

const SCHEME_AUTHORITY_PATTERN = /^(?:([a-zA-Z][a-zA-Z0-9+.-]*):)?(?:\/\/([^/?#]*))?/;

const ASCII_PATTERN = /^[\x00-\x7F]*$/;

export interface UriParts {
  readonly scheme: string;
  readonly netloc: string;
}

/**
 * Scheme and authority of a URI, empty strings when absent
 */
export function splitUri(uri: string): UriParts {
  const match = SCHEME_AUTHORITY_PATTERN.exec(uri);
  return {
    scheme: (match?.[1] ?? '').toLowerCase(),
    netloc: match?.[2] ?? '',
  };
}

/**
 * Reasons a URI is unusable; empty when it is fine
 */
export function uriProblems(uri: string): string[] {
  const { scheme, netloc } = splitUri(uri);
  const problems: string[] = [];
  if (scheme !== 'http' && scheme !== 'https') problems.push('protocol - invalid');
  if (netloc === '') problems.push('domain - missing');
  if (!ASCII_PATTERN.test(uri)) problems.push('not ascii encoded');
  return problems;
}

export class URIValidator extends ElementRule {
  elements(): readonly string[] {
    return ['Uri'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const uri = element.text.trim();
    if (uri === '') {
      issues.error('Missing URI value.', { element });
      return;
    }

    const problems = uriProblems(uri);
    if (problems.length > 0) {
      issues.error(`The provided URI, ${uri}, is invalid for the following reasons: ${problems.join(', ')}.`, {
        element,
      });
    }
  }
}

// ============================================================================
// Annotations
// ============================================================================

export const USAGE_TYPES: ReadonlySet<string> = new Set(['personal', 'official', 'campaign']);

/**
 * Platforms and the hosts their links live on. An empty list means any host.
 */
export const PLATFORM_DOMAINS: ReadonlyMap<string, readonly string[]> = new Map([
  ['facebook', ['facebook.com', 'fb.com']],
  ['twitter', ['twitter.com', 'x.com']],
  ['youtube', ['youtube.com']],
  ['instagram', ['instagram.com']],
  ['linkedin', ['linkedin.com']],
  ['line', ['line.me']],
  ['wikipedia', ['wikipedia.org']],
  ['ballotpedia', ['ballotpedia.org']],
  ['website', []],
]);

/** Annotations that name a platform with no usage type */
export const PLATFORM_ONLY_ANNOTATIONS: ReadonlySet<string> = new Set(['wikipedia', 'ballotpedia', 'candidate-image']);

function hostOf(uri: string): string | null {
  try {
    return new URL(uri).hostname.toLowerCase();
  } catch {
    return null;
  }
}

function hostMatches(host: string, domains: readonly string[]): boolean {
  if (domains.length === 0) return true;
  return domains.some((domain) => host === domain || host.endsWith(`.${domain}`));
}

/**
 * Contact URIs are annotated "<usage>-<platform>" (e.g. "personal-facebook")
 * or with a platform-only annotation, and the URI's host fits the platform
 */
export class ValidURIAnnotation extends ElementRule {
  elements(): readonly string[] {
    return ['ContactInformation'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    for (const uriElement of element.findAll('Uri')) {
      const uri = uriElement.text.trim();
      const annotation = (uriElement.attr('Annotation') ?? '').trim();
      if (annotation === '') {
        issues.warning(`URI ${uri} is missing annotation.`, { element: uriElement });
        continue;
      }
      this.checkAnnotation(uriElement, uri, annotation, issues);
    }
  }

  private checkAnnotation(element: FeedElement, uri: string, annotation: string, issues: IssueSink): void {
    if (PLATFORM_ONLY_ANNOTATIONS.has(annotation)) {
      this.checkDomain(element, uri, annotation, annotation, issues);
      return;
    }

    const parts = annotation.split('-');
    if (parts.length === 1) {
      if (USAGE_TYPES.has(annotation)) {
        issues.error(`Annotation '${annotation}' has usage type, missing platform.`, { element });
      } else if (PLATFORM_DOMAINS.has(annotation)) {
        issues.warning(`Annotation '${annotation}' missing usage type.`, { element });
      } else {
        issues.warning(`${annotation} is not a valid annotation.`, { element });
      }
      return;
    }

    const [usage, platform] = parts;
    if (
      parts.length !== 2 ||
      usage === undefined ||
      platform === undefined ||
      !USAGE_TYPES.has(usage) ||
      !PLATFORM_DOMAINS.has(platform)
    ) {
      issues.warning(`${annotation} is not a valid annotation.`, { element });
      return;
    }
    this.checkDomain(element, uri, annotation, platform, issues);
  }

  private checkDomain(element: FeedElement, uri: string, annotation: string, platform: string, issues: IssueSink): void {
    const domains = PLATFORM_DOMAINS.get(platform);
    if (domains === undefined || domains.length === 0) return;
    const host = hostOf(uri);
    if (host === null || !hostMatches(host, domains)) {
      issues.error(`Annotation ${annotation} is incorrect for URI ${uri}.`, { element });
    }
  }
}
