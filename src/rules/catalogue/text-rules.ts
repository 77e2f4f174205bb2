/**
 * Text Rules
 *
 * Document encoding, language tags and the shape of human-readable names.
 *
 * @module text-rules
 */

import type { IssueSink } from '../../core/issues.js';
import { isBlank, type FeedElement } from '../../core/tree/feed-element.js';
import { ElementRule, TreeRule } from '../rule.js';
import { describe } from './helpers.js';

/**
 * Feeds are UTF-8. A document without an XML declaration defaults to it.
 */
export class Encoding extends TreeRule {
  check(issues: IssueSink): void {
    const encoding = this.context.document.encoding ?? 'utf-8';
    if (encoding.toLowerCase() !== 'utf-8') {
      issues.error('Encoding on file is not UTF-8');
    }
  }
}

// ============================================================================
// Language tags
// ============================================================================

const languageNames = new Intl.DisplayNames(['en'], { type: 'language', fallback: 'none' });

/**
 * Well-formed BCP-47 tag whose primary language subtag is a known language
 */
export function isKnownLanguageTag(tag: string): boolean {
  if (tag.trim() === '') return false;
  try {
    const [canonical] = Intl.getCanonicalLocales(tag);
    if (canonical === undefined) return false;
    const language = new Intl.Locale(canonical).language;
    return languageNames.of(language) !== undefined;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

export class LanguageCode extends ElementRule {
  elements(): readonly string[] {
    return ['Text'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    const language = element.attr('language');
    if (language === null) return;

    if (!isKnownLanguageTag(language)) {
      issues.error(`${language} is not a valid language code`, { element });
    }
  }
}

/**
 * Text that is present but only whitespace. Empty text is left to the
 * optional-element check.
 */
export class EmptyText extends ElementRule {
  elements(): readonly string[] {
    return ['Text'];
  }

  check(element: FeedElement, issues: IssueSink): void {
    if (element.text !== '' && element.text.trim() === '') {
      issues.warning('Text is empty', { element });
    }
  }
}

// ============================================================================
// Names
// ============================================================================

function isAllCaps(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

/**
 * Names shouted in capitals
 */
export class AllCaps extends ElementRule {
  elements(): readonly string[] {
    return ['Candidate', 'CandidateContest', 'PartyContest', 'Person'];
  }

  private namePath(element: FeedElement): string | null {
    if (element.is('Candidate')) return 'BallotName/Text';
    if (element.is('CandidateContest') || (element.tag === 'Contest' && element.xsiType === null)) return 'Name';
    if (element.is('PartyContest') || element.is('Person')) return 'FullName/Text';
    return null;
  }

  check(element: FeedElement, issues: IssueSink): void {
    const path = this.namePath(element);
    if (path === null) return;

    for (const name of element.findAll(path)) {
      const text = name.text.trim();
      if (text !== '' && isAllCaps(text)) {
        issues.warning(`${describe(element)} has name in all upper case letters: ${text}`, { element: name });
        return;
      }
    }
  }
}

/**
 * Internationalized names carry a Text for every required language
 */
export class AllLanguages extends ElementRule {
  elements(): readonly string[] {
    return ['BallotName', 'BallotTitle', 'FullName', 'Name'];
  }

  get requiredLanguages(): readonly string[] {
    return this.options.requiredLanguages;
  }

  check(element: FeedElement, issues: IssueSink): void {
    const texts = element.findAll('Text');
    if (texts.length === 0) return;

    const present = new Set(
      texts.map((text) => text.attr('language')).filter((language): language is string => !isBlank(language))
    );
    const missing = this.requiredLanguages.filter((language) => !present.has(language));
    if (missing.length > 0) {
      issues.error(`${element.tag} is not translated to all required languages. Missing: ${missing.join(', ')}`, {
        element,
      });
    }
  }
}
