/**
 * OCD Division Identifiers
 *
 * Grammar, value normalization and the two-column CSV the dataset ships in.
 *
 * @module ocd-id
 */

import { createHash } from 'node:crypto';

/**
 * ocd-division/country:<cc> followed by any number of /type:value steps.
 * Types are lower-case words; values allow letters of any script.
 */
export const OCD_ID_PATTERN = /^ocd-division\/country:[a-z]{2}(\/[\p{Ll}\p{N}_-]+:[\p{L}\p{M}\p{N}_.~'-]+)*$/u;

export function isValidOcdIdSyntax(value: string): boolean {
  return OCD_ID_PATTERN.test(value);
}

const utf8 = new TextDecoder('utf-8');

/**
 * Canonical form of an id value read from a feed: strings as-is in NFC,
 * bytes decoded as UTF-8, anything else the empty string (which never
 * matches a dataset entry).
 */
export function encodeOcdIdValue(value: unknown): string {
  if (typeof value === 'string') {
    return value.normalize('NFC');
  }
  if (value instanceof Uint8Array) {
    return utf8.decode(value).normalize('NFC');
  }
  return '';
}

/**
 * Git blob object id of a file body, as listed by the contents API
 */
export function gitBlobSha(content: Uint8Array): string {
  return createHash('sha1').update(`blob ${content.byteLength}\0`).update(content).digest('hex');
}

// ============================================================================
// CSV
// ============================================================================

export interface OcdDataset {
  /** id to display name */
  readonly names: ReadonlyMap<string, string>;
}

/**
 * Split one CSV line, honouring double-quoted fields
 */
export function parseCSVLine(line: string): string[] {
  const values: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      values.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }
  values.push(current.trim());

  return values;
}

function contentLines(content: string): string[] {
  return content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);
}

/**
 * Reason the content is not a usable dataset, or null when it is
 */
export function verifyOcdCsv(content: string): string | null {
  const lines = contentLines(content);
  const header = lines[0];
  if (header === undefined) {
    return 'dataset file is empty';
  }
  if (!parseCSVLine(header).map((h) => h.toLowerCase()).includes('id')) {
    return 'dataset header has no id column';
  }
  if (lines.length < 2) {
    return 'dataset has no identifiers';
  }
  return null;
}

/**
 * Parse dataset CSV. Rows without an id are skipped; the name column is
 * optional.
 */
export function parseOcdCsv(content: string): OcdDataset {
  const lines = contentLines(content);
  const header = lines[0];
  const names = new Map<string, string>();
  if (header === undefined) {
    return { names };
  }

  const headers = parseCSVLine(header).map((h) => h.toLowerCase());
  const idIndex = headers.indexOf('id');
  const nameIndex = headers.indexOf('name');
  if (idIndex === -1) {
    return { names };
  }

  for (const line of lines.slice(1)) {
    const values = parseCSVLine(line);
    const id = values[idIndex];
    if (id === undefined || id === '') continue;
    names.set(id.normalize('NFC'), nameIndex === -1 ? '' : values[nameIndex] ?? '');
  }

  return { names };
}
