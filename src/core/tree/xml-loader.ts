/**
 * XML Loader
 *
 * Turns feed bytes into the immutable FeedElement tree. Source lines come
 * from the @xmldom/xmldom locator; the declared encoding is kept for the
 * encoding rule and used to decode the bytes when the runtime knows it.
 *
 * @module xml-loader
 */

import { readFile } from 'node:fs/promises';
import { DOMParser } from '@xmldom/xmldom';
import { FeedParseError } from '../errors.js';
import { FeedElement, type FeedDocument } from './feed-element.js';

export const XSI_NAMESPACE = 'http://www.w3.org/2001/XMLSchema-instance';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;

const DECLARATION_PATTERN = /^\s*<\?xml[^>]*?\bencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/;

/**
 * Encoding named in the XML declaration, or null
 */
export function declaredEncoding(bytes: Uint8Array): string | null {
  // The declaration is ASCII whatever the encoding, so latin1 reads it safely
  const head = Buffer.from(bytes.subarray(0, 256)).toString('latin1').replace(/^(\uFEFF|\u00EF\u00BB\u00BF)/, '');
  const match = DECLARATION_PATTERN.exec(head);
  return match?.[1] ?? null;
}

function decode(bytes: Uint8Array, encoding: string | null): string {
  if (encoding !== null) {
    try {
      return new TextDecoder(encoding).decode(bytes);
    } catch (error) {
      if (!(error instanceof RangeError)) throw error;
    }
  }
  return new TextDecoder('utf-8').decode(bytes);
}

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function lineOf(node: Node): number | null {
  if ('lineNumber' in node && typeof node.lineNumber === 'number') {
    return node.lineNumber;
  }
  return null;
}

function toFeedElement(node: Element): FeedElement {
  const attributes = new Map<string, string>();
  let xsiType: string | null = null;

  for (let i = 0; i < node.attributes.length; i++) {
    const attribute = node.attributes.item(i);
    if (attribute === null) continue;
    if (attribute.name === 'xmlns' || attribute.name.startsWith('xmlns:')) continue;

    attributes.set(attribute.name, attribute.value);
    if (attribute.namespaceURI === XSI_NAMESPACE && attribute.localName === 'type') {
      xsiType = attribute.value;
    }
  }

  let text = '';
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child.nodeType === TEXT_NODE || child.nodeType === CDATA_SECTION_NODE) {
      text += child.nodeValue ?? '';
    }
  }

  return new FeedElement(node.localName || node.tagName, attributes, text, lineOf(node), xsiType);
}

/**
 * Parse XML text into a feed document
 *
 * @throws {FeedParseError} When the text is not well-formed
 */
export function parseFeed(xml: string, options: { filePath?: string; encoding?: string | null } = {}): FeedDocument {
  const filePath = options.filePath ?? '<memory>';
  const problems: string[] = [];
  const record = (message: unknown): void => {
    problems.push(String(message).trim());
  };

  let dom: Document;
  try {
    dom = new DOMParser({
      locator: {},
      errorHandler: { warning: record, error: record, fatalError: record },
    }).parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new FeedParseError('Feed is not well-formed XML', filePath, [
      ...problems,
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (problems.length > 0) {
    throw new FeedParseError('Feed is not well-formed XML', filePath, problems);
  }

  const documentElement: Element | null = dom.documentElement;
  if (documentElement === null) {
    throw new FeedParseError('Feed has no root element', filePath);
  }

  const root = toFeedElement(documentElement);
  const stack: Array<[Element, FeedElement]> = [[documentElement, root]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [domElement, feedElement] = entry;
    for (let i = 0; i < domElement.childNodes.length; i++) {
      const child = domElement.childNodes.item(i);
      if (isElement(child)) {
        const feedChild = toFeedElement(child);
        feedElement.append(feedChild);
        stack.push([child, feedChild]);
      }
    }
  }

  return { root, encoding: options.encoding ?? null, filePath: options.filePath };
}

/**
 * Parse feed bytes, honouring the declared encoding
 */
export function parseFeedBytes(bytes: Uint8Array, filePath?: string): FeedDocument {
  const encoding = declaredEncoding(bytes);
  return parseFeed(decode(bytes, encoding), { filePath, encoding });
}

/**
 * Read and parse a feed file
 *
 * @throws {FeedParseError} When the file cannot be read or parsed
 */
export async function loadFeed(filePath: string): Promise<FeedDocument> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new FeedParseError('Feed file could not be read', filePath, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return parseFeedBytes(bytes, filePath);
}
