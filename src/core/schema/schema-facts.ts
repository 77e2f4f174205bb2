/**
 * Schema Facts
 *
 * The subset of an XSD that rules condition on: complex types and their
 * child declarations, optional element names, reference-typed element
 * names, enumeration values, internationalized-text elements and the types
 * that carry an OtherType child. Names are matched on local name, so a
 * schema written with or without the xs: prefix reads the same.
 *
 * @module schema-facts
 */

import { readFile } from 'node:fs/promises';
import { DOMParser } from '@xmldom/xmldom';
import { SchemaParseError } from '../errors.js';

export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema';

const ELEMENT_NODE = 1;

// ============================================================================
// Types
// ============================================================================

export interface ChildDeclaration {
  readonly name: string;
  /** Local type name, null for anonymous or untyped declarations */
  readonly type: string | null;
  /** 0 for optional declarations and for members of a choice group */
  readonly minOccurs: number;
  /** Infinity for unbounded */
  readonly maxOccurs: number;
}

export interface ComplexTypeFact {
  readonly name: string;
  /** Local name of the extended or restricted base type */
  readonly base: string | null;
  readonly children: readonly ChildDeclaration[];
  /** Content model contains an xs:any wildcard */
  readonly open: boolean;
}

export interface SchemaFacts {
  readonly complexTypes: ReadonlyMap<string, ComplexTypeFact>;
  /** Global element declarations: name to local type name */
  readonly rootElements: ReadonlyMap<string, string | null>;
  /** Element names declared with minOccurs="0", document order */
  readonly optionalElements: readonly string[];
  /** Element names typed IDREF or IDREFS */
  readonly referenceElements: readonly string[];
  /** Enumeration values of every simple type, "other" excluded */
  readonly enumerations: readonly string[];
  /** Element names typed InternationalizedText */
  readonly internationalizedTextElements: readonly string[];
  /** Complex types declaring an OtherType child */
  readonly otherTypeParents: readonly string[];
  /** Type references that name no declared or built-in type */
  readonly unresolvedTypes: readonly string[];
}

export const EMPTY_SCHEMA_FACTS: SchemaFacts = {
  complexTypes: new Map(),
  rootElements: new Map(),
  optionalElements: [],
  referenceElements: [],
  enumerations: [],
  internationalizedTextElements: [],
  otherTypeParents: [],
  unresolvedTypes: [],
};

// ============================================================================
// DOM helpers
// ============================================================================

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

function localNameOf(node: Element): string {
  return node.localName || node.tagName.replace(/^.*:/, '');
}

function elementChildren(node: Element): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (isElement(child)) result.push(child);
  }
  return result;
}

function allElements(root: Element): Element[] {
  const result: Element[] = [];
  const stack: Element[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined) break;
    result.push(node);
    stack.push(...elementChildren(node).reverse());
  }
  return result;
}

function stripPrefix(qualified: string): string {
  const colon = qualified.indexOf(':');
  return colon === -1 ? qualified : qualified.slice(colon + 1);
}

function parseOccurs(value: string | null, fallback: number): number {
  if (value === null || value === '') return fallback;
  if (value === 'unbounded') return Number.POSITIVE_INFINITY;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function pushUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

/**
 * Namespace a type reference resolves to, found by walking up to the
 * nearest matching xmlns declaration. Null when none declares it.
 */
function namespaceOfReference(node: Element, reference: string): string | null {
  const colon = reference.indexOf(':');
  const declaration = colon === -1 ? 'xmlns' : `xmlns:${reference.slice(0, colon)}`;
  let current: Node | null = node;
  while (current !== null && isElement(current)) {
    if (current.hasAttribute(declaration)) {
      return current.getAttribute(declaration);
    }
    current = current.parentNode;
  }
  return null;
}

// ============================================================================
// Extraction
// ============================================================================

/**
 * Collect child element declarations of a complex type. Members of a
 * choice, or of a group that may occur zero times, are optional. Nested
 * element declarations with anonymous types are not descended into.
 */
function collectComplexType(node: Element): ComplexTypeFact {
  const children: ChildDeclaration[] = [];
  let base: string | null = null;
  let open = false;

  const walk = (current: Element, optional: boolean): void => {
    for (const child of elementChildren(current)) {
      const kind = localNameOf(child);
      if (kind === 'element') {
        const name = child.getAttribute('name') || stripPrefix(child.getAttribute('ref') || '');
        if (name === '') continue;
        const type = child.getAttribute('type');
        children.push({
          name,
          type: type ? stripPrefix(type) : null,
          minOccurs: optional ? 0 : parseOccurs(child.getAttribute('minOccurs'), 1),
          maxOccurs: parseOccurs(child.getAttribute('maxOccurs'), 1),
        });
      } else if (kind === 'any') {
        open = true;
      } else if (kind === 'extension' || kind === 'restriction') {
        const baseAttr = child.getAttribute('base');
        if (baseAttr) base = stripPrefix(baseAttr);
        walk(child, optional);
      } else if (kind === 'complexType' || kind === 'simpleType' || kind === 'attribute') {
        continue;
      } else {
        walk(child, optional || kind === 'choice' || parseOccurs(child.getAttribute('minOccurs'), 1) === 0);
      }
    }
  };

  walk(node, false);
  return { name: node.getAttribute('name') ?? '', base, children, open };
}

/**
 * Derive schema facts from XSD text
 *
 * @throws {SchemaParseError} When the text is not well-formed XML
 */
export function parseSchemaFacts(xsd: string, filePath = '<memory>'): SchemaFacts {
  const problems: string[] = [];
  const record = (message: unknown): void => {
    problems.push(String(message).trim());
  };

  let dom: Document;
  try {
    dom = new DOMParser({
      errorHandler: { warning: record, error: record, fatalError: record },
    }).parseFromString(xsd, 'text/xml');
  } catch (error) {
    throw new SchemaParseError(
      `Schema file could not be parsed correctly: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const root: Element | null = dom.documentElement;
  if (problems.length > 0 || root === null) {
    throw new SchemaParseError(
      `Schema file could not be parsed correctly: ${problems[0] ?? 'no root element'}`,
      filePath
    );
  }

  const complexTypes = new Map<string, ComplexTypeFact>();
  const declaredTypes = new Set<string>();
  const rootElements = new Map<string, string | null>();
  const optionalElements: string[] = [];
  const referenceElements: string[] = [];
  const enumerations: string[] = [];
  const internationalizedTextElements: string[] = [];
  const typeReferences: Array<{ node: Element; reference: string }> = [];

  for (const child of elementChildren(root)) {
    if (localNameOf(child) === 'element') {
      const name = child.getAttribute('name');
      if (name) {
        const type = child.getAttribute('type');
        rootElements.set(name, type ? stripPrefix(type) : null);
      }
    }
  }

  for (const node of allElements(root)) {
    const kind = localNameOf(node);

    if (kind === 'complexType' || kind === 'simpleType') {
      const name = node.getAttribute('name');
      if (name) declaredTypes.add(name);
      if (kind === 'complexType' && name) {
        complexTypes.set(name, collectComplexType(node));
      }
    } else if (kind === 'element') {
      const name = node.getAttribute('name');
      const type = node.getAttribute('type');
      if (type) typeReferences.push({ node, reference: type });
      if (!name) continue;

      if (node.getAttribute('minOccurs') === '0') pushUnique(optionalElements, name);
      const typeName = type ? stripPrefix(type) : null;
      if (typeName === 'IDREF' || typeName === 'IDREFS') pushUnique(referenceElements, name);
      if (typeName === 'InternationalizedText') pushUnique(internationalizedTextElements, name);
    } else if (kind === 'enumeration') {
      const value = node.getAttribute('value');
      if (value && value !== 'other') pushUnique(enumerations, value);
    } else if (kind === 'extension' || kind === 'restriction' || kind === 'attribute') {
      const reference = node.getAttribute(kind === 'attribute' ? 'type' : 'base');
      if (reference) typeReferences.push({ node, reference });
    }
  }

  const unresolvedTypes: string[] = [];
  for (const { node, reference } of typeReferences) {
    if (namespaceOfReference(node, reference) === XSD_NAMESPACE) continue;
    const local = stripPrefix(reference);
    if (!declaredTypes.has(local)) pushUnique(unresolvedTypes, local);
  }

  const otherTypeParents: string[] = [];
  for (const fact of complexTypes.values()) {
    if (fact.children.some((child) => child.name === 'OtherType')) {
      otherTypeParents.push(fact.name);
    }
  }

  return {
    complexTypes,
    rootElements,
    optionalElements,
    referenceElements,
    enumerations,
    internationalizedTextElements,
    otherTypeParents,
    unresolvedTypes,
  };
}

/**
 * Read and parse an XSD file
 *
 * @throws {SchemaParseError} When the file cannot be read or parsed
 */
export async function loadSchemaFacts(filePath: string): Promise<SchemaFacts> {
  let xsd: string;
  try {
    xsd = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SchemaParseError(
      `Schema file could not be read: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return parseSchemaFacts(xsd, filePath);
}

/**
 * Child declarations of a complex type, base types first
 */
export function effectiveChildren(facts: SchemaFacts, typeName: string): ChildDeclaration[] {
  const chain: ComplexTypeFact[] = [];
  const seen = new Set<string>();
  let current = facts.complexTypes.get(typeName);
  while (current !== undefined && !seen.has(current.name)) {
    seen.add(current.name);
    chain.unshift(current);
    current = current.base === null ? undefined : facts.complexTypes.get(current.base);
  }
  return chain.flatMap((fact) => [...fact.children]);
}

/**
 * True when the type or any of its bases declares an xs:any wildcard
 */
export function isOpenType(facts: SchemaFacts, typeName: string): boolean {
  const seen = new Set<string>();
  let current = facts.complexTypes.get(typeName);
  while (current !== undefined && !seen.has(current.name)) {
    if (current.open) return true;
    seen.add(current.name);
    current = current.base === null ? undefined : facts.complexTypes.get(current.base);
  }
  return false;
}
