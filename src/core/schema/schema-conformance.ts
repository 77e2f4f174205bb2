/**
 * Schema Conformance
 *
 * Approximate structural check of a feed against its schema facts: the root
 * must be a declared global element, and every element whose type is a
 * known complex type must have its required children, no undeclared
 * children (unless the type is open), and no more occurrences than
 * maxOccurs allows. Simple-type content and attributes are not checked.
 *
 * @module schema-conformance
 */

import { finding, type SubFinding } from '../issues.js';
import type { FeedElement } from '../tree/feed-element.js';
import { effectiveChildren, isOpenType, type SchemaFacts } from './schema-facts.js';

function stripPrefix(name: string): string {
  const colon = name.indexOf(':');
  return colon === -1 ? name : name.slice(colon + 1);
}

function checkElement(
  element: FeedElement,
  typeName: string,
  facts: SchemaFacts,
  findings: SubFinding[]
): Array<[FeedElement, string | null]> {
  const declarations = effectiveChildren(facts, typeName);
  const next: Array<[FeedElement, string | null]> = [];
  const counts = new Map<string, number>();

  for (const child of element.children) {
    counts.set(child.tag, (counts.get(child.tag) ?? 0) + 1);
    const declaration = declarations.find((d) => d.name === child.tag);
    if (declaration === undefined) {
      if (!isOpenType(facts, typeName)) {
        findings.push(finding(`Element ${child.tag} is not expected in ${element.tag} (type ${typeName})`, child));
      }
      continue;
    }
    next.push([child, declaration.type]);
  }

  const checked = new Set<string>();
  for (const declaration of declarations) {
    if (checked.has(declaration.name)) continue;
    checked.add(declaration.name);
    const count = counts.get(declaration.name) ?? 0;
    if (count < declaration.minOccurs) {
      findings.push(finding(`Element ${element.tag} is missing required child ${declaration.name}`, element));
    }
    if (count > declaration.maxOccurs) {
      findings.push(
        finding(
          `Element ${element.tag} has ${count} ${declaration.name} children, at most ${declaration.maxOccurs} allowed`,
          element
        )
      );
    }
  }

  return next;
}

/**
 * Conformance findings for the document rooted at `root`, document order
 */
export function checkConformance(root: FeedElement, facts: SchemaFacts): SubFinding[] {
  const findings: SubFinding[] = [];

  if (!facts.rootElements.has(root.tag)) {
    findings.push(finding(`Root element ${root.tag} is not declared in the schema`, root));
    return findings;
  }

  const stack: Array<[FeedElement, string | null]> = [[root, facts.rootElements.get(root.tag) ?? null]];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (entry === undefined) break;
    const [element, declaredType] = entry;
    const typeName = element.xsiType !== null ? stripPrefix(element.xsiType) : declaredType;
    if (typeName === null || !facts.complexTypes.has(typeName)) continue;
    stack.push(...checkElement(element, typeName, facts, findings).reverse());
  }

  return findings.sort((a, b) => (a.line ?? 0) - (b.line ?? 0));
}
