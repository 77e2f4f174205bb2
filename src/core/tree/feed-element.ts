/**
 * Feed Tree Model
 *
 * Immutable, ordered element tree built once per run by the XML loader and
 * shared read-only by every rule.
 *
 * @module feed-element
 */

/**
 * One element of a feed document
 */
export class FeedElement {
  private readonly childList: FeedElement[] = [];
  private parentElement: FeedElement | null = null;

  constructor(
    /** Local tag name, namespace prefix removed */
    readonly tag: string,
    /** Attributes keyed by qualified name, document order, namespace declarations excluded */
    readonly attributes: ReadonlyMap<string, string>,
    /** Direct text and CDATA content, '' when the element has none */
    readonly text: string,
    readonly line: number | null,
    /** Value of xsi:type, when present */
    readonly xsiType: string | null = null
  ) {}

  get children(): readonly FeedElement[] {
    return this.childList;
  }

  get parent(): FeedElement | null {
    return this.parentElement;
  }

  /**
   * Attach a child. Only the loader and test builders call this, before the
   * tree is handed to rules.
   */
  append(child: FeedElement): this {
    child.parentElement = this;
    this.childList.push(child);
    return this;
  }

  attr(name: string): string | null {
    return this.attributes.get(name) ?? null;
  }

  get objectId(): string | null {
    return this.attr('objectId');
  }

  /**
   * xsi:type when present, otherwise the tag
   */
  get typeName(): string {
    return this.xsiType ?? this.tag;
  }

  /**
   * True when the tag or the xsi:type equals `name`
   */
  is(name: string): boolean {
    return this.tag === name || this.xsiType === name;
  }

  /**
   * First element reached by a slash-separated path of child tags
   */
  find(path: string): FeedElement | null {
    return this.findAll(path)[0] ?? null;
  }

  /**
   * All elements reached by a slash-separated path of child tags, in
   * document order
   */
  findAll(path: string): FeedElement[] {
    let current: FeedElement[] = [this];
    for (const step of path.split('/')) {
      const next: FeedElement[] = [];
      for (const element of current) {
        for (const child of element.childList) {
          if (child.tag === step) {
            next.push(child);
          }
        }
      }
      current = next;
    }
    return current;
  }

  /**
   * Text of the first element at `path`, or null when there is none
   */
  childText(path: string): string | null {
    const found = this.find(path);
    return found ? found.text : null;
  }

  /**
   * This element and all descendants, pre-order
   */
  *iter(): IterableIterator<FeedElement> {
    const stack: FeedElement[] = [this];
    while (stack.length > 0) {
      const element = stack.pop();
      if (element === undefined) break;
      yield element;
      for (let i = element.childList.length - 1; i >= 0; i--) {
        const child = element.childList[i];
        if (child !== undefined) stack.push(child);
      }
    }
  }

  /**
   * Every element in the subtree (self included) whose tag or xsi:type is `name`
   */
  descendants(name: string): FeedElement[] {
    const matches: FeedElement[] = [];
    for (const element of this.iter()) {
      if (element.is(name)) matches.push(element);
    }
    return matches;
  }
}

/**
 * A loaded feed
 */
export interface FeedDocument {
  readonly root: FeedElement | null;
  /** Encoding named in the XML declaration, when there is one */
  readonly encoding: string | null;
  readonly filePath?: string;
}

// ============================================================================
// Builders
// ============================================================================

export interface ElementSpec {
  readonly attributes?: Readonly<Record<string, string>>;
  readonly text?: string;
  readonly line?: number;
  readonly xsiType?: string;
  readonly children?: readonly FeedElement[];
}

/**
 * Build an element programmatically
 *
 * @example
 * ```typescript
 * const party = el('Party', { attributes: { objectId: 'par0001' } });
 * ```
 */
export function el(tag: string, spec: ElementSpec = {}): FeedElement {
  const element = new FeedElement(
    tag,
    new Map(Object.entries(spec.attributes ?? {})),
    spec.text ?? '',
    spec.line ?? null,
    spec.xsiType ?? null
  );
  for (const child of spec.children ?? []) {
    element.append(child);
  }
  return element;
}

/**
 * Split a whitespace-separated id list, dropping empty tokens
 */
export function splitIds(value: string | null | undefined): string[] {
  if (!value) return [];
  return value.split(/\s+/).filter((token) => token.length > 0);
}

/**
 * True for null, empty or whitespace-only text
 */
export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}
