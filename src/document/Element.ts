import { TreeError } from '../utils/errors.js';

/**
 * Class filter for text extraction, e.g. `[Paragraph, Table]`.
 */
export type ElementClass = abstract new (...args: never[]) => Element;

/**
 * What `insert` accepts. Strings are rejected at runtime: wrap text in a
 * Paragraph first.
 */
export type Insertable = Element | string;

/**
 * Node of a parsed document.
 *
 * Besides parent/children and sibling links, every node is threaded into a
 * pre-order chain through `previousElement`/`nextElement`: a node's next
 * element is its first child if it has one, else its next sibling, else the
 * next sibling of the nearest ancestor that has one. Subtree walks follow
 * that chain instead of recursing.
 */
export abstract class Element {
  parent: Element | null = null;
  previousElement: Element | null = null;
  nextElement: Element | null = null;
  previousSibling: Element | null = null;
  nextSibling: Element | null = null;
  contents: Element[] = [];
  private isDecomposed = false;

  /**
   * Plain text of this node, without markup.
   */
  abstract get elementText(): string;

  /**
   * Markdown source of this node. Defaults to the plain text.
   */
  get elementTextSource(): string {
    return this.elementText;
  }

  /**
   * Plain text with list markers and surrounding whitespace removed.
   */
  get strippedText(): string {
    return this.elementText.trim();
  }

  /**
   * Text this node contributes to `getText`.
   */
  renderText(strip: boolean): string {
    return strip ? this.strippedText : this.elementText;
  }

  /**
   * Only the document root flattens into its children on insert.
   */
  get isDocumentRoot(): boolean {
    return false;
  }

  get decomposed(): boolean {
    return this.isDecomposed;
  }

  /**
   * Wires this node's links. Without an explicit previous sibling, the
   * parent's current last child is taken.
   */
  setup(
    parent: Element | null = null,
    previousElement: Element | null = null,
    nextElement: Element | null = null,
    previousSibling: Element | null = null,
    nextSibling: Element | null = null
  ): void {
    this.parent = parent;
    this.previousElement = previousElement;
    if (previousElement !== null) {
      previousElement.nextElement = this;
    }
    this.nextElement = nextElement;
    if (nextElement !== null) {
      nextElement.previousElement = this;
    }
    this.nextSibling = nextSibling;
    if (nextSibling !== null) {
      nextSibling.previousSibling = this;
    }
    if (previousSibling === null && parent !== null && parent.contents.length > 0) {
      previousSibling = parent.contents[parent.contents.length - 1];
    }
    this.previousSibling = previousSibling;
    if (previousSibling !== null) {
      previousSibling.nextSibling = this;
    }
  }

  /**
   * Yields the text pieces `getText` joins.
   */
  protected abstract allStrings(strip: boolean, types: readonly ElementClass[]): Generator<string>;

  /**
   * Text of every descendant matching `types`, empty strings skipped.
   */
  protected *descendantStrings(strip: boolean, types: readonly ElementClass[]): Generator<string> {
    for (const descendant of this.descendants) {
      if (types.length > 0 && !types.some((type) => descendant instanceof type)) {
        continue;
      }
      const text = descendant.renderText(strip);
      if (text) {
        yield text;
      }
    }
  }

  getText(separator = '\n', strip = false, types: readonly ElementClass[] = []): string {
    return [...this.allStrings(strip, types)].join(separator);
  }

  get text(): string {
    return this.getText();
  }

  get strippedStrings(): Generator<string> {
    return this.allStrings(true, []);
  }

  /**
   * Position of a direct child, compared by identity.
   */
  index(element: Element): number {
    const position = this.contents.indexOf(element);
    if (position < 0) {
      throw new TreeError('Element is not a child of this element');
    }
    return position;
  }

  get isEmptyElement(): boolean {
    return this.contents.length === 0;
  }

  get length(): number {
    return this.contents.length;
  }

  [Symbol.iterator](): Iterator<Element> {
    return this.contents[Symbol.iterator]();
  }

  /**
   * Detaches this node and its subtree, closing the gap in the pre-order
   * chain and the sibling links.
   */
  extract(selfIndex?: number): this {
    if (this.parent !== null) {
      const position = selfIndex ?? this.parent.index(this);
      this.parent.contents.splice(position, 1);
    }

    const lastChild = this.lastDescendant() ?? this;
    const nextElement = lastChild.nextElement;

    if (this.previousElement !== null && this.previousElement !== nextElement) {
      this.previousElement.nextElement = nextElement;
    }
    if (nextElement !== null && nextElement !== this.previousElement) {
      nextElement.previousElement = this.previousElement;
    }
    this.previousElement = null;
    lastChild.nextElement = null;

    this.parent = null;
    if (this.previousSibling !== null && this.previousSibling !== this.nextSibling) {
      this.previousSibling.nextSibling = this.nextSibling;
    }
    if (this.nextSibling !== null && this.nextSibling !== this.previousSibling) {
      this.nextSibling.previousSibling = this.previousSibling;
    }
    this.previousSibling = null;
    this.nextSibling = null;
    return this;
  }

  /**
   * Extracts this node and invalidates it and its whole subtree.
   */
  decompose(): void {
    this.extract();
    let current: Element | null = this;
    while (current !== null) {
      const next: Element | null = current.nextElement;
      current.invalidate();
      current = next;
    }
  }

  private invalidate(): void {
    this.parent = null;
    this.previousElement = null;
    this.nextElement = null;
    this.previousSibling = null;
    this.nextSibling = null;
    this.contents = [];
    this.isDecomposed = true;
  }

  /**
   * Removes every child; decomposes them when asked.
   */
  clear(decompose = false): void {
    for (const child of [...this.contents]) {
      if (decompose) {
        child.decompose();
      } else {
        child.extract();
      }
    }
  }

  /**
   * Last node of this subtree in pre-order. With `isInitialized`, the links
   * are trusted and the answer comes from the next sibling's predecessor.
   */
  protected lastDescendant(isInitialized = true, acceptSelf = true): Element | null {
    let lastChild: Element;
    if (isInitialized && this.nextSibling !== null && this.nextSibling.previousElement !== null) {
      lastChild = this.nextSibling.previousElement;
    } else {
      lastChild = this;
      while (lastChild.contents.length > 0) {
        lastChild = lastChild.contents[lastChild.contents.length - 1];
      }
    }
    if (!acceptSelf && lastChild === this) {
      return null;
    }
    return lastChild;
  }

  /**
   * Inserts nodes as children starting at `position`, which is clamped to
   * the current length. A node that already has a parent is moved; a
   * document root is spliced in as its children.
   */
  insert(position: number, ...newChildren: Insertable[]): Element[] {
    const inserted: Element[] = [];
    let at = position;
    for (const child of newChildren) {
      const result = this.insertOne(at, child);
      inserted.push(...result);
      const last = result[result.length - 1];
      if (last !== undefined && last.parent === this) {
        at = this.contents.indexOf(last) + 1;
      }
    }
    return inserted;
  }

  private insertOne(position: number, newChild: Insertable): Element[] {
    if (newChild === null || newChild === undefined) {
      throw new TreeError('Cannot insert null into an element');
    }
    if (typeof newChild === 'string') {
      throw new TypeError('Cannot insert a string into an element; wrap it in a Paragraph');
    }
    if (newChild === this) {
      throw new TreeError('Cannot insert an element into itself');
    }
    if (newChild.isDocumentRoot) {
      return this.insert(position, ...[...newChild.contents]);
    }

    position = Math.min(position, this.contents.length);
    if (newChild.parent !== null) {
      if (newChild.parent === this) {
        const currentIndex = this.index(newChild);
        if (currentIndex === position) {
          return [newChild];
        }
        if (currentIndex < position) {
          position -= 1;
        }
      }
      newChild.extract();
    }

    newChild.parent = this;
    if (position === 0) {
      newChild.previousSibling = null;
      newChild.previousElement = this;
    } else {
      const previousChild = this.contents[position - 1];
      newChild.previousSibling = previousChild;
      previousChild.nextSibling = newChild;
      newChild.previousElement = previousChild.lastDescendant(false);
    }
    if (newChild.previousElement !== null) {
      newChild.previousElement.nextElement = newChild;
    }

    const newChildsLastElement = newChild.lastDescendant(false) ?? newChild;

    if (position >= this.contents.length) {
      newChild.nextSibling = null;
      let parent: Element | null = this;
      let parentsNextSibling: Element | null = null;
      while (parentsNextSibling === null && parent !== null) {
        parentsNextSibling = parent.nextSibling;
        parent = parent.parent;
      }
      newChildsLastElement.nextElement = parentsNextSibling;
    } else {
      const nextChild = this.contents[position];
      newChild.nextSibling = nextChild;
      nextChild.previousSibling = newChild;
      newChildsLastElement.nextElement = nextChild;
    }
    if (newChildsLastElement.nextElement !== null) {
      newChildsLastElement.nextElement.previousElement = newChildsLastElement;
    }

    this.contents.splice(position, 0, newChild);
    return [newChild];
  }

  /**
   * Appends a node and returns it.
   */
  append<T extends Element>(element: T): T {
    this.insert(this.contents.length, element);
    return element;
  }

  /**
   * Direct children.
   */
  get children(): IterableIterator<Element> {
    return this.contents[Symbol.iterator]();
  }

  /**
   * Whole subtree in pre-order, this node excluded.
   */
  get descendants(): Generator<Element> {
    return this.walkDescendants();
  }

  private *walkDescendants(): Generator<Element> {
    if (this.contents.length === 0) {
      return;
    }
    const stopNode = (this.lastDescendant() ?? this).nextElement;
    let current: Element | null = this.contents[0];
    while (current !== null && current !== stopNode) {
      const successor: Element | null = current.nextElement;
      yield current;
      current = successor;
    }
  }

  get selfAndDescendants(): Generator<Element> {
    return this.walkSelfAnd(this.walkDescendants());
  }

  get nextElements(): Generator<Element> {
    return this.follow((node) => node.nextElement);
  }

  get previousElements(): Generator<Element> {
    return this.follow((node) => node.previousElement);
  }

  get nextSiblings(): Generator<Element> {
    return this.follow((node) => node.nextSibling);
  }

  get previousSiblings(): Generator<Element> {
    return this.follow((node) => node.previousSibling);
  }

  get parents(): Generator<Element> {
    return this.follow((node) => node.parent);
  }

  get selfAndParents(): Generator<Element> {
    return this.walkSelfAnd(this.follow((node) => node.parent));
  }

  private *follow(step: (node: Element) => Element | null): Generator<Element> {
    let current = step(this);
    while (current !== null) {
      yield current;
      current = step(current);
    }
  }

  private *walkSelfAnd(rest: Generator<Element>): Generator<Element> {
    yield this;
    yield* rest;
  }
}
