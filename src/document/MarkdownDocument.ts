import { Element, type ElementClass } from './Element.js';
import { Heading } from './Heading.js';

/**
 * Root of a parsed Markdown document. Inserting a document into another
 * element splices in its children.
 */
export class MarkdownDocument extends Element {
  /** The level-1 heading the whole outline hangs from. */
  main: Heading | null = null;

  constructor() {
    super();
    this.setup();
  }

  get isDocumentRoot(): boolean {
    return true;
  }

  get elementText(): string {
    return '';
  }

  get title(): string {
    return this.main?.elementText ?? '';
  }

  /**
   * Level-2 headings directly under the main heading.
   */
  get chapters(): Heading[] {
    return this.main ? this.main.subHeadings.filter((heading) => heading.level === 2) : [];
  }

  protected allStrings(strip: boolean, types: readonly ElementClass[]): Generator<string> {
    return this.descendantStrings(strip, types);
  }

  toString(): string {
    return `<MarkdownDocument title='${this.title}'>`;
  }
}
