import { Element, type ElementClass } from './Element.js';

/**
 * `#`-style or Setext heading. Sections are the heading's children.
 */
export class Heading extends Element {
  readonly level: number;
  private headingText: string;
  private readonly source: string | undefined;

  /**
   * @param source - original markup when it differs from the ATX form,
   * e.g. a Setext heading
   */
  constructor(level: number, text: string, source?: string) {
    super();
    this.setup();
    this.level = level;
    this.headingText = text;
    this.source = source;
  }

  get elementText(): string {
    return this.headingText;
  }

  set elementText(text: string) {
    this.headingText = text;
  }

  get elementTextSource(): string {
    return this.source ?? `${'#'.repeat(this.level)} ${this.headingText}`;
  }

  renderText(strip: boolean): string {
    return strip ? this.strippedText : this.elementTextSource;
  }

  /**
   * Text of every descendant matching `types`, headings rendered as
   * markup unless stripping.
   */
  protected allStrings(strip: boolean, types: readonly ElementClass[]): Generator<string> {
    return this.descendantStrings(strip, types);
  }

  /**
   * Direct child headings one level down.
   */
  get subHeadings(): Heading[] {
    return this.contents.filter((child): child is Heading => child instanceof Heading);
  }

  toString(): string {
    return `<Heading level=${this.level} text='${this.headingText}'>`;
  }
}
