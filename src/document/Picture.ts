import { LeafElement } from './LeafElement.js';

export class Picture extends LeafElement {
  readonly src: string;
  readonly altText: string | null;
  readonly title: string | null;

  constructor(src: string, altText: string | null = null, title: string | null = null) {
    super();
    this.setup();
    this.src = src;
    this.altText = altText;
    this.title = title;
  }

  /**
   * Image markup, rebuilt from the parsed parts.
   */
  get elementText(): string {
    const title = this.title !== null ? ` "${this.title}"` : '';
    return `![${this.altText ?? ''}](${this.src}${title})`;
  }

  toString(): string {
    const alt = this.altText ? ` alt='${this.altText}'` : '';
    const title = this.title ? ` title='${this.title}'` : '';
    return `<Picture src='${this.src}'${alt}${title}>`;
  }
}
