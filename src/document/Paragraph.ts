import { LeafElement } from './LeafElement.js';

const BULLET_MARKER = /^\s*[-*+]\s+/;
const ORDERED_MARKER = /^\s*\d+\.\s+/;

export class Paragraph extends LeafElement {
  private paragraphText: string;

  constructor(text: string) {
    super();
    this.setup();
    this.paragraphText = text;
  }

  get elementText(): string {
    return this.paragraphText;
  }

  set elementText(text: string) {
    this.paragraphText = text;
  }

  /**
   * Text without a leading list marker.
   */
  get strippedText(): string {
    return this.paragraphText.replace(BULLET_MARKER, '').replace(ORDERED_MARKER, '').trim();
  }

  toString(): string {
    return `<Paragraph text='${this.paragraphText}'>`;
  }
}
