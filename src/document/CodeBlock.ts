import { LeafElement } from './LeafElement.js';

export class CodeBlock extends LeafElement {
  code: string;
  readonly language: string | null;

  constructor(code: string, language: string | null = null) {
    super();
    this.setup();
    this.code = code;
    this.language = language;
  }

  get elementText(): string {
    return this.code;
  }

  get elementTextSource(): string {
    return `\`\`\`${this.language ?? ''}\n${this.code}\n\`\`\``;
  }

  toString(): string {
    const lang = this.language ? ` language='${this.language}'` : '';
    return `<CodeBlock${lang} code='${this.code.slice(0, 30)}...'>`;
  }
}
