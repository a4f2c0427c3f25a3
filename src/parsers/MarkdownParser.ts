import { CodeBlock } from '../document/CodeBlock.js';
import type { Element } from '../document/Element.js';
import { Heading } from '../document/Heading.js';
import { MarkdownDocument } from '../document/MarkdownDocument.js';
import { Paragraph } from '../document/Paragraph.js';
import { Picture } from '../document/Picture.js';
import type { TableType } from '../document/Table.js';
import { MarkdownDocumentError } from '../utils/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { createTable, isHtmlTableStart, isPipeRow, isSeparatorRow } from './TableParser.js';

const CODE_FENCE_START = /^\s*```(\w+)?/;
const CODE_FENCE = /^\s*```/;
const ATX_HEADING = /^\s{0,3}(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_LEVEL_1 = /^\s*={3,}\s*$/;
const SETEXT_LEVEL_2 = /^\s*-{3,}\s*$/;
const BULLET_ITEM = /^\s*[-*+]\s+(.*)$/;
const ORDERED_ITEM = /^\s*\d+[.)]\s+(.*)$/;
const IMAGE = /^\s*!\[([^\]]*)\]\(\s*(\S+?)(?:\s+"([^"]*)")?\s*\)\s*$/;

/**
 * Line-oriented Markdown parser producing a heading outline.
 *
 * Headings nest by level; everything else attaches to the most recently
 * opened heading. Lists are flattened into paragraphs. Input that matches
 * no construct becomes paragraphs, so parsing never fails.
 */
export class MarkdownParser {
  private readonly logger: ILogger;

  private document = new MarkdownDocument();
  private cursor: Element = this.document;
  private lines: string[] = [];

  private jumpToNext = false;
  private inCodeBlock = false;
  private codeLanguage: string | null = null;
  private codeLines: string[] = [];
  private inTableBlock = false;
  private tableType: TableType = 'markdown';
  private tableLines: string[] = [];

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'MarkdownParser');
  }

  parse(text: string): MarkdownDocument {
    this.reset(text);

    for (let index = 0; index < this.lines.length; index++) {
      if (this.jumpToNext) {
        this.jumpToNext = false;
        continue;
      }
      const line = this.lines[index];
      const next: string | undefined = this.lines[index + 1];

      if (this.inCodeBlock) {
        this.handleCodeLine(line);
        continue;
      }
      if (this.inTableBlock && this.handleTableRow(line, next)) {
        continue;
      }
      this.dispatch(line, next);
    }

    if (this.inCodeBlock) {
      this.logger.debug('Unterminated code block closed at end of input');
      this.closeCodeBlock();
    }
    if (this.inTableBlock) {
      this.closeTable();
    }

    const document = this.document;
    this.logger.debug('Parsed markdown', { lines: this.lines.length, title: document.title });
    return document;
  }

  private reset(text: string): void {
    this.document = new MarkdownDocument();
    this.cursor = this.document;
    this.lines = text.split(/\r?\n/);
    this.jumpToNext = false;
    this.inCodeBlock = false;
    this.codeLanguage = null;
    this.codeLines = [];
    this.inTableBlock = false;
    this.tableType = 'markdown';
    this.tableLines = [];
  }

  private dispatch(line: string, next: string | undefined): void {
    if (this.handleCodeFence(line)) return;
    if (this.handleHeading(line, next)) return;
    if (this.handleListItem(line)) return;
    if (this.handleTableStart(line, next)) return;
    if (this.handleImage(line)) return;
    this.handleParagraph(line);
  }

  private handleCodeFence(line: string): boolean {
    const match = CODE_FENCE_START.exec(line);
    if (!match) {
      return false;
    }
    this.inCodeBlock = true;
    this.codeLanguage = match[1] ?? null;
    this.codeLines = [];
    return true;
  }

  private handleCodeLine(line: string): void {
    if (CODE_FENCE.test(line)) {
      this.closeCodeBlock();
    } else {
      this.codeLines.push(line);
    }
  }

  private closeCodeBlock(): void {
    this.cursor.append(new CodeBlock(this.codeLines.join('\n'), this.codeLanguage));
    this.inCodeBlock = false;
    this.codeLanguage = null;
    this.codeLines = [];
  }

  private handleHeading(line: string, next: string | undefined): boolean {
    return this.handleSetextHeading(line, next) || this.handleAtxHeading(line);
  }

  private handleSetextHeading(line: string, next: string | undefined): boolean {
    if (next === undefined || line.trim() === '' || next.trim() === '') {
      return false;
    }
    // A line that is already something else cannot be a Setext title.
    if (ATX_HEADING.test(line) || BULLET_ITEM.test(line) || ORDERED_ITEM.test(line) || isPipeRow(line)) {
      return false;
    }

    let level: number;
    if (SETEXT_LEVEL_1.test(next)) {
      level = 1;
    } else if (SETEXT_LEVEL_2.test(next)) {
      level = 2;
    } else {
      return false;
    }

    this.insertHeading(this.createSetextHeading(level, line, next));
    this.jumpToNext = true;
    return true;
  }

  private createSetextHeading(level: number, line: string, underline: string): Heading {
    if (level !== 1 && level !== 2) {
      throw new MarkdownDocumentError(`Setext headings have level 1 or 2, got ${level}`);
    }
    return new Heading(level, line.trim(), `${line}\n${underline}`);
  }

  private handleAtxHeading(line: string): boolean {
    const match = ATX_HEADING.exec(line);
    if (!match || match[2].trim() === '') {
      return false;
    }
    this.insertHeading(new Heading(match[1].length, match[2].trim()));
    return true;
  }

  /**
   * Closes every open heading of the same or a deeper level, then opens
   * the new one under what remains.
   */
  private insertHeading(heading: Heading): void {
    let parent: Element = this.cursor;
    while (parent instanceof Heading && parent.level >= heading.level) {
      parent = parent.parent ?? this.document;
    }
    parent.append(heading);

    if (heading.level === 1 && this.document.main === null) {
      this.document.main = heading;
    }
    this.cursor = heading;
  }

  private handleListItem(line: string): boolean {
    const match = BULLET_ITEM.exec(line) ?? ORDERED_ITEM.exec(line);
    if (!match) {
      return false;
    }
    const text = match[1].trim();
    if (text) {
      this.cursor.append(new Paragraph(text));
    }
    return true;
  }

  private handleTableStart(line: string, next: string | undefined): boolean {
    if (isPipeRow(line) && next !== undefined && isSeparatorRow(next)) {
      this.inTableBlock = true;
      this.tableType = 'markdown';
      this.tableLines = [line];
      this.jumpToNext = true;
      return true;
    }
    if (isHtmlTableStart(line)) {
      this.inTableBlock = true;
      this.tableType = 'html';
      this.tableLines = [line];
      if (/<\/table>/i.test(line)) {
        this.closeTable();
      }
      return true;
    }
    return false;
  }

  /**
   * Buffers a row of the open table. Returns false when the line ends a
   * Markdown table without belonging to it, so it is dispatched normally.
   */
  private handleTableRow(line: string, next: string | undefined): boolean {
    if (this.tableType === 'html') {
      this.tableLines.push(line);
      if (/<\/table>/i.test(line)) {
        this.closeTable();
      }
      return true;
    }

    if (line.trim() === '' || !line.trim().startsWith('|')) {
      this.closeTable();
      return false;
    }
    this.tableLines.push(line);
    if (next === undefined || !next.trim().startsWith('|')) {
      this.closeTable();
    }
    return true;
  }

  private closeTable(): void {
    this.cursor.append(createTable(this.tableType, this.tableLines));
    this.inTableBlock = false;
    this.tableLines = [];
  }

  private handleImage(line: string): boolean {
    const match = IMAGE.exec(line);
    if (!match) {
      return false;
    }
    this.cursor.append(new Picture(match[2], match[1] || null, match[3] ?? null));
    return true;
  }

  private handleParagraph(line: string): void {
    const text = line.trim();
    if (text) {
      this.cursor.append(new Paragraph(text));
    }
  }
}

/**
 * Parses Markdown text into a document tree.
 */
export function parseMarkdown(text: string, logger?: ILogger): MarkdownDocument {
  return new MarkdownParser(logger).parse(text);
}
