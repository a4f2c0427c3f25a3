export { MarkdownParser, parseMarkdown } from './MarkdownParser.js';
export { loadMarkdown, readMarkdown, normalizeMarkdown } from './MarkdownLoader.js';
export type { MarkdownSource } from './MarkdownLoader.js';
export {
  createTable,
  isHtmlTableStart,
  isPipeRow,
  isSeparatorRow,
  parseHtmlTable,
  parseMarkdownTable,
  splitTableRow,
} from './TableParser.js';
export type { TableShape } from './TableParser.js';
