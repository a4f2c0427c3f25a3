import { Table } from '../document/Table.js';

/**
 * Header names and dimensions read from a table block.
 */
export interface TableShape {
  headers: string[];
  rowCount: number;
  colCount: number;
}

const SEPARATOR_CELL = /^\s*:?-+:?\s*$/;

/**
 * Splits a pipe-table row into trimmed cells. Escaped pipes stay in the cell.
 */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith('|')) {
    row = row.slice(1);
  }
  if (row.endsWith('|') && !row.endsWith('\\|')) {
    row = row.slice(0, -1);
  }
  return row.split(/(?<!\\)\|/).map((cell) => cell.trim());
}

export function isPipeRow(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.length > 1 && trimmed.startsWith('|') && trimmed.endsWith('|');
}

/**
 * `|---|:---:|` style row under a table header.
 */
export function isSeparatorRow(line: string): boolean {
  if (!isPipeRow(line)) {
    return false;
  }
  const cells = splitTableRow(line);
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL.test(cell));
}

export function isHtmlTableStart(line: string): boolean {
  return /^\s*<table\b/i.test(line);
}

/**
 * Header row first; the separator row is not part of `lines`.
 */
export function parseMarkdownTable(lines: readonly string[]): TableShape {
  const headers = lines.length > 0 ? splitTableRow(lines[0]) : [];
  return {
    headers,
    rowCount: Math.max(0, lines.length - 1),
    colCount: headers.length,
  };
}

function stripTags(html: string): string {
  return html.replace(/<[^>]*>/g, '').trim();
}

function matchAll(source: string, pattern: RegExp): string[] {
  return [...source.matchAll(pattern)].map((match) => match[1] ?? '');
}

/**
 * Reads headers from `<thead>`/`<th>` and rows from `<tbody>`/`<tr>`.
 * Regex based: nested tables and attributes containing `>` are not handled.
 */
export function parseHtmlTable(source: string): TableShape {
  const thead = /<thead\b[^>]*>([\s\S]*?)<\/thead>/i.exec(source);
  const headers = matchAll(thead ? thead[1] : source, /<th\b[^>]*>([\s\S]*?)<\/th>/gi).map(stripTags);

  const tbody = /<tbody\b[^>]*>([\s\S]*?)<\/tbody>/i.exec(source);
  const rows = matchAll(tbody ? tbody[1] : source, /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi).filter((row) =>
    /<td\b/i.test(row)
  );

  const firstRowCells = rows.length > 0 ? matchAll(rows[0], /<td\b[^>]*>([\s\S]*?)<\/td>/gi).length : 0;
  return {
    headers,
    rowCount: rows.length,
    colCount: headers.length > 0 ? headers.length : firstRowCells,
  };
}

/**
 * Builds a Table node from buffered block lines.
 */
export function createTable(tableType: 'markdown' | 'html', lines: readonly string[]): Table {
  const source = lines.join('\n');
  const shape = tableType === 'markdown' ? parseMarkdownTable(lines) : parseHtmlTable(source);
  return new Table(tableType, source, shape.headers, shape.rowCount, shape.colCount);
}
