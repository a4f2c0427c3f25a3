import * as fs from 'fs/promises';
import type { MarkdownDocument } from '../document/MarkdownDocument.js';
import type { ILogger } from '../utils/Logger.js';
import { parseMarkdown } from './MarkdownParser.js';

export type MarkdownSource = string | Buffer;

/**
 * Trims trailing whitespace on every line and collapses runs of blank
 * lines to a single one.
 */
export function normalizeMarkdown(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .join('\n')
    .replace(/\n{3,}/g, '\n\n');
}

function isMarkdownPath(source: string): boolean {
  return !source.includes('\n') && /\.md$/i.test(source.trim());
}

/**
 * Reads Markdown from a `.md` path, a UTF-8 buffer or a string, normalized.
 */
export async function readMarkdown(source: MarkdownSource): Promise<string> {
  let text: string;
  if (Buffer.isBuffer(source)) {
    text = source.toString('utf-8');
  } else if (isMarkdownPath(source)) {
    text = await fs.readFile(source.trim(), 'utf-8');
  } else {
    text = source;
  }
  return normalizeMarkdown(text);
}

/**
 * Reads and parses Markdown from any supported source.
 */
export async function loadMarkdown(source: MarkdownSource, logger?: ILogger): Promise<MarkdownDocument> {
  return parseMarkdown(await readMarkdown(source), logger);
}
