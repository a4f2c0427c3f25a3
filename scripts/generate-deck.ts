#!/usr/bin/env node
/**
 * Generates a deck from a Markdown file, a template and a layout catalog.
 */

import * as fs from 'node:fs/promises';
import { generateDeck } from '../src/index.js';
import type { LogLevel } from '../src/index.js';

const USAGE =
  'Usage: slidesmith-generate <markdown.md> <template.pptx> <catalog.json> <output.pptx> [--log-level=LEVEL]';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(args: string[]): LogLevel {
  const flag = args.find((arg) => arg.startsWith('--log-level='));
  const value = flag?.slice('--log-level='.length) ?? 'info';
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    console.error(`Unknown log level: ${value}`);
    console.error(USAGE);
    process.exit(1);
  }
  return level;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const [markdownPath, templatePath, catalogPath, outputPath] = positional;

  if (!markdownPath || !templatePath || !catalogPath || !outputPath) {
    console.error(USAGE);
    process.exit(1);
  }
  const logLevel = parseLogLevel(args);

  const startTime = Date.now();
  const presentation = await generateDeck({
    markdown: await fs.readFile(markdownPath),
    template: templatePath,
    catalog: catalogPath,
    output: outputPath,
    options: { logLevel },
  });

  console.log(`Wrote ${presentation.slideCount} slides to ${outputPath}`);
  console.log(`Completed in ${Date.now() - startTime}ms`);
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
