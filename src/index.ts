/**
 * slidesmith - Markdown outlines to slide decks
 *
 * Parses Markdown into a heading tree and lays it out on a PPTX template,
 * using a catalog of slide designs extracted from hand-made slides.
 */

// Main entry points
export { PPTGen, createGenerator, generateDeck, TEMPLATE_SLIDE_COUNT } from './pptgen/index.js';
export type { GenerateDeckInput } from './pptgen/index.js';
export { parseMarkdown, loadMarkdown, normalizeMarkdown, MarkdownParser } from './parsers/index.js';
export type { MarkdownSource } from './parsers/index.js';
export { ComponentsManager, StyleExtractor } from './catalog/index.js';

// Document tree
export {
  Element,
  Heading,
  Paragraph,
  CodeBlock,
  Table,
  Picture,
  MarkdownDocument,
} from './document/index.js';
export type { ElementClass, TableType } from './document/index.js';

// Catalog model
export {
  CShape,
  Style,
  LayoutType,
  LAYOUT_NAMES,
  layoutNameForPoints,
  areSameShape,
  addShapeByXml,
  modifyShapeXml,
  getTextFromXml,
  removeCustDataLst,
} from './catalog/index.js';
export type { ContentType, LayoutName, CShapeData, CatalogData } from './catalog/index.js';

// Page generators (for advanced usage)
export {
  GenerationSession,
  CoverPage,
  CatalogPage,
  ChapterHomePage,
  ChapterContentPage,
  EndPage,
} from './pptgen/index.js';
export type { ChapterNumberStyle, PageContext } from './pptgen/index.js';

// Presentation model
export { Presentation, Slide, Shape, PptxPackage } from './core/index.js';

// Types - Options
export type {
  LogLevel,
  GenerationOptions,
  HeuristicThresholds,
  StyleExtractionOptions,
  CatalogOptions,
  ImageExporter,
  Location,
  Rect,
} from './types/index.js';
export { DEFAULT_HEURISTICS, DEFAULT_GENERATION_OPTIONS } from './types/index.js';

// Errors and logging
export {
  SlidesmithError,
  PPTTemplateError,
  PPTGenError,
  MarkdownDocumentError,
  NotFoundError,
  CatalogError,
  PackageError,
  TreeError,
  createLogger,
} from './utils/index.js';
export type { ILogger, LogEntry, LogSink } from './utils/index.js';
