/**
 * Error codes carried by every library error, for callers that translate
 * failures into their own error surface.
 */
export type ErrorCode =
  | 'TEMPLATE_ERROR'
  | 'GENERATION_ERROR'
  | 'DOCUMENT_ERROR'
  | 'NOT_FOUND'
  | 'CATALOG_ERROR'
  | 'PACKAGE_ERROR'
  | 'TREE_ERROR';

export class SlidesmithError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SlidesmithError';
    this.code = code;
    this.details = details;
  }
}

/**
 * The template deck does not have the structure generation relies on.
 */
export class PPTTemplateError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TEMPLATE_ERROR', details);
    this.name = 'PPTTemplateError';
  }
}

/**
 * Document content and the chosen style cannot be reconciled.
 */
export class PPTGenError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'GENERATION_ERROR', details);
    this.name = 'PPTGenError';
  }
}

export class MarkdownDocumentError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOCUMENT_ERROR', details);
    this.name = 'MarkdownDocumentError';
  }
}

export class NotFoundError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class CatalogError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_ERROR', details);
    this.name = 'CatalogError';
  }
}

/**
 * A PPTX part is missing or malformed, or a slide index is out of range.
 */
export class PackageError extends SlidesmithError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PACKAGE_ERROR', details);
    this.name = 'PackageError';
  }
}

/**
 * Misuse of the element tree: inserting nothing, or a node into itself.
 */
export class TreeError extends SlidesmithError {
  constructor(message: string) {
    super(message, 'TREE_ERROR');
    this.name = 'TreeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
