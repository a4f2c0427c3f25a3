/**
 * Shared constants for PPTX element types, relationships and content types.
 */

/**
 * Element types that can appear in a shape tree (p:spTree).
 * Document order determines z-order.
 */
export const SHAPE_ELEMENT_TYPES = [
  'p:sp',                   // Regular shapes and text boxes
  'p:cxnSp',                // Connection shapes (connectors)
  'p:pic',                  // Pictures/images
  'p:grpSp',                // Group shapes
  'p:graphicFrame',         // Charts, tables, diagrams
] as const;

export type ShapeElementType = (typeof SHAPE_ELEMENT_TYPES)[number];

export function isShapeElementType(tagName: string | undefined): tagName is ShapeElementType {
  return SHAPE_ELEMENT_TYPES.some((type) => type === tagName);
}

/**
 * Namespaces declared on new slide parts.
 */
export const Namespaces = {
  a: 'http://schemas.openxmlformats.org/drawingml/2006/main',
  r: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships',
  p: 'http://schemas.openxmlformats.org/presentationml/2006/main',
  packageRelationships: 'http://schemas.openxmlformats.org/package/2006/relationships',
  contentTypes: 'http://schemas.openxmlformats.org/package/2006/content-types',
} as const;

/**
 * Relationship types used when reading and editing a deck.
 */
export const RelationshipTypes = {
  officeDocument: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument',
  image: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/image',
  slide: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slide',
  slideLayout: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideLayout',
  slideMaster: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/slideMaster',
  notesSlide: 'http://schemas.openxmlformats.org/officeDocument/2006/relationships/notesSlide',
} as const;

export const ContentTypes = {
  slide: 'application/vnd.openxmlformats-officedocument.presentationml.slide+xml',
  relationships: 'application/vnd.openxmlformats-package.relationships+xml',
  xml: 'application/xml',
} as const;

/**
 * Placeholder types that a new slide does not inherit from its layout.
 */
export const LAYOUT_ONLY_PLACEHOLDERS = ['dt', 'ftr', 'sldNum'] as const;
