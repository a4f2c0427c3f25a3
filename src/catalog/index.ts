export { ComponentsManager } from './ComponentsManager.js';
export { StyleExtractor, createFileImageExporter } from './StyleExtractor.js';
export { CShape, Style, LayoutType, CONTENT_TYPES, LAYOUT_NAMES, layoutNameForPoints } from './components.js';
export type { ContentType, LayoutName, CShapeData, StyleData, LayoutData, CatalogData } from './components.js';
export { CatalogSchema, parseCatalogData } from './schema.js';
export { areSameShape, addShapeByXml, getTextFromXml, modifyShapeXml, removeCustDataLst } from './shapeXml.js';
