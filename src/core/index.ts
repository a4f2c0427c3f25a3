export { Presentation } from './Presentation.js';
export type { SlideSize } from './Presentation.js';
export { Slide } from './Slide.js';
export { Shape } from './Shape.js';
export { PptxPackage, CONTENT_TYPES_PATH } from './PptxPackage.js';
export type { Relationship } from './PptxPackage.js';

export { PlaceholderResolver, readPlaceholderRef, readTransform } from './PlaceholderResolver.js';
export type { InheritedPlaceholder } from './PlaceholderResolver.js';

export {
  SHAPE_ELEMENT_TYPES,
  isShapeElementType,
  Namespaces,
  RelationshipTypes,
  ContentTypes,
  LAYOUT_ONLY_PLACEHOLDERS,
} from './constants.js';
export type { ShapeElementType } from './constants.js';

export {
  parseXml,
  buildXml,
  serializeNode,
  parseFragment,
  getTagName,
  getChildren,
  getChildElements,
  getAttributes,
  getAttr,
  setAttr,
  removeAttr,
  createElement,
  createText,
  findChild,
  findChildren,
  findPath,
  findFirst,
  findAll,
  getRootElement,
  getTextContent,
  setTextContent,
  removeNode,
  removeAll,
  cloneNode,
} from './xml.js';
export type { OrderedXmlNode, OrderedXmlOutput, XmlAttributes } from './xml.js';
