import type { Shape } from '../core/Shape.js';
import type { Slide } from '../core/Slide.js';
import {
  findAll,
  findFirst,
  getAttr,
  getAttributes,
  getTextContent,
  parseFragment,
  removeAll,
  removeAttr,
  serializeNode,
  setAttr,
  setTextContent,
} from '../core/xml.js';
import { replaceFirstRun } from '../text/TextFrame.js';
import type { Location } from '../types/index.js';

const TEXT_PLACEHOLDER = 'placeholder_text';

/**
 * Whether two shape fragments differ only in position, size, identity and
 * text. The whole transform is dropped before comparing, so rotation and
 * size do not count either.
 */
export function areSameShape(xml1: string, xml2: string): boolean {
  return normalizeShapeXml(xml1) === normalizeShapeXml(xml2);
}

function normalizeShapeXml(xml: string): string {
  const root = parseFragment(xml);
  removeAll(root, 'a:xfrm');
  removeAll(root, 'p:xfrm');
  const cNvPr = findFirst(root, 'p:cNvPr');
  if (cNvPr) {
    setAttr(cNvPr, 'id', '1');
    setAttr(cNvPr, 'name', 'temp');
  }
  for (const t of findAll(root, 'a:t')) {
    setTextContent(t, TEXT_PLACEHOLDER);
  }
  return serializeNode(root);
}

/**
 * Drops `p:custDataLst` (tags attached by add-ins) from a shape fragment.
 */
export function removeCustDataLst(xml: string): string {
  const root = parseFragment(xml);
  removeAll(root, 'p:custDataLst');
  return serializeNode(root);
}

/**
 * Concatenated `a:t` text of a shape fragment.
 */
export function getTextFromXml(xml: string): string {
  return findAll(parseFragment(xml), 'a:t')
    .map((t) => getTextContent(t))
    .join('');
}

/**
 * Rewrites a shape's id and name and, when given, its text. The new text
 * goes into a fresh run carrying the first run's `a:rPr`.
 */
export function modifyShapeXml(xml: string, id: number, name: string, text?: string): string {
  const root = parseFragment(xml);
  const cNvPr = findFirst(root, 'p:cNvPr');
  if (cNvPr) {
    setAttr(cNvPr, 'id', id);
    setAttr(cNvPr, 'name', name);
  }
  if (text !== undefined) {
    replaceFirstRun(root, text);
  }
  return serializeNode(root);
}

/**
 * Retargets a catalog fragment and places it on the slide at `location`,
 * above the existing shapes.
 *
 * Relationship references such as `r:embed` are kept as written and their
 * targets are not copied to the slide, so image-filled decorations are not
 * supported.
 */
export function addShapeByXml(
  slide: Slide,
  xml: string,
  location: Location,
  id: number,
  name: string,
  text?: string
): Shape {
  const element = parseFragment(modifyShapeXml(xml, id, name, text));

  // Declarations the slide root already makes are dropped from the fragment.
  const declarations = slide.namespaceDeclarations;
  for (const attrName of Object.keys(getAttributes(element))) {
    const isDeclaration = attrName === 'xmlns' || attrName.startsWith('xmlns:');
    if (isDeclaration && declarations[attrName] === getAttr(element, attrName)) {
      removeAttr(element, attrName);
    }
  }

  const shape = slide.insertShapeElement(element);
  shape.setLocation(location);
  return shape;
}
