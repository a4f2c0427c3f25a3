import { XMLParser, XMLBuilder, type X2jOptions } from 'fast-xml-parser';

/**
 * XML attribute prefix used by fast-xml-parser.
 */
export const ATTR_PREFIX = '@_';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

export type XmlAttributes = Record<string, string>;

/**
 * Represents a single element in the ordered XML output from fast-xml-parser.
 * Each element has one key (the tag name) with children as value, and optionally ':@' for attributes.
 */
export interface OrderedXmlNode {
  [tagName: string]: OrderedXmlOutput | string | XmlAttributes | undefined;
}

/**
 * Type representing the output of fast-xml-parser with preserveOrder: true.
 * Returns an array of elements in document order.
 */
export type OrderedXmlOutput = OrderedXmlNode[];

/**
 * Parser options with preserveOrder enabled, so documents can be edited and
 * written back without reordering. Whitespace is kept verbatim since run
 * text in `a:t` is significant.
 */
const ORDERED_XML_PARSER_OPTIONS: Partial<X2jOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  removeNSPrefix: false,
  parseAttributeValue: false,
  trimValues: false,
  parseTagValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
};

const XML_BUILDER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
  processEntities: true,
  format: false,
};

const orderedXmlParser = new XMLParser(ORDERED_XML_PARSER_OPTIONS);
const xmlBuilder = new XMLBuilder(XML_BUILDER_OPTIONS);

/**
 * Parses an XML string with preserved document order.
 */
export function parseXml(xml: string): OrderedXmlOutput {
  return orderedXmlParser.parse(xml) as OrderedXmlOutput;
}

/**
 * Serializes ordered nodes back to an XML string.
 */
export function buildXml(nodes: OrderedXmlOutput): string {
  return xmlBuilder.build(nodes) as string;
}

export function serializeNode(node: OrderedXmlNode): string {
  return buildXml([node]);
}

/**
 * Parses a fragment holding a single root element, such as a shape's XML.
 */
export function parseFragment(xml: string): OrderedXmlNode {
  const root = parseXml(xml).find((node) => isElement(node) && !getTagName(node)?.startsWith('?'));
  if (!root) {
    throw new Error('XML fragment has no root element');
  }
  return root;
}

/**
 * The standard `<?xml ...?>` declaration node for a new part.
 */
export function createDeclaration(): OrderedXmlNode {
  return {
    '?xml': [{ [TEXT_KEY]: '' }],
    [ATTRIBUTES_KEY]: {
      [`${ATTR_PREFIX}version`]: '1.0',
      [`${ATTR_PREFIX}encoding`]: 'UTF-8',
      [`${ATTR_PREFIX}standalone`]: 'yes',
    },
  };
}

export function getTagName(node: OrderedXmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

export function isTextNode(node: OrderedXmlNode): boolean {
  return getTagName(node) === TEXT_KEY;
}

export function isElement(node: OrderedXmlNode): boolean {
  const tag = getTagName(node);
  return tag !== undefined && tag !== TEXT_KEY;
}

function isAttributes(value: OrderedXmlNode[string]): value is XmlAttributes {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Direct children of an element, text nodes included.
 */
export function getChildren(node: OrderedXmlNode): OrderedXmlOutput {
  const tag = getTagName(node);
  if (tag === undefined || tag === TEXT_KEY) {
    return [];
  }
  const value = node[tag];
  if (Array.isArray(value)) {
    return value;
  }
  const children: OrderedXmlOutput = [];
  node[tag] = children;
  return children;
}

export function getChildElements(node: OrderedXmlNode): OrderedXmlNode[] {
  return getChildren(node).filter(isElement);
}

/**
 * Attributes without the parser prefix.
 */
export function getAttributes(node: OrderedXmlNode): XmlAttributes {
  const raw = node[ATTRIBUTES_KEY];
  const attributes: XmlAttributes = {};
  if (!isAttributes(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    attributes[key.startsWith(ATTR_PREFIX) ? key.slice(ATTR_PREFIX.length) : key] = String(value);
  }
  return attributes;
}

export function getAttr(node: OrderedXmlNode, name: string): string | undefined {
  const raw = node[ATTRIBUTES_KEY];
  if (!isAttributes(raw)) {
    return undefined;
  }
  const value = raw[`${ATTR_PREFIX}${name}`];
  return value === undefined ? undefined : String(value);
}

export function setAttr(node: OrderedXmlNode, name: string, value: string | number): void {
  const raw = node[ATTRIBUTES_KEY];
  const attributes: XmlAttributes = isAttributes(raw) ? raw : {};
  attributes[`${ATTR_PREFIX}${name}`] = String(value);
  node[ATTRIBUTES_KEY] = attributes;
}

export function removeAttr(node: OrderedXmlNode, name: string): void {
  const raw = node[ATTRIBUTES_KEY];
  if (!isAttributes(raw)) {
    return;
  }
  delete raw[`${ATTR_PREFIX}${name}`];
  if (Object.keys(raw).length === 0) {
    delete node[ATTRIBUTES_KEY];
  }
}

/**
 * Builds an element node. Attribute names are given without prefix.
 */
export function createElement(
  tagName: string,
  attributes: Record<string, string | number> = {},
  children: OrderedXmlOutput = []
): OrderedXmlNode {
  const node: OrderedXmlNode = { [tagName]: children };
  for (const [name, value] of Object.entries(attributes)) {
    setAttr(node, name, value);
  }
  return node;
}

export function createText(text: string): OrderedXmlNode {
  return { [TEXT_KEY]: text };
}

export function findChild(node: OrderedXmlNode, tagName: string): OrderedXmlNode | undefined {
  return getChildren(node).find((child) => getTagName(child) === tagName);
}

export function findChildren(node: OrderedXmlNode, tagName: string): OrderedXmlNode[] {
  return getChildren(node).filter((child) => getTagName(child) === tagName);
}

/**
 * Follows a path of child tag names, e.g. `['p:cSld', 'p:spTree']`.
 */
export function findPath(node: OrderedXmlNode, path: readonly string[]): OrderedXmlNode | undefined {
  let current: OrderedXmlNode | undefined = node;
  for (const tagName of path) {
    if (!current) {
      return undefined;
    }
    current = findChild(current, tagName);
  }
  return current;
}

/**
 * First descendant with the tag, in document order. The node itself is not considered.
 */
export function findFirst(node: OrderedXmlNode, tagName: string): OrderedXmlNode | undefined {
  for (const child of getChildren(node)) {
    if (getTagName(child) === tagName) {
      return child;
    }
    const nested = findFirst(child, tagName);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

export function findAll(node: OrderedXmlNode, tagName: string): OrderedXmlNode[] {
  const result: OrderedXmlNode[] = [];
  const visit = (current: OrderedXmlNode): void => {
    for (const child of getChildren(current)) {
      if (getTagName(child) === tagName) {
        result.push(child);
      }
      visit(child);
    }
  };
  visit(node);
  return result;
}

/**
 * Root element of a parsed document, skipping the declaration and whitespace.
 */
export function getRootElement(document: OrderedXmlOutput, tagName?: string): OrderedXmlNode | undefined {
  return document.find((node) => {
    const tag = getTagName(node);
    if (tag === undefined || tag === TEXT_KEY || tag.startsWith('?')) {
      return false;
    }
    return tagName === undefined || tag === tagName;
  });
}

/**
 * Concatenated text of all descendant text nodes.
 */
export function getTextContent(node: OrderedXmlNode): string {
  const tag = getTagName(node);
  if (tag === TEXT_KEY) {
    const value = node[TEXT_KEY];
    return typeof value === 'string' ? value : String(value ?? '');
  }
  return getChildren(node).map(getTextContent).join('');
}

/**
 * Replaces the element's children with a single text node.
 */
export function setTextContent(node: OrderedXmlNode, text: string): void {
  const tag = getTagName(node);
  if (tag === undefined || tag === TEXT_KEY) {
    return;
  }
  node[tag] = text === '' ? [] : [createText(text)];
}

/**
 * Removes `target` from the subtree under `root`. Returns whether it was found.
 */
export function removeNode(root: OrderedXmlNode, target: OrderedXmlNode): boolean {
  const children = getChildren(root);
  const index = children.indexOf(target);
  if (index >= 0) {
    children.splice(index, 1);
    return true;
  }
  return children.some((child) => removeNode(child, target));
}

export function removeChildren(node: OrderedXmlNode, tagName: string): number {
  const children = getChildren(node);
  let removed = 0;
  for (let i = children.length - 1; i >= 0; i--) {
    if (getTagName(children[i]) === tagName) {
      children.splice(i, 1);
      removed++;
    }
  }
  return removed;
}

/**
 * Removes every descendant element with the tag.
 */
export function removeAll(node: OrderedXmlNode, tagName: string): number {
  let removed = removeChildren(node, tagName);
  for (const child of getChildren(node)) {
    removed += removeAll(child, tagName);
  }
  return removed;
}

/**
 * Inserts `child` before the first child tagged `beforeTag`, or appends it.
 */
export function insertBefore(parent: OrderedXmlNode, child: OrderedXmlNode, beforeTag: string): void {
  const children = getChildren(parent);
  const index = children.findIndex((node) => getTagName(node) === beforeTag);
  if (index >= 0) {
    children.splice(index, 0, child);
  } else {
    children.push(child);
  }
}

/**
 * Inserts `child` right after `reference`, or first when there is no reference.
 */
export function insertAfter(
  parent: OrderedXmlNode,
  child: OrderedXmlNode,
  reference: OrderedXmlNode | undefined
): void {
  const children = getChildren(parent);
  const index = reference ? children.indexOf(reference) : -1;
  children.splice(index + 1, 0, child);
}

export function cloneNode<T extends OrderedXmlNode | OrderedXmlOutput>(node: T): T {
  return structuredClone(node);
}
