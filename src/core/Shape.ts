import type { Location, PlaceholderReference, Rect, ShapeKind } from '../types/index.js';
import {
  getShapeText,
  getTextBody,
  normalizeAlignment,
  setPlainText,
  setStyledText,
  setWordWrap,
} from '../text/TextFrame.js';
import { PackageError } from '../utils/errors.js';
import type { ShapeElementType } from './constants.js';
import { readPlaceholderRef, readTransform } from './PlaceholderResolver.js';
import type { Slide } from './Slide.js';
import {
  cloneNode,
  createElement,
  findChild,
  findFirst,
  getAttr,
  getChildren,
  getTagName,
  insertAfter,
  serializeNode,
  setAttr,
  type OrderedXmlNode,
} from './xml.js';

const SHAPE_KINDS: Record<ShapeElementType, ShapeKind> = {
  'p:sp': 'shape',
  'p:cxnSp': 'connector',
  'p:pic': 'picture',
  'p:grpSp': 'group',
  'p:graphicFrame': 'graphicFrame',
};

/**
 * A shape-tree child of a slide. Wraps the live XML element, so edits
 * land in the slide part; call `slide.markDirty()` afterwards.
 */
export class Shape {
  readonly element: OrderedXmlNode;
  readonly slide: Slide;
  readonly tagName: ShapeElementType;

  constructor(element: OrderedXmlNode, tagName: ShapeElementType, slide: Slide) {
    this.element = element;
    this.tagName = tagName;
    this.slide = slide;
  }

  get kind(): ShapeKind {
    return SHAPE_KINDS[this.tagName];
  }

  private get nonVisualProperties(): OrderedXmlNode | undefined {
    return findFirst(this.element, 'p:cNvPr');
  }

  get id(): number {
    const cNvPr = this.nonVisualProperties;
    return cNvPr ? Number(getAttr(cNvPr, 'id') ?? 0) : 0;
  }

  get name(): string {
    const cNvPr = this.nonVisualProperties;
    return cNvPr ? getAttr(cNvPr, 'name') ?? '' : '';
  }

  get placeholder(): PlaceholderReference | undefined {
    return readPlaceholderRef(this.element);
  }

  get isPlaceholder(): boolean {
    return this.placeholder !== undefined;
  }

  /**
   * Auto shapes and text boxes can always carry text, even before they
   * have a `p:txBody`.
   */
  get hasTextFrame(): boolean {
    return this.kind === 'shape';
  }

  get textBody(): OrderedXmlNode | undefined {
    return getTextBody(this.element);
  }

  get text(): string {
    return this.hasTextFrame ? getShapeText(this.element) : '';
  }

  /**
   * Replaces the text. Placeholders get plain paragraphs and take their
   * formatting from the layout; other shapes keep the first paragraph's
   * run formatting.
   */
  setText(text: string): void {
    this.requireTextFrame();
    if (this.isPlaceholder) {
      setPlainText(this.element, text);
    } else {
      setStyledText(this.element, text);
    }
    this.slide.markDirty();
  }

  setWordWrap(wrap: boolean): void {
    this.requireTextFrame();
    setWordWrap(this.element, wrap);
    this.slide.markDirty();
  }

  /**
   * Top anchor and justified paragraphs.
   */
  normalizeAlignment(): void {
    if (!this.hasTextFrame) {
      return;
    }
    normalizeAlignment(this.element);
    this.slide.markDirty();
  }

  private requireTextFrame(): void {
    if (!this.hasTextFrame) {
      throw new PackageError(`Shape '${this.name}' has no text frame`, { slide: this.slide.partPath, kind: this.kind });
    }
  }

  /**
   * `a:xfrm` (or `p:xfrm` on graphic frames) holding this shape's own transform.
   */
  private get transformElement(): OrderedXmlNode | undefined {
    if (this.kind === 'graphicFrame') {
      return findChild(this.element, 'p:xfrm');
    }
    const container = findChild(this.element, this.kind === 'group' ? 'p:grpSpPr' : 'p:spPr');
    return container ? findChild(container, 'a:xfrm') : undefined;
  }

  get ownTransform(): Rect | undefined {
    return readTransform(this.transformElement);
  }

  /**
   * Own transform, or the one a placeholder inherits from layout and master.
   */
  get rect(): Rect | undefined {
    const own = this.ownTransform;
    if (own) {
      return own;
    }
    const ref = this.placeholder;
    return ref ? this.slide.presentation.placeholders.resolveTransform(this.slide.partPath, ref) : undefined;
  }

  get left(): number {
    return this.rect?.x ?? 0;
  }

  get top(): number {
    return this.rect?.y ?? 0;
  }

  get width(): number {
    return this.rect?.width ?? 0;
  }

  get height(): number {
    return this.rect?.height ?? 0;
  }

  /**
   * Writes position and size into the shape's own transform, creating it when
   * the shape only inherited one.
   */
  setLocation(location: Location): void {
    const xfrm = this.transformElement ?? this.createTransformElement();
    let off = findChild(xfrm, 'a:off');
    if (!off) {
      off = createElement('a:off');
      getChildren(xfrm).unshift(off);
    }
    let ext = findChild(xfrm, 'a:ext');
    if (!ext) {
      ext = createElement('a:ext');
      insertAfter(xfrm, ext, off);
    }
    setAttr(off, 'x', Math.round(location.x));
    setAttr(off, 'y', Math.round(location.y));
    setAttr(ext, 'cx', Math.round(location.width));
    setAttr(ext, 'cy', Math.round(location.height));
    this.slide.markDirty();
  }

  private createTransformElement(): OrderedXmlNode {
    if (this.kind === 'graphicFrame') {
      const xfrm = createElement('p:xfrm');
      insertAfter(this.element, xfrm, findChild(this.element, 'p:nvGraphicFramePr'));
      return xfrm;
    }

    const containerTag = this.kind === 'group' ? 'p:grpSpPr' : 'p:spPr';
    let container = findChild(this.element, containerTag);
    if (!container) {
      container = createElement(containerTag);
      const nonVisual = getChildren(this.element).find((child) => getTagName(child)?.startsWith('p:nv'));
      insertAfter(this.element, container, nonVisual);
    }
    const xfrm = createElement('a:xfrm');
    getChildren(container).unshift(xfrm);
    return xfrm;
  }

  /**
   * Relationship id of the embedded image of a picture shape.
   */
  get imageRelationshipId(): string | undefined {
    const blip = findFirst(this.element, 'a:blip');
    return blip ? getAttr(blip, 'r:embed') : undefined;
  }

  /**
   * Serializes the shape as a standalone fragment carrying the slide's
   * namespace declarations on its root element.
   */
  toXml(): string {
    const fragment = cloneNode(this.element);
    for (const [name, uri] of Object.entries(this.slide.namespaceDeclarations)) {
      if (getAttr(fragment, name) === undefined) {
        setAttr(fragment, name, uri);
      }
    }
    return serializeNode(fragment);
  }
}
