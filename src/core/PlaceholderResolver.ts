import type { PlaceholderType, PlaceholderReference, Rect } from '../types/index.js';
import { isPlaceholderType } from '../types/index.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { RelationshipTypes } from './constants.js';
import type { PptxPackage } from './PptxPackage.js';
import {
  findChild,
  findFirst,
  findPath,
  getAttr,
  getChildElements,
  getRootElement,
  getTagName,
  type OrderedXmlNode,
} from './xml.js';

/**
 * Placeholder shape found on a layout or master.
 */
export interface InheritedPlaceholder {
  ref: PlaceholderReference;
  name: string;
  element: OrderedXmlNode;
  rect?: Rect;
}

/**
 * Master placeholders are matched by these broader types.
 */
const MASTER_TYPE_ALIASES: Partial<Record<PlaceholderType, PlaceholderType>> = {
  ctrTitle: 'title',
  subTitle: 'body',
  obj: 'body',
};

/**
 * Reads `p:nvPr/p:ph` from any shape element.
 */
export function readPlaceholderRef(shapeElement: OrderedXmlNode): PlaceholderReference | undefined {
  const nonVisual = getChildElements(shapeElement).find((child) => getTagName(child)?.startsWith('p:nv'));
  const ph = nonVisual ? findPath(nonVisual, ['p:nvPr', 'p:ph']) : undefined;
  if (!ph) {
    return undefined;
  }

  const type = getAttr(ph, 'type');
  const idx = getAttr(ph, 'idx');
  return {
    type: type !== undefined && isPlaceholderType(type) ? type : 'obj',
    idx: idx !== undefined ? parseInt(idx, 10) || 0 : 0,
  };
}

/**
 * Reads `a:off`/`a:ext` of a transform element.
 */
export function readTransform(xfrm: OrderedXmlNode | undefined): Rect | undefined {
  if (!xfrm) {
    return undefined;
  }
  const off = findChild(xfrm, 'a:off');
  const ext = findChild(xfrm, 'a:ext');
  if (!off && !ext) {
    return undefined;
  }
  return {
    x: Number(off ? getAttr(off, 'x') ?? 0 : 0),
    y: Number(off ? getAttr(off, 'y') ?? 0 : 0),
    width: Number(ext ? getAttr(ext, 'cx') ?? 0 : 0),
    height: Number(ext ? getAttr(ext, 'cy') ?? 0 : 0),
  };
}

/**
 * Resolves what a slide placeholder inherits from its layout and master.
 *
 * A slide placeholder without its own transform takes the position of the
 * layout placeholder with the same idx (falling back to the same type),
 * and that one in turn the master placeholder of the same broad type.
 */
export class PlaceholderResolver {
  private readonly logger: ILogger;
  private readonly pkg: PptxPackage;
  private readonly cache = new Map<string, InheritedPlaceholder[]>();

  constructor(pkg: PptxPackage, logger?: ILogger) {
    this.pkg = pkg;
    this.logger = logger ?? createLogger('warn', 'PlaceholderResolver');
  }

  /**
   * Layout part of a slide, or master part of a layout.
   */
  relatedPart(sourcePath: string, relationshipType: string): string | undefined {
    const rel = this.pkg.getRelationships(sourcePath).find((r) => r.type === relationshipType);
    return rel ? this.pkg.resolvePath(sourcePath, rel.target) : undefined;
  }

  /**
   * Placeholders declared on a layout or master part, in document order.
   */
  getPlaceholders(partPath: string): InheritedPlaceholder[] {
    const cached = this.cache.get(partPath);
    if (cached) {
      return cached;
    }

    const root = getRootElement(this.pkg.getXml(partPath));
    const spTree = root ? findPath(root, ['p:cSld', 'p:spTree']) : undefined;
    const placeholders: InheritedPlaceholder[] = [];
    for (const element of spTree ? getChildElements(spTree) : []) {
      const ref = readPlaceholderRef(element);
      if (!ref) {
        continue;
      }
      const cNvPr = findFirst(element, 'p:cNvPr');
      const spPr = findChild(element, 'p:spPr');
      placeholders.push({
        ref,
        name: cNvPr ? getAttr(cNvPr, 'name') ?? '' : '',
        element,
        rect: spPr ? readTransform(findChild(spPr, 'a:xfrm')) : undefined,
      });
    }

    this.cache.set(partPath, placeholders);
    return placeholders;
  }

  findLayoutPlaceholder(layoutPath: string, ref: PlaceholderReference): InheritedPlaceholder | undefined {
    const placeholders = this.getPlaceholders(layoutPath);
    return (
      placeholders.find((ph) => ph.ref.idx === ref.idx && this.sameFamily(ph.ref.type, ref.type)) ??
      placeholders.find((ph) => ph.ref.idx === ref.idx) ??
      placeholders.find((ph) => ph.ref.type === ref.type)
    );
  }

  findMasterPlaceholder(masterPath: string, type: PlaceholderType): InheritedPlaceholder | undefined {
    const wanted = MASTER_TYPE_ALIASES[type] ?? type;
    return this.getPlaceholders(masterPath).find(
      (ph) => (MASTER_TYPE_ALIASES[ph.ref.type] ?? ph.ref.type) === wanted
    );
  }

  /**
   * Inherited position and size of a slide placeholder.
   */
  resolveTransform(slidePath: string, ref: PlaceholderReference): Rect | undefined {
    const layoutPath = this.relatedPart(slidePath, RelationshipTypes.slideLayout);
    if (!layoutPath) {
      this.logger.debug('Slide has no layout', { slide: slidePath });
      return undefined;
    }

    const layoutPlaceholder = this.findLayoutPlaceholder(layoutPath, ref);
    if (layoutPlaceholder?.rect) {
      return layoutPlaceholder.rect;
    }

    const masterPath = this.relatedPart(layoutPath, RelationshipTypes.slideMaster);
    if (!masterPath) {
      return undefined;
    }
    const masterPlaceholder = this.findMasterPlaceholder(masterPath, layoutPlaceholder?.ref.type ?? ref.type);
    if (!masterPlaceholder?.rect) {
      this.logger.debug('No inherited transform for placeholder', { slide: slidePath, ...ref });
    }
    return masterPlaceholder?.rect;
  }

  private sameFamily(a: PlaceholderType, b: PlaceholderType): boolean {
    return (MASTER_TYPE_ALIASES[a] ?? a) === (MASTER_TYPE_ALIASES[b] ?? b);
  }
}
