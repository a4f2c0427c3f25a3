import type { Location, PlaceholderType } from '../types/index.js';
import { PackageError } from '../utils/errors.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import { RelationshipTypes, isShapeElementType } from './constants.js';
import type { Relationship } from './PptxPackage.js';
import type { Presentation } from './Presentation.js';
import { Shape } from './Shape.js';
import {
  createElement,
  findAll,
  findPath,
  getAttr,
  getAttributes,
  getChildElements,
  getRootElement,
  getTagName,
  insertBefore,
  removeNode,
  type OrderedXmlNode,
  type OrderedXmlOutput,
  type XmlAttributes,
} from './xml.js';

const imageDecoder = new ImageDecoder();

/**
 * One slide part of a presentation.
 */
export class Slide {
  readonly presentation: Presentation;
  readonly partPath: string;

  constructor(presentation: Presentation, partPath: string) {
    this.presentation = presentation;
    this.partPath = partPath;
  }

  get document(): OrderedXmlOutput {
    return this.presentation.package.getXml(this.partPath);
  }

  get root(): OrderedXmlNode {
    const root = getRootElement(this.document, 'p:sld');
    if (!root) {
      throw new PackageError(`Slide part has no p:sld root: ${this.partPath}`);
    }
    return root;
  }

  get shapeTree(): OrderedXmlNode {
    const spTree = findPath(this.root, ['p:cSld', 'p:spTree']);
    if (!spTree) {
      throw new PackageError(`Slide part has no shape tree: ${this.partPath}`);
    }
    return spTree;
  }

  /**
   * Top-level shapes in z-order (document order).
   */
  get shapes(): Shape[] {
    const shapes: Shape[] = [];
    for (const element of getChildElements(this.shapeTree)) {
      const tagName = getTagName(element);
      if (isShapeElementType(tagName)) {
        shapes.push(new Shape(element, tagName, this));
      }
    }
    return shapes;
  }

  get placeholders(): Shape[] {
    return this.shapes.filter((shape) => shape.isPlaceholder);
  }

  /**
   * First placeholder whose type is one of `types`.
   */
  findPlaceholder(types: readonly PlaceholderType[]): Shape | undefined {
    return this.placeholders.find((shape) => {
      const ref = shape.placeholder;
      return ref !== undefined && types.includes(ref.type);
    });
  }

  get relationships(): Relationship[] {
    return this.presentation.package.getRelationships(this.partPath);
  }

  get layoutPath(): string | undefined {
    return this.presentation.placeholders.relatedPart(this.partPath, RelationshipTypes.slideLayout);
  }

  /**
   * `xmlns` declarations on the slide root, keyed by attribute name.
   */
  get namespaceDeclarations(): XmlAttributes {
    const declarations: XmlAttributes = {};
    for (const [name, value] of Object.entries(getAttributes(this.root))) {
      if (name === 'xmlns' || name.startsWith('xmlns:')) {
        declarations[name] = value;
      }
    }
    return declarations;
  }

  markDirty(): void {
    this.presentation.package.markDirty(this.partPath);
  }

  /**
   * Next free shape id: one above the largest id on the slide.
   */
  nextShapeId(): number {
    const ids = findAll(this.shapeTree, 'p:cNvPr').map((node) => Number(getAttr(node, 'id') ?? 0));
    return Math.max(0, ...ids.filter((id) => Number.isFinite(id))) + 1;
  }

  /**
   * Inserts a shape element at the top of the z-order, before `p:extLst`.
   */
  insertShapeElement(element: OrderedXmlNode): Shape {
    const tagName = getTagName(element);
    if (!isShapeElementType(tagName)) {
      throw new PackageError(`Not a shape element: ${tagName ?? '(empty)'}`);
    }
    insertBefore(this.shapeTree, element, 'p:extLst');
    this.markDirty();
    return new Shape(element, tagName, this);
  }

  removeShape(shape: Shape): void {
    if (removeNode(this.shapeTree, shape.element)) {
      this.markDirty();
    }
  }

  /**
   * Adds a relationship from this slide to another part and returns its id.
   */
  addRelationship(type: string, targetPath: string): string {
    const pkg = this.presentation.package;
    return pkg.addRelationship(this.partPath, type, pkg.relativeTarget(this.partPath, targetPath));
  }

  /**
   * Bytes of the part a relationship points to, e.g. an embedded image.
   */
  async getImageData(relationshipId: string): Promise<Buffer> {
    const rel = this.relationships.find((r) => r.id === relationshipId);
    if (!rel) {
      throw new PackageError(`Relationship ${relationshipId} not found on ${this.partPath}`);
    }
    const pkg = this.presentation.package;
    return pkg.readBinary(pkg.resolvePath(this.partPath, rel.target));
  }

  /**
   * Embeds an image as a new media part and places a picture shape for it.
   */
  addPicture(data: Buffer, location: Location, name = 'Picture'): Shape {
    const format = imageDecoder.detectFormat(data);
    if (format === 'unknown') {
      throw new PackageError('Unsupported image data', { slide: this.partPath, size: data.length });
    }

    const pkg = this.presentation.package;
    const extension = imageDecoder.getExtension(format);
    const mediaPath = this.presentation.nextMediaPath(extension);
    pkg.writeBinary(mediaPath, data);
    pkg.ensureDefaultContentType(extension, imageDecoder.getMimeType(format));
    const relationshipId = this.addRelationship(RelationshipTypes.image, mediaPath);

    const id = this.nextShapeId();
    const picture = createElement('p:pic', {}, [
      createElement('p:nvPicPr', {}, [
        createElement('p:cNvPr', { id, name: `${name} ${id}`, descr: '' }),
        createElement('p:cNvPicPr', {}, [createElement('a:picLocks', { noChangeAspect: 1 })]),
        createElement('p:nvPr'),
      ]),
      createElement('p:blipFill', {}, [
        createElement('a:blip', { 'r:embed': relationshipId }),
        createElement('a:stretch', {}, [createElement('a:fillRect')]),
      ]),
      createElement('p:spPr', {}, [
        createElement('a:xfrm', {}, [
          createElement('a:off', { x: Math.round(location.x), y: Math.round(location.y) }),
          createElement('a:ext', { cx: Math.round(location.width), cy: Math.round(location.height) }),
        ]),
        createElement('a:prstGeom', { prst: 'rect' }, [createElement('a:avLst')]),
      ]),
    ]);

    return this.insertShapeElement(picture);
  }
}
