import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { PackageError } from '../utils/errors.js';
import { ContentTypes, LAYOUT_ONLY_PLACEHOLDERS, Namespaces, RelationshipTypes } from './constants.js';
import { PlaceholderResolver } from './PlaceholderResolver.js';
import { PptxPackage } from './PptxPackage.js';
import { Slide } from './Slide.js';
import {
  cloneNode,
  createDeclaration,
  createElement,
  findAll,
  findChild,
  findFirst,
  getAttr,
  getChildren,
  getRootElement,
  getTagName,
  removeAll,
  removeAttr,
  type OrderedXmlNode,
} from './xml.js';

/**
 * Slide dimensions in EMU.
 */
export interface SlideSize {
  width: number;
  height: number;
}

/**
 * Elements that precede `p:sldIdLst` in `p:presentation`.
 */
const SLIDE_ID_LIST_PREDECESSORS = ['p:sldMasterIdLst', 'p:notesMasterIdLst', 'p:handoutMasterIdLst'];

const FIRST_SLIDE_ID = 256;

/**
 * An editable presentation: slide order, slide parts and their relationships.
 *
 * @example
 * ```typescript
 * const prs = await Presentation.open('template.pptx');
 * const copy = prs.duplicateSlide(2);
 * prs.moveSlide(copy, 3);
 * await prs.save('out.pptx');
 * ```
 */
export class Presentation {
  readonly package: PptxPackage;
  readonly presentationPath: string;
  readonly placeholders: PlaceholderResolver;
  private readonly logger: ILogger;
  private readonly slideCache = new Map<string, Slide>();

  private constructor(pkg: PptxPackage, logger: ILogger) {
    this.package = pkg;
    this.logger = logger;
    this.presentationPath = pkg.findPresentationPath();
    this.placeholders = new PlaceholderResolver(pkg, logger.child('PlaceholderResolver'));
    if (!getRootElement(pkg.getXml(this.presentationPath), 'p:presentation')) {
      throw new PackageError(`No p:presentation root in ${this.presentationPath}`);
    }
  }

  /**
   * Opens a PPTX file from a file path or Buffer.
   */
  static async open(input: Buffer | string, logger?: ILogger): Promise<Presentation> {
    const log = logger ?? createLogger('warn', 'Presentation');
    const pkg = await PptxPackage.open(input, log.child('PptxPackage'));
    return new Presentation(pkg, log);
  }

  private get root(): OrderedXmlNode {
    const root = getRootElement(this.package.getXml(this.presentationPath), 'p:presentation');
    if (!root) {
      throw new PackageError(`No p:presentation root in ${this.presentationPath}`);
    }
    return root;
  }

  private get slideIdList(): OrderedXmlNode {
    const existing = findChild(this.root, 'p:sldIdLst');
    if (existing) {
      return existing;
    }
    const list = createElement('p:sldIdLst');
    const children = getChildren(this.root);
    let index = 0;
    children.forEach((child, i) => {
      const tag = getTagName(child);
      if (tag !== undefined && SLIDE_ID_LIST_PREDECESSORS.includes(tag)) {
        index = i + 1;
      }
    });
    children.splice(index, 0, list);
    this.package.markDirty(this.presentationPath);
    return list;
  }

  private get slideIdEntries(): OrderedXmlNode[] {
    return getChildren(this.slideIdList).filter((node) => getTagName(node) === 'p:sldId');
  }

  private slidePathForEntry(entry: OrderedXmlNode): string {
    const relationshipId = getAttr(entry, 'r:id');
    const rel = this.package.getRelationships(this.presentationPath).find((r) => r.id === relationshipId);
    if (!rel) {
      throw new PackageError(`Slide relationship ${relationshipId ?? '(missing)'} not found`);
    }
    return this.package.resolvePath(this.presentationPath, rel.target);
  }

  private slideAt(partPath: string): Slide {
    let slide = this.slideCache.get(partPath);
    if (!slide) {
      slide = new Slide(this, partPath);
      this.slideCache.set(partPath, slide);
    }
    return slide;
  }

  /**
   * Slides in presentation order.
   */
  get slides(): Slide[] {
    return this.slideIdEntries.map((entry) => this.slideAt(this.slidePathForEntry(entry)));
  }

  get slideCount(): number {
    return this.slideIdEntries.length;
  }

  getSlide(index: number): Slide {
    const entry = this.slideIdEntries[index];
    if (!entry) {
      throw new PackageError(`Slide index ${index} out of range (0..${this.slideCount - 1})`);
    }
    return this.slideAt(this.slidePathForEntry(entry));
  }

  indexOf(slide: Slide): number {
    return this.slides.findIndex((s) => s.partPath === slide.partPath);
  }

  get slideSize(): SlideSize {
    const sldSz = findChild(this.root, 'p:sldSz');
    return {
      width: Number(sldSz ? getAttr(sldSz, 'cx') ?? 9144000 : 9144000),
      height: Number(sldSz ? getAttr(sldSz, 'cy') ?? 6858000 : 6858000),
    };
  }

  /**
   * Layout parts reachable from the slide masters, in master order.
   */
  get layoutPaths(): string[] {
    const paths: string[] = [];
    for (const master of this.package.getRelationships(this.presentationPath)) {
      if (master.type !== RelationshipTypes.slideMaster) {
        continue;
      }
      const masterPath = this.package.resolvePath(this.presentationPath, master.target);
      for (const rel of this.package.getRelationships(masterPath)) {
        if (rel.type === RelationshipTypes.slideLayout) {
          paths.push(this.package.resolvePath(masterPath, rel.target));
        }
      }
    }
    return paths;
  }

  /**
   * Copies a slide, its shapes and relationships, to the end of the deck.
   * Notes are not copied and shape custom data is dropped.
   */
  duplicateSlide(index: number): Slide {
    const source = this.getSlide(index);
    const newPath = this.nextSlidePath();

    const document = cloneNode(source.document);
    const root = getRootElement(document, 'p:sld');
    if (root) {
      removeAll(root, 'p:custDataLst');
    }
    this.package.setXml(newPath, document);
    this.package.setRelationships(
      newPath,
      source.relationships.filter((rel) => rel.type !== RelationshipTypes.notesSlide)
    );
    this.registerSlide(newPath);

    this.logger.debug('Duplicated slide', { from: index, part: newPath });
    return this.slideAt(newPath);
  }

  /**
   * Appends an empty slide based on a layout, with the layout's placeholders
   * (date, footer and slide number excepted).
   */
  addSlide(layoutPath: string): Slide {
    if (!this.package.hasPart(layoutPath)) {
      throw new PackageError(`Layout not found: ${layoutPath}`);
    }
    const newPath = this.nextSlidePath();

    let nextId = 2;
    const placeholders: OrderedXmlNode[] = [];
    for (const inherited of this.placeholders.getPlaceholders(layoutPath)) {
      if (LAYOUT_ONLY_PLACEHOLDERS.some((type) => type === inherited.ref.type)) {
        continue;
      }
      if (getTagName(inherited.element) !== 'p:sp') {
        continue;
      }
      const ph = findFirst(inherited.element, 'p:ph');
      const phCopy = ph ? cloneNode(ph) : createElement('p:ph');
      removeAttr(phCopy, 'hasCustomPrompt');
      placeholders.push(
        createElement('p:sp', {}, [
          createElement('p:nvSpPr', {}, [
            createElement('p:cNvPr', { id: nextId, name: inherited.name || `Placeholder ${nextId}` }),
            createElement('p:cNvSpPr', {}, [createElement('a:spLocks', { noGrp: 1 })]),
            createElement('p:nvPr', {}, [phCopy]),
          ]),
          createElement('p:spPr'),
          createElement('p:txBody', {}, [
            createElement('a:bodyPr'),
            createElement('a:lstStyle'),
            createElement('a:p'),
          ]),
        ])
      );
      nextId++;
    }

    const slideRoot = createElement(
      'p:sld',
      { 'xmlns:a': Namespaces.a, 'xmlns:r': Namespaces.r, 'xmlns:p': Namespaces.p },
      [
        createElement('p:cSld', {}, [
          createElement('p:spTree', {}, [
            createElement('p:nvGrpSpPr', {}, [
              createElement('p:cNvPr', { id: 1, name: '' }),
              createElement('p:cNvGrpSpPr'),
              createElement('p:nvPr'),
            ]),
            createElement('p:grpSpPr'),
            ...placeholders,
          ]),
        ]),
        createElement('p:clrMapOvr', {}, [createElement('a:masterClrMapping')]),
      ]
    );

    this.package.setXml(newPath, [createDeclaration(), slideRoot]);
    this.package.setRelationships(newPath, [
      {
        id: 'rId1',
        type: RelationshipTypes.slideLayout,
        target: this.package.relativeTarget(newPath, layoutPath),
      },
    ]);
    this.registerSlide(newPath);

    this.logger.debug('Added slide', { layout: layoutPath, part: newPath, placeholders: placeholders.length });
    return this.slideAt(newPath);
  }

  /**
   * Moves a slide to `index` in the presentation order.
   */
  moveSlide(slide: Slide, index: number): void {
    const entries = this.slideIdEntries;
    const entry = entries.find((e) => this.slidePathForEntry(e) === slide.partPath);
    if (!entry) {
      throw new PackageError(`Slide is not part of this presentation: ${slide.partPath}`);
    }

    const children = getChildren(this.slideIdList);
    children.splice(children.indexOf(entry), 1);
    const remaining = entries.filter((e) => e !== entry);
    const before = remaining[index];
    if (before) {
      children.splice(children.indexOf(before), 0, entry);
    } else {
      const last = remaining[remaining.length - 1];
      children.splice(last ? children.indexOf(last) + 1 : children.length, 0, entry);
    }
    this.package.markDirty(this.presentationPath);
  }

  /**
   * Removes a slide from the deck and deletes its parts.
   */
  removeSlide(index: number): void {
    const entry = this.slideIdEntries[index];
    if (!entry) {
      throw new PackageError(`Slide index ${index} out of range (0..${this.slideCount - 1})`);
    }
    const slidePath = this.slidePathForEntry(entry);
    const slideId = getAttr(entry, 'id');
    const relationshipId = getAttr(entry, 'r:id');

    const children = getChildren(this.slideIdList);
    children.splice(children.indexOf(entry), 1);
    if (relationshipId) {
      this.package.removeRelationship(this.presentationPath, relationshipId);
    }
    if (slideId) {
      this.removeSectionReferences(slideId);
    }
    this.package.markDirty(this.presentationPath);

    for (const rel of this.package.getRelationships(slidePath)) {
      if (rel.type === RelationshipTypes.notesSlide) {
        this.deletePartWithRelationships(this.package.resolvePath(slidePath, rel.target));
      }
    }
    this.deletePartWithRelationships(slidePath);
    this.slideCache.delete(slidePath);

    this.logger.debug('Removed slide', { index, part: slidePath });
  }

  private deletePartWithRelationships(partPath: string): void {
    this.package.deletePart(this.package.getRelsPath(partPath));
    this.package.deletePart(partPath);
    this.package.removeContentTypeOverride(partPath);
  }

  /**
   * Drops a removed slide id from section lists (`p14:sectionLst`).
   */
  private removeSectionReferences(slideId: string): void {
    for (const list of findAll(this.root, 'p14:sldIdLst')) {
      const children = getChildren(list);
      for (let i = children.length - 1; i >= 0; i--) {
        if (getTagName(children[i]) === 'p14:sldId' && getAttr(children[i], 'id') === slideId) {
          children.splice(i, 1);
        }
      }
    }
  }

  private registerSlide(slidePath: string): void {
    this.package.addContentTypeOverride(slidePath, ContentTypes.slide);
    const relationshipId = this.package.addRelationship(
      this.presentationPath,
      RelationshipTypes.slide,
      this.package.relativeTarget(this.presentationPath, slidePath)
    );

    const ids = this.slideIdEntries.map((entry) => Number(getAttr(entry, 'id') ?? 0));
    const id = Math.max(FIRST_SLIDE_ID - 1, ...ids) + 1;
    const entry = createElement('p:sldId', { id, 'r:id': relationshipId });

    const list = this.slideIdList;
    const entries = this.slideIdEntries;
    const children = getChildren(list);
    const last = entries[entries.length - 1];
    children.splice(last ? children.indexOf(last) + 1 : children.length, 0, entry);
    this.package.markDirty(this.presentationPath);
  }

  private nextSlidePath(): string {
    const numbers = this.package
      .listParts()
      .map((part) => /^ppt\/slides\/slide(\d+)\.xml$/.exec(part))
      .map((match) => (match ? Number(match[1]) : 0));
    return `ppt/slides/slide${Math.max(0, ...numbers) + 1}.xml`;
  }

  /**
   * Next free `ppt/media/imageN.ext` part name.
   */
  nextMediaPath(extension: string): string {
    const numbers = this.package
      .listParts()
      .map((part) => /^ppt\/media\/image(\d+)\.\w+$/.exec(part))
      .map((match) => (match ? Number(match[1]) : 0));
    return `ppt/media/image${Math.max(0, ...numbers) + 1}.${extension}`;
  }

  async toBuffer(): Promise<Buffer> {
    return this.package.toBuffer();
  }

  async save(outputPath: string): Promise<void> {
    await this.package.save(outputPath);
  }
}
