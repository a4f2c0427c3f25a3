import JSZip from 'jszip';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { PackageError, errorMessage } from '../utils/errors.js';
import { Namespaces } from './constants.js';
import {
  buildXml,
  createDeclaration,
  createElement,
  getAttr,
  getChildElements,
  getRootElement,
  getTagName,
  parseXml,
  type OrderedXmlNode,
  type OrderedXmlOutput,
} from './xml.js';

/**
 * Relationship entry from a .rels part.
 */
export interface Relationship {
  id: string;
  type: string;
  target: string;
  targetMode?: string;
}

export const CONTENT_TYPES_PATH = '[Content_Types].xml';

/**
 * Read/write access to the parts of a PPTX container.
 *
 * XML parts are read as strings when the package is opened and parsed on
 * first access. Parsed documents are live: callers edit them in place and
 * mark them with `markDirty`, and dirty parts are serialized on `toBuffer`.
 * Binary parts (media) stay in the zip and are read on demand.
 */
export class PptxPackage {
  private readonly zip: JSZip;
  private readonly logger: ILogger;
  private readonly rawParts: Map<string, string>;
  private readonly parsedParts = new Map<string, OrderedXmlOutput>();
  private readonly dirtyParts = new Set<string>();

  private constructor(zip: JSZip, rawParts: Map<string, string>, logger: ILogger) {
    this.zip = zip;
    this.rawParts = rawParts;
    this.logger = logger;
  }

  /**
   * Opens a PPTX file from a file path or Buffer.
   */
  static async open(input: Buffer | string, logger?: ILogger): Promise<PptxPackage> {
    const log = logger ?? createLogger('warn', 'PptxPackage');
    let data: Buffer;

    if (typeof input === 'string') {
      log.debug('Opening PPTX from file path', { path: input });
      data = await fs.readFile(input);
    } else {
      log.debug('Opening PPTX from buffer', { size: input.length });
      data = input;
    }

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(data);
    } catch (error) {
      const message = errorMessage(error);
      log.error('Failed to open PPTX', { error: message });
      throw new PackageError(`Failed to open PPTX file: ${message}`);
    }

    const rawParts = new Map<string, string>();
    const xmlFiles = Object.values(zip.files).filter(
      (file) => !file.dir && (file.name.endsWith('.xml') || file.name.endsWith('.rels'))
    );
    for (const file of xmlFiles) {
      rawParts.set(file.name, await file.async('string'));
    }

    if (!rawParts.has(CONTENT_TYPES_PATH)) {
      throw new PackageError('PPTX file has no [Content_Types].xml part');
    }

    log.info('PPTX opened', { parts: rawParts.size });
    return new PptxPackage(zip, rawParts, log);
  }

  hasPart(partPath: string): boolean {
    return this.parsedParts.has(partPath) || this.rawParts.has(partPath) || this.zip.file(partPath) !== null;
  }

  /**
   * Lists every part name in the package.
   */
  listParts(): string[] {
    const names = new Set<string>([...this.rawParts.keys(), ...this.parsedParts.keys()]);
    this.zip.forEach((relativePath, file) => {
      if (!file.dir) {
        names.add(relativePath);
      }
    });
    return [...names].sort();
  }

  /**
   * Parsed XML part. The returned document is shared; mark it dirty after editing.
   */
  getXml(partPath: string): OrderedXmlOutput {
    const cached = this.parsedParts.get(partPath);
    if (cached) {
      return cached;
    }

    const raw = this.rawParts.get(partPath);
    if (raw === undefined) {
      throw new PackageError(`Part not found in PPTX: ${partPath}`, { part: partPath });
    }

    const parsed = parseXml(raw);
    this.parsedParts.set(partPath, parsed);
    return parsed;
  }

  setXml(partPath: string, document: OrderedXmlOutput): void {
    this.parsedParts.set(partPath, document);
    this.dirtyParts.add(partPath);
  }

  markDirty(partPath: string): void {
    if (!this.parsedParts.has(partPath)) {
      throw new PackageError(`Cannot mark unparsed part as modified: ${partPath}`);
    }
    this.dirtyParts.add(partPath);
  }

  async readBinary(partPath: string): Promise<Buffer> {
    const file = this.zip.file(partPath);
    if (!file) {
      throw new PackageError(`Part not found in PPTX: ${partPath}`, { part: partPath });
    }
    return file.async('nodebuffer');
  }

  writeBinary(partPath: string, data: Buffer): void {
    this.zip.file(partPath, data);
  }

  deletePart(partPath: string): void {
    this.rawParts.delete(partPath);
    this.parsedParts.delete(partPath);
    this.dirtyParts.delete(partPath);
    this.zip.remove(partPath);
  }

  /**
   * Gets the .rels path for a part, e.g.
   * ppt/slides/slide1.xml -> ppt/slides/_rels/slide1.xml.rels
   */
  getRelsPath(sourcePath: string): string {
    const lastSlash = sourcePath.lastIndexOf('/');
    const dir = sourcePath.substring(0, lastSlash);
    const filename = sourcePath.substring(lastSlash + 1);
    return dir ? `${dir}/_rels/${filename}.rels` : `_rels/${filename}.rels`;
  }

  getRelationships(sourcePath: string): Relationship[] {
    const relsPath = this.getRelsPath(sourcePath);
    if (!this.hasPart(relsPath)) {
      return [];
    }

    const root = getRootElement(this.getXml(relsPath), 'Relationships');
    if (!root) {
      return [];
    }

    return getChildElements(root)
      .filter((node) => getTagName(node) === 'Relationship')
      .map((node) => ({
        id: getAttr(node, 'Id') ?? '',
        type: getAttr(node, 'Type') ?? '',
        target: getAttr(node, 'Target') ?? '',
        targetMode: getAttr(node, 'TargetMode'),
      }));
  }

  setRelationships(sourcePath: string, relationships: readonly Relationship[]): void {
    const elements = relationships.map((rel) =>
      createElement('Relationship', {
        Id: rel.id,
        Type: rel.type,
        Target: rel.target,
        ...(rel.targetMode ? { TargetMode: rel.targetMode } : {}),
      })
    );
    const root = createElement('Relationships', { xmlns: Namespaces.packageRelationships }, elements);
    this.setXml(this.getRelsPath(sourcePath), [createDeclaration(), root]);
  }

  /**
   * Adds a relationship with the next free `rIdN` and returns its id.
   */
  addRelationship(sourcePath: string, type: string, target: string): string {
    const relationships = this.getRelationships(sourcePath);
    const used = relationships
      .map((rel) => /^rId(\d+)$/.exec(rel.id))
      .map((match) => (match ? Number(match[1]) : 0));
    const id = `rId${Math.max(0, ...used) + 1}`;
    this.setRelationships(sourcePath, [...relationships, { id, type, target }]);
    return id;
  }

  removeRelationship(sourcePath: string, id: string): void {
    const relationships = this.getRelationships(sourcePath);
    this.setRelationships(
      sourcePath,
      relationships.filter((rel) => rel.id !== id)
    );
  }

  /**
   * Resolves a relationship target to a part path within the PPTX.
   */
  resolvePath(basePath: string, relativePath: string): string {
    if (relativePath.startsWith('/')) {
      return relativePath.slice(1);
    }

    const baseDir = basePath.substring(0, basePath.lastIndexOf('/') + 1);
    let resolved = baseDir + relativePath;

    while (resolved.includes('../')) {
      const next = resolved.replace(/[^/]+\/\.\.\//, '');
      if (next === resolved) {
        break;
      }
      resolved = next;
    }

    return resolved.replace(/^\/+/, '');
  }

  /**
   * Relationship target pointing from one part to another.
   */
  relativeTarget(fromPath: string, toPath: string): string {
    const fromDir = path.posix.dirname(fromPath);
    return path.posix.relative(fromDir === '.' ? '' : fromDir, toPath);
  }

  /**
   * Finds the main presentation part through _rels/.rels.
   */
  findPresentationPath(): string {
    const officeDocument = this.getRelationships('').find((rel) =>
      rel.type.endsWith('/officeDocument')
    );
    if (!officeDocument) {
      this.logger.warn('Root relationships missing, using default presentation path');
      return 'ppt/presentation.xml';
    }
    return this.resolvePath('', officeDocument.target);
  }

  addContentTypeOverride(partPath: string, contentType: string): void {
    const types = this.getContentTypesRoot();
    const partName = `/${partPath}`;
    const exists = getChildElements(types).some(
      (node) => getTagName(node) === 'Override' && getAttr(node, 'PartName') === partName
    );
    if (!exists) {
      types[getTagName(types) ?? 'Types'] = [
        ...getChildElements(types),
        createElement('Override', { PartName: partName, ContentType: contentType }),
      ];
      this.markDirty(CONTENT_TYPES_PATH);
    }
  }

  removeContentTypeOverride(partPath: string): void {
    const types = this.getContentTypesRoot();
    const partName = `/${partPath}`;
    const children = getChildElements(types);
    const kept = children.filter(
      (node) => !(getTagName(node) === 'Override' && getAttr(node, 'PartName') === partName)
    );
    if (kept.length !== children.length) {
      types[getTagName(types) ?? 'Types'] = kept;
      this.markDirty(CONTENT_TYPES_PATH);
    }
  }

  /**
   * Registers a default content type for a file extension if none exists.
   */
  ensureDefaultContentType(extension: string, contentType: string): void {
    const types = this.getContentTypesRoot();
    const ext = extension.toLowerCase();
    const children = getChildElements(types);
    const exists = children.some(
      (node) => getTagName(node) === 'Default' && getAttr(node, 'Extension')?.toLowerCase() === ext
    );
    if (!exists) {
      types[getTagName(types) ?? 'Types'] = [
        createElement('Default', { Extension: ext, ContentType: contentType }),
        ...children,
      ];
      this.markDirty(CONTENT_TYPES_PATH);
    }
  }

  private getContentTypesRoot(): OrderedXmlNode {
    const root = getRootElement(this.getXml(CONTENT_TYPES_PATH), 'Types');
    if (!root) {
      throw new PackageError('Malformed [Content_Types].xml');
    }
    return root;
  }

  /**
   * Writes modified parts back into the zip and produces the PPTX bytes.
   */
  async toBuffer(): Promise<Buffer> {
    for (const partPath of this.dirtyParts) {
      const document = this.parsedParts.get(partPath);
      if (document) {
        const xml = buildXml(document);
        this.zip.file(partPath, xml);
        this.rawParts.set(partPath, xml);
      }
    }
    this.dirtyParts.clear();

    this.logger.debug('Writing PPTX package');
    return this.zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  }

  async save(outputPath: string): Promise<void> {
    const data = await this.toBuffer();
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, data);
    this.logger.info('PPTX saved', { path: outputPath, size: data.length });
  }
}
