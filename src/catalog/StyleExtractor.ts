import * as fs from 'fs/promises';
import * as path from 'path';
import type { Slide } from '../core/Slide.js';
import type { Location } from '../types/index.js';
import { DEFAULT_HEURISTICS, DEFAULT_PICTURE_DIR, rectArea } from '../types/index.js';
import type { ImageExporter, StyleExtractionOptions } from '../types/index.js';
import { ImageDecoder } from '../utils/ImageDecoder.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { CShape, Style, type CShapeData } from './components.js';
import { areSameShape, getTextFromXml, removeCustDataLst } from './shapeXml.js';

interface ExtractedShape {
  key: string;
  data: CShapeData;
  area: number;
}

/**
 * Default picture writer: converts to PNG and writes the file, creating
 * its directory.
 */
export function createFileImageExporter(logger?: ILogger): ImageExporter {
  const decoder = new ImageDecoder({ logger });
  return async (image, outputPath) => {
    const png = await decoder.toPng(image);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, png);
  };
}

function safeFileName(name: string): string {
  return name.replace(/[^\w.-]+/g, '_');
}

/**
 * Turns a hand-designed slide into a catalog style.
 *
 * Every non-placeholder shape becomes a CShape. Text shapes start out as
 * CONTENT; those clearly smaller than the largest text shape are assumed
 * to be section titles, or numbers when their text is all digits. Shapes
 * that differ only in position and text are merged into one CShape with
 * several locations.
 */
export class StyleExtractor {
  private readonly logger: ILogger;
  private readonly pictureDir: string;
  private readonly titleAreaSlack: number;
  private readonly imageExporter: ImageExporter;

  constructor(options: StyleExtractionOptions = {}) {
    this.logger = options.logger ?? createLogger('warn', 'StyleExtractor');
    this.pictureDir = options.pictureDir ?? DEFAULT_PICTURE_DIR;
    this.titleAreaSlack = options.titleAreaSlack ?? DEFAULT_HEURISTICS.titleAreaSlack;
    this.imageExporter = options.imageExporter ?? createFileImageExporter(this.logger);
  }

  async extract(slide: Slide, styleName: string): Promise<Style> {
    const extracted: ExtractedShape[] = [];
    let maxTextArea = 0;

    const shapes = slide.shapes;
    for (let zorder = 0; zorder < shapes.length; zorder++) {
      const shape = shapes[zorder];
      if (shape.isPlaceholder) {
        continue;
      }
      const location: Location = { x: shape.left, y: shape.top, width: shape.width, height: shape.height };
      const area = rectArea(location);
      const key = `${shape.name}_${zorder}`;
      const base = { zorder, path: null, location: [location] };

      const relationshipId = shape.kind === 'picture' ? shape.imageRelationshipId : undefined;
      if (relationshipId !== undefined) {
        const picturePath = path.posix.join(this.pictureDir, `${safeFileName(shape.name)}_${zorder}.png`);
        await this.imageExporter(await slide.getImageData(relationshipId), picturePath);
        extracted.push({ key, area, data: { ...base, xml: null, content_type: 'picture', path: picturePath } });
        this.logger.debug('Exported picture', { shape: shape.name, path: picturePath });
      } else if (shape.hasTextFrame) {
        const hasText = shape.text.trim() !== '';
        // Empty frames (backgrounds, decorations) do not count towards the body size.
        if (hasText) {
          maxTextArea = Math.max(maxTextArea, area);
        }
        const xml = removeCustDataLst(shape.toXml());
        extracted.push({ key, area, data: { ...base, xml, content_type: hasText ? 'content' : null } });
      } else {
        extracted.push({ key, area, data: { ...base, xml: removeCustDataLst(shape.toXml()), content_type: null } });
      }
    }

    this.refineContentTypes(extracted, maxTextArea);
    const merged = this.mergeDuplicates(extracted);

    const style = new Style(styleName);
    for (const entry of merged) {
      style.addShape(entry.key, CShape.fromJSON(entry.data));
    }
    this.logger.debug('Extracted style', { style: styleName, shapes: style.size, source: extracted.length });
    return style;
  }

  /**
   * CONTENT shapes well below the largest text area become TITLE, or
   * NUMBER when all digits.
   */
  private refineContentTypes(extracted: ExtractedShape[], maxTextArea: number): void {
    for (const entry of extracted) {
      const { data } = entry;
      if (data.content_type !== 'content' || data.xml === null) {
        continue;
      }
      if (entry.area < maxTextArea - this.titleAreaSlack) {
        data.content_type = /^\d+$/.test(getTextFromXml(data.xml).trim()) ? 'number' : 'title';
      }
    }
  }

  private mergeDuplicates(extracted: ExtractedShape[]): ExtractedShape[] {
    const removed = new Set<ExtractedShape>();
    for (let i = 0; i < extracted.length; i++) {
      const first = extracted[i];
      const firstXml = first.data.xml;
      if (firstXml === null || removed.has(first)) {
        continue;
      }
      for (let j = i + 1; j < extracted.length; j++) {
        const other = extracted[j];
        if (other.data.xml === null || removed.has(other)) {
          continue;
        }
        if (other.data.content_type === first.data.content_type && areSameShape(firstXml, other.data.xml)) {
          first.data.location.push(...other.data.location);
          other.data.xml = null;
          removed.add(other);
        }
      }
    }
    return extracted.filter((entry) => !removed.has(entry));
  }
}
