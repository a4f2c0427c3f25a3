import type { Shape } from '../core/Shape.js';
import type { Slide } from '../core/Slide.js';
import type { Heading } from '../document/Heading.js';
import { distance, intervalOverlap } from '../types/index.js';
import { PPTGenError, PPTTemplateError } from '../utils/errors.js';
import { Page } from './Page.js';

/**
 * Direction catalog entries run in. Labels sit below numbers in a
 * horizontal catalog and to their right in a vertical one.
 */
export type CatalogDirection = 'horizontal' | 'vertical' | 'undefined';

export interface ShapeInfo {
  shape: Shape;
  text: string | null;
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * One table-of-contents entry: chapter number, chapter title and an
 * optional background shape behind them.
 */
export interface CatalogItem {
  number: ShapeInfo;
  label: ShapeInfo;
  background?: ShapeInfo;
}

function describeShape(info: ShapeInfo): Record<string, unknown> {
  return {
    name: info.shape.name,
    id: info.shape.id,
    text: info.text,
    left: info.left,
    top: info.top,
    width: info.width,
    height: info.height,
  };
}

function cornerDistance(a: ShapeInfo, b: ShapeInfo): number {
  return distance(a.left, a.top, b.left, b.top);
}

/**
 * Fills the table-of-contents slide.
 *
 * Number shapes are recognised by their text (short, numeric, within the
 * configured bounds) and each is paired with the nearest text shape in the
 * direction the entries flow. Surplus entries are deleted; when there are
 * too few, the slide is cloned and the clone takes the remaining chapters.
 */
export class CatalogPage extends Page {
  /**
   * @returns index of the last catalog slide
   */
  generate(chapters: readonly Heading[], catalogPageIndex = this.options.catalogPageIndex, beginNumber = 1): number {
    if (chapters.length === 0) {
      throw new PPTGenError('Catalog page must have content.');
    }

    const slide = this.presentation.getSlide(catalogPageIndex);
    let items = this.findCatalogItems(slide);

    if (items.length > chapters.length) {
      for (const item of items.slice(chapters.length)) {
        for (const info of [item.number, item.label, item.background]) {
          if (info) {
            slide.removeShape(info.shape);
          }
        }
      }
      items = items.slice(0, chapters.length);
    }

    items.forEach((item, i) => {
      item.label.shape.setText(chapters[i].elementText);
      item.number.shape.setText(String(beginNumber + i).padStart(2, '0'));
    });
    this.logger.debug('Filled catalog page', { index: catalogPageIndex, from: beginNumber, entries: items.length });

    if (items.length < chapters.length) {
      const copy = this.presentation.duplicateSlide(catalogPageIndex);
      this.presentation.moveSlide(copy, catalogPageIndex + 1);
      this.logger.info('Catalog overflows onto a new slide', {
        index: catalogPageIndex + 1,
        remaining: chapters.length - items.length,
      });
      return this.generate(chapters.slice(items.length), catalogPageIndex + 1, beginNumber + items.length);
    }
    return catalogPageIndex;
  }

  /**
   * Pairs every number shape on the slide with its label, sorted by number.
   */
  findCatalogItems(slide: Slide): CatalogItem[] {
    const { catalogNumberMax, catalogNumberMaxLength, backgroundDistanceFactor } = this.options.heuristics;

    const allShapes: ShapeInfo[] = slide.shapes
      .filter((shape) => !shape.isPlaceholder)
      .map((shape) => ({
        shape,
        text: shape.hasTextFrame ? shape.text.trim() : null,
        left: shape.left,
        top: shape.top,
        width: shape.width,
        height: shape.height,
      }));
    const textShapes = allShapes.filter((info) => info.text !== null);

    const numbered: Array<{ info: ShapeInfo; value: number }> = [];
    for (const info of textShapes) {
      const text = info.text ?? '';
      if (text.length > catalogNumberMaxLength || !/^\d+\.?$/.test(text)) {
        continue;
      }
      const value = parseInt(text, 10);
      if (value <= catalogNumberMax) {
        numbered.push({ info, value });
      }
    }
    numbered.sort((a, b) => a.value - b.value);
    const numberShapes = numbered.map((entry) => entry.info);

    if (numberShapes.length === 0) {
      throw new PPTTemplateError('Catalog page must have at least one chapter number', { slide: slide.partPath });
    }
    const direction = numberShapes.length === 1 ? 'undefined' : this.layoutDirection(numberShapes);

    const labels = textShapes.filter((info) => !numberShapes.includes(info));
    const unclaimed = new Set(allShapes);
    const items: CatalogItem[] = [];

    for (const number of numberShapes) {
      const label = this.closestLabel(number, labels, direction);
      if (!label) {
        throw new PPTTemplateError('No chapter title shape found for a catalog number', {
          direction,
          numberShape: describeShape(number),
          candidates: labels.map(describeShape),
        });
      }
      labels.splice(labels.indexOf(label), 1);
      unclaimed.delete(number);
      unclaimed.delete(label);
      items.push({ number, label });
    }

    if (unclaimed.size >= numberShapes.length) {
      for (const item of items) {
        let best: ShapeInfo | undefined;
        let bestDistance = Infinity;
        // The running minimum includes candidates that fail the height gate,
        // so a closer ungated shape hides gated ones met after it.
        for (const candidate of unclaimed) {
          const d = cornerDistance(item.number, candidate);
          if (d < bestDistance) {
            bestDistance = d;
            if (d < candidate.height * backgroundDistanceFactor) {
              best = candidate;
            }
          }
        }
        if (best) {
          item.background = best;
          unclaimed.delete(best);
        }
      }
    }

    return items;
  }

  /**
   * The axis along which consecutive numbers are further apart on average.
   */
  layoutDirection(numberShapes: readonly ShapeInfo[]): CatalogDirection {
    if (numberShapes.length < 2) {
      throw new PPTTemplateError(
        'To judge the layout direction, catalog page must have at least two chapter numbers'
      );
    }
    const sorted = [...numberShapes].sort((a, b) => a.left - b.left || a.top - b.top);
    let horizontal = 0;
    let vertical = 0;
    for (let i = 0; i < sorted.length - 1; i++) {
      horizontal += Math.abs(sorted[i + 1].left - sorted[i].left);
      vertical += Math.abs(sorted[i + 1].top - sorted[i].top);
    }
    return horizontal > vertical ? 'horizontal' : 'vertical';
  }

  private closestLabel(
    number: ShapeInfo,
    labels: readonly ShapeInfo[],
    direction: CatalogDirection
  ): ShapeInfo | undefined {
    let closest: ShapeInfo | undefined;
    let minDistance = Infinity;
    for (const label of labels) {
      if (!this.isLabelCandidate(number, label, direction)) {
        continue;
      }
      const d = cornerDistance(number, label);
      if (d < minDistance) {
        minDistance = d;
        closest = label;
      }
    }
    return closest;
  }

  private isLabelCandidate(number: ShapeInfo, label: ShapeInfo, direction: CatalogDirection): boolean {
    switch (direction) {
      case 'horizontal':
        return label.top > number.top && intervalOverlap(number.left, number.width, label.left, label.width) > 0;
      case 'vertical':
        return label.left > number.left && intervalOverlap(number.top, number.height, label.top, label.height) > 0;
      case 'undefined':
        return true;
    }
  }
}
