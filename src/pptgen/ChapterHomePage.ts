import type { Shape } from '../core/Shape.js';
import type { Heading } from '../document/Heading.js';
import { Page } from './Page.js';

const CHAPTER_NUMBER_PATTERNS = [/^0\d+$/, /^part/i, /^\d+\.$/];

function looksLikeChapterNumber(text: string): boolean {
  return CHAPTER_NUMBER_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Clones the chapter home template for one chapter: title plus chapter
 * number.
 */
export class ChapterHomePage extends Page {
  generate(chapter: Heading, chapterNumber: number, templateIndex: number, slideIndex: number): void {
    const slide = this.presentation.duplicateSlide(templateIndex);
    try {
      const title = this.requireTitle(slide, 'chapter home slide');
      this.setTitle(title, chapter.elementText);

      const numberShape = this.findChapterNumberShape(slide.shapes, title);
      if (numberShape) {
        numberShape.setText(this.session.formatChapterNumber(chapterNumber));
      } else {
        this.logger.warn('No chapter number shape above the title', { chapter: chapter.elementText });
      }
    } catch (error) {
      this.discardSlide(slide);
      throw error;
    }

    this.presentation.moveSlide(slide, slideIndex);
    this.logger.debug('Generated chapter home page', { index: slideIndex, chapter: chapterNumber });
  }

  /**
   * Nearest text shape above the title. A closer shape that already reads
   * like a chapter number ends the search.
   */
  findChapterNumberShape(shapes: readonly Shape[], title: Shape): Shape | undefined {
    let chosen: Shape | undefined;
    let minDistance = Infinity;
    for (const shape of shapes) {
      if (shape.element === title.element || !shape.hasTextFrame || shape.top >= title.top) {
        continue;
      }
      const gap = title.top - shape.top;
      if (gap >= minDistance) {
        continue;
      }
      chosen = shape;
      if (looksLikeChapterNumber(shape.text.trim())) {
        break;
      }
      minDistance = gap;
    }
    return chosen;
  }
}
