import type { Heading } from '../document/Heading.js';
import { Page } from './Page.js';

/**
 * Writes the document title into the cover slide, in place.
 */
export class CoverPage extends Page {
  generate(main: Heading, coverPageIndex = this.options.coverPageIndex): void {
    const slide = this.presentation.getSlide(coverPageIndex);
    const title = main.elementText.trim() ? main.elementText : this.options.coverTitleFallback;
    this.setTitle(this.requireTitle(slide, 'cover slide'), title);
    this.logger.debug('Generated cover page', { index: coverPageIndex, title });
  }
}
