import { PPTTemplateError } from '../utils/errors.js';
import { Page } from './Page.js';

/**
 * Adds the closing slide on the end template's layout.
 */
export class EndPage extends Page {
  generate(templateIndex: number, slideIndex: number, text = this.options.endPageText): void {
    const template = this.presentation.getSlide(templateIndex);
    const layoutPath = template.layoutPath;
    if (!layoutPath) {
      throw new PPTTemplateError(`EndPage: end slide has no layout, end slide index: ${templateIndex}`);
    }

    const slide = this.presentation.addSlide(layoutPath);
    try {
      this.setTitle(this.requireTitle(slide, `end slide, end slide index: ${templateIndex}`), text);
    } catch (error) {
      this.discardSlide(slide);
      throw error;
    }
    this.presentation.moveSlide(slide, slideIndex);
    this.logger.debug('Generated end page', { index: slideIndex });
  }
}
