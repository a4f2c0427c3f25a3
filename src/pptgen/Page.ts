import type { Presentation } from '../core/Presentation.js';
import type { Shape } from '../core/Shape.js';
import type { Slide } from '../core/Slide.js';
import type { PlaceholderType, ResolvedGenerationOptions } from '../types/index.js';
import { PPTTemplateError } from '../utils/errors.js';
import type { ILogger } from '../utils/Logger.js';
import type { GenerationSession } from './GenerationSession.js';

export const TITLE_PLACEHOLDER_TYPES: readonly PlaceholderType[] = ['title', 'ctrTitle'];

/**
 * What every page generator works against during one `generate` call.
 */
export interface PageContext {
  presentation: Presentation;
  session: GenerationSession;
  options: ResolvedGenerationOptions;
  logger: ILogger;
}

/**
 * Base class for the page generators.
 */
export abstract class Page {
  protected readonly presentation: Presentation;
  protected readonly session: GenerationSession;
  protected readonly options: ResolvedGenerationOptions;
  protected readonly logger: ILogger;

  constructor(context: PageContext) {
    this.presentation = context.presentation;
    this.session = context.session;
    this.options = context.options;
    this.logger = context.logger.child(this.constructor.name);
  }

  protected findTitle(slide: Slide): Shape | undefined {
    return slide.findPlaceholder(TITLE_PLACEHOLDER_TYPES);
  }

  protected requireTitle(slide: Slide, description: string): Shape {
    const title = this.findTitle(slide);
    if (!title) {
      throw new PPTTemplateError(`${this.constructor.name}: No title placeholder found in ${description}`, {
        slide: slide.partPath,
      });
    }
    return title;
  }

  /**
   * Sets a title placeholder's text on one line.
   */
  protected setTitle(title: Shape, text: string): void {
    title.setText(text);
    title.setWordWrap(false);
  }

  /**
   * Removes a slide that was added during a failed step.
   */
  protected discardSlide(slide: Slide): void {
    const index = this.presentation.indexOf(slide);
    if (index >= 0) {
      this.presentation.removeSlide(index);
    }
  }
}
