import { ComponentsManager } from '../catalog/ComponentsManager.js';
import { Presentation } from '../core/Presentation.js';
import { Heading } from '../document/Heading.js';
import { MarkdownDocument } from '../document/MarkdownDocument.js';
import { loadMarkdown, type MarkdownSource } from '../parsers/MarkdownLoader.js';
import type { GenerationOptions, ResolvedGenerationOptions } from '../types/index.js';
import { resolveGenerationOptions } from '../types/index.js';
import { MarkdownDocumentError, PPTTemplateError } from '../utils/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { CatalogPage } from './CatalogPage.js';
import { ChapterContentPage } from './ChapterContentPage.js';
import { ChapterHomePage } from './ChapterHomePage.js';
import { CoverPage } from './CoverPage.js';
import { EndPage } from './EndPage.js';
import { GenerationSession } from './GenerationSession.js';
import type { PageContext } from './Page.js';

/**
 * Template slides a deck is built from, in order.
 */
export const TEMPLATE_SLIDE_COUNT = 5;

/**
 * Builds a deck from a Markdown outline and a template presentation.
 *
 * The template holds, in order, a cover, a table of contents, a chapter
 * home page, a chapter content page and an end page. Cover and table of
 * contents are filled in place; the other three are used as sources for
 * new slides and removed at the end.
 *
 * @example
 * ```typescript
 * const catalog = await ComponentsManager.fromFile('components/shapes/shapes.json');
 * const generator = createGenerator(catalog, { logLevel: 'info' });
 * const prs = await generator.generate(await Presentation.open('template.pptx'), parseMarkdown(text));
 * await prs.save('deck.pptx');
 * ```
 */
export class PPTGen {
  private readonly catalog: ComponentsManager;
  private readonly options: ResolvedGenerationOptions;
  private readonly logger: ILogger;

  constructor(catalog: ComponentsManager, options: GenerationOptions = {}) {
    this.catalog = catalog;
    this.options = resolveGenerationOptions(options);
    this.logger = this.options.logger ?? createLogger(this.options.logLevel, 'PPTGen');
  }

  /**
   * Fills `presentation` in place and returns it. On error the
   * presentation is left part-written and should be discarded.
   */
  async generate(presentation: Presentation, document: MarkdownDocument): Promise<Presentation> {
    if (presentation.slideCount < TEMPLATE_SLIDE_COUNT) {
      throw new PPTTemplateError(
        `Template presentation must have at least ${TEMPLATE_SLIDE_COUNT} slides, got ${presentation.slideCount}`
      );
    }

    const hasLevelOne = [...document.descendants].some((node) => node instanceof Heading && node.level === 1);
    if (!hasLevelOne) {
      throw new MarkdownDocumentError('Markdown document must have at least one level 1 heading');
    }
    const main = document.main;
    if (main === null) {
      throw new MarkdownDocumentError('Markdown document must have a main heading');
    }

    const context: PageContext = {
      presentation,
      session: new GenerationSession(this.options.random),
      options: this.options,
      logger: this.logger,
    };

    new CoverPage(context).generate(main);

    const chapters = document.chapters;
    if (chapters.length === 0) {
      throw new MarkdownDocumentError('Markdown document must have at least one level 2 heading');
    }

    const catalogLastIndex = new CatalogPage(context).generate(chapters);

    const homeTemplateIndex = catalogLastIndex + 1;
    const contentTemplateIndex = homeTemplateIndex + 1;
    const endTemplateIndex = contentTemplateIndex + 1;
    let slideIndex = endTemplateIndex + 1;

    const homePage = new ChapterHomePage(context);
    const contentPage = new ChapterContentPage(context, this.catalog);
    for (let i = 0; i < chapters.length; i++) {
      homePage.generate(chapters[i], i + 1, homeTemplateIndex, slideIndex);
      slideIndex++;
      await contentPage.generate(chapters[i], contentTemplateIndex, slideIndex);
      slideIndex++;
    }

    new EndPage(context).generate(endTemplateIndex, slideIndex);

    this.removeTemplateSlides(presentation, [homeTemplateIndex, contentTemplateIndex, endTemplateIndex]);
    this.logger.info('Generated deck', { chapters: chapters.length, slides: presentation.slideCount });
    return presentation;
  }

  /**
   * Back to front, so earlier indices stay valid.
   */
  private removeTemplateSlides(presentation: Presentation, indices: number[]): void {
    for (const index of [...indices].sort((a, b) => b - a)) {
      presentation.removeSlide(index);
    }
    this.logger.debug('Removed template slides', { indices });
  }
}

export function createGenerator(catalog: ComponentsManager, options?: GenerationOptions): PPTGen {
  return new PPTGen(catalog, options);
}

export interface GenerateDeckInput {
  /** Markdown text, a UTF-8 buffer, a `.md` path or a parsed document. */
  markdown: MarkdownSource | MarkdownDocument;
  /** Template path, bytes or an opened presentation. */
  template: string | Buffer | Presentation;
  /** Catalog JSON path or a loaded catalog. */
  catalog: string | ComponentsManager;
  /** Where to save the deck, if anywhere. */
  output?: string;
  options?: GenerationOptions;
}

/**
 * Loads every input, generates the deck and optionally saves it.
 */
export async function generateDeck(input: GenerateDeckInput): Promise<Presentation> {
  const options = input.options ?? {};
  const logger = options.logger ?? createLogger(options.logLevel ?? 'warn', 'slidesmith');

  const document =
    input.markdown instanceof MarkdownDocument
      ? input.markdown
      : await loadMarkdown(input.markdown, logger.child('MarkdownParser'));
  const presentation =
    input.template instanceof Presentation
      ? input.template
      : await Presentation.open(input.template, logger.child('Presentation'));
  const catalog =
    input.catalog instanceof ComponentsManager
      ? input.catalog
      : await ComponentsManager.fromFile(input.catalog, {
          logger: logger.child('ComponentsManager'),
          random: options.random,
        });

  await new PPTGen(catalog, { ...options, logger }).generate(presentation, document);
  if (input.output) {
    await presentation.save(input.output);
    logger.info('Saved deck', { path: input.output });
  }
  return presentation;
}
