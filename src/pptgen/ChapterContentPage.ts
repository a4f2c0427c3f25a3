import * as fs from 'fs/promises';
import type { ComponentsManager } from '../catalog/ComponentsManager.js';
import { layoutNameForPoints, type CShape, type Style } from '../catalog/components.js';
import { addShapeByXml } from '../catalog/shapeXml.js';
import type { Slide } from '../core/Slide.js';
import type { Heading } from '../document/Heading.js';
import type { Location } from '../types/index.js';
import { PPTGenError, PPTTemplateError } from '../utils/errors.js';
import { isImagePath } from '../utils/ImageDecoder.js';
import { Page, type PageContext } from './Page.js';

function assertNever(value: never): never {
  throw new PPTGenError(`Unhandled content type: ${String(value)}`);
}

/**
 * Section titles and bodies of a chapter, one entry per child.
 */
interface SectionContent {
  titles: string[];
  texts: string[];
}

/**
 * Lays out one chapter on a new slide using a random catalog style for
 * its section count.
 *
 * Style shapes are placed in z-order; a shape with several locations is
 * placed once per location, location `i` taking section `i`.
 */
export class ChapterContentPage extends Page {
  private readonly catalog: ComponentsManager;

  constructor(context: PageContext, catalog: ComponentsManager) {
    super(context);
    this.catalog = catalog;
  }

  async generate(chapter: Heading, templateIndex: number, slideIndex: number): Promise<void> {
    const slideType = chapter.length;
    const layoutName = layoutNameForPoints(slideType);
    if (slideType > this.options.heuristics.maxPoints || layoutName === undefined) {
      throw new PPTGenError(`ChapterContentPage: Invalid slide type: ${slideType}`, {
        chapter: chapter.elementText,
      });
    }

    const content: SectionContent = {
      titles: chapter.contents.map((child) => child.elementText),
      texts: chapter.contents.map((child) => child.text),
    };

    const style = this.catalog.getRandomStyle(layoutName);
    if (!style) {
      throw new PPTGenError(`ChapterContentPage: No style available for layout '${layoutName}'`, {
        layout: layoutName,
      });
    }
    this.logger.debug('Chose style', { layout: layoutName, style: style.name });
    this.validateStyle(style, content);

    const layoutPath = this.presentation.getSlide(templateIndex).layoutPath;
    if (!layoutPath) {
      throw new PPTTemplateError(`ChapterContentPage: content slide has no layout, index: ${templateIndex}`);
    }

    const slide = this.presentation.addSlide(layoutPath);
    try {
      const title = this.findTitle(slide);
      if (title) {
        this.setTitle(title, chapter.elementText);
      } else {
        this.logger.warn('Content slide layout has no title placeholder', { layout: layoutPath });
      }

      for (const [name, shape] of style.sortedShapes()) {
        for (let index = 0; index < shape.locations.length; index++) {
          await this.placeShape(slide, name, shape, index, shape.locations[index], content);
        }
      }
    } catch (error) {
      this.discardSlide(slide);
      throw error;
    }

    this.presentation.moveSlide(slide, slideIndex);
    this.logger.debug('Generated chapter content page', { index: slideIndex, style: style.name });
  }

  /**
   * Checks the style against the chapter before anything is written.
   */
  private validateStyle(style: Style, content: SectionContent): void {
    for (const [name, shape] of style.shapes) {
      const locations = shape.locations.length;
      switch (shape.contentType) {
        case 'content':
          if (content.texts.length !== locations) {
            throw new PPTGenError(
              `ChapterContentPage: Text content must be equal to the number of locations: ${content.texts.length} != ${locations}`,
              { style: style.name, shape: name }
            );
          }
          break;
        case 'title':
          if (content.titles.length !== locations) {
            throw new PPTGenError(
              `ChapterContentPage: Title must be equal to the number of locations: ${content.titles.length} != ${locations}`,
              { style: style.name, shape: name }
            );
          }
          break;
        case 'picture':
          if (shape.path === null) {
            throw new PPTGenError(`ChapterContentPage: Picture path is None for shape '${name}'`, {
              style: style.name,
            });
          }
          break;
        case 'number':
        case null:
          break;
        default:
          assertNever(shape.contentType);
      }
    }
  }

  private async placeShape(
    slide: Slide,
    name: string,
    shape: CShape,
    index: number,
    location: Location,
    content: SectionContent
  ): Promise<void> {
    switch (shape.contentType) {
      case 'content':
        addShapeByXml(slide, this.requireXml(shape, name), location, slide.nextShapeId(), name, content.texts[index])
          .normalizeAlignment();
        return;
      case 'title':
        addShapeByXml(slide, this.requireXml(shape, name), location, slide.nextShapeId(), name, content.titles[index])
          .normalizeAlignment();
        return;
      case 'picture': {
        const imagePath = await this.resolvePicture(shape, name);
        slide.addPicture(await fs.readFile(imagePath), location, name);
        return;
      }
      case 'number':
        addShapeByXml(
          slide,
          this.requireXml(shape, name),
          location,
          slide.nextShapeId(),
          name,
          String(index + 1).padStart(2, '0')
        );
        return;
      case null:
        addShapeByXml(slide, this.requireXml(shape, name), location, slide.nextShapeId(), name);
        return;
      default:
        assertNever(shape.contentType);
    }
  }

  private requireXml(shape: CShape, name: string): string {
    if (shape.xml === null) {
      throw new PPTGenError(`ChapterContentPage: Shape '${name}' has no XML`, { contentType: shape.contentType });
    }
    return shape.xml;
  }

  /**
   * A literal image path, or a pick from a directory of candidates.
   */
  private async resolvePicture(shape: CShape, name: string): Promise<string> {
    if (shape.path === null) {
      throw new PPTGenError(`ChapterContentPage: Picture path is None for shape '${name}'`);
    }
    return isImagePath(shape.path) ? shape.path : this.session.pickPicture(shape.path);
  }
}
