import { describe, it, expect } from 'vitest';
import { ComponentsManager } from '../../src/catalog/index.js';
import { Presentation } from '../../src/core/Presentation.js';
import { Heading } from '../../src/document/Heading.js';
import { parseMarkdown } from '../../src/parsers/index.js';
import {
  CatalogPage,
  ChapterContentPage,
  ChapterHomePage,
  CoverPage,
  EndPage,
  GenerationSession,
  type PageContext,
} from '../../src/pptgen/index.js';
import { resolveGenerationOptions } from '../../src/types/index.js';
import { PPTGenError, PPTTemplateError } from '../../src/utils/errors.js';
import { createLogger } from '../../src/utils/Logger.js';
import {
  buildDeck,
  buildTemplateDeck,
  placeholder,
  rectangle,
  sampleCatalogData,
  textBox,
} from '../helpers/pptxFixture.js';

const ENTRY_SIZE = { width: 1500000, height: 500000 };
const SMALL_DOT = rectangle(30, 'Dot', { x: 1200000, y: 900000, width: 100000, height: 100000 });
const PANEL = rectangle(31, 'Panel', { x: 800000, y: 600000, width: 2000000, height: 1000000 });

/**
 * Two catalog entries plus decorations above them, in the given z-order.
 */
function decoratedCatalogDeck(decorations: string[]): Promise<Buffer> {
  return buildDeck([
    {
      shapes: [
        placeholder(2, 'Title 1', 'title', 'Contents'),
        ...decorations,
        textBox(10, 'Number 1', '01', { x: 1000000, y: 1000000, ...ENTRY_SIZE }),
        textBox(11, 'Number 2', '02', { x: 4000000, y: 1000000, ...ENTRY_SIZE }),
        textBox(20, 'Label 1', 'Intro', { x: 1000000, y: 2000000, ...ENTRY_SIZE }),
        textBox(21, 'Label 2', 'Outro', { x: 4000000, y: 2000000, ...ENTRY_SIZE }),
      ],
    },
  ]);
}

async function createContext(random: () => number = () => 0, deck?: Buffer): Promise<PageContext> {
  return {
    presentation: await Presentation.open(deck ?? (await buildTemplateDeck())),
    session: new GenerationSession(random),
    options: resolveGenerationOptions({ random }),
    logger: createLogger('silent', 'test'),
  };
}

function chaptersOf(count: number, sections = 2): Heading[] {
  const lines = ['# Deck'];
  for (let c = 1; c <= count; c++) {
    lines.push(`## Chapter ${c}`);
    for (let s = 1; s <= sections; s++) {
      lines.push(`### Section ${c}.${s}`, '', `Body ${c}.${s}`, '');
    }
  }
  return parseMarkdown(lines.join('\n')).chapters;
}

describe('Page generators', () => {
  describe('CoverPage', () => {
    it('should write the title in place', async () => {
      const context = await createContext();
      const main = parseMarkdown('# My deck\n\n## One').main;
      expect(main).not.toBeNull();
      if (main) {
        new CoverPage(context).generate(main);
      }
      expect(context.presentation.getSlide(0).shapes[0].text).toBe('My deck');
      expect(context.presentation.slideCount).toBe(5);
    });

    it('should fall back to a default title', async () => {
      const context = await createContext();
      new CoverPage(context).generate(new Heading(1, '  '));
      expect(context.presentation.getSlide(0).shapes[0].text).toBe('Presentation Title');
    });
  });

  describe('CatalogPage', () => {
    it('should pair numbers with the labels below them', async () => {
      const context = await createContext();
      const page = new CatalogPage(context);
      const items = page.findCatalogItems(context.presentation.getSlide(1));
      expect(items.map((item) => [item.number.shape.name, item.label.shape.name])).toEqual([
        ['Number 1', 'Label 1'],
        ['Number 2', 'Label 2'],
        ['Number 3', 'Label 3'],
      ]);
      expect(items.every((item) => item.background === undefined)).toBe(true);
    });

    it('should attach a background within reach of the number', async () => {
      const context = await createContext(() => 0, await decoratedCatalogDeck([PANEL, SMALL_DOT]));
      const items = new CatalogPage(context).findCatalogItems(context.presentation.getSlide(0));
      expect(items.map((item) => item.label.shape.name)).toEqual(['Label 1', 'Label 2']);
      expect(items.map((item) => item.background?.shape.name)).toEqual(['Panel', undefined]);
    });

    it('should let a closer out-of-reach shape hide a background met later', async () => {
      const context = await createContext(() => 0, await decoratedCatalogDeck([SMALL_DOT, PANEL]));
      const items = new CatalogPage(context).findCatalogItems(context.presentation.getSlide(0));
      expect(items.map((item) => item.background?.shape.name)).toEqual([undefined, undefined]);
    });

    it('should judge the layout direction', async () => {
      const context = await createContext();
      const page = new CatalogPage(context);
      const items = page.findCatalogItems(context.presentation.getSlide(1));
      expect(page.layoutDirection(items.map((item) => item.number))).toBe('horizontal');
      expect(page.layoutDirection(items.map((item) => item.label))).toBe('horizontal');
      expect(() => page.layoutDirection(items.slice(0, 1).map((item) => item.number))).toThrow(PPTTemplateError);
    });

    it('should remove surplus entries', async () => {
      const context = await createContext();
      const last = new CatalogPage(context).generate(chaptersOf(2));
      expect(last).toBe(1);
      expect(context.presentation.getSlide(1).shapes.map((shape) => shape.text)).toEqual([
        'Contents',
        '01',
        'Chapter 1',
        '02',
        'Chapter 2',
      ]);
    });

    it('should overflow onto a copy of the slide', async () => {
      const context = await createContext();
      const last = new CatalogPage(context).generate(chaptersOf(5));
      expect(last).toBe(2);
      expect(context.presentation.slideCount).toBe(6);
      expect(context.presentation.getSlide(1).shapes.map((shape) => shape.text)).toEqual([
        'Contents',
        '01',
        'Chapter 1',
        '02',
        'Chapter 2',
        '03',
        'Chapter 3',
      ]);
      expect(context.presentation.getSlide(2).shapes.map((shape) => shape.text)).toEqual([
        'Contents',
        '04',
        'Chapter 4',
        '05',
        'Chapter 5',
      ]);
    });

    it('should require chapters and number shapes', async () => {
      const context = await createContext();
      const page = new CatalogPage(context);
      expect(() => page.generate([])).toThrow('Catalog page must have content.');
      expect(() => page.generate(chaptersOf(1), 0)).toThrow('Catalog page must have at least one chapter number');
    });
  });

  describe('ChapterHomePage', () => {
    it('should fill a copy of the template and move it into place', async () => {
      const context = await createContext(() => 0.5);
      new ChapterHomePage(context).generate(chaptersOf(1)[0], 4, 2, 1);

      const { presentation } = context;
      expect(presentation.slideCount).toBe(6);
      expect(presentation.getSlide(1).shapes.map((shape) => shape.text)).toEqual([
        'Chapter 1',
        'PART 04',
        'Footnote',
      ]);
      expect(presentation.getSlide(3).shapes[1].text).toBe('01');
    });

    it('should pick the nearest text shape above the title', async () => {
      const context = await createContext();
      const slide = context.presentation.getSlide(2);
      const title = slide.shapes[0];
      expect(new ChapterHomePage(context).findChapterNumberShape(slide.shapes, title)?.name).toBe('Chapter Number');
    });
  });

  describe('ChapterContentPage', () => {
    it('should lay out every section with a catalog style', async () => {
      const context = await createContext();
      const catalog = new ComponentsManager();
      catalog.loadFromJSON(sampleCatalogData([2]));

      await new ChapterContentPage(context, catalog).generate(chaptersOf(1)[0], 3, 2);

      const slide = context.presentation.getSlide(2);
      expect(context.presentation.slideCount).toBe(6);
      expect(slide.findPlaceholder(['title'])?.text).toBe('Chapter 1');
      const placed = slide.shapes.filter((shape) => !shape.isPlaceholder);
      expect(placed.map((shape) => [shape.name, shape.text])).toEqual([
        ['Background_0', ''],
        ['Title_1', 'Section 1.1'],
        ['Title_1', 'Section 1.2'],
        ['Body_2', 'Body 1.1'],
        ['Body_2', 'Body 1.2'],
        ['Number_3', '01'],
        ['Number_3', '02'],
      ]);
      expect(placed[2].rect).toEqual({ x: 3300000, y: 1500000, width: 2500000, height: 500000 });
      expect(new Set(slide.shapes.map((shape) => shape.id)).size).toBe(slide.shapes.length);
    });

    it('should reject a style whose locations do not match the sections', async () => {
      const context = await createContext();
      const catalog = new ComponentsManager();
      catalog.loadFromJSON({ two_points: sampleCatalogData([3]).three_points });

      await expect(new ChapterContentPage(context, catalog).generate(chaptersOf(1)[0], 3, 2)).rejects.toThrow(
        'Title must be equal to the number of locations: 2 != 3'
      );
      expect(context.presentation.slideCount).toBe(5);
    });

    it('should reject unsupported section counts and missing styles', async () => {
      const context = await createContext();
      const page = new ChapterContentPage(context, new ComponentsManager());
      await expect(page.generate(chaptersOf(1, 5)[0], 3, 2)).rejects.toThrow('Invalid slide type: 5');
      await expect(page.generate(chaptersOf(1, 0)[0], 3, 2)).rejects.toThrow(PPTGenError);
      await expect(page.generate(chaptersOf(1)[0], 3, 2)).rejects.toThrow("No style available for layout 'two_points'");
      expect(context.presentation.slideCount).toBe(5);
    });
  });

  describe('EndPage', () => {
    it('should add the closing slide', async () => {
      const context = await createContext();
      new EndPage(context).generate(4, 5, 'Questions?');
      const slide = context.presentation.getSlide(5);
      expect(slide.partPath).toBe('ppt/slides/slide6.xml');
      expect(slide.findPlaceholder(['title'])?.text).toBe('Questions?');
    });
  });
});
