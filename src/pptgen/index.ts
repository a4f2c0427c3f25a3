export { PPTGen, createGenerator, generateDeck, TEMPLATE_SLIDE_COUNT } from './PPTGen.js';
export type { GenerateDeckInput } from './PPTGen.js';
export { GenerationSession, CHAPTER_NUMBER_STYLES, formatChapterNumber } from './GenerationSession.js';
export type { ChapterNumberStyle } from './GenerationSession.js';
export { Page, TITLE_PLACEHOLDER_TYPES } from './Page.js';
export type { PageContext } from './Page.js';
export { CoverPage } from './CoverPage.js';
export { CatalogPage } from './CatalogPage.js';
export type { CatalogDirection, CatalogItem, ShapeInfo } from './CatalogPage.js';
export { ChapterHomePage } from './ChapterHomePage.js';
export { ChapterContentPage } from './ChapterContentPage.js';
export { EndPage } from './EndPage.js';
