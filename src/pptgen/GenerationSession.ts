import * as fs from 'fs/promises';
import * as path from 'path';
import { PPTGenError, errorMessage } from '../utils/errors.js';
import { isImagePath } from '../utils/ImageDecoder.js';
import { numberToWords } from '../utils/numberToWords.js';
import { pickRandom, type RandomSource } from '../utils/random.js';

/**
 * How chapter home pages number their chapters: `01`, `PART 01` or `PART ONE`.
 */
export type ChapterNumberStyle = 'digits' | 'part-digits' | 'part-words';

export const CHAPTER_NUMBER_STYLES: readonly ChapterNumberStyle[] = ['digits', 'part-digits', 'part-words'];

export function formatChapterNumber(chapterNumber: number, style: ChapterNumberStyle): string {
  const digits = String(chapterNumber).padStart(2, '0');
  switch (style) {
    case 'digits':
      return digits;
    case 'part-digits':
      return `PART ${digits}`;
    case 'part-words':
      return `PART ${numberToWords(chapterNumber).toUpperCase()}`;
  }
}

/**
 * State shared by the pages of one generated deck: the random source, the
 * chapter number style picked for the deck, and the pictures already used
 * from each candidate directory.
 */
export class GenerationSession {
  readonly random: RandomSource;
  private chapterNumberStyle: ChapterNumberStyle | undefined;
  private readonly usedPictures = new Map<string, Set<string>>();

  constructor(random: RandomSource = Math.random) {
    this.random = random;
  }

  /**
   * The style is chosen on first use and kept for the rest of the deck.
   */
  get numberStyle(): ChapterNumberStyle {
    if (this.chapterNumberStyle === undefined) {
      this.chapterNumberStyle = pickRandom(CHAPTER_NUMBER_STYLES, this.random) ?? 'digits';
    }
    return this.chapterNumberStyle;
  }

  formatChapterNumber(chapterNumber: number): string {
    return formatChapterNumber(chapterNumber, this.numberStyle);
  }

  /**
   * Picks an image from a directory, not repeating one until all of them
   * have been used.
   */
  async pickPicture(directory: string): Promise<string> {
    let entries: string[];
    try {
      const dirents = await fs.readdir(directory, { withFileTypes: true });
      entries = dirents.filter((d) => d.isFile() && isImagePath(d.name)).map((d) => d.name).sort();
    } catch (error) {
      throw new PPTGenError(`Cannot read picture directory: ${directory}`, { directory, error: errorMessage(error) });
    }
    if (entries.length === 0) {
      throw new PPTGenError(`No pictures in directory: ${directory}`, { directory });
    }

    const used = this.usedPictures.get(directory) ?? new Set<string>();
    this.usedPictures.set(directory, used);
    let available = entries.filter((name) => !used.has(name));
    if (available.length === 0) {
      used.clear();
      available = entries;
    }

    const chosen = pickRandom(available, this.random) ?? available[0];
    used.add(chosen);
    return path.join(directory, chosen);
  }
}
