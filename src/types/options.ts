import type { ILogger } from '../utils/Logger.js';
import type { RandomSource } from '../utils/random.js';

/**
 * Logging level.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Tunable thresholds behind the geometric heuristics. None of them is a
 * guarantee; they encode what typical templates look like.
 */
export interface HeuristicThresholds {
  /**
   * A CONTENT shape whose area is more than this many EMU² below the largest
   * text shape on the slide is reclassified as TITLE or NUMBER.
   * @default 10000
   */
  titleAreaSlack: number;

  /**
   * Largest value a catalog number shape may show.
   * @default 49
   */
  catalogNumberMax: number;

  /**
   * Longest text a catalog number shape may hold, trailing period included.
   * @default 3
   */
  catalogNumberMaxLength: number;

  /**
   * A background shape is attached to a catalog item when its distance is
   * below the candidate height times this factor.
   * @default 1.5
   */
  backgroundDistanceFactor: number;

  /**
   * Most sub-sections a chapter content slide can lay out.
   * @default 4
   */
  maxPoints: number;
}

export const DEFAULT_HEURISTICS: HeuristicThresholds = {
  titleAreaSlack: 10000,
  catalogNumberMax: 49,
  catalogNumberMaxLength: 3,
  backgroundDistanceFactor: 1.5,
  maxPoints: 4,
};

/**
 * Options for deck generation.
 */
export interface GenerationOptions {
  /**
   * Logging level, used when no logger is supplied.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  logger?: ILogger;

  /**
   * Random source for style and picture choices.
   * @default Math.random
   */
  random?: RandomSource;

  heuristics?: Partial<HeuristicThresholds>;

  /**
   * Cover title used when the document title is blank.
   * @default 'Presentation Title'
   */
  coverTitleFallback?: string;

  /**
   * @default 'Thank you!'
   */
  endPageText?: string;

  /**
   * Template slide holding the cover.
   * @default 0
   */
  coverPageIndex?: number;

  /**
   * Template slide holding the table of contents.
   * @default 1
   */
  catalogPageIndex?: number;
}

/**
 * Resolved generation options with defaults applied.
 */
export interface ResolvedGenerationOptions {
  logLevel: LogLevel;
  logger?: ILogger;
  random: RandomSource;
  heuristics: HeuristicThresholds;
  coverTitleFallback: string;
  endPageText: string;
  coverPageIndex: number;
  catalogPageIndex: number;
}

export const DEFAULT_GENERATION_OPTIONS: Omit<ResolvedGenerationOptions, 'logger' | 'random'> = {
  logLevel: 'warn',
  heuristics: DEFAULT_HEURISTICS,
  coverTitleFallback: 'Presentation Title',
  endPageText: 'Thank you!',
  coverPageIndex: 0,
  catalogPageIndex: 1,
};

export function resolveGenerationOptions(options: GenerationOptions = {}): ResolvedGenerationOptions {
  return {
    ...DEFAULT_GENERATION_OPTIONS,
    ...options,
    random: options.random ?? Math.random,
    heuristics: { ...DEFAULT_HEURISTICS, ...options.heuristics },
  };
}

/**
 * Writes an exported picture to `outputPath`.
 */
export type ImageExporter = (image: Buffer, outputPath: string) => Promise<void>;

/**
 * Options for turning a designed slide into a catalog style.
 */
export interface StyleExtractionOptions {
  /**
   * Directory pictures are exported to, also recorded as their path.
   * @default 'components/picture'
   */
  pictureDir?: string;

  /**
   * @default 10000
   */
  titleAreaSlack?: number;

  /**
   * Picture writer. The default converts to PNG and writes the file.
   */
  imageExporter?: ImageExporter;

  logger?: ILogger;
}

export const DEFAULT_PICTURE_DIR = 'components/picture';

/**
 * Options for the layout catalog.
 */
export interface CatalogOptions {
  logger?: ILogger;

  /**
   * @default Math.random
   */
  random?: RandomSource;
}
