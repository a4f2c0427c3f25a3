import * as fs from 'fs/promises';
import * as path from 'path';
import type { Slide } from '../core/Slide.js';
import type { CatalogOptions, StyleExtractionOptions } from '../types/index.js';
import { CatalogError, NotFoundError, errorMessage } from '../utils/errors.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';
import { pickRandom, type RandomSource } from '../utils/random.js';
import { LayoutType, type CatalogData, type Style } from './components.js';
import { parseCatalogData } from './schema.js';
import { StyleExtractor } from './StyleExtractor.js';

/**
 * Layout catalog: layout name → style name → shape name → CShape.
 *
 * @example
 * ```typescript
 * const catalog = await ComponentsManager.fromFile('components/shapes/shapes.json');
 * const style = catalog.getRandomStyle('two_points');
 * ```
 */
export class ComponentsManager {
  private readonly logger: ILogger;
  private readonly random: RandomSource;
  private layouts = new Map<string, LayoutType>();

  constructor(options: CatalogOptions = {}) {
    this.logger = options.logger ?? createLogger('warn', 'ComponentsManager');
    this.random = options.random ?? Math.random;
  }

  static async fromFile(filePath: string, options: CatalogOptions = {}): Promise<ComponentsManager> {
    const manager = new ComponentsManager(options);
    await manager.load(filePath);
    return manager;
  }

  /**
   * Replaces the catalog with the contents of a JSON file.
   */
  async load(filePath: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    } catch (error) {
      throw new CatalogError(`Cannot read layout catalog ${filePath}: ${errorMessage(error)}`, { path: filePath });
    }
    this.layouts = this.buildLayouts(parseCatalogData(raw, filePath));
    this.logger.info('Loaded layout catalog', { path: filePath, layouts: this.layoutNames });
  }

  /**
   * Swaps in a new catalog file. The current catalog stays if the file is invalid.
   */
  async reload(filePath: string): Promise<void> {
    await this.load(filePath);
    this.logger.info('Reloaded layout catalog', { path: filePath });
  }

  async save(filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(this.toJSON(), null, 4), 'utf-8');
    this.logger.info('Saved layout catalog', { path: filePath });
  }

  loadFromJSON(data: unknown): void {
    this.layouts = this.buildLayouts(parseCatalogData(data));
  }

  toJSON(): CatalogData {
    const data: CatalogData = {};
    for (const [name, layout] of this.layouts) {
      data[name] = layout.toJSON();
    }
    return data;
  }

  private buildLayouts(data: CatalogData): Map<string, LayoutType> {
    const layouts = new Map<string, LayoutType>();
    for (const [name, layoutData] of Object.entries(data)) {
      layouts.set(name, new LayoutType(name, layoutData));
    }
    return layouts;
  }

  get layoutNames(): string[] {
    return [...this.layouts.keys()];
  }

  findLayout(name: string): LayoutType | undefined {
    return this.layouts.get(name);
  }

  getLayout(name: string): LayoutType {
    const layout = this.layouts.get(name);
    if (!layout) {
      throw new NotFoundError(`Layout type '${name}' not found`, { layout: name, available: this.layoutNames });
    }
    return layout;
  }

  /**
   * Returns the layout, creating an empty one if needed.
   */
  addLayout(name: string): LayoutType {
    let layout = this.layouts.get(name);
    if (!layout) {
      layout = new LayoutType(name);
      this.layouts.set(name, layout);
    }
    return layout;
  }

  /**
   * Uniform pick among a layout's styles; undefined when the layout is
   * unknown or empty.
   */
  getRandomStyle(layoutName: string): Style | undefined {
    const layout = this.layouts.get(layoutName);
    if (!layout) {
      return undefined;
    }
    return pickRandom([...layout.styles.values()], this.random);
  }

  /**
   * Extracts a style from a designed slide and adds it to an existing
   * layout. Style names are never overwritten.
   */
  async addStyleFromSlide(
    slide: Slide,
    layoutName: string,
    styleName: string,
    options: StyleExtractionOptions = {}
  ): Promise<Style> {
    const layout = this.getLayout(layoutName);
    if (layout.hasStyle(styleName)) {
      throw new CatalogError(`Style '${styleName}' already exists in layout type '${layoutName}'`, {
        layout: layoutName,
        style: styleName,
      });
    }

    const extractor = new StyleExtractor({ logger: this.logger.child('StyleExtractor'), ...options });
    const style = await extractor.extract(slide, styleName);
    layout.addStyle(style);
    this.logger.info(`Added style '${styleName}' to layout type '${layoutName}' with ${style.size} shapes`);
    return style;
  }
}
