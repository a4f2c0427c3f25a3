import type { Location } from '../types/index.js';

/**
 * Role a catalog shape plays when a content slide is synthesized.
 * `null` marks a decorative shape that is placed as-is.
 */
export type ContentType = 'content' | 'picture' | 'number' | 'title';

export const CONTENT_TYPES: readonly ContentType[] = ['content', 'picture', 'number', 'title'];

/**
 * Catalog layout names by the number of sections they lay out.
 */
export const LAYOUT_NAMES = ['one_point', 'two_points', 'three_points', 'four_points'] as const;

export type LayoutName = (typeof LAYOUT_NAMES)[number];

/**
 * Layout name for a chapter with `points` sections, if one exists.
 */
export function layoutNameForPoints(points: number): LayoutName | undefined {
  return LAYOUT_NAMES[points - 1];
}

/**
 * Serialized form of a CShape in the catalog file.
 */
export interface CShapeData {
  xml: string | null;
  zorder: number;
  content_type: ContentType | null;
  path: string | null;
  location: Location[];
}

export type StyleData = Record<string, CShapeData>;
export type LayoutData = Record<string, StyleData>;
export type CatalogData = Record<string, LayoutData>;

/**
 * One reusable shape of a style: its XML fragment and every position it
 * is placed at.
 */
export class CShape {
  xml: string | null;
  zorder: number;
  contentType: ContentType | null;
  path: string | null;
  locations: Location[];

  constructor(data: CShapeData) {
    this.xml = data.xml;
    this.zorder = data.zorder;
    this.contentType = data.content_type;
    this.path = data.path;
    this.locations = data.location.map((loc) => ({ ...loc }));
  }

  static fromJSON(data: CShapeData): CShape {
    return new CShape(data);
  }

  toJSON(): CShapeData {
    return {
      xml: this.xml,
      zorder: this.zorder,
      content_type: this.contentType,
      path: this.path,
      location: this.locations.map((loc) => ({ x: loc.x, y: loc.y, width: loc.width, height: loc.height })),
    };
  }
}

/**
 * Named set of shapes making up one slide design.
 */
export class Style {
  readonly name: string;
  readonly shapes = new Map<string, CShape>();

  constructor(name: string, data?: StyleData) {
    this.name = name;
    if (data) {
      for (const [shapeName, shapeData] of Object.entries(data)) {
        this.shapes.set(shapeName, CShape.fromJSON(shapeData));
      }
    }
  }

  get shapeNames(): string[] {
    return [...this.shapes.keys()];
  }

  get size(): number {
    return this.shapes.size;
  }

  getShape(name: string): CShape | undefined {
    return this.shapes.get(name);
  }

  addShape(name: string, shape: CShape): void {
    this.shapes.set(name, shape);
  }

  /**
   * Shapes in paint order, background first.
   */
  sortedShapes(): Array<[string, CShape]> {
    return [...this.shapes.entries()].sort((a, b) => a[1].zorder - b[1].zorder);
  }

  toJSON(): StyleData {
    const data: StyleData = {};
    for (const [name, shape] of this.shapes) {
      data[name] = shape.toJSON();
    }
    return data;
  }
}

/**
 * Interchangeable styles for one section count.
 */
export class LayoutType {
  readonly name: string;
  readonly styles = new Map<string, Style>();

  constructor(name: string, data?: LayoutData) {
    this.name = name;
    if (data) {
      for (const [styleName, styleData] of Object.entries(data)) {
        this.styles.set(styleName, new Style(styleName, styleData));
      }
    }
  }

  get styleNames(): string[] {
    return [...this.styles.keys()];
  }

  get size(): number {
    return this.styles.size;
  }

  hasStyle(name: string): boolean {
    return this.styles.has(name);
  }

  getStyle(name: string): Style | undefined {
    return this.styles.get(name);
  }

  addStyle(style: Style): void {
    this.styles.set(style.name, style);
  }

  toJSON(): LayoutData {
    const data: LayoutData = {};
    for (const [name, style] of this.styles) {
      data[name] = style.toJSON();
    }
    return data;
  }
}
