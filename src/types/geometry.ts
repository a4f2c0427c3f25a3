/**
 * Placement rectangle in EMU (English Metric Units, 914400 per inch).
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * One position a catalog shape may be placed at.
 */
export type Location = Rect;

export function rectArea(rect: Rect): number {
  return rect.width * rect.height;
}

/**
 * Length of the overlap of two 1-D intervals; negative when they are apart.
 */
export function intervalOverlap(start1: number, length1: number, start2: number, length2: number): number {
  return Math.min(start1 + length1, start2 + length2) - Math.max(start1, start2);
}

export function distance(x1: number, y1: number, x2: number, y2: number): number {
  return Math.hypot(x2 - x1, y2 - y1);
}
