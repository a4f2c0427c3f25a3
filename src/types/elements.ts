/**
 * Placeholder types from `p:ph/@type`.
 */
export type PlaceholderType =
  | 'title'
  | 'body'
  | 'ctrTitle'
  | 'subTitle'
  | 'dt'
  | 'ftr'
  | 'sldNum'
  | 'hdr'
  | 'obj'
  | 'chart'
  | 'tbl'
  | 'clipArt'
  | 'dgm'
  | 'media'
  | 'sldImg'
  | 'pic';

export const PLACEHOLDER_TYPES: readonly PlaceholderType[] = [
  'title', 'body', 'ctrTitle', 'subTitle', 'dt', 'ftr', 'sldNum', 'hdr',
  'obj', 'chart', 'tbl', 'clipArt', 'dgm', 'media', 'sldImg', 'pic',
];

export function isPlaceholderType(value: string): value is PlaceholderType {
  return PLACEHOLDER_TYPES.some((type) => type === value);
}

/**
 * Placeholder reference read from a shape's `p:nvPr/p:ph`.
 */
export interface PlaceholderReference {
  /** Missing `type` means `obj` */
  type: PlaceholderType;
  /** Missing `idx` means 0 */
  idx: number;
}

/**
 * Kind of a shape-tree child.
 */
export type ShapeKind = 'shape' | 'picture' | 'group' | 'connector' | 'graphicFrame';
