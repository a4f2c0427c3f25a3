import { z } from 'zod';
import { CatalogError } from '../utils/errors.js';
import type { CatalogData } from './components.js';

const LocationSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number(),
});

const CShapeSchema = z.object({
  xml: z.string().nullable().default(null),
  zorder: z.number().int().default(0),
  content_type: z.enum(['content', 'picture', 'number', 'title']).nullable().default(null),
  path: z.string().nullable().default(null),
  location: z.array(LocationSchema).default([]),
});

export const CatalogSchema = z.record(z.string(), z.record(z.string(), z.record(z.string(), CShapeSchema)));

/**
 * Validates parsed catalog JSON. Missing shape fields take their defaults.
 */
export function parseCatalogData(data: unknown, source = 'catalog'): CatalogData {
  const result = CatalogSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new CatalogError(`Invalid layout catalog in ${source}`, { issues });
  }
  return result.data;
}
