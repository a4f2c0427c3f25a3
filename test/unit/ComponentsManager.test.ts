import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ComponentsManager, layoutNameForPoints } from '../../src/catalog/index.js';
import { Presentation } from '../../src/core/Presentation.js';
import { CatalogError, NotFoundError } from '../../src/utils/errors.js';
import { buildDeck, sampleCatalogData, textBox } from '../helpers/pptxFixture.js';

async function designedSlide() {
  const prs = await Presentation.open(
    await buildDeck([
      {
        shapes: [
          textBox(2, 'Heading', 'Heading', { x: 0, y: 0, width: 1000, height: 100 }),
          textBox(3, 'Body', 'Body text', { x: 0, y: 200, width: 1000, height: 1000 }),
        ],
      },
    ])
  );
  return prs.getSlide(0);
}

describe('ComponentsManager', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slidesmith-catalog-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('Layout names', () => {
    it('should map section counts to layouts', () => {
      expect(layoutNameForPoints(1)).toBe('one_point');
      expect(layoutNameForPoints(4)).toBe('four_points');
      expect(layoutNameForPoints(5)).toBeUndefined();
      expect(layoutNameForPoints(0)).toBeUndefined();
    });
  });

  describe('Building', () => {
    it('should add styles extracted from a slide', async () => {
      const catalog = new ComponentsManager();
      catalog.addLayout('one_point');
      const style = await catalog.addStyleFromSlide(await designedSlide(), 'one_point', 'simple', {
        imageExporter: vi.fn(async () => {}),
      });

      expect(style.shapeNames).toEqual(['Heading_0', 'Body_1']);
      expect(style.getShape('Heading_0')?.contentType).toBe('title');
      expect(style.getShape('Body_1')?.contentType).toBe('content');
      expect(catalog.getLayout('one_point').styleNames).toEqual(['simple']);
    });

    it('should return the existing layout when added twice', () => {
      const catalog = new ComponentsManager();
      expect(catalog.addLayout('two_points')).toBe(catalog.addLayout('two_points'));
      expect(catalog.layoutNames).toEqual(['two_points']);
    });

    it('should refuse to overwrite a style', async () => {
      const catalog = new ComponentsManager();
      catalog.loadFromJSON(sampleCatalogData([1]));
      await expect(catalog.addStyleFromSlide(await designedSlide(), 'one_point', 'plain')).rejects.toThrow(
        CatalogError
      );
    });

    it('should require a known layout', async () => {
      const catalog = new ComponentsManager();
      await expect(catalog.addStyleFromSlide(await designedSlide(), 'one_point', 'simple')).rejects.toThrow(
        NotFoundError
      );
      expect(() => catalog.getLayout('one_point')).toThrow("Layout type 'one_point' not found");
    });
  });

  describe('Persistence', () => {
    it('should survive a save and load', async () => {
      const catalog = new ComponentsManager();
      catalog.loadFromJSON(sampleCatalogData([1, 3]));
      const filePath = path.join(tmpDir, 'shapes', 'shapes.json');
      await catalog.save(filePath);

      const loaded = await ComponentsManager.fromFile(filePath);
      expect(loaded.layoutNames).toEqual(['one_point', 'three_points']);
      expect(loaded.toJSON()).toEqual(sampleCatalogData([1, 3]));
    });

    it('should fill in missing shape fields', () => {
      const catalog = new ComponentsManager();
      catalog.loadFromJSON({ one_point: { bare: { Shape_0: { xml: '<p:sp/>' } } } });
      expect(catalog.getLayout('one_point').getStyle('bare')?.getShape('Shape_0')?.toJSON()).toEqual({
        xml: '<p:sp/>',
        zorder: 0,
        content_type: null,
        path: null,
        location: [],
      });
    });

    it('should reject malformed catalogs', async () => {
      const catalog = new ComponentsManager();
      expect(() => catalog.loadFromJSON({ one_point: { bad: { Shape_0: { content_type: 'chart' } } } })).toThrow(
        'Invalid layout catalog in catalog'
      );

      const notJson = path.join(tmpDir, 'broken.json');
      await fs.writeFile(notJson, '{ not json');
      await expect(ComponentsManager.fromFile(notJson)).rejects.toThrow(/Cannot read layout catalog/);
    });

    it('should keep the current catalog when a reload fails', async () => {
      const catalog = new ComponentsManager();
      catalog.loadFromJSON(sampleCatalogData([2]));
      await expect(catalog.reload(path.join(tmpDir, 'missing.json'))).rejects.toThrow(CatalogError);
      expect(catalog.layoutNames).toEqual(['two_points']);
    });
  });

  describe('Random styles', () => {
    it('should pick among a layout styles', () => {
      const data = sampleCatalogData([2]);
      data.two_points.bold = data.two_points.plain;
      const catalog = new ComponentsManager({ random: () => 0.75 });
      catalog.loadFromJSON(data);
      expect(catalog.getRandomStyle('two_points')?.name).toBe('bold');
      expect(catalog.getRandomStyle('four_points')).toBeUndefined();
    });
  });
});
