import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadMarkdown, normalizeMarkdown, readMarkdown } from '../../src/parsers/index.js';

describe('MarkdownLoader', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slidesmith-md-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('should trim line ends and collapse blank runs', () => {
    expect(normalizeMarkdown('a  \n\n\n\nb\t\n')).toBe('a\n\nb\n');
    expect(normalizeMarkdown('x\r\ny')).toBe('x\ny');
  });

  it('should decode buffers as UTF-8', async () => {
    expect(await readMarkdown(Buffer.from('# Café\r\n', 'utf-8'))).toBe('# Café\n');
  });

  it('should treat multi-line strings as text', async () => {
    expect(await readMarkdown('# notes.md\nbody')).toBe('# notes.md\nbody');
  });

  it('should read .md paths from disk', async () => {
    const file = path.join(tmpDir, 'outline.md');
    await fs.writeFile(file, '# Deck\n## One\n', 'utf-8');

    const doc = await loadMarkdown(file);
    expect(doc.title).toBe('Deck');
    expect(doc.chapters.map((chapter) => chapter.elementText)).toEqual(['One']);
  });
});
