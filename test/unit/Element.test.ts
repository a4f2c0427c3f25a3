import { describe, it, expect } from 'vitest';
import {
  CodeBlock,
  Heading,
  MarkdownDocument,
  Paragraph,
  Picture,
  Table,
  type Element,
} from '../../src/document/index.js';
import { TreeError } from '../../src/utils/errors.js';

function buildTree(): { doc: MarkdownDocument; h1: Heading; p1: Paragraph; h2: Heading; p2: Paragraph } {
  const doc = new MarkdownDocument();
  const h1 = doc.append(new Heading(1, 'Title'));
  const p1 = h1.append(new Paragraph('Intro'));
  const h2 = h1.append(new Heading(2, 'Part'));
  const p2 = h2.append(new Paragraph('- item'));
  return { doc, h1, p1, h2, p2 };
}

/**
 * Small deterministic generator so failures reproduce from the seed.
 */
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function preOrder(node: Element): Element[] {
  return node.contents.flatMap((child) => [child, ...preOrder(child)]);
}

function isAncestorOrSelf(candidate: Element, node: Element): boolean {
  return [...node.selfAndParents].includes(candidate);
}

describe('Element tree', () => {
  describe('Traversal', () => {
    it('should walk descendants in pre-order', () => {
      const { doc, h1, p1, h2, p2 } = buildTree();
      expect([...doc.descendants]).toEqual([h1, p1, h2, p2]);
      expect([...h2.descendants]).toEqual([p2]);
      expect([...p2.descendants]).toEqual([]);
    });

    it('should thread next and previous element links', () => {
      const { doc, h1, p1, h2, p2 } = buildTree();
      expect(doc.nextElement).toBe(h1);
      expect(p1.nextElement).toBe(h2);
      expect(p2.nextElement).toBeNull();
      expect(h2.previousElement).toBe(p1);
      expect([...p2.previousElements]).toEqual([h2, p1, h1, doc]);
    });

    it('should expose sibling and parent chains', () => {
      const { doc, h1, p1, h2, p2 } = buildTree();
      expect([...p1.nextSiblings]).toEqual([h2]);
      expect([...h2.previousSiblings]).toEqual([p1]);
      expect([...p2.parents]).toEqual([h2, h1, doc]);
      expect([...p2.selfAndParents]).toEqual([p2, h2, h1, doc]);
      expect([...h1.children]).toEqual([p1, h2]);
      expect(h1.length).toBe(2);
      expect(h1.index(h2)).toBe(1);
    });

    it('should reject index lookups of non-children', () => {
      const { h1, p2 } = buildTree();
      expect(() => h1.index(p2)).toThrow(TreeError);
    });
  });

  describe('Text extraction', () => {
    it('should render headings as markup unless stripping', () => {
      const { doc } = buildTree();
      expect(doc.getText()).toBe('# Title\nIntro\n## Part\n- item');
      expect(doc.getText('\n', true)).toBe('Title\nIntro\nPart\nitem');
    });

    it('should filter by element class', () => {
      const { doc } = buildTree();
      expect(doc.getText('|', false, [Paragraph])).toBe('Intro|- item');
      expect(doc.getText('|', true, [Heading])).toBe('Title|Part');
    });

    it('should give a heading the text of its subtree only', () => {
      const { h1, h2 } = buildTree();
      expect(h1.text).toBe('Intro\n## Part\n- item');
      expect(h2.text).toBe('- item');
      expect([...h1.strippedStrings]).toEqual(['Intro', 'Part', 'item']);
    });

    it('should reject type filters on leaf elements', () => {
      const { p2 } = buildTree();
      expect(() => p2.getText('\n', false, [Heading])).toThrow(TypeError);
      expect(p2.text).toBe('- item');
    });

    it('should skip empty strings', () => {
      const heading = new Heading(2, 'Empty');
      heading.append(new Paragraph(''));
      heading.append(new Paragraph('kept'));
      expect(heading.getText()).toBe('kept');
    });
  });

  describe('Random edits', () => {
    it('should keep links consistent through any sequence of edits', () => {
      for (let seed = 1; seed <= 100; seed++) {
        const random = seededRandom(seed);
        const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];
        const doc = new MarkdownDocument();
        const nodes: Heading[] = Array.from({ length: 8 }, (_, i) => new Heading((i % 3) + 1, `Node ${i}`));
        const containers: Element[] = [doc, ...nodes];

        for (let step = 0; step < 40; step++) {
          const node = pick(nodes);
          const operation = random();
          if (operation < 0.2) {
            node.extract();
          } else {
            const target = pick(containers);
            if (isAncestorOrSelf(node, target)) {
              continue;
            }
            if (operation < 0.6) {
              target.append(node);
            } else {
              target.insert(Math.floor(random() * (target.length + 1)), node);
            }
          }

          for (const container of containers) {
            expect([...container.descendants]).toEqual(preOrder(container));
            container.contents.forEach((child, i) => {
              expect(child.parent).toBe(container);
              expect(child.previousSibling).toBe(container.contents[i - 1] ?? null);
              expect(child.nextSibling).toBe(container.contents[i + 1] ?? null);
            });
          }
        }
      }
    });
  });

  describe('Mutation', () => {
    it('should close the gap when a subtree is extracted', () => {
      const { doc, h1, p1, h2, p2 } = buildTree();
      expect(h2.extract()).toBe(h2);
      expect(h1.contents).toEqual([p1]);
      expect([...doc.descendants]).toEqual([h1, p1]);
      expect(h2.parent).toBeNull();
      expect(p1.nextSibling).toBeNull();
      expect([...h2.descendants]).toEqual([p2]);
    });

    it('should move an existing child when inserted again', () => {
      const { doc, h1, p1, h2, p2 } = buildTree();
      h1.insert(0, h2);
      expect(h1.contents).toEqual([h2, p1]);
      expect([...doc.descendants]).toEqual([h1, h2, p2, p1]);
      expect(p2.nextElement).toBe(p1);
      expect(p1.previousSibling).toBe(h2);
    });

    it('should splice a document root in as its children', () => {
      const target = new Heading(2, 'Target');
      const other = new MarkdownDocument();
      const a = other.append(new Paragraph('a'));
      const b = other.append(new Paragraph('b'));

      expect(target.insert(0, other)).toEqual([a, b]);
      expect(target.contents).toEqual([a, b]);
      expect(other.contents).toEqual([]);
      expect([...target.descendants]).toEqual([a, b]);
      expect(a.parent).toBe(target);
    });

    it('should insert several nodes in order', () => {
      const target = new Heading(2, 'Target');
      const last = target.append(new Paragraph('z'));
      const x = new Paragraph('x');
      const y = new Paragraph('y');
      target.insert(0, x, y);
      expect(target.contents).toEqual([x, y, last]);
      expect(target.getText(',')).toBe('x,y,z');
    });

    it('should reject strings and self insertion', () => {
      const heading = new Heading(1, 'Self');
      expect(() => heading.insert(0, 'loose text')).toThrow(TypeError);
      expect(() => heading.insert(0, heading)).toThrow(TreeError);
    });

    it('should invalidate a decomposed subtree', () => {
      const { doc, h1, h2, p2 } = buildTree();
      h2.decompose();
      expect(h2.decomposed).toBe(true);
      expect(p2.decomposed).toBe(true);
      expect(p2.parent).toBeNull();
      expect(h1.length).toBe(1);
      expect(doc.getText('\n', true)).toBe('Title\nIntro');
    });

    it('should clear all children', () => {
      const { h1 } = buildTree();
      h1.clear();
      expect(h1.isEmptyElement).toBe(true);
      expect(h1.text).toBe('');
    });
  });
});

describe('Document nodes', () => {
  it('should build ATX source for headings without explicit markup', () => {
    expect(new Heading(3, 'Deep').elementTextSource).toBe('### Deep');
    expect(new Heading(1, 'Setext', 'Setext\n======').elementTextSource).toBe('Setext\n======');
  });

  it('should strip list markers from paragraphs', () => {
    expect(new Paragraph('  - item one ').strippedText).toBe('item one');
    expect(new Paragraph('3. step').strippedText).toBe('step');
    expect(new Paragraph('plain').strippedText).toBe('plain');
  });

  it('should rebuild image markup', () => {
    expect(new Picture('img/a.png', 'Alt', 'Caption').elementText).toBe('![Alt](img/a.png "Caption")');
    expect(new Picture('img/b.png').elementText).toBe('![](img/b.png)');
  });

  it('should fence code blocks in their source form', () => {
    const block = new CodeBlock('x = 1', 'py');
    expect(block.elementText).toBe('x = 1');
    expect(block.elementTextSource).toBe('```py\nx = 1\n```');
  });

  it('should keep table source verbatim', () => {
    const table = new Table('markdown', '| a |\n| 1 |', ['a'], 1, 1);
    expect(table.text).toBe('| a |\n| 1 |');
    expect(table.headers).toEqual(['a']);
  });

  it('should expose the main heading and its chapters', () => {
    const { doc, h1, h2 } = buildTree();
    expect(doc.title).toBe('');
    doc.main = h1;
    expect(doc.title).toBe('Title');
    expect(doc.chapters).toEqual([h2]);
    expect(h1.subHeadings).toEqual([h2]);
  });
});
