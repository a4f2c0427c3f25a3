import JSZip from 'jszip';
import type { CatalogData } from '../../src/catalog/index.js';
import type { Location } from '../../src/types/index.js';

const NS_A = 'http://schemas.openxmlformats.org/drawingml/2006/main';
const NS_R = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';
const NS_P = 'http://schemas.openxmlformats.org/presentationml/2006/main';
const NS_RELS = 'http://schemas.openxmlformats.org/package/2006/relationships';
const REL = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

const DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';
const NAMESPACES = `xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}"`;

/**
 * Layout title position; template slides inherit it.
 */
export const LAYOUT_TITLE_RECT: Location = { x: 1000000, y: 3000000, width: 8000000, height: 1000000 };
export const MASTER_BODY_RECT: Location = { x: 838200, y: 1825625, width: 10515600, height: 4351338 };

export interface SlideSpec {
  shapes: string[];
  /** Images the slide references, keyed by relationship id. */
  images?: Record<string, Buffer>;
}

function xfrm(rect: Location): string {
  return `<a:xfrm><a:off x="${rect.x}" y="${rect.y}"/><a:ext cx="${rect.width}" cy="${rect.height}"/></a:xfrm>`;
}

function paragraph(text: string): string {
  return `<a:p><a:r><a:rPr lang="en-US" sz="2000"/><a:t>${text}</a:t></a:r></a:p>`;
}

/**
 * Text box with one styled run.
 */
export function textBox(id: number, name: string, text: string, rect: Location): string {
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${name}"/><p:cNvSpPr txBox="1"/><p:nvPr/></p:nvSpPr>` +
    `<p:spPr>${xfrm(rect)}<a:prstGeom prst="rect"><a:avLst/></a:prstGeom></p:spPr>` +
    `<p:txBody><a:bodyPr wrap="square"/><a:lstStyle/>${paragraph(text)}</p:txBody></p:sp>`
  );
}

/**
 * Placeholder shape; without `rect` its position comes from the layout.
 */
export function placeholder(id: number, name: string, type: string, text: string, rect?: Location): string {
  const typeAttr = type === 'body' ? ' idx="1"' : ` type="${type}"`;
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${name}"/><p:cNvSpPr><a:spLocks noGrp="1"/></p:cNvSpPr>` +
    `<p:nvPr><p:ph${typeAttr}/></p:nvPr></p:nvSpPr>` +
    `<p:spPr>${rect ? xfrm(rect) : ''}</p:spPr>` +
    `<p:txBody><a:bodyPr/><a:lstStyle/>${paragraph(text)}</p:txBody></p:sp>`
  );
}

/**
 * Filled rectangle without text.
 */
export function rectangle(id: number, name: string, rect: Location): string {
  return (
    `<p:sp><p:nvSpPr><p:cNvPr id="${id}" name="${name}"/><p:cNvSpPr/><p:nvPr/></p:nvSpPr>` +
    `<p:spPr>${xfrm(rect)}<a:prstGeom prst="rect"><a:avLst/></a:prstGeom>` +
    `<a:solidFill><a:srgbClr val="4472C4"/></a:solidFill></p:spPr></p:sp>`
  );
}

export function picture(id: number, name: string, relationshipId: string, rect: Location): string {
  return (
    `<p:pic><p:nvPicPr><p:cNvPr id="${id}" name="${name}"/><p:cNvPicPr/><p:nvPr/></p:nvPicPr>` +
    `<p:blipFill><a:blip r:embed="${relationshipId}"/><a:stretch><a:fillRect/></a:stretch></p:blipFill>` +
    `<p:spPr>${xfrm(rect)}<a:prstGeom prst="rect"><a:avLst/></a:prstGeom></p:spPr></p:pic>`
  );
}

function slideXml(shapes: string[]): string {
  return (
    `${DECLARATION}<p:sld ${NAMESPACES}><p:cSld><p:spTree>` +
    '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>' +
    `${shapes.join('')}</p:spTree></p:cSld><p:clrMapOvr><a:masterClrMapping/></p:clrMapOvr></p:sld>`
  );
}

function relsXml(relationships: Array<{ id: string; type: string; target: string }>): string {
  const entries = relationships
    .map((rel) => `<Relationship Id="${rel.id}" Type="${REL}/${rel.type}" Target="${rel.target}"/>`)
    .join('');
  return `${DECLARATION}<Relationships xmlns="${NS_RELS}">${entries}</Relationships>`;
}

const LAYOUT_XML =
  `${DECLARATION}<p:sldLayout ${NAMESPACES} type="titleOnly"><p:cSld name="Title Only"><p:spTree>` +
  '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>' +
  placeholder(2, 'Title 1', 'title', 'Click to edit title', LAYOUT_TITLE_RECT) +
  placeholder(3, 'Content Placeholder 2', 'body', 'Click to edit text') +
  '</p:spTree></p:cSld></p:sldLayout>';

const MASTER_XML =
  `${DECLARATION}<p:sldMaster ${NAMESPACES}><p:cSld><p:spTree>` +
  '<p:nvGrpSpPr><p:cNvPr id="1" name=""/><p:cNvGrpSpPr/><p:nvPr/></p:nvGrpSpPr><p:grpSpPr/>' +
  placeholder(2, 'Title Placeholder 1', 'title', 'Master title', {
    x: 838200,
    y: 365125,
    width: 10515600,
    height: 1325563,
  }) +
  `<p:sp><p:nvSpPr><p:cNvPr id="3" name="Text Placeholder 2"/><p:cNvSpPr/><p:nvPr><p:ph type="body" idx="1"/></p:nvPr></p:nvSpPr>` +
  `<p:spPr>${xfrm(MASTER_BODY_RECT)}</p:spPr><p:txBody><a:bodyPr/><a:lstStyle/><a:p/></p:txBody></p:sp>` +
  '</p:spTree></p:cSld><p:sldLayoutIdLst><p:sldLayoutId id="2147483649" r:id="rId1"/></p:sldLayoutIdLst></p:sldMaster>';

/**
 * Builds a PPTX with one master, one title-only layout and the given slides.
 */
export async function buildDeck(slides: SlideSpec[]): Promise<Buffer> {
  const zip = new JSZip();
  const slideOverrides = slides
    .map(
      (_, i) =>
        `<Override PartName="/ppt/slides/slide${i + 1}.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slide+xml"/>`
    )
    .join('');
  zip.file(
    '[Content_Types].xml',
    `${DECLARATION}<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">` +
      '<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>' +
      '<Default Extension="xml" ContentType="application/xml"/>' +
      '<Default Extension="png" ContentType="image/png"/>' +
      '<Override PartName="/ppt/presentation.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.presentation.main+xml"/>' +
      '<Override PartName="/ppt/slideMasters/slideMaster1.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slideMaster+xml"/>' +
      '<Override PartName="/ppt/slideLayouts/slideLayout1.xml" ContentType="application/vnd.openxmlformats-officedocument.presentationml.slideLayout+xml"/>' +
      `${slideOverrides}</Types>`
  );
  zip.file('_rels/.rels', relsXml([{ id: 'rId1', type: 'officeDocument', target: 'ppt/presentation.xml' }]));

  const slideIds = slides.map((_, i) => `<p:sldId id="${256 + i}" r:id="rId${i + 2}"/>`).join('');
  zip.file(
    'ppt/presentation.xml',
    `${DECLARATION}<p:presentation ${NAMESPACES}>` +
      '<p:sldMasterIdLst><p:sldMasterId id="2147483648" r:id="rId1"/></p:sldMasterIdLst>' +
      `<p:sldIdLst>${slideIds}</p:sldIdLst><p:sldSz cx="12192000" cy="6858000"/><p:notesSz cx="6858000" cy="9144000"/>` +
      '</p:presentation>'
  );
  zip.file(
    'ppt/_rels/presentation.xml.rels',
    relsXml([
      { id: 'rId1', type: 'slideMaster', target: 'slideMasters/slideMaster1.xml' },
      ...slides.map((_, i) => ({ id: `rId${i + 2}`, type: 'slide', target: `slides/slide${i + 1}.xml` })),
    ])
  );

  zip.file('ppt/slideMasters/slideMaster1.xml', MASTER_XML);
  zip.file(
    'ppt/slideMasters/_rels/slideMaster1.xml.rels',
    relsXml([{ id: 'rId1', type: 'slideLayout', target: '../slideLayouts/slideLayout1.xml' }])
  );
  zip.file('ppt/slideLayouts/slideLayout1.xml', LAYOUT_XML);
  zip.file(
    'ppt/slideLayouts/_rels/slideLayout1.xml.rels',
    relsXml([{ id: 'rId1', type: 'slideMaster', target: '../slideMasters/slideMaster1.xml' }])
  );

  let mediaCount = 0;
  slides.forEach((slide, i) => {
    const number = i + 1;
    const relationships = [{ id: 'rId1', type: 'slideLayout', target: '../slideLayouts/slideLayout1.xml' }];
    for (const [id, data] of Object.entries(slide.images ?? {})) {
      mediaCount++;
      zip.file(`ppt/media/image${mediaCount}.png`, data);
      relationships.push({ id, type: 'image', target: `../media/image${mediaCount}.png` });
    }
    zip.file(`ppt/slides/slide${number}.xml`, slideXml(slide.shapes));
    zip.file(`ppt/slides/_rels/slide${number}.xml.rels`, relsXml(relationships));
  });

  return zip.generateAsync({ type: 'nodebuffer' });
}

export const CATALOG_NUMBER_LEFTS = [1000000, 3000000, 5000000];
const CATALOG_ITEM_SIZE = { width: 1500000, height: 500000 };

/**
 * Cover, table of contents (three entries), chapter home, chapter content
 * and end slide.
 */
export function templateSlides(): SlideSpec[] {
  const catalogShapes = [placeholder(2, 'Title 1', 'title', 'Contents')];
  CATALOG_NUMBER_LEFTS.forEach((x, i) => {
    catalogShapes.push(textBox(10 + i, `Number ${i + 1}`, `0${i + 1}`, { x, y: 1000000, ...CATALOG_ITEM_SIZE }));
    catalogShapes.push(textBox(20 + i, `Label ${i + 1}`, 'Chapter title', { x, y: 2000000, ...CATALOG_ITEM_SIZE }));
  });

  return [
    { shapes: [placeholder(2, 'Title 1', 'title', 'Deck title')] },
    { shapes: catalogShapes },
    {
      shapes: [
        placeholder(2, 'Title 1', 'title', 'Chapter title'),
        textBox(3, 'Chapter Number', '01', { x: 1000000, y: 1500000, width: 2000000, height: 800000 }),
        textBox(4, 'Footnote', 'Footnote', { x: 1000000, y: 5000000, width: 2000000, height: 400000 }),
      ],
    },
    { shapes: [placeholder(2, 'Title 1', 'title', 'Content title')] },
    { shapes: [placeholder(2, 'Title 1', 'title', 'End')] },
  ];
}

export function buildTemplateDeck(): Promise<Buffer> {
  return buildDeck(templateSlides());
}

/**
 * A 1x1 PNG.
 */
export const TINY_PNG = Buffer.from(
  '89504e470d0a1a0a0000000d49484452000000010000000108060000001f15c4890000000d4944415478da63f8ffff3f0005fe02fea7d6a4a40000000049454e44ae426082',
  'hex'
);

/**
 * Serialized text box as stored in a catalog, namespaces on the root.
 */
export function catalogTextBoxXml(name: string, text: string): string {
  return withNamespaces(textBox(1, name, text, ORIGIN), 'p:sp');
}

function withNamespaces(xml: string, tag: 'p:sp' | 'p:pic'): string {
  return xml.replace(`<${tag}>`, `<${tag} xmlns:a="${NS_A}" xmlns:r="${NS_R}" xmlns:p="${NS_P}">`);
}

const ORIGIN: Location = { x: 0, y: 0, width: 100, height: 100 };

/**
 * Catalog data with one style per section count: a background, then a
 * title, a body and a number per section.
 */
export function sampleCatalogData(points: readonly number[]): CatalogData {
  const names = ['one_point', 'two_points', 'three_points', 'four_points'];
  const data: CatalogData = {};
  for (const count of points) {
    const column = (i: number, y: number, height: number): Location => ({
      x: 500000 + i * 2800000,
      y,
      width: 2500000,
      height,
    });
    const sections = Array.from({ length: count }, (_, i) => i);
    data[names[count - 1]] = {
      plain: {
        Background_0: {
          xml: withNamespaces(rectangle(1, 'Background', ORIGIN), 'p:sp'),
          zorder: 0,
          content_type: null,
          path: null,
          location: [{ x: 0, y: 0, width: 12192000, height: 6858000 }],
        },
        Title_1: {
          xml: catalogTextBoxXml('Title', 'Section title'),
          zorder: 1,
          content_type: 'title',
          path: null,
          location: sections.map((i) => column(i, 1500000, 500000)),
        },
        Body_2: {
          xml: catalogTextBoxXml('Body', 'Section body'),
          zorder: 2,
          content_type: 'content',
          path: null,
          location: sections.map((i) => column(i, 2200000, 3000000)),
        },
        Number_3: {
          xml: catalogTextBoxXml('Number', '01'),
          zorder: 3,
          content_type: 'number',
          path: null,
          location: sections.map((i) => column(i, 1000000, 400000)),
        },
      },
    };
  }
  return data;
}
