/**
 * Text-frame editing on DrawingML shape elements (`p:txBody` / `a:p` / `a:r`).
 *
 * Edits keep the template's formatting: run properties (`a:rPr`) and
 * paragraph properties (`a:pPr`) are carried over to the new text.
 */

import {
  cloneNode,
  createElement,
  createText,
  findChild,
  findChildren,
  findFirst,
  getAttributes,
  getChildElements,
  getChildren,
  getTagName,
  getTextContent,
  insertAfter,
  insertBefore,
  removeChildren,
  setAttr,
  setTextContent,
  type OrderedXmlNode,
} from '../core/xml.js';

/**
 * Line break marker used in extracted paragraph text for `a:br`.
 */
export const LINE_BREAK = '\v';

export function getTextBody(shapeElement: OrderedXmlNode): OrderedXmlNode | undefined {
  return findChild(shapeElement, 'p:txBody');
}

/**
 * Returns the shape's `p:txBody`, creating an empty one when missing.
 */
export function ensureTextBody(shapeElement: OrderedXmlNode): OrderedXmlNode {
  const existing = getTextBody(shapeElement);
  if (existing) {
    return existing;
  }
  const txBody = createElement('p:txBody', {}, [
    createElement('a:bodyPr'),
    createElement('a:lstStyle'),
    createElement('a:p'),
  ]);
  insertBefore(shapeElement, txBody, 'p:extLst');
  return txBody;
}

export function getParagraphs(txBody: OrderedXmlNode): OrderedXmlNode[] {
  return findChildren(txBody, 'a:p');
}

export function getRuns(paragraph: OrderedXmlNode): OrderedXmlNode[] {
  return findChildren(paragraph, 'a:r');
}

export function getParagraphText(paragraph: OrderedXmlNode): string {
  let text = '';
  for (const child of getChildElements(paragraph)) {
    const tag = getTagName(child);
    if (tag === 'a:r' || tag === 'a:fld') {
      const t = findChild(child, 'a:t');
      text += t ? getTextContent(t) : '';
    } else if (tag === 'a:br') {
      text += LINE_BREAK;
    }
  }
  return text;
}

/**
 * Text of a shape element: paragraphs joined by newlines.
 */
export function getShapeText(shapeElement: OrderedXmlNode): string {
  const txBody = getTextBody(shapeElement);
  if (!txBody) {
    return '';
  }
  return getParagraphs(txBody).map(getParagraphText).join('\n');
}

/**
 * Builds `<a:r>[rPr]<a:t>text</a:t></a:r>`.
 */
export function createRun(text: string, runProperties?: OrderedXmlNode): OrderedXmlNode {
  const children = runProperties ? [runProperties] : [];
  const t = createElement('a:t', {}, text === '' ? [] : [createText(text)]);
  return createElement('a:r', {}, [...children, t]);
}

/**
 * Replaces every paragraph with plain ones, one per line. This is how
 * placeholder text is set: formatting comes from the layout.
 */
export function setPlainText(shapeElement: OrderedXmlNode, text: string): void {
  const txBody = ensureTextBody(shapeElement);
  removeChildren(txBody, 'a:p');
  for (const line of text.split('\n')) {
    const runs = line === '' ? [] : [createRun(line)];
    getChildren(txBody).push(createElement('a:p', {}, runs));
  }
}

/**
 * Collapses a paragraph's runs into its longest run, which takes the whole
 * paragraph text. A paragraph holding only fields has its first field
 * turned into a run. Returns the remaining run, if any.
 */
export function mergeRuns(paragraph: OrderedXmlNode): OrderedXmlNode | undefined {
  let runs = getRuns(paragraph);
  if (runs.length === 0) {
    const field = findChild(paragraph, 'a:fld');
    if (!field) {
      return undefined;
    }
    const run = createElement('a:r', {}, getChildElements(field).filter((child) => {
      const tag = getTagName(child);
      return tag === 'a:rPr' || tag === 'a:t';
    }));
    const children = getChildren(paragraph);
    children.splice(children.indexOf(field), 1, run);
    runs = [run];
  }
  if (runs.length === 1) {
    return runs[0];
  }

  const paragraphText = getParagraphText(paragraph);
  const longest = runs.reduce((best, run) =>
    getShapeRunText(run).length > getShapeRunText(best).length ? run : best
  );
  setRunText(longest, paragraphText);

  const children = getChildren(paragraph);
  for (let i = children.length - 1; i >= 0; i--) {
    const tag = getTagName(children[i]);
    if ((tag === 'a:r' || tag === 'a:br') && children[i] !== longest) {
      children.splice(i, 1);
    }
  }
  return longest;
}

function getShapeRunText(run: OrderedXmlNode): string {
  const t = findChild(run, 'a:t');
  return t ? getTextContent(t) : '';
}

export function setRunText(run: OrderedXmlNode, text: string): void {
  let t = findChild(run, 'a:t');
  if (!t) {
    t = createElement('a:t');
    getChildren(run).push(t);
  }
  setTextContent(t, text);
}

/**
 * Builds a styled run for an empty paragraph from its `a:endParaRPr`, which
 * is removed. The run goes right after `a:pPr`, or first.
 */
export function fillEmptyParagraph(paragraph: OrderedXmlNode, text: string): OrderedXmlNode {
  const endProps = findChild(paragraph, 'a:endParaRPr');
  let runProperties: OrderedXmlNode | undefined;
  if (endProps) {
    runProperties = createElement('a:rPr', getAttributes(endProps), cloneNode(getChildElements(endProps)));
    removeChildren(paragraph, 'a:endParaRPr');
  }
  const run = createRun(text, runProperties);
  insertAfter(paragraph, run, findChild(paragraph, 'a:pPr'));
  return run;
}

/**
 * Writes `text` over a styled first paragraph. Each line becomes a copy of
 * that paragraph, and every other paragraph is dropped.
 */
function fillFromTemplateParagraph(txBody: OrderedXmlNode, template: OrderedXmlNode, text: string): void {
  const lines = text.split('\n');
  const paragraphs = lines.map((line, index) => {
    const paragraph = index === 0 ? template : cloneNode(template);
    const run = getRuns(paragraph)[0];
    if (run) {
      setRunText(run, line);
    }
    return paragraph;
  });

  const children = getChildren(txBody);
  const firstIndex = children.indexOf(template);
  removeChildren(txBody, 'a:p');
  const insertAt = Math.min(Math.max(firstIndex, 0), getChildren(txBody).length);
  getChildren(txBody).splice(insertAt, 0, ...paragraphs);
}

/**
 * Sets text on a non-placeholder shape while keeping the template styling.
 * With existing text the first paragraph's runs are merged and reused;
 * otherwise a run is synthesized from the end-of-paragraph properties.
 */
export function setStyledText(shapeElement: OrderedXmlNode, text: string): void {
  const txBody = ensureTextBody(shapeElement);
  let first = getParagraphs(txBody)[0];
  if (!first) {
    first = createElement('a:p');
    getChildren(txBody).push(first);
  }

  if (getShapeText(shapeElement) !== '' && mergeRuns(first)) {
    fillFromTemplateParagraph(txBody, first, text);
    return;
  }

  for (const extra of getParagraphs(txBody).slice(1)) {
    getChildren(txBody).splice(getChildren(txBody).indexOf(extra), 1);
  }
  fillEmptyParagraph(first, '');
  fillFromTemplateParagraph(txBody, first, text);
}

/**
 * Replaces the first run holding text with a new run that reuses its
 * `a:rPr` verbatim, drops the other runs and paragraphs, and falls back to
 * `setStyledText` when the shape has no run to reuse.
 */
export function replaceFirstRun(shapeElement: OrderedXmlNode, text: string): void {
  const txBody = getTextBody(shapeElement);
  const t = txBody ? findFirst(txBody, 'a:t') : undefined;
  const paragraph = txBody && t ? getParagraphs(txBody).find((p) => findFirst(p, 'a:t') === t) : undefined;
  const oldRun = paragraph ? getRuns(paragraph).find((run) => findChild(run, 'a:t') === t) : undefined;

  if (!txBody || !paragraph || !oldRun) {
    setStyledText(shapeElement, text);
    return;
  }

  const rPr = findChild(oldRun, 'a:rPr');
  const newRun = createRun('', rPr ? cloneNode(rPr) : undefined);
  const children = getChildren(paragraph);
  children.splice(children.indexOf(oldRun), 1, newRun);
  for (let i = children.length - 1; i >= 0; i--) {
    const tag = getTagName(children[i]);
    if ((tag === 'a:r' || tag === 'a:br' || tag === 'a:fld') && children[i] !== newRun) {
      children.splice(i, 1);
    }
  }

  fillFromTemplateParagraph(txBody, paragraph, text);
}

/**
 * Turns word wrap on or off through `a:bodyPr/@wrap`.
 */
export function setWordWrap(shapeElement: OrderedXmlNode, wrap: boolean): void {
  const bodyPr = ensureBodyProperties(ensureTextBody(shapeElement));
  setAttr(bodyPr, 'wrap', wrap ? 'square' : 'none');
}

/**
 * Top-anchors the text frame and justifies every paragraph.
 */
export function normalizeAlignment(shapeElement: OrderedXmlNode): void {
  const txBody = getTextBody(shapeElement);
  if (!txBody) {
    return;
  }
  setAttr(ensureBodyProperties(txBody), 'anchor', 't');
  for (const paragraph of getParagraphs(txBody)) {
    let pPr = findChild(paragraph, 'a:pPr');
    if (!pPr) {
      pPr = createElement('a:pPr');
      getChildren(paragraph).unshift(pPr);
    }
    setAttr(pPr, 'algn', 'just');
  }
}

function ensureBodyProperties(txBody: OrderedXmlNode): OrderedXmlNode {
  let bodyPr = findChild(txBody, 'a:bodyPr');
  if (!bodyPr) {
    bodyPr = createElement('a:bodyPr');
    getChildren(txBody).unshift(bodyPr);
  }
  return bodyPr;
}
