export {
  LINE_BREAK,
  getTextBody,
  ensureTextBody,
  getParagraphs,
  getRuns,
  getParagraphText,
  getShapeText,
  createRun,
  setPlainText,
  mergeRuns,
  setRunText,
  fillEmptyParagraph,
  setStyledText,
  replaceFirstRun,
  setWordWrap,
  normalizeAlignment,
} from './TextFrame.js';
