export { Element } from './Element.js';
export type { ElementClass, Insertable } from './Element.js';
export { LeafElement } from './LeafElement.js';
export { Heading } from './Heading.js';
export { Paragraph } from './Paragraph.js';
export { CodeBlock } from './CodeBlock.js';
export { Table } from './Table.js';
export type { TableType } from './Table.js';
export { Picture } from './Picture.js';
export { MarkdownDocument } from './MarkdownDocument.js';
