import { LeafElement } from './LeafElement.js';

export type TableType = 'markdown' | 'html';

/**
 * Pipe table or HTML table block. The source text is kept as written;
 * only headers and dimensions are parsed out.
 */
export class Table extends LeafElement {
  readonly tableType: TableType;
  readonly headers: string[];
  readonly rowCount: number;
  readonly colCount: number;
  private readonly source: string;

  constructor(tableType: TableType, source: string, headers: string[], rowCount: number, colCount: number) {
    super();
    this.setup();
    this.tableType = tableType;
    this.source = source;
    this.headers = headers;
    this.rowCount = rowCount;
    this.colCount = colCount;
  }

  get elementText(): string {
    return this.source;
  }

  toString(): string {
    return `<Table type=${this.tableType} headers=${JSON.stringify(this.headers)}>`;
  }
}
