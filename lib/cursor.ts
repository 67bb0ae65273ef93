import { ROW_SIZE, ROWS_PER_PAGE } from './constant';
import type { Table } from './table';

/**
 * A position in the table, from row 0 up to one past the last row.
 */
export class Cursor {
  public static tableStart(table: Table): Cursor {
    return new Cursor(table, 0);
  }

  public static tableEnd(table: Table): Cursor {
    return new Cursor(table, table.numRows);
  }

  private readonly table: Table;
  private rowNum: number;

  constructor(table: Table, rowNum: number) {
    this.table = table;
    this.rowNum = rowNum;
  }

  public get endOfTable(): boolean {
    return this.rowNum >= this.table.numRows;
  }

  public get position(): number {
    return this.rowNum;
  }

  /**
   * the 291 bytes of the row under the cursor, a view into its page
   */
  public value(): Buffer {
    const pageNum = Math.floor(this.rowNum / ROWS_PER_PAGE);
    const page = this.table.pager.getPage(pageNum);
    const byteOffset = (this.rowNum % ROWS_PER_PAGE) * ROW_SIZE;
    return page.subarray(byteOffset, byteOffset + ROW_SIZE);
  }

  public advance() {
    this.rowNum++;
  }
}
