import { PAGE_SIZE, ROW_SIZE, ROWS_PER_PAGE, TABLE_MAX_ROWS } from './constant';
import { Cursor } from './cursor';
import { OutOfRangeError, TableFullError } from './errors';
import type { Pager } from './pager';
import { deserializeRow, serializeRow } from './row';
import type { Row } from './row';

/**
 * rows a file of `fileLength` bytes holds; every page but the last one is
 * full and no row straddles a page boundary.
 */
export function rowCountFromFileLength(fileLength: number): number {
  const fullPages = Math.floor(fileLength / PAGE_SIZE);
  const rest = Math.floor((fileLength % PAGE_SIZE) / ROW_SIZE);
  return Math.min(fullPages * ROWS_PER_PAGE + rest, TABLE_MAX_ROWS);
}

export class Table {
  public readonly pager: Pager;
  private rows: number;

  constructor(pager: Pager, numRows?: number) {
    this.pager = pager;
    this.rows = numRows ?? rowCountFromFileLength(pager.fileLength);
  }

  public get numRows(): number {
    return this.rows;
  }

  public rowSlot(rowNum: number): Buffer {
    if (
      !Number.isInteger(rowNum) ||
      rowNum < 0 ||
      rowNum >= TABLE_MAX_ROWS
    ) {
      throw new OutOfRangeError(
        `Tried to fetch row number out of bounds. ` +
          `${rowNum} >= ${TABLE_MAX_ROWS}`
      );
    }
    return new Cursor(this, rowNum).value();
  }

  public insertRow(row: Row) {
    if (this.rows >= TABLE_MAX_ROWS) {
      throw new TableFullError();
    }
    const cursor = Cursor.tableEnd(this);
    serializeRow(row, cursor.value());
    this.rows++;
  }

  public *scanRows(): Generator<Row, void, undefined> {
    const cursor = Cursor.tableStart(this);
    while (!cursor.endOfTable) {
      yield deserializeRow(cursor.value());
      cursor.advance();
    }
  }
}
