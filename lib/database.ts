import { PAGE_SIZE, ROW_SIZE, ROWS_PER_PAGE } from './constant';
import { Pager } from './pager';
import type { Row } from './row';
import { Table } from './table';

export function openTable(filePath: string): Table {
  return new Table(Pager.open(filePath));
}

/**
 * Flushes every resident page, full pages at PAGE_SIZE and the last partial
 * page only up to its last row, then closes the file. Stops at the first
 * failure and rethrows it.
 */
export function closeTable(table: Table) {
  const { pager, numRows } = table;
  const numFullPages = Math.floor(numRows / ROWS_PER_PAGE);

  for (let i = 0; i < numFullPages; i++) {
    if (!pager.isResident(i)) {
      continue;
    }
    pager.flush(i, PAGE_SIZE);
    pager.release(i);
  }

  const numAdditionalRows = numRows % ROWS_PER_PAGE;
  if (numAdditionalRows > 0 && pager.isResident(numFullPages)) {
    pager.flush(numFullPages, numAdditionalRows * ROW_SIZE);
    pager.release(numFullPages);
  }

  pager.close();
}

export function insertRow(table: Table, row: Row) {
  table.insertRow(row);
}

export function scanRows(table: Table): Iterable<Row> {
  return table.scanRows();
}

export class Database {
  private readonly filePath: string;
  private table: Table | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  public get isOpen(): boolean {
    return this.table !== null;
  }

  public get numRows(): number {
    return this.getTable().numRows;
  }

  public open(): Table {
    if (!this.table) {
      this.table = openTable(this.filePath);
    }
    return this.table;
  }

  public insert(row: Row) {
    insertRow(this.getTable(), row);
  }

  public select(): Row[] {
    return [...scanRows(this.getTable())];
  }

  /**
   * runs the flush-then-close sequence once; later calls are no-ops even
   * when the first one threw.
   */
  public close() {
    if (!this.table) {
      return;
    }
    const table = this.table;
    this.table = null;
    closeTable(table);
  }

  private getTable(): Table {
    if (!this.table) {
      throw new Error('call `db.open` first!');
    }
    return this.table;
  }
}
