import fs from 'fs';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import {
  Database,
  IOFailureError,
  Table,
  USAGE,
  closeAndExitCode,
  databasePath,
  openFromArgv,
  PAGE_SIZE,
  ROW_SIZE,
  ROWS_PER_PAGE,
  closeTable,
  insertRow,
  openTable,
  scanRows,
} from '../lib';

const row = (i: number) => ({
  id: i,
  username: `user${i}`,
  email: `person${i}@example.com`,
});

const rows = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, i) => row(from + i));

describe('openTable / closeTable', () => {
  const file = './test/fixture/lifecycle.db';

  beforeEach(() => {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  });

  afterEach(() => {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  });

  test('a new file opens empty', () => {
    const table = openTable(file);
    expect(table.numRows).toBe(0);
    expect([...scanRows(table)]).toEqual([]);
    closeTable(table);
    expect(fs.statSync(file).size).toBe(0);
  });

  test('rows survive close and reopen', () => {
    let table = openTable(file);
    for (const r of rows(1, 30)) {
      insertRow(table, r);
    }
    closeTable(table);

    table = openTable(file);
    expect(table.numRows).toBe(30);
    expect([...scanRows(table)]).toEqual(rows(1, 30));
    closeTable(table);
  });

  test('full pages are written whole, the last page up to its last row', () => {
    const table = openTable(file);
    for (const r of rows(1, ROWS_PER_PAGE + 6)) {
      insertRow(table, r);
    }
    closeTable(table);

    expect(fs.statSync(file).size).toBe(PAGE_SIZE + 6 * ROW_SIZE);
  });

  test('a partial last page reopens with exactly its rows', () => {
    let table = openTable(file);
    for (const r of rows(1, 3)) {
      insertRow(table, r);
    }
    // garbage past the last row never reaches the file
    table.rowSlot(3).fill(0x41);
    closeTable(table);
    expect(fs.statSync(file).size).toBe(3 * ROW_SIZE);

    table = openTable(file);
    expect(table.numRows).toBe(3);
    expect([...scanRows(table)]).toEqual(rows(1, 3));

    insertRow(table, row(4));
    expect([...scanRows(table)]).toEqual(rows(1, 4));
    closeTable(table);

    table = openTable(file);
    expect([...scanRows(table)]).toEqual(rows(1, 4));
    closeTable(table);
  });

  test('appending after reopen fills the partial page first', () => {
    let table = openTable(file);
    for (const r of rows(1, 10)) {
      insertRow(table, r);
    }
    closeTable(table);

    table = openTable(file);
    for (const r of rows(11, 20)) {
      insertRow(table, r);
    }
    closeTable(table);

    expect(fs.statSync(file).size).toBe(PAGE_SIZE + 6 * ROW_SIZE);
    table = openTable(file);
    expect([...scanRows(table)]).toEqual(rows(1, 20));
    closeTable(table);
  });

  test('a page missing from memory is read back from disk', () => {
    let table = openTable(file);
    for (const r of rows(1, ROWS_PER_PAGE + 2)) {
      insertRow(table, r);
    }
    closeTable(table);

    const onDisk = fs.readFileSync(file);
    table = openTable(file);
    expect(table.pager.isResident(1)).toBe(false);
    const slot = table.rowSlot(ROWS_PER_PAGE + 1);
    const expected = onDisk.subarray(
      PAGE_SIZE + ROW_SIZE,
      PAGE_SIZE + 2 * ROW_SIZE
    );
    expect(slot.equals(expected)).toBe(true);
    expect(table.pager.isResident(0)).toBe(false);
    closeTable(table);
  });

  test('pages never loaded are left untouched on close', () => {
    let table = openTable(file);
    for (const r of rows(1, ROWS_PER_PAGE * 2)) {
      insertRow(table, r);
    }
    closeTable(table);
    const before = fs.readFileSync(file);

    table = openTable(file);
    table.rowSlot(ROWS_PER_PAGE);
    closeTable(table);
    expect(fs.readFileSync(file).equals(before)).toBe(true);
  });

  test('closeTable surfaces IO failures', () => {
    const table = openTable(file);
    insertRow(table, row(1));
    fs.closeSync(table.pager.fd);
    expect(() => closeTable(table)).toThrowError(IOFailureError);
  });
});

describe('Database', () => {
  let db: Database;
  const file = './test/fixture/good.db';

  beforeEach(() => {
    db = new Database(file);
  });

  afterEach(() => {
    db.close();
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  });

  test('insert', () => {
    expect(() => db.insert(row(1))).toThrowError('call `db.open` first!');
    db.open();
    db.insert(row(1));
    expect(db.numRows).toBe(1);
  });

  test('select', () => {
    expect(() => db.select()).toThrowError('call `db.open` first!');
    db.open();
    expect(db.select()).toEqual([]);
    db.insert(row(1));
    db.insert(row(2));
    expect(db.select()).toEqual([row(1), row(2)]);
  });

  test('close flushes once and the file reopens', () => {
    db.open();
    db.insert(row(1));
    expect(db.isOpen).toBe(true);
    db.close();
    expect(db.isOpen).toBe(false);
    expect(() => db.close()).not.toThrow();

    db.open();
    expect(db.select()).toEqual([row(1)]);
  });
});

describe('process entry', () => {
  const file = './test/fixture/process.db';
  let messages: string[];
  const report = (message: string) => {
    messages.push(message);
  };

  beforeEach(() => {
    messages = [];
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  });

  afterEach(() => {
    if (fs.existsSync(file)) {
      fs.unlinkSync(file);
    }
  });

  test('databasePath', () => {
    expect(databasePath(['node', 'db.js'])).toBe(null);
    expect(databasePath(['node', 'db.js', ''])).toBe(null);
    expect(databasePath(['node', 'db.js', file])).toBe(file);
  });

  test('a missing argument prints usage and exits with 1', () => {
    expect(openFromArgv(['node', 'db.js'], report)).toBe(1);
    expect(messages).toEqual([USAGE]);
    expect(USAGE).toBe('Usage: pagedb <database_file>');
  });

  test('a file that cannot be opened exits with 1', () => {
    expect(openFromArgv(['node', 'db.js', './test/fixture'], report)).toBe(1);
    expect(messages.length).toBe(1);
    expect(messages[0]).toMatch(/^Error opening database: open failed: EISDIR/);
  });

  test('a clean shutdown exits with 0 and keeps the rows', () => {
    const opened = openFromArgv(['node', 'db.js', file], report);
    expect(opened).toBeInstanceOf(Table);
    if (!(opened instanceof Table)) {
      return;
    }
    insertRow(opened, row(1));
    expect(closeAndExitCode(opened, report)).toBe(0);
    expect(messages).toEqual([]);
    expect(fs.statSync(file).size).toBe(ROW_SIZE);
  });

  test('a failing shutdown exits with 1', () => {
    const table = openTable(file);
    insertRow(table, row(1));
    fs.closeSync(table.pager.fd);
    expect(closeAndExitCode(table, report)).toBe(1);
    expect(messages.length).toBe(1);
    expect(messages[0]).toMatch(/^Error closing database: write failed: EBADF/);
  });
});
