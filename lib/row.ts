import {
  COLUMN_EMAIL_SIZE,
  COLUMN_USERNAME_SIZE,
  EMAIL_OFFSET,
  ID_OFFSET,
  ROW_SIZE,
  USERNAME_OFFSET,
} from './constant';

export interface Row {
  id: number;
  username: string;
  email: string;
}

/**
 * Row, FIXED 291 bytes:
 *
 * 0            4                     36                           291
 * +------------+---------------------+-----------------------------+
 * | [u32le] id | [bytes] username    | [bytes] email               |
 * +------------+---------------------+-----------------------------+
 *
 * both strings are left-justified and zero-padded to the column width.
 */
export function serializeRow(row: Row, destination: Buffer) {
  if (destination.length < ROW_SIZE) {
    throw new RangeError(
      `row slot is ${destination.length} bytes, need ${ROW_SIZE}`
    );
  }
  destination.writeUInt32LE(row.id, ID_OFFSET);
  writeColumn(destination, row.username, USERNAME_OFFSET, COLUMN_USERNAME_SIZE);
  writeColumn(destination, row.email, EMAIL_OFFSET, COLUMN_EMAIL_SIZE);
}

export function deserializeRow(source: Buffer): Row {
  return {
    id: source.readUInt32LE(ID_OFFSET),
    username: readColumn(source, USERNAME_OFFSET, COLUMN_USERNAME_SIZE),
    email: readColumn(source, EMAIL_OFFSET, COLUMN_EMAIL_SIZE),
  };
}

export function formatRow(row: Row): string {
  return `(${row.id}, ${row.username}, ${row.email})`;
}

// Buffer#write stops before a character that does not fit, so an oversized
// value is cut on a character boundary.
function writeColumn(buf: Buffer, value: string, offset: number, size: number) {
  const written = buf.write(value, offset, size, 'utf8');
  buf.fill(0, offset + written, offset + size);
}

function readColumn(buf: Buffer, offset: number, size: number): string {
  const column = buf.subarray(offset, offset + size);
  const end = column.indexOf(0);
  return column.toString('utf8', 0, end === -1 ? size : end);
}
