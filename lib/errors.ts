export enum ErrorCode {
  OutOfRange = 'OUT_OF_RANGE',
  TableFull = 'TABLE_FULL',
  IOFailure = 'IO_FAILURE',
}

export class DatabaseError extends Error {
  public readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseError';
    this.code = code;
  }
}

/**
 * A page or row number outside of the table's capacity.
 */
export class OutOfRangeError extends DatabaseError {
  constructor(message: string) {
    super(message, ErrorCode.OutOfRange);
    this.name = 'OutOfRangeError';
  }
}

export class TableFullError extends DatabaseError {
  constructor() {
    super('Table full.', ErrorCode.TableFull);
    this.name = 'TableFullError';
  }
}

export type IOOperation = 'open' | 'fetch' | 'read' | 'write' | 'close';

/**
 * Wraps whatever the file system threw while touching the backing file.
 */
export class IOFailureError extends DatabaseError {
  public readonly operation: IOOperation;

  constructor(operation: IOOperation, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${reason}`, ErrorCode.IOFailure, { cause });
    this.name = 'IOFailureError';
    this.operation = operation;
  }
}

export function isDatabaseError(err: unknown): err is DatabaseError {
  return err instanceof DatabaseError;
}
