import { Cursor } from './cursor';
import { ErrorCode, isDatabaseError } from './errors';
import { deserializeRow, formatRow } from './row';
import type { Row } from './row';
import type { Table } from './table';
import { PrepareError, validateRow } from './validation';

export enum MetaCommandResult {
  Success,
  Exit,
  Unrecognized,
}

export enum StatementType {
  INSERT,
  SELECT,
}

export enum ExecuteResult {
  Success,
  TableFull,
}

export type Statement =
  | { type: StatementType.INSERT; rowToInsert: Row }
  | { type: StatementType.SELECT };

export type PrepareResult =
  | { stmt: Statement }
  | { error: PrepareError }
  | { unrecognized: true };

export function doMetaCommand(cmd: string): MetaCommandResult {
  if (cmd === '+quit') {
    return MetaCommandResult.Exit;
  }
  return MetaCommandResult.Unrecognized;
}

export function prepareStatement(cmd: string): PrepareResult {
  const words = cmd.split(/\s+/).filter(Boolean);
  const firstWord = (words[0] ?? '').toLowerCase();

  if (firstWord === 'select') {
    return { stmt: { type: StatementType.SELECT } };
  }

  if (firstWord === 'insert') {
    if (words.length !== 4) {
      return { error: PrepareError.SyntaxError };
    }
    const [, id, username, email] = words;
    if (!/^-?\d+$/.test(id)) {
      return { error: PrepareError.SyntaxError };
    }
    const validated = validateRow({ id: Number(id), username, email });
    if ('error' in validated) {
      return validated;
    }
    return {
      stmt: { type: StatementType.INSERT, rowToInsert: validated.row },
    };
  }

  return { unrecognized: true };
}

function executeInsert(row: Row, table: Table, out: string[]): ExecuteResult {
  try {
    table.insertRow(row);
  } catch (err) {
    if (!isDatabaseError(err)) {
      throw err;
    }
    if (err.code === ErrorCode.TableFull) {
      return ExecuteResult.TableFull;
    }
    out.push(`Error: ${err.message}`);
    return ExecuteResult.Success;
  }
  return ExecuteResult.Success;
}

// a row that cannot be read is reported and the scan moves on
function executeSelect(table: Table, out: string[]): ExecuteResult {
  const cursor = Cursor.tableStart(table);
  while (!cursor.endOfTable) {
    try {
      out.push(formatRow(deserializeRow(cursor.value())));
    } catch (err) {
      if (!isDatabaseError(err)) {
        throw err;
      }
      out.push(`Error reading row ${cursor.position}: ${err.message}`);
    }
    cursor.advance();
  }
  return ExecuteResult.Success;
}

export function executeStatement(
  stmt: Statement,
  table: Table,
  out: string[] = []
): ExecuteResult {
  switch (stmt.type) {
    case StatementType.INSERT:
      return executeInsert(stmt.rowToInsert, table, out);
    case StatementType.SELECT:
      return executeSelect(table, out);
  }
}

const prepareErrorMessages: Record<PrepareError, string> = {
  [PrepareError.SyntaxError]: 'Syntax error. Could not parse statement.',
  [PrepareError.StringTooLong]: 'String is too long.',
  [PrepareError.NegativeId]: 'ID must be positive.',
  [PrepareError.NullByte]: 'String must not contain a null byte.',
};

export interface CommandOutput {
  output: string;
  exit: boolean;
}

/**
 * Handles one line of input against `table` and returns what to print.
 */
export function runCommand(table: Table, input: string): CommandOutput {
  const cmd = input.trim();
  const out: string[] = [];

  if (cmd.length === 0) {
    return { output: '', exit: false };
  }

  if (cmd.startsWith('+')) {
    switch (doMetaCommand(cmd)) {
      case MetaCommandResult.Exit:
        return { output: '', exit: true };
      case MetaCommandResult.Unrecognized:
        return { output: `Unrecognized command '${cmd}'.`, exit: false };
      case MetaCommandResult.Success:
        return { output: '', exit: false };
    }
  }

  const prepared = prepareStatement(cmd);
  if ('unrecognized' in prepared) {
    out.push(`Unrecognized keyword at start of '${cmd}'.`);
  } else if ('error' in prepared) {
    out.push(prepareErrorMessages[prepared.error]);
  } else {
    switch (executeStatement(prepared.stmt, table, out)) {
      case ExecuteResult.Success:
        out.push('Executed.');
        break;
      case ExecuteResult.TableFull:
        out.push('Error: Table full.');
        break;
    }
  }

  return { output: out.join('\n'), exit: false };
}
