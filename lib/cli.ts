import { closeTable, openTable } from './database';
import type { Table } from './table';

export const USAGE = 'Usage: pagedb <database_file>';

export type Reporter = (message: string) => void;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * the database path from `process.argv`, or null when it is missing
 */
export function databasePath(argv: readonly string[]): string | null {
  const filePath = argv[2];
  return filePath ? filePath : null;
}

/**
 * Opens the table named on the command line. Returns the exit code instead
 * when there is nothing to open or opening failed.
 */
export function openFromArgv(
  argv: readonly string[],
  report: Reporter = console.error
): Table | number {
  const filePath = databasePath(argv);
  if (filePath === null) {
    report(USAGE);
    return 1;
  }
  try {
    return openTable(filePath);
  } catch (err) {
    report(`Error opening database: ${errorMessage(err)}`);
    return 1;
  }
}

/**
 * Runs the shutdown sequence and maps its outcome to an exit code.
 */
export function closeAndExitCode(
  table: Table,
  report: Reporter = console.error
): number {
  try {
    closeTable(table);
  } catch (err) {
    report(`Error closing database: ${errorMessage(err)}`);
    return 1;
  }
  return 0;
}
