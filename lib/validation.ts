import { z } from 'zod';

import {
  COLUMN_EMAIL_SIZE,
  COLUMN_USERNAME_SIZE,
  MAX_ROW_ID,
} from './constant';
import type { Row } from './row';

export enum PrepareError {
  SyntaxError = 'SYNTAX_ERROR',
  StringTooLong = 'STRING_TOO_LONG',
  NegativeId = 'NEGATIVE_ID',
  NullByte = 'NULL_BYTE',
}

// every issue message is the PrepareError to report
const column = (size: number) =>
  z
    .string({ invalid_type_error: PrepareError.SyntaxError })
    .refine(s => !s.includes('\0'), { message: PrepareError.NullByte })
    .refine(s => Buffer.byteLength(s, 'utf8') <= size, {
      message: PrepareError.StringTooLong,
    });

export const rowSchema = z.object({
  id: z
    .number({ invalid_type_error: PrepareError.SyntaxError })
    .int({ message: PrepareError.SyntaxError })
    .nonnegative({ message: PrepareError.NegativeId })
    .max(MAX_ROW_ID, { message: PrepareError.SyntaxError }),
  username: column(COLUMN_USERNAME_SIZE),
  email: column(COLUMN_EMAIL_SIZE),
});

export type ValidationResult = { row: Row } | { error: PrepareError };

/**
 * Rejects a row the codec could not store verbatim: an id outside of uint32,
 * a column longer than its width, or a NUL byte (the codec's terminator).
 */
export function validateRow(input: unknown): ValidationResult {
  const result = rowSchema.safeParse(input);
  if (result.success) {
    return { row: result.data };
  }
  const [issue] = result.error.issues;
  const error = Object.values(PrepareError).find(e => e === issue?.message);
  return { error: error ?? PrepareError.SyntaxError };
}
