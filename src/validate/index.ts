/**
 * Schema validation for parsed input files
 *
 * Wraps a Zod schema and reports only the first violation, with the
 * dotted path of the offending value, so diagnostics stay one line long.
 */

import type { z } from 'zod';
import type { Result } from '../contracts/index.js';

export interface SchemaError {
  path: string;
  message: string;
}

export const ROOT_PATH = '(root)';

export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? ROOT_PATH : path.join('.');
}

export function describeSchemaError(error: SchemaError): string {
  return `${error.path}: ${error.message}`;
}

/**
 * Validate `data` against `schema`, failing on the first issue found.
 * Zod reports array elements in order and object keys in schema order,
 * so the first issue is stable for a given input.
 */
export function validateRecords<S extends z.ZodTypeAny>(
  data: unknown,
  schema: S
): Result<z.infer<S>, SchemaError> {
  const parsed = schema.safeParse(data);
  if (parsed.success) {
    return { success: true, data: parsed.data };
  }

  const [first] = parsed.error.errors;
  if (!first) {
    return { success: false, error: { path: ROOT_PATH, message: 'Invalid input' } };
  }

  return {
    success: false,
    error: { path: formatIssuePath(first.path), message: first.message },
  };
}
