/**
 * Input file loading
 *
 * Reads a JSON file from disk, parses it and validates it against one of
 * the fixed record schemas. Every failure is terminal for that file and is
 * returned as a LoadError rather than thrown.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import type { z } from 'zod';
import {
  USERS_SCHEMA,
  COMPANIES_SCHEMA,
  type Company,
  type Result,
  type User,
} from '../contracts/index.js';
import { describeSchemaError, validateRecords } from '../validate/index.js';

export type LoadErrorKind =
  | 'NOT_FOUND'
  | 'READ_FAILURE'
  | 'PARSE_FAILURE'
  | 'SCHEMA_VIOLATION';

export interface LoadError {
  kind: LoadErrorKind;
  path: string;
  message: string;
  cause?: string;
}

export interface ReadJsonOptions {
  /** Reject files larger than this many bytes before parsing. Unlimited when unset. */
  maxBytes?: number;
}

function causeOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read and parse a JSON file without validating its shape.
 */
export function readJsonFile(
  filePath: string,
  options: ReadJsonOptions = {}
): Result<unknown, LoadError> {
  const { maxBytes } = options;
  const resolved = resolve(filePath);

  if (!existsSync(resolved)) {
    return {
      success: false,
      error: { kind: 'NOT_FOUND', path: filePath, message: `${filePath} does not exist` },
    };
  }

  let content: string;
  try {
    content = readFileSync(resolved, 'utf-8');
  } catch (err) {
    return {
      success: false,
      error: {
        kind: 'READ_FAILURE',
        path: filePath,
        message: `Error reading file ${filePath}`,
        cause: causeOf(err),
      },
    };
  }

  if (maxBytes !== undefined && Buffer.byteLength(content, 'utf-8') > maxBytes) {
    return {
      success: false,
      error: {
        kind: 'READ_FAILURE',
        path: filePath,
        message: `${filePath} exceeds maximum size of ${maxBytes} bytes`,
      },
    };
  }

  try {
    return { success: true, data: JSON.parse(content) };
  } catch (err) {
    const cause = causeOf(err);
    return {
      success: false,
      error: {
        kind: 'PARSE_FAILURE',
        path: filePath,
        message: `${filePath} is not valid JSON: ${cause}`,
        cause,
      },
    };
  }
}

/**
 * Load a file of records and validate it against `schema`.
 */
export function loadRecords<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
  options: ReadJsonOptions = {}
): Result<z.infer<S>, LoadError> {
  const raw = readJsonFile(filePath, options);
  if (!raw.success) return raw;

  const validated = validateRecords(raw.data, schema);
  if (!validated.success) {
    const detail = describeSchemaError(validated.error);
    return {
      success: false,
      error: {
        kind: 'SCHEMA_VIOLATION',
        path: filePath,
        message: `${filePath} is in an invalid format: ${detail}`,
        cause: detail,
      },
    };
  }

  return validated;
}

export function loadUsers(filePath: string, options?: ReadJsonOptions): Result<User[], LoadError> {
  return loadRecords(filePath, USERS_SCHEMA, options);
}

export function loadCompanies(filePath: string, options?: ReadJsonOptions): Result<Company[], LoadError> {
  return loadRecords(filePath, COMPANIES_SCHEMA, options);
}
