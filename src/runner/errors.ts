/**
 * Shared error envelope for the top-up runner.
 *
 * Every error that reaches the user goes through this envelope so the CLI
 * output and the structured logs always have the same shape.
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Error envelope --------------------------------------------------

export type ErrorCode =
  | 'USAGE_ERROR'
  | 'NOT_FOUND'
  | 'PARSE_ERROR'
  | 'SCHEMA_ERROR'
  | 'IO_ERROR'
  | 'INTERNAL_ERROR';

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  cause?: string;
  context?: Record<string, unknown>;
}

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  USAGE_ERROR: EXIT_VALIDATION,
  NOT_FOUND: EXIT_VALIDATION,
  PARSE_ERROR: EXIT_VALIDATION,
  SCHEMA_ERROR: EXIT_VALIDATION,
  IO_ERROR: EXIT_DEPENDENCY,
  INTERNAL_ERROR: EXIT_BUG,
};

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code];
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    ...(causeMsg !== undefined && { cause: redactString(causeMsg) }),
    ...(opts.context && { context: opts.context }),
  };
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
