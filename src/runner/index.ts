/**
 * Runner infrastructure shared by the CLI and the pipeline:
 * structured logging, error envelopes and redaction.
 */

// Logger
export {
  createLogger,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  EXIT_SUCCESS,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactRecord,
  redactString,
  REDACT_DENYLIST_KEYS,
} from './redact.js';
