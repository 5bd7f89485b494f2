/**
 * Redaction for logs and error envelopes.
 *
 * User records carry email addresses; those must not leak into the
 * structured log stream or error output. The report file itself is the
 * only place addresses are written.
 */

/** Keys whose values are always masked, matched case-insensitively. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'email',
  'password',
  'secret',
  'api_key',
  'private_key',
  'authorization',
  'credential',
];

/** Email addresses are masked regardless of key name. */
const EMAIL_VALUE_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower === dk || lower.endsWith(`_${dk}`));
}

function valueMatchesPattern(value: string): boolean {
  return EMAIL_VALUE_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-redact a value: any key on the denylist is replaced with
 * `[REDACTED]`, any string value matching a sensitive pattern is
 * replaced with `[REDACTED]`. Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return valueMatchesPattern(obj) ? REDACTED : obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  if (!isRecord(obj)) return obj;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

export function redactRecord(data: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Redact a string by replacing inline email addresses.
 */
export function redactString(input: string): string {
  return input.replace(new RegExp(EMAIL_VALUE_PATTERN.source, 'g'), REDACTED);
}
