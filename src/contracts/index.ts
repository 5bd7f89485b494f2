/**
 * Core domain contracts and Zod schemas for the token top-up run
 *
 * Input records keep the snake_case keys of the source JSON files so the
 * same names flow from the files through to the report.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Types
// ============================================================================

// Integers beyond 2^53 lose precision and print in exponent form.
export const SafeIntegerSchema = z.number().int().safe();

export const RecordIdSchema = SafeIntegerSchema;

// Exactly one "@", with a "." somewhere in the domain part, no whitespace.
export const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const EMAIL_MIN_LENGTH = 6;
export const EMAIL_MAX_LENGTH = 127;

export const EmailSchema = z
  .string()
  .regex(EMAIL_PATTERN, 'Expected an email address with one "@" followed by a "."')
  .min(EMAIL_MIN_LENGTH, `Expected at least ${EMAIL_MIN_LENGTH} characters`)
  .max(EMAIL_MAX_LENGTH, `Expected at most ${EMAIL_MAX_LENGTH} characters`);

// ============================================================================
// Input Records
// ============================================================================

export const UserSchema = z.object({
  id: RecordIdSchema,
  first_name: z.string(),
  last_name: z.string(),
  email: EmailSchema,
  company_id: RecordIdSchema,
  email_status: z.boolean(),
  active_status: z.boolean(),
  tokens: SafeIntegerSchema,
});

export type User = z.infer<typeof UserSchema>;

export const CompanySchema = z.object({
  id: RecordIdSchema,
  name: z.string(),
  top_up: SafeIntegerSchema,
  email_status: z.boolean(),
});

export type Company = z.infer<typeof CompanySchema>;

export const USERS_SCHEMA = z.array(UserSchema);
export const COMPANIES_SCHEMA = z.array(CompanySchema);

// ============================================================================
// Derived Results
// ============================================================================

export interface ProcessedUser extends User {
  new_balance: number;
}

export interface CompanyResult {
  company: Company;
  emailed: ProcessedUser[];
  not_emailed: ProcessedUser[];
  total_top_ups: number;
}

export interface TopUpStats {
  companies: number;
  users_emailed: number;
  users_not_emailed: number;
  total_top_ups: number;
}

// ============================================================================
// Run Configuration
// ============================================================================

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const RunConfigFileSchema = z
  .object({
    users_file: z.string().min(1).optional(),
    companies_file: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    log_level: LogLevelSchema.optional(),
  })
  .strict();

export type RunConfigFile = z.infer<typeof RunConfigFileSchema>;

export const RunConfigSchema = z.object({
  users_file: z.string().min(1),
  companies_file: z.string().min(1),
  output: z.string().min(1),
  log_level: LogLevelSchema,
});

export type RunConfig = z.infer<typeof RunConfigSchema>;

// ============================================================================
// Results
// ============================================================================

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };
