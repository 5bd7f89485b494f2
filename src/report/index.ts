/**
 * Plain-text top-up report
 *
 * The layout is a fixed contract consumed by people and diff tools:
 *
 *   (blank line)
 *     Company Id: 1
 *     Company Name: Acme
 *     Users Emailed:
 *       Zed, A, a@x.com
 *         Previous Token Balance 10
 *         New Token Balance 15
 *     Users Not Emailed:
 *     Total amount of top ups for Acme: 5
 *
 * Both list headers are printed even when the list is empty, and the total
 * line sits at the company field indentation.
 */

import { closeSync, openSync, writeFileSync } from 'fs';
import { createHash } from 'crypto';
import type { CompanyResult, ProcessedUser, Result } from '../contracts/index.js';

const COMPANY_INDENT = '  ';
const USER_INDENT = '    ';
const BALANCE_INDENT = '      ';

export interface WriteError {
  kind: 'WRITE_FAILURE';
  path: string;
  message: string;
  cause?: string;
}

export interface WrittenReport {
  path: string;
  bytes: number;
}

function userLines(user: ProcessedUser): string[] {
  return [
    `${USER_INDENT}${user.last_name}, ${user.first_name}, ${user.email}`,
    `${BALANCE_INDENT}Previous Token Balance ${user.tokens}`,
    `${BALANCE_INDENT}New Token Balance ${user.new_balance}`,
  ];
}

function userListLines(header: string, users: readonly ProcessedUser[]): string[] {
  return [`${COMPANY_INDENT}${header}`, ...users.flatMap(userLines)];
}

export function companyLines(result: CompanyResult): string[] {
  const { company } = result;
  return [
    '',
    `${COMPANY_INDENT}Company Id: ${company.id}`,
    `${COMPANY_INDENT}Company Name: ${company.name}`,
    ...userListLines('Users Emailed:', result.emailed),
    ...userListLines('Users Not Emailed:', result.not_emailed),
    `${COMPANY_INDENT}Total amount of top ups for ${company.name}: ${result.total_top_ups}`,
  ];
}

/**
 * Render results in order. Every line, including the last, ends in "\n";
 * an empty result set renders as the empty string.
 */
export function formatReport(results: readonly CompanyResult[]): string {
  return results
    .flatMap(companyLines)
    .map((line) => `${line}\n`)
    .join('');
}

export function hashReport(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

/**
 * Write the report to `filePath`, truncating any existing file.
 * The descriptor is closed on every path, including a failed write.
 */
export function writeReport(text: string, filePath: string): Result<WrittenReport, WriteError> {
  let fd: number | undefined;
  try {
    fd = openSync(filePath, 'w');
    writeFileSync(fd, text, 'utf-8');
    return { success: true, data: { path: filePath, bytes: Buffer.byteLength(text, 'utf-8') } };
  } catch (err) {
    const cause = err instanceof Error ? err.message : String(err);
    return {
      success: false,
      error: {
        kind: 'WRITE_FAILURE',
        path: filePath,
        message: `Unable to write report to ${filePath}`,
        cause,
      },
    };
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}
