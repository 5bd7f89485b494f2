/**
 * Top-up run: load companies and users, compute, format, write.
 *
 * Load failures stop the run before the output file is touched. Every
 * failure is returned to the caller; only the CLI exits the process.
 */

import type { Result, RunConfig, TopUpStats } from '../contracts/index.js';
import { loadCompanies, loadUsers, type LoadError } from '../ingest/index.js';
import { processTopUps, summarizeTopUps } from '../topup/index.js';
import { formatReport, hashReport, writeReport, type WriteError } from '../report/index.js';
import {
  createErrorEnvelope,
  type ErrorCode,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from '../runner/index.js';

export type TopUpRunOptions = Pick<RunConfig, 'users_file' | 'companies_file' | 'output'>;

export type TopUpRunError = LoadError | WriteError;

export interface TopUpRunSummary {
  output: string;
  bytes: number;
  report_hash: string;
  stats: TopUpStats;
}

export function runTopUp(
  options: TopUpRunOptions,
  log: StructuredLogger
): Result<TopUpRunSummary, TopUpRunError> {
  log.info('load.start', 'Loading input files', {
    companies_file: options.companies_file,
    users_file: options.users_file,
  });

  const companies = loadCompanies(options.companies_file);
  if (!companies.success) {
    log.error('load.companies', companies.error.message, { kind: companies.error.kind });
    return companies;
  }

  const users = loadUsers(options.users_file);
  if (!users.success) {
    log.error('load.users', users.error.message, { kind: users.error.kind });
    return users;
  }

  log.info('load.complete', `Loaded ${companies.data.length} companies and ${users.data.length} users`);

  const results = processTopUps(users.data, companies.data);
  const stats = summarizeTopUps(results);
  log.info('topup.complete', `Processed ${stats.companies} companies`, { ...stats });

  const text = formatReport(results);
  const written = writeReport(text, options.output);
  if (!written.success) {
    log.error('report.write', written.error.message, { cause: written.error.cause });
    return written;
  }

  const reportHash = hashReport(text);
  log.info('report.written', `Report written to ${options.output}`, {
    bytes: written.data.bytes,
    report_hash: reportHash,
  });

  return {
    success: true,
    data: { output: options.output, bytes: written.data.bytes, report_hash: reportHash, stats },
  };
}

const KIND_TO_CODE: Record<TopUpRunError['kind'], ErrorCode> = {
  NOT_FOUND: 'NOT_FOUND',
  READ_FAILURE: 'IO_ERROR',
  PARSE_FAILURE: 'PARSE_ERROR',
  SCHEMA_VIOLATION: 'SCHEMA_ERROR',
  WRITE_FAILURE: 'IO_ERROR',
};

export function toErrorEnvelope(error: TopUpRunError): RunnerErrorEnvelope {
  return createErrorEnvelope(KIND_TO_CODE[error.kind], error.message, {
    cause: error.cause,
    context: { kind: error.kind, path: error.path },
  });
}
