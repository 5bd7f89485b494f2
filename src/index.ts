/**
 * Token Top-Up
 *
 * Batch job that tops up active users' token balances by their company's
 * fixed amount and reports which users would be emailed.
 *
 * Boundary Statement:
 * - Reads two JSON files, writes one text report
 * - No email delivery; users are only classified
 * - No persistence between runs
 */

// Contracts
export {
  UserSchema,
  CompanySchema,
  EmailSchema,
  USERS_SCHEMA,
  COMPANIES_SCHEMA,
  RunConfigSchema,
  RunConfigFileSchema,
  LogLevelSchema,
  EMAIL_PATTERN,
  EMAIL_MIN_LENGTH,
  EMAIL_MAX_LENGTH,
} from './contracts/index.js';

export type {
  User,
  Company,
  ProcessedUser,
  CompanyResult,
  TopUpStats,
  RunConfig,
  RunConfigFile,
  Result,
} from './contracts/index.js';

// Validation
export {
  validateRecords,
  describeSchemaError,
  formatIssuePath,
  type SchemaError,
} from './validate/index.js';

// Ingest
export {
  loadRecords,
  loadUsers,
  loadCompanies,
  readJsonFile,
  type LoadError,
  type LoadErrorKind,
  type ReadJsonOptions,
} from './ingest/index.js';

// Top-up
export {
  processTopUps,
  summarizeTopUps,
  groupUsersByCompany,
  sortCompaniesById,
  sortUsersByLastName,
  compareCodePoints,
  isEmailEligible,
} from './topup/index.js';

// Report
export {
  formatReport,
  companyLines,
  hashReport,
  writeReport,
  type WriteError,
  type WrittenReport,
} from './report/index.js';

// Config
export {
  resolveRunConfig,
  loadRunConfigFile,
  DEFAULT_OUTPUT_FILE,
  USAGE_MESSAGE,
  type RunFlags,
  type UsageError,
} from './config/index.js';

// Pipeline
export {
  runTopUp,
  toErrorEnvelope,
  type TopUpRunOptions,
  type TopUpRunError,
  type TopUpRunSummary,
} from './pipeline/index.js';
