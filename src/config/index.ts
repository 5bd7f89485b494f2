/**
 * Run configuration
 *
 * Settings come from command-line flags and, optionally, a JSON config
 * file. Flags win over the file; the output path and log level fall back
 * to defaults.
 */

import {
  RunConfigFileSchema,
  RunConfigSchema,
  type Result,
  type RunConfig,
  type RunConfigFile,
} from '../contracts/index.js';
import { loadRecords } from '../ingest/index.js';
import { describeSchemaError, formatIssuePath } from '../validate/index.js';

export const DEFAULT_OUTPUT_FILE = './output.txt';
export const USAGE_MESSAGE = 'Invalid format, run with --help for usage details';

export interface RunFlags {
  users_file?: string;
  companies_file?: string;
  output?: string;
  log_level?: string;
}

export interface UsageError {
  kind: 'USAGE';
  message: string;
  missing: string[];
  cause?: string;
}

/**
 * Load the `--config` file. A bad config file is a usage mistake, so every
 * load failure (missing, unreadable, malformed, unknown keys) comes back as
 * a usage error carrying the loader's message.
 */
export function loadRunConfigFile(filePath: string): Result<RunConfigFile, UsageError> {
  const loaded = loadRecords(filePath, RunConfigFileSchema);
  if (loaded.success) return loaded;

  const { message, cause } = loaded.error;
  return {
    success: false,
    error: { kind: 'USAGE', message, missing: [], ...(cause !== undefined && { cause }) },
  };
}

export function resolveRunConfig(
  flags: RunFlags,
  file: RunConfigFile = {}
): Result<RunConfig, UsageError> {
  const merged = {
    users_file: flags.users_file ?? file.users_file,
    companies_file: flags.companies_file ?? file.companies_file,
    output: flags.output ?? file.output ?? DEFAULT_OUTPUT_FILE,
    log_level: flags.log_level ?? file.log_level ?? 'info',
  };

  const missing = (['users_file', 'companies_file'] as const).filter((key) => !merged[key]);
  if (missing.length > 0) {
    return { success: false, error: { kind: 'USAGE', message: USAGE_MESSAGE, missing: [...missing] } };
  }

  const parsed = RunConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const [first] = parsed.error.errors;
    const message = first
      ? describeSchemaError({ path: formatIssuePath(first.path), message: first.message })
      : 'Invalid configuration';
    return { success: false, error: { kind: 'USAGE', message, missing: [] } };
  }

  return { success: true, data: parsed.data };
}
