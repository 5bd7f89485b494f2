#!/usr/bin/env node
/**
 * Token top-up CLI
 *
 *   topup --users_file <path> --companies_file <path> [--output <path>]
 *         [--config <path>] [--json] [--log-file <path>] [--log-level <level>]
 *
 * Exit codes:
 *   0  success
 *   2  validation error (usage, missing file, bad JSON, schema mismatch)
 *   3  IO failure (read or write)
 *   4  unexpected bug
 */

import { Command } from 'commander';
import type { RunConfigFile } from './contracts/index.js';
import { loadRunConfigFile, resolveRunConfig } from './config/index.js';
import { runTopUp, toErrorEnvelope } from './pipeline/index.js';
import {
  createErrorEnvelope,
  createLogger,
  exitCodeFor,
  wrapError,
  EXIT_SUCCESS,
  type RunnerErrorEnvelope,
} from './runner/index.js';

interface CliOptions {
  users_file?: string;
  companies_file?: string;
  output?: string;
  config?: string;
  json?: boolean;
  logFile?: string;
  logLevel?: string;
  verbose?: boolean;
}

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('topup')
  .description('Top up user token balances per company and report who would be emailed')
  .version('0.1.0')
  .addHelpText('after', '\nExample:\n  topup --users_file ./users.json --companies_file ./companies.json --output ./output.txt\n')
  .option('--users_file <path>', 'Path to users JSON file')
  .option('--companies_file <path>', 'Path to companies JSON file')
  .option('--output <path>', 'Report output path (default: ./output.txt)')
  .option('--config <path>', 'Path to a JSON config file supplying any of the above')
  .option('--json', 'Emit structured logs to stderr and the run summary as JSON to stdout')
  .option('--log-file <path>', 'Append structured logs to this file')
  .option('--log-level <level>', 'Minimum log level (debug, info, warn, error, fatal)')
  .option('--verbose', 'Print the underlying cause of a failure')
  .action((options: CliOptions) => {
    try {
      let fileConfig: RunConfigFile = {};
      if (options.config) {
        const loaded = loadRunConfigFile(options.config);
        if (!loaded.success) {
          exitWithEnvelope(
            createErrorEnvelope('USAGE_ERROR', loaded.error.message, {
              cause: loaded.error.cause,
              context: { config: options.config },
            }),
            options,
          );
        }
        fileConfig = loaded.data;
      }

      const resolved = resolveRunConfig(
        {
          users_file: options.users_file,
          companies_file: options.companies_file,
          output: options.output,
          log_level: options.logLevel,
        },
        fileConfig,
      );
      if (!resolved.success) {
        exitWithEnvelope(
          createErrorEnvelope('USAGE_ERROR', resolved.error.message, {
            context: { missing: resolved.error.missing },
          }),
          options,
        );
      }

      const config = resolved.data;
      const log = createLogger({
        module: 'topup',
        filePath: options.logFile,
        minLevel: config.log_level,
        json: options.json,
      });

      if (!options.json) {
        console.log(`Processing e-mails for companies: ${config.companies_file} and users: ${config.users_file}`);
      }

      const result = runTopUp(config, log);
      if (!result.success) {
        exitWithEnvelope(toErrorEnvelope(result.error), options);
      }

      if (options.json) {
        process.stdout.write(JSON.stringify(result.data, null, 2) + '\n');
      } else {
        console.log(`Processing complete, see ${config.output} for more details`);
      }

      process.exit(EXIT_SUCCESS);
    } catch (err) {
      exitWithEnvelope(wrapError(err), options);
    }
  });

// ---------------------------------------------------------------------------
// Error handling helpers
// ---------------------------------------------------------------------------

function exitWithEnvelope(envelope: RunnerErrorEnvelope, options: CliOptions): never {
  if (options.json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.code}]: ${envelope.userMessage}`);
    if (options.verbose && envelope.cause) {
      console.error(`  cause: ${envelope.cause}`);
    }
  }
  process.exit(exitCodeFor(envelope.code));
}

program.parse();
