#!/usr/bin/env node
// Load environment variables from .env file
import dotenv from 'dotenv';
dotenv.config();

import { helpText, parseArgs, PROGRAM_NAME, type CliCommand } from './cli/args';
import { readPackageVersion } from './cli/version';
import { loadEnvConfig, type EnvConfig } from './config/env.config';
import { StdoutWriter } from './output';
import { EXIT_FAILURE, EXIT_SUCCESS, EXIT_USAGE, run, type ExitCode } from './run';
import { errorMessage, UsageError } from './utils/error-handler';
import { Logger } from './utils/logger';

function main(argv: readonly string[]): ExitCode {
  let env: EnvConfig;
  try {
    env = loadEnvConfig(process.env);
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error('✗ Configuration error:', errorMessage(error));
    return EXIT_FAILURE;
  }

  let command: CliCommand;
  try {
    command = parseArgs(argv, env);
  } catch (error) {
    if (error instanceof UsageError) {
      // eslint-disable-next-line no-console
      console.error(
        `error: ${error.message}\n\nUsage: ${PROGRAM_NAME} <number> -d <catalog> -l <list> [options]\nFor more information try --help`
      );
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command.kind) {
    case 'help':
      process.stdout.write(helpText());
      return EXIT_SUCCESS;
    case 'version':
      process.stdout.write(`${PROGRAM_NAME} ${readPackageVersion()}\n`);
      return EXIT_SUCCESS;
    case 'run': {
      const logger = new Logger(command.config.log);
      const result = run(command.config, {
        logger,
        writer: new StdoutWriter(),
        terminalColumns: process.stdout.isTTY
          ? process.stdout.columns
          : undefined,
      });
      return result.exitCode;
    }
  }
}

process.exitCode = main(process.argv.slice(2));
