/**
 * Command-line parsing.
 *
 * Usage:
 *   random-show-themes <number> -d <catalog> -l <list> [options]
 *
 * Long options accept both `--name value` and `--name=value`. `-v` may be
 * repeated (`-v -v` or `-vv`). Everything after `--` is positional.
 */

import type { EnvConfig } from '../config/env.config';
import {
  OutputMode,
  type RunConfig,
  type TimestampMode,
} from '../types/config.types';
import type { ValidationError } from '../types/validation.types';
import { UsageError } from '../utils/error-handler';
import {
  validateDisplayFlags,
  validatePositiveInteger,
  validateTimestampMode,
} from '../validation/cli.validation';

export const PROGRAM_NAME = 'random-show-themes';

export type CliCommand =
  | { kind: 'run'; config: RunConfig }
  | { kind: 'help' }
  | { kind: 'version' };

/**
 * Raw flag values before validation.
 */
interface CliArgs {
  help?: boolean;
  version?: boolean;
  number?: string;
  dictionary?: string;
  list?: string;
  hardFail?: boolean;
  verbosity: number;
  quiet?: boolean;
  timestamp?: string;
  modes: OutputMode[];
  tableWidth?: string;
  seed?: string;
  positionals: string[];
}

type ValueField =
  | 'dictionary'
  | 'list'
  | 'number'
  | 'timestamp'
  | 'tableWidth'
  | 'seed';

const VALUE_OPTIONS = new Map<string, ValueField>([
  ['-d', 'dictionary'],
  ['--dictionary', 'dictionary'],
  ['-l', 'list'],
  ['--list', 'list'],
  ['-n', 'number'],
  ['--number', 'number'],
  ['--timestamp', 'timestamp'],
  ['--table-width', 'tableWidth'],
  ['--seed', 'seed'],
]);

function tokenize(argv: readonly string[]): CliArgs {
  const args: CliArgs = { verbosity: 0, modes: [], positionals: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      args.positionals.push(...argv.slice(i + 1));
      break;
    }

    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq > 0 ? arg.slice(eq + 1) : undefined;

    const field = VALUE_OPTIONS.get(name);
    if (field !== undefined) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined) {
        throw new UsageError(`${name} requires a value`);
      }
      args[field] = value;
      continue;
    }

    if (inlineValue !== undefined) {
      throw new UsageError(`${name} does not take a value`);
    }

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--version' || arg === '-V') {
      args.version = true;
    } else if (arg === '--hard-fail') {
      args.hardFail = true;
    } else if (arg === '--quiet' || arg === '-q') {
      args.quiet = true;
    } else if (arg === '--table' || arg === '-t') {
      args.modes.push(OutputMode.TABLE);
    } else if (arg === '--readable') {
      args.modes.push(OutputMode.READABLE);
    } else if (arg === '--csv') {
      args.modes.push(OutputMode.CSV);
    } else if (/^-v+$/.test(arg)) {
      args.verbosity += arg.length - 1;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`unknown option: ${arg}`);
    } else {
      args.positionals.push(arg);
    }
  }

  return args;
}

function messages(errors: readonly ValidationError[]): string[] {
  return errors.map(error => error.message);
}

/**
 * Parses the arguments after the program name.
 *
 * @param argv - e.g. `process.argv.slice(2)`
 * @param env - Defaults read from the environment
 * @throws {UsageError} On unknown options, missing values or invalid input
 */
export function parseArgs(
  argv: readonly string[],
  env: EnvConfig = {}
): CliCommand {
  const args = tokenize(argv);

  if (args.help) return { kind: 'help' };
  if (args.version) return { kind: 'version' };

  const problems: string[] = [];

  const allowedPositionals = args.number === undefined ? 1 : 0;
  if (args.positionals.length > allowedPositionals) {
    problems.push(
      `unexpected argument: ${args.positionals[allowedPositionals]}`
    );
  }

  const count = validatePositiveInteger(
    args.number ?? args.positionals[0],
    'number'
  );
  if (!count.isValid) problems.push(...messages(count.errors));

  if (args.dictionary === undefined) {
    problems.push('-d <dictionary> is required');
  }
  if (args.list === undefined) {
    problems.push('-l <list> is required');
  }

  const display = validateDisplayFlags(
    args.modes,
    args.tableWidth !== undefined
  );
  if (!display.isValid) problems.push(...messages(display.errors));

  let tableWidth = env.tableWidth;
  if (args.tableWidth !== undefined) {
    const width = validatePositiveInteger(args.tableWidth, 'table-width');
    if (width.isValid) {
      tableWidth = width.value;
    } else {
      problems.push(...messages(width.errors));
    }
  }

  let timestamp: TimestampMode = env.timestamp ?? 'none';
  if (args.timestamp !== undefined) {
    const mode = validateTimestampMode(args.timestamp);
    if (mode.isValid) {
      timestamp = mode.value;
    } else {
      problems.push(...messages(mode.errors));
    }
  }

  if (
    problems.length > 0 ||
    !count.isValid ||
    args.dictionary === undefined ||
    args.list === undefined
  ) {
    throw new UsageError(problems.join('\n'));
  }

  const config: RunConfig = {
    count: count.value,
    catalogPath: args.dictionary,
    listPath: args.list,
    hardFail: args.hardFail === true,
    outputMode: args.modes[0] ?? OutputMode.READABLE,
    log: {
      verbosity: args.verbosity,
      quiet: args.quiet === true,
      timestamp,
    },
  };
  if (config.outputMode === OutputMode.TABLE && tableWidth !== undefined) {
    config.tableWidth = tableWidth;
  }
  const seed = args.seed ?? env.seed;
  if (seed !== undefined) {
    config.seed = seed;
  }

  return { kind: 'run', config };
}

export function helpText(): string {
  return `${PROGRAM_NAME}: pick random theme songs from a list of shows

Usage:
  ${PROGRAM_NAME} <number> -d <catalog> -l <list> [options]

Arguments:
  <number>                 The number of results to output. Fewer may be
                           printed when the inputs cannot supply enough.

Options:
  -d, --dictionary <path>  The catalog of all known shows (JSON or YAML)
  -l, --list <path>        The subset of show ids to choose from
  -n, --number <n>         Alternative to the <number> argument
      --hard-fail          Exit with code 1 on any error; output already
                           written is kept
  -t, --table              Print a formatted table
      --table-width <n>    Maximum column width (requires --table)
      --readable           Print human readable lines (default)
      --csv                Print CSV
      --seed <phrase>      Reproduce a previous run
  -v                       Increase log verbosity (repeatable)
  -q, --quiet              Silence all log output
      --timestamp <mode>   Prefix log lines: none, sec, ms, ns
  -h, --help               Show this help
  -V, --version            Show the version

Environment:
  THEMES_SEED, THEMES_TABLE_WIDTH, THEMES_LOG_TIMESTAMP (also read from .env)
`;
}
