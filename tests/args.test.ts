/**
 * CLI Argument Parsing Tests
 *
 * Tests the mapping from argv to a run configuration, environment defaults,
 * and the usage errors reported for invalid command lines.
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, helpText, type CliCommand } from '../src/cli/args';
import { OutputMode, type RunConfig } from '../src/types/config.types';
import { UsageError } from '../src/utils/error-handler';

const BASE = ['-d', 'shows.json', '-l', 'list.json'];

function runConfig(command: CliCommand): RunConfig {
  if (command.kind !== 'run') {
    throw new Error(`expected a run command, got ${command.kind}`);
  }
  return command.config;
}

function usageMessage(argv: string[]): string {
  try {
    parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) return error.message;
    throw error;
  }
  throw new Error('expected a UsageError');
}

describe('parseArgs', () => {
  describe('run configuration', () => {
    it('should apply defaults for everything but the required values', () => {
      const config = runConfig(parseArgs(['3', ...BASE]));

      expect(config).toEqual({
        count: 3,
        catalogPath: 'shows.json',
        listPath: 'list.json',
        hardFail: false,
        outputMode: OutputMode.READABLE,
        log: { verbosity: 0, quiet: false, timestamp: 'none' },
      });
    });

    it('should accept long options and --name=value', () => {
      const config = runConfig(
        parseArgs([
          '--dictionary=a.yaml',
          '--list',
          'b.yaml',
          '--number=7',
          '--hard-fail',
          '--csv',
          '--timestamp=ms',
          '--seed',
          'replay',
        ])
      );

      expect(config).toEqual({
        count: 7,
        catalogPath: 'a.yaml',
        listPath: 'b.yaml',
        hardFail: true,
        outputMode: OutputMode.CSV,
        seed: 'replay',
        log: { verbosity: 0, quiet: false, timestamp: 'ms' },
      });
    });

    it('should count repeated -v flags', () => {
      expect(runConfig(parseArgs(['1', ...BASE, '-v', '-vv'])).log.verbosity).toBe(3);
    });

    it('should set quiet', () => {
      expect(runConfig(parseArgs(['1', ...BASE, '-q'])).log.quiet).toBe(true);
    });

    it('should keep a table width only for table output', () => {
      const table = runConfig(
        parseArgs(['1', ...BASE, '-t', '--table-width', '20'])
      );

      expect(table.outputMode).toBe(OutputMode.TABLE);
      expect(table.tableWidth).toBe(20);
    });

    it('should treat arguments after -- as positional', () => {
      expect(runConfig(parseArgs([...BASE, '--', '4'])).count).toBe(4);
    });
  });

  describe('environment defaults', () => {
    const env = { seed: 'from-env', tableWidth: 40, timestamp: 'sec' as const };

    it('should fill in values not given on the command line', () => {
      const config = runConfig(parseArgs(['1', ...BASE, '--table'], env));

      expect(config.seed).toBe('from-env');
      expect(config.tableWidth).toBe(40);
      expect(config.log.timestamp).toBe('sec');
    });

    it('should let flags override the environment', () => {
      const config = runConfig(
        parseArgs(
          ['1', ...BASE, '-t', '--table-width=10', '--seed=flag', '--timestamp=none'],
          env
        )
      );

      expect(config.seed).toBe('flag');
      expect(config.tableWidth).toBe(10);
      expect(config.log.timestamp).toBe('none');
    });

    it('should ignore an environment table width outside table mode', () => {
      expect(runConfig(parseArgs(['1', ...BASE], env)).tableWidth).toBeUndefined();
    });
  });

  describe('help and version', () => {
    it('should return help or version before validating anything', () => {
      expect(parseArgs(['--help'])).toEqual({ kind: 'help' });
      expect(parseArgs(['-h', '0'])).toEqual({ kind: 'help' });
      expect(parseArgs(['-V'])).toEqual({ kind: 'version' });
    });

    it('should describe every option in the help text', () => {
      const text = helpText();

      for (const flag of ['--dictionary', '--list', '--hard-fail', '--table-width', '--csv', '--seed', '--timestamp']) {
        expect(text).toContain(flag);
      }
    });
  });

  describe('usage errors', () => {
    it('should report every missing required value at once', () => {
      expect(usageMessage([])).toBe(
        [
          'number is required',
          '-d <dictionary> is required',
          '-l <list> is required',
        ].join('\n')
      );
    });

    it('should reject a zero or non-numeric count', () => {
      expect(usageMessage(['0', ...BASE])).toBe(
        'number must be a positive, non-zero integer'
      );
      expect(usageMessage(['many', ...BASE])).toBe(
        'number must be a positive, non-zero integer'
      );
    });

    it('should reject extra positional arguments', () => {
      expect(usageMessage(['1', '2', ...BASE])).toBe('unexpected argument: 2');
      expect(usageMessage(['-n', '1', '2', ...BASE])).toBe(
        'unexpected argument: 2'
      );
    });

    it('should reject combined display modes', () => {
      expect(usageMessage(['1', ...BASE, '--table', '--csv'])).toBe(
        'display modes cannot be combined: --table, --csv'
      );
    });

    it('should reject --table-width without --table', () => {
      expect(usageMessage(['1', ...BASE, '--table-width', '5'])).toBe(
        '--table-width requires --table'
      );
    });

    it('should reject a zero table width', () => {
      expect(usageMessage(['1', ...BASE, '-t', '--table-width', '0'])).toBe(
        'table-width must be a positive, non-zero integer'
      );
    });

    it('should reject an unknown timestamp mode', () => {
      expect(usageMessage(['1', ...BASE, '--timestamp', 'us'])).toBe(
        "invalid value for 'timestamp'"
      );
    });

    it('should reject unknown options and missing values', () => {
      expect(usageMessage(['1', ...BASE, '--colour'])).toBe(
        'unknown option: --colour'
      );
      expect(usageMessage(['1', '-l', 'list.json', '-d'])).toBe(
        '-d requires a value'
      );
      expect(usageMessage(['1', ...BASE, '--csv=yes'])).toBe(
        '--csv does not take a value'
      );
    });
  });
});
