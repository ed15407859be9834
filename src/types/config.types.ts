/**
 * Configuration values threaded through a run. Built once from the command
 * line and the environment, then passed explicitly to every component.
 */

/**
 * Output formats a run can render to.
 */
export enum OutputMode {
  TABLE = 'table',
  READABLE = 'readable',
  CSV = 'csv',
}

/**
 * Timestamp prefix applied to log lines.
 */
export type TimestampMode = 'none' | 'sec' | 'ms' | 'ns';

export const TIMESTAMP_MODES: readonly TimestampMode[] = [
  'none',
  'sec',
  'ms',
  'ns',
];

/**
 * Logger settings.
 */
export interface LogConfig {
  /** Number of `-v` flags given; 0 logs warnings and errors */
  verbosity: number;
  /** Silence every log line */
  quiet: boolean;
  timestamp: TimestampMode;
}

/**
 * Everything a run needs, resolved from flags and environment defaults.
 */
export interface RunConfig {
  /** Number of results requested */
  count: number;
  /** Path to the catalog file */
  catalogPath: string;
  /** Path to the candidate list file */
  listPath: string;
  /** Turn any failure into exit code 1 */
  hardFail: boolean;
  outputMode: OutputMode;
  /** Maximum column width for table output; terminal width when absent */
  tableWidth?: number;
  /** Seed phrase for reproducible runs; random when absent */
  seed?: string;
  log: LogConfig;
}
