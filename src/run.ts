/**
 * Run orchestration: one invocation of the tool from loaded config to exit code.
 *
 * Steps:
 * 1. Load and validate the catalog and candidate list (fatal on failure)
 * 2. Reject an empty catalog or list (fatal)
 * 3. Lower the requested count to the number of distinct candidates, or
 *    abort under hard-fail
 * 4. Seed the random source, open the sink, sample, close the sink
 * 5. Exit 1 only for fatal errors, or for any failure under hard-fail
 *
 * Output already written is never retracted, whatever the exit code.
 */

import {
  createResultSink,
  type OutputWriter,
  type ResultSink,
} from './output';
import { LoaderService } from './services/loader.service';
import { PRNG, type RandomSource } from './services/prng.service';
import { SamplingService } from './services/sampling.service';
import { SeedService } from './services/seed.service';
import type { RunConfig } from './types/config.types';
import type {
  CandidateList,
  Catalog,
  SampleOutcome,
} from './types/show.types';
import {
  ConfigurationError,
  logError,
  RunError,
  RunErrorCode,
} from './utils/error-handler';
import type { Logger } from './utils/logger';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_FAILURE
  | typeof EXIT_USAGE;

export interface RunDependencies {
  logger: Logger;
  writer: OutputWriter;
  /** Overrides seeding entirely; `config.seed` is then ignored */
  random?: RandomSource;
  seeds?: SeedService;
  /** Terminal width used for table output when no width is configured */
  terminalColumns?: number;
}

export interface RunResult {
  exitCode: ExitCode;
  /** Count actually passed to the sampler, after degradation */
  targetCount?: number;
  /** Seed phrase used, when the run seeded its own generator */
  seedPhrase?: string;
  outcome?: SampleOutcome;
}

interface Inputs {
  catalog: Catalog;
  candidates: CandidateList;
}

function fatal(logger: Logger, error: RunError): RunResult {
  logError(logger, error, error.code);
  return { exitCode: EXIT_FAILURE };
}

function loadInputs(config: RunConfig, logger: Logger): Inputs | RunError {
  const loader = new LoaderService(logger);
  try {
    const catalog = loader.loadCatalog(config.catalogPath);
    const candidates = loader.loadCandidates(config.listPath);
    return { catalog, candidates };
  } catch (error) {
    if (error instanceof RunError) return error;
    throw error;
  }
}

/**
 * Calls a sink operation, logging and reporting a failure instead of throwing.
 */
function guardSink(
  logger: Logger,
  operation: string,
  action: () => void
): boolean {
  try {
    action();
    return true;
  } catch (error) {
    logError(logger, error, RunErrorCode.SINK, { operation });
    return false;
  }
}

export function run(config: RunConfig, deps: RunDependencies): RunResult {
  const { logger } = deps;

  const inputs = loadInputs(config, logger);
  if (inputs instanceof RunError) {
    return fatal(logger, inputs);
  }
  const { catalog, candidates } = inputs;

  if (catalog.size === 0) {
    return fatal(logger, new ConfigurationError('dictionary cannot be empty'));
  }
  if (candidates.length === 0) {
    return fatal(logger, new ConfigurationError('list cannot be empty'));
  }

  const distinct = new Set(candidates).size;
  let targetCount = config.count;
  if (targetCount > distinct) {
    const message = `${targetCount} results were requested, however the list only contained ${distinct} distinct entries`;
    if (config.hardFail) {
      logError(logger, message, RunErrorCode.DEGRADATION);
      return { exitCode: EXIT_FAILURE };
    }
    logger.warn(message, { errorCode: RunErrorCode.DEGRADATION });
    logger.info(`requesting ${distinct} results instead`);
    targetCount = distinct;
  }

  let random = deps.random;
  let seedPhrase: string | undefined;
  if (random === undefined) {
    const seeds = deps.seeds ?? new SeedService();
    seedPhrase = seeds.resolvePhrase(config.seed);
    logger.info(`seed: ${seedPhrase}`);
    random = new PRNG(seeds.toSeed(seedPhrase));
  }

  const sink: ResultSink = createResultSink(config.outputMode, deps.writer, {
    tableWidth: config.tableWidth,
    terminalColumns: deps.terminalColumns,
  });

  if (!guardSink(logger, 'open', () => sink.open())) {
    return { exitCode: EXIT_FAILURE, targetCount, seedPhrase };
  }

  const outcome = new SamplingService(logger).sample(
    targetCount,
    candidates,
    catalog,
    random,
    sink
  );

  const closed = guardSink(logger, 'close', () => sink.close());
  const failed = outcome.failed || !closed;

  logger.info(`${outcome.successes} of ${targetCount} results written`);

  return {
    exitCode: failed && config.hardFail ? EXIT_FAILURE : EXIT_SUCCESS,
    targetCount,
    seedPhrase,
    outcome,
  };
}
