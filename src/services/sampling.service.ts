/**
 * Sampling Service - Distinct Theme Draws from a Candidate List
 *
 * Draws up to `targetCount` (theme, show) pairs so that:
 * - No show is drawn twice: every drawn candidate value joins the visited set
 * - Theme-less shows and unknown identifiers never block progress: they are
 *   visited and the draw is retried
 * - Sampling always terminates: once every distinct candidate value has been
 *   visited the run is exhausted and stops early
 *
 * Draws are taken only among list positions whose value has not been
 * visited. Each value is therefore picked with probability proportional to
 * its multiplicity in the list, exactly as drawing from the whole list and
 * rejecting visited values would, but every draw consumes a fresh value and
 * the number of draws over a run never exceeds the number of distinct
 * candidates.
 *
 * Algorithm (per requested result):
 * 1. If no unvisited value remains, record a failure and stop sampling
 * 2. Draw a position among the unvisited ones and mark its value visited
 * 3. Unknown identifier: retry from 1
 * 4. Aggregate the show's themes; empty pool: retry from 1
 * 5. Pick a theme, classify it and hand it to the sink
 * 6. A sink error is a failure for this result only; sampling continues
 *
 * @example
 * ```typescript
 * const sampler = new SamplingService(logger);
 * const outcome = sampler.sample(5, candidates, catalog, new PRNG(seed), sink);
 * if (outcome.failed && hardFail) process.exitCode = 1;
 * ```
 */

import type {
  CandidateList,
  Catalog,
  SampleOutcome,
  Show,
  ShowId,
} from '../types/show.types';
import type { ResultSink } from '../output/result-sink';
import { logError, RunErrorCode } from '../utils/error-handler';
import type { Logger } from '../utils/logger';
import { CandidatePool } from './candidate-pool';
import { choice, type RandomSource } from './prng.service';
import { ThemeAggregatorService } from './theme-aggregator.service';

/**
 * Result of searching for the next show with at least one theme.
 */
type ShowDraw =
  | { kind: 'found'; id: ShowId; show: Show; themes: string[] }
  | { kind: 'exhausted' };

/**
 * Mutable bookkeeping for one `sample` call.
 */
interface RunState {
  visited: Set<ShowId>;
  /** Candidate positions whose value is not yet visited */
  pool: CandidatePool;
  drawAttempts: number;
}

export class SamplingService {
  constructor(
    private readonly logger: Logger,
    private readonly themes: ThemeAggregatorService = new ThemeAggregatorService()
  ) {}

  /**
   * Runs up to `targetCount` draws and hands each result to the sink.
   * The sink must already be opened; closing it is left to the caller.
   *
   * @param targetCount - Results wanted; non-negative integer
   * @param candidates - Identifiers to draw from; expected non-empty
   * @param catalog - Shows by identifier; expected non-empty
   * @param random - Random source shared by every draw in the run
   * @param sink - Destination for successful draws
   * @throws {RangeError} If targetCount is negative or not an integer
   */
  sample(
    targetCount: number,
    candidates: CandidateList,
    catalog: Catalog,
    random: RandomSource,
    sink: ResultSink
  ): SampleOutcome {
    if (!Number.isInteger(targetCount) || targetCount < 0) {
      throw new RangeError(
        `targetCount must be a non-negative integer, got ${targetCount}`
      );
    }

    const state: RunState = {
      visited: new Set<ShowId>(),
      pool: new CandidatePool(candidates),
      drawAttempts: 0,
    };
    let successes = 0;
    let failures = 0;
    let exhausted = false;

    this.logger.debug('sampling started', {
      targetCount,
      candidates: candidates.length,
      distinctCandidates: new Set(candidates).size,
      catalogSize: catalog.size,
    });

    for (let i = 0; i < targetCount; i++) {
      const draw = this.drawShow(state, catalog, random);

      if (draw.kind === 'exhausted') {
        failures++;
        exhausted = true;
        logError(
          this.logger,
          'not enough results were found',
          RunErrorCode.EXHAUSTION,
          { requested: targetCount, found: successes }
        );
        break;
      }

      const theme = choice(random, draw.themes);
      const category = this.themes.classify(theme, draw.show);

      try {
        sink.emit(theme, draw.show.title, category);
        successes++;
        this.logger.trace('result emitted', {
          id: draw.id,
          theme,
          category,
        });
      } catch (error) {
        failures++;
        logError(this.logger, error, RunErrorCode.SINK, { id: draw.id });
      }
    }

    const outcome: SampleOutcome = {
      successes,
      failures,
      failed: failures > 0,
      exhausted,
      visited: state.visited.size,
      drawAttempts: state.drawAttempts,
    };
    this.logger.debug('sampling finished', { ...outcome });

    return outcome;
  }

  /**
   * Visits fresh candidate values until one names a show with themes, or
   * none are left.
   */
  private drawShow(
    state: RunState,
    catalog: Catalog,
    random: RandomSource
  ): ShowDraw {
    while (state.pool.size > 0) {
      const id = state.pool.at(random.nextIndex(state.pool.size));
      state.visited.add(id);
      state.pool.remove(id);
      state.drawAttempts++;

      const show = catalog.get(id);
      if (show === undefined) {
        this.logger.debug('candidate is not in the catalog', { id });
        continue;
      }

      const themes = this.themes.aggregate(show);
      if (themes.length === 0) {
        this.logger.debug('show has no themes', { id, title: show.title });
        continue;
      }

      return { kind: 'found', id, show, themes };
    }

    return { kind: 'exhausted' };
  }
}
