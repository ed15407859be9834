/**
 * Shared test fixtures: shows, catalogs, scripted random sources and
 * loggers that capture their output.
 */

import type { RandomSource } from '../../src/services/prng.service';
import type { Catalog, Show, ShowId } from '../../src/types/show.types';
import { Logger } from '../../src/utils/logger';
import type { LogConfig } from '../../src/types/config.types';

export interface ShowThemes {
  opening?: string[];
  ending?: string[];
  other?: string[];
}

export const createShow = (
  id: ShowId,
  title: string,
  themes: ShowThemes = {}
): Show => ({
  id,
  title,
  openingThemes: themes.opening ?? [],
  endingThemes: themes.ending ?? [],
  otherSoundtrack: themes.other ?? [],
});

export const createCatalog = (...shows: Show[]): Catalog =>
  new Map(shows.map(show => [show.id, show]));

/**
 * Returns the scripted indices in order, then 0 once the script runs out.
 * Throws if a scripted index is out of range, so a wrong trace fails loudly.
 */
export class ScriptedRandom implements RandomSource {
  readonly requests: number[] = [];
  private readonly picks: number[];

  constructor(picks: number[] = []) {
    this.picks = [...picks];
  }

  nextIndex(length: number): number {
    this.requests.push(length);
    const pick = this.picks.shift() ?? 0;
    if (pick >= length) {
      throw new RangeError(`scripted index ${pick} out of range ${length}`);
    }
    return pick;
  }
}

export interface CapturedLogger {
  logger: Logger;
  lines: string[];
}

export const captureLogger = (config: Partial<LogConfig> = {}): CapturedLogger => {
  const lines: string[] = [];
  const logger = new Logger(
    { verbosity: 0, quiet: false, timestamp: 'none', ...config },
    line => lines.push(line),
    () => BigInt(Date.parse('2026-10-18T12:34:56.789Z')) * 1000000n
  );
  return { logger, lines };
};

export const silentLogger = (): Logger =>
  new Logger({ verbosity: 0, quiet: true, timestamp: 'none' }, () => {});
