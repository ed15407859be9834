/**
 * TypeScript type definitions for shows, catalogs and draw results.
 * These types define the in-memory shape of the catalog and candidate list
 * files and the values the sampling engine hands to a result sink.
 */

/**
 * Unsigned integer identifying a show in the catalog.
 */
export type ShowId = number;

/**
 * A show and its theme songs, split into three categories.
 *
 * @example
 * {
 *   id: 1,
 *   title: "Cowboy Bebop",
 *   openingThemes: ["Tank!"],
 *   endingThemes: ["The Real Folk Blues"],
 *   otherSoundtrack: []
 * }
 */
export interface Show {
  /** Identifier as declared inside the show record (`id` or `mal_id`) */
  id: ShowId;
  /** Display title */
  title: string;
  /** Optional reference page for the show */
  url?: string;
  /** Opening themes, in file order */
  openingThemes: string[];
  /** Ending themes, in file order */
  endingThemes: string[];
  /** Insert songs and any other soundtrack entries */
  otherSoundtrack: string[];
}

/**
 * Full mapping of identifiers to shows. Keyed by the catalog file's keys,
 * which are the lookup keys for candidate values.
 */
export type Catalog = ReadonlyMap<ShowId, Show>;

/**
 * Ordered subset of identifiers eligible for sampling. May contain
 * duplicates and identifiers the catalog does not know.
 */
export type CandidateList = readonly ShowId[];

/**
 * Category a theme belongs to. The values are the codes printed in output.
 */
export enum ThemeCategory {
  OPENING = 'OP',
  ENDING = 'ED',
  OTHER = 'ST',
}

/**
 * One successful draw: a theme, its category and the show it came from.
 */
export interface DrawResult {
  theme: string;
  category: ThemeCategory;
  show: Show;
}

/**
 * Aggregate outcome of one sampling run.
 */
export interface SampleOutcome {
  /** Number of results handed to the sink without error */
  successes: number;
  /** Number of iterations that ended in a failure (exhaustion or sink error) */
  failures: number;
  /** True when any iteration failed */
  failed: boolean;
  /** True when sampling stopped early because no fresh candidate remained */
  exhausted: boolean;
  /** Distinct candidate values consumed during the run */
  visited: number;
  /** Fresh values drawn, including misses and theme-less shows */
  drawAttempts: number;
}
