/**
 * Theme Aggregator Service
 *
 * Flattens a show's three theme lists into one pool to draw from, and maps a
 * drawn theme back to the category it came from.
 *
 * Classification is a lookup against the show's own lists, not a position in
 * the pool: opening first, then ending, otherwise other soundtrack. A title
 * listed as both an opening and an ending is therefore always reported as an
 * opening.
 *
 * @example
 * ```typescript
 * const themes = new ThemeAggregatorService();
 * const pool = themes.aggregate(show);           // ['Tank!', 'The Real Folk Blues']
 * const category = themes.classify(pool[1], show); // ThemeCategory.ENDING
 * ```
 */

import { type Show, ThemeCategory } from '../types/show.types';

/**
 * Appends `other` to `target` when `other` has entries. `other` is copied,
 * never aliased or modified.
 */
export function smartAppend<T>(target: T[], other: readonly T[]): void {
  if (other.length > 0) {
    target.push(...other);
  }
}

export class ThemeAggregatorService {
  /**
   * Opening, ending and other soundtrack themes in that order. Duplicates
   * are kept. The returned array is a fresh copy.
   */
  aggregate(show: Show): string[] {
    const themes = [...show.openingThemes];
    smartAppend(themes, show.endingThemes);
    smartAppend(themes, show.otherSoundtrack);
    return themes;
  }

  classify(theme: string, show: Show): ThemeCategory {
    if (show.openingThemes.includes(theme)) {
      return ThemeCategory.OPENING;
    }
    if (show.endingThemes.includes(theme)) {
      return ThemeCategory.ENDING;
    }
    return ThemeCategory.OTHER;
  }
}
