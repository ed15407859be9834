/**
 * Seed Service for Reproducible Runs
 *
 * Turns a seed phrase into the 64-bit value the PRNG is initialized with.
 * Every run has a phrase: either the one given by `--seed` / `THEMES_SEED`
 * or a freshly generated one. The phrase is logged so any run can be
 * replayed exactly.
 *
 * Seed Flow:
 * 1. Phrase: user supplied, or 16 hex characters from crypto.randomBytes
 * 2. Digest: SHA-256(phrase)
 * 3. PRNG Seed: first 64 bits of the digest as BigInt
 */

import crypto from 'crypto';

const HASH_ALGORITHM = 'sha256';
const SEED_ENCODING = 'hex';
const SEED_TO_INT64_CHARS = 16;
const RANDOM_PHRASE_BYTES = 8;

/**
 * @example
 * ```typescript
 * const seeds = new SeedService();
 * const phrase = seeds.resolvePhrase(config.seed); // given or random
 * const prng = new PRNG(seeds.toSeed(phrase));
 * ```
 */
export class SeedService {
  /**
   * Returns the given phrase, or a random one when none was configured.
   */
  resolvePhrase(phrase?: string): string {
    if (phrase !== undefined && phrase.length > 0) {
      return phrase;
    }
    return this.randomPhrase();
  }

  randomPhrase(): string {
    return crypto.randomBytes(RANDOM_PHRASE_BYTES).toString(SEED_ENCODING);
  }

  /**
   * Derives the 64-bit PRNG seed for a phrase. Deterministic.
   *
   * @throws {Error} If phrase is empty
   */
  toSeed(phrase: string): bigint {
    if (phrase.length === 0) {
      throw new Error('seed phrase must be a non-empty string');
    }

    const digest = crypto
      .createHash(HASH_ALGORITHM)
      .update(phrase)
      .digest(SEED_ENCODING);
    return BigInt('0x' + digest.substring(0, SEED_TO_INT64_CHARS));
  }
}
