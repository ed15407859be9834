/**
 * Candidate positions not yet visited, in list order.
 *
 * A Fenwick tree over the list counts live positions, so finding the k-th
 * live position and removing every position of a value both run in
 * O(log n) per position. Over one run the pool costs O(n log n), where a
 * filter per draw would cost O(n^2).
 *
 * @example
 * ```typescript
 * const pool = new CandidatePool([5, 5, 6]);
 * pool.at(2);     // 6
 * pool.remove(5); // 2 positions dropped
 * pool.at(0);     // 6
 * ```
 */

import type { CandidateList, ShowId } from '../types/show.types';

export class CandidatePool {
  /** 1-based Fenwick tree of live-position counts */
  private readonly tree: number[];
  private readonly positions = new Map<ShowId, number[]>();
  private readonly topStep: number;
  private live: number;

  constructor(private readonly candidates: CandidateList) {
    const n = candidates.length;

    this.tree = new Array<number>(n + 1).fill(0);
    for (let i = 1; i <= n; i++) {
      this.tree[i] += 1;
      const parent = i + (i & -i);
      if (parent <= n) this.tree[parent] += this.tree[i];
    }

    candidates.forEach((id, index) => {
      const list = this.positions.get(id);
      if (list === undefined) {
        this.positions.set(id, [index]);
      } else {
        list.push(index);
      }
    });

    let step = 1;
    while (step * 2 <= n) step *= 2;
    this.topStep = n === 0 ? 0 : step;
    this.live = n;
  }

  /** Number of live positions */
  get size(): number {
    return this.live;
  }

  /**
   * Value at the k-th live position (0-based, in list order).
   *
   * @throws {RangeError} If k is not an index into the live positions
   */
  at(k: number): ShowId {
    if (!Number.isInteger(k) || k < 0 || k >= this.live) {
      throw new RangeError(`index ${k} out of range ${this.live}`);
    }

    // Largest prefix whose live count is still below k + 1
    let position = 0;
    let rest = k + 1;
    for (let step = this.topStep; step > 0; step >>= 1) {
      const next = position + step;
      if (next < this.tree.length && this.tree[next] < rest) {
        position = next;
        rest -= this.tree[next];
      }
    }
    return this.candidates[position];
  }

  /**
   * Drops every position holding `id`. Returns how many were dropped.
   */
  remove(id: ShowId): number {
    const list = this.positions.get(id);
    if (list === undefined) return 0;

    for (const index of list) {
      for (let i = index + 1; i < this.tree.length; i += i & -i) {
        this.tree[i] -= 1;
      }
    }
    this.positions.delete(id);
    this.live -= list.length;
    return list.length;
  }
}
