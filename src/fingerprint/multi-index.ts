/**
 * Multi-index hashing prefilter
 *
 * The code is cut into `k` contiguous slices, each with its own exact-match
 * table. Two codes within distance t < k must agree exactly on at least one
 * slice (pigeonhole), so unioning the slice buckets yields a superset of the
 * true matches; callers verify each candidate with the full distance.
 */

import { type Fingerprint, fingerprintSlice } from "./fingerprint";

interface SliceRange {
  start: number;
  width: number;
}

export class MultiIndexHash<T> {
  private readonly ranges: SliceRange[];
  private readonly tables: Map<string, T[]>[];

  constructor(
    readonly bits: number,
    slices: number,
  ) {
    const k = Math.max(1, Math.min(slices, bits));
    const base = Math.floor(bits / k);
    const extra = bits % k;

    this.ranges = [];
    let start = 0;
    for (let i = 0; i < k; i++) {
      const width = base + (i < extra ? 1 : 0);
      this.ranges.push({ start, width });
      start += width;
    }
    this.tables = this.ranges.map(() => new Map());
  }

  get sliceCount(): number {
    return this.ranges.length;
  }

  /** Whether a query of this radius is guaranteed exact through the prefilter. */
  covers(radius: number): boolean {
    return radius < this.ranges.length;
  }

  add(fingerprint: Fingerprint, value: T): void {
    this.ranges.forEach((range, i) => {
      const key = fingerprintSlice(fingerprint, range.start, range.width);
      const bucket = this.tables[i].get(key);
      if (bucket) {
        bucket.push(value);
      } else {
        this.tables[i].set(key, [value]);
      }
    });
  }

  /** Coarse candidates sharing at least one slice with `target`, deduplicated. */
  candidates(target: Fingerprint): Set<T> {
    const found = new Set<T>();
    this.ranges.forEach((range, i) => {
      const key = fingerprintSlice(target, range.start, range.width);
      for (const value of this.tables[i].get(key) ?? []) {
        found.add(value);
      }
    });
    return found;
  }
}
