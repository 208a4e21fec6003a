/**
 * Candidate Generator
 *
 * Turns the live item set into candidate pairs in two passes over a
 * fingerprint index: every pair inside an exact bucket at distance 0, then
 * one bounded query per distinct fingerprint for pairs across buckets.
 */

import { setImmediate } from "node:timers/promises";
import {
  type Fingerprint,
  FingerprintIndex,
  type FingerprintIndexOptions,
} from "@/fingerprint";
import type { Candidate, ItemId } from "@/types";
import { InvalidArgumentError } from "@/utils/errors";
import { canonicalPair, isUnderRoot } from "@/utils/pairs";

export interface CandidateSourceItem {
  id: ItemId;
  fingerprint: Fingerprint;
  sourceLocation: string;
}

export interface GenerateOptions {
  items: readonly CandidateSourceItem[];
  threshold: number;
  indexOptions: FingerprintIndexOptions;
  /** A ready index over exactly `items`; ignored when a scope is given */
  index?: FingerprintIndex;
  /** Source roots; items outside all of them are dropped before indexing */
  scope?: readonly string[];
  signal?: AbortSignal;
  /** Queries between yields to the event loop (default 256) */
  yieldEvery?: number;
}

export interface GenerationStats {
  items: number;
  distinctFingerprints: number;
  exactPairs: number;
  fuzzyPairs: number;
  queries: number;
  elapsedMs: number;
}

export interface GenerationResult {
  candidates: Candidate[];
  /** True when the signal aborted the run; candidates holds what was found first */
  cancelled: boolean;
  stats: GenerationStats;
}

const DEFAULT_YIELD_EVERY = 256;

/**
 * @throws {InvalidArgumentError} unless the threshold is a non-negative integer
 */
export function assertThreshold(threshold: number): void {
  if (!Number.isInteger(threshold) || threshold < 0) {
    throw new InvalidArgumentError(
      `Threshold must be a non-negative integer, got ${threshold}`,
    );
  }
}

export async function generateCandidates(
  options: GenerateOptions,
): Promise<GenerationResult> {
  const started = Date.now();
  const { threshold, signal } = options;
  assertThreshold(threshold);
  const yieldEvery = Math.max(1, options.yieldEvery ?? DEFAULT_YIELD_EVERY);

  const scoped = options.scope && options.scope.length > 0;
  const items = scoped
    ? options.items.filter((item) =>
        isUnderRoot(item.sourceLocation, options.scope ?? []),
      )
    : options.items;

  const index =
    !scoped && options.index
      ? options.index
      : FingerprintIndex.build(items, options.indexOptions);

  const candidates: Candidate[] = [];
  const stats: GenerationStats = {
    items: items.length,
    distinctFingerprints: 0,
    exactPairs: 0,
    fuzzyPairs: 0,
    queries: 0,
    elapsedMs: 0,
  };

  const finish = (cancelled: boolean): GenerationResult => {
    candidates.sort((x, y) => x.pair.a - y.pair.a || x.pair.b - y.pair.b);
    stats.elapsedMs = Date.now() - started;
    return { candidates, cancelled, stats };
  };

  if (signal?.aborted) {
    return finish(true);
  }

  // Exact pass
  for (const group of index.exactGroups()) {
    const ids = [...group.itemIds].sort((x, y) => x - y);
    for (let i = 0; i < ids.length; i++) {
      for (let j = i + 1; j < ids.length; j++) {
        candidates.push({ pair: canonicalPair(ids[i], ids[j]), distance: 0 });
        stats.exactPairs++;
      }
    }
  }

  const groups = [...index.groups()];
  stats.distinctFingerprints = groups.length;

  if (threshold === 0) {
    return finish(false);
  }

  // Fuzzy pass
  const visited = new Set<string>();
  for (const group of groups) {
    if (stats.queries > 0 && stats.queries % yieldEvery === 0) {
      await setImmediate();
    }
    if (signal?.aborted) {
      return finish(true);
    }

    stats.queries++;
    for (const match of index.queryGroups(group.fingerprint, threshold)) {
      // Same bucket; covered by the exact pass
      if (match.distance === 0) continue;

      const hexes = [group.fingerprint.hex, match.fingerprint.hex].sort();
      const bucketPair = `${hexes[0]}|${hexes[1]}`;
      if (visited.has(bucketPair)) continue;
      visited.add(bucketPair);

      for (const x of group.itemIds) {
        for (const y of match.itemIds) {
          candidates.push({ pair: canonicalPair(x, y), distance: match.distance });
          stats.fuzzyPairs++;
        }
      }
    }
  }

  return finish(false);
}
