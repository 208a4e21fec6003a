/**
 * Fingerprint Index
 *
 * Combines three structures over the same item set:
 * - exact buckets: fingerprint hex -> item ids sharing it
 * - a BK-tree with one node per distinct fingerprint (bounded-distance queries)
 * - an optional multi-index hashing prefilter for small radii
 *
 * The index is built once per scan pass. Items added afterwards go through
 * insert(); removed items are hidden with exclude(), since the tree has no
 * delete. A changed fingerprint cannot be patched in place: insert() reports
 * it and the owner rebuilds.
 */

import type { ItemId } from "@/types";
import { FingerprintError } from "@/utils/errors";
import { BKTree } from "./bk-tree";
import { type Fingerprint, hammingDistance } from "./fingerprint";
import { MultiIndexHash } from "./multi-index";

export interface IndexedItem {
  id: ItemId;
  fingerprint: Fingerprint;
}

export interface FingerprintIndexOptions {
  bits: number;
  /** Enable the multi-index prefilter with this many slices (0 = off) */
  multiIndexSlices?: number;
}

export interface FingerprintGroup {
  fingerprint: Fingerprint;
  itemIds: ItemId[];
}

export interface GroupMatch extends FingerprintGroup {
  distance: number;
}

export interface IndexMatch {
  itemId: ItemId;
  distance: number;
}

export type InsertOutcome = "inserted" | "unchanged" | "changed";

interface Bucket {
  fingerprint: Fingerprint;
  ids: Set<ItemId>;
}

export class FingerprintIndex {
  private readonly buckets = new Map<string, Bucket>();
  private readonly tree = new BKTree<Bucket>();
  private readonly prefilter: MultiIndexHash<Bucket> | null;
  private readonly itemFingerprints = new Map<ItemId, string>();
  private readonly excluded = new Set<ItemId>();

  constructor(readonly options: FingerprintIndexOptions) {
    const slices = options.multiIndexSlices ?? 0;
    this.prefilter =
      slices > 0 ? new MultiIndexHash<Bucket>(options.bits, slices) : null;
  }

  static build(
    items: Iterable<IndexedItem>,
    options: FingerprintIndexOptions,
  ): FingerprintIndex {
    const index = new FingerprintIndex(options);
    for (const item of items) {
      index.insert(item);
    }
    return index;
  }

  get bits(): number {
    return this.options.bits;
  }

  /** Live items in the index */
  get size(): number {
    return this.itemFingerprints.size;
  }

  /** Distinct fingerprints seen since the build, including fully excluded ones */
  get distinctFingerprints(): number {
    return this.buckets.size;
  }

  has(itemId: ItemId): boolean {
    return this.itemFingerprints.has(itemId);
  }

  isExcluded(itemId: ItemId): boolean {
    return this.excluded.has(itemId);
  }

  /**
   * Add an item after the build.
   * Returns "changed" without touching the index when the id is already
   * indexed under a different fingerprint; the caller must rebuild.
   */
  insert(item: IndexedItem): InsertOutcome {
    if (item.fingerprint.bits !== this.options.bits) {
      throw new FingerprintError(
        `Item ${item.id} has a ${item.fingerprint.bits}-bit fingerprint, index expects ${this.options.bits}`,
      );
    }

    const current = this.itemFingerprints.get(item.id);
    if (current !== undefined) {
      return current === item.fingerprint.hex ? "unchanged" : "changed";
    }

    let bucket = this.buckets.get(item.fingerprint.hex);
    if (!bucket) {
      bucket = { fingerprint: item.fingerprint, ids: new Set() };
      this.buckets.set(item.fingerprint.hex, bucket);
      this.tree.add(item.fingerprint, bucket);
      this.prefilter?.add(item.fingerprint, bucket);
    }

    bucket.ids.add(item.id);
    this.itemFingerprints.set(item.id, item.fingerprint.hex);
    this.excluded.delete(item.id);
    return "inserted";
  }

  /**
   * Hide an item from every later query and grouping until the next build.
   * Returns false if the item was not live in the index.
   */
  exclude(itemId: ItemId): boolean {
    const hex = this.itemFingerprints.get(itemId);
    if (hex === undefined) return false;

    this.buckets.get(hex)?.ids.delete(itemId);
    this.itemFingerprints.delete(itemId);
    this.excluded.add(itemId);
    return true;
  }

  /** Undo exclude() for an item whose removal did not go through. */
  restore(item: IndexedItem): void {
    if (this.excluded.delete(item.id)) {
      this.insert(item);
    }
  }

  lookupExact(fingerprint: Fingerprint): ItemId[] {
    const bucket = this.buckets.get(fingerprint.hex);
    return bucket ? [...bucket.ids] : [];
  }

  /** Every distinct fingerprint that still has live items. */
  *groups(): Generator<FingerprintGroup> {
    for (const bucket of this.buckets.values()) {
      if (bucket.ids.size > 0) {
        yield { fingerprint: bucket.fingerprint, itemIds: [...bucket.ids] };
      }
    }
  }

  /** Groups of two or more items sharing one fingerprint. */
  *exactGroups(): Generator<FingerprintGroup> {
    for (const group of this.groups()) {
      if (group.itemIds.length > 1) {
        yield group;
      }
    }
  }

  /**
   * Distinct fingerprints within `radius` of `target`, with their live items.
   * One-shot: the generator cannot be restarted.
   */
  *queryGroups(target: Fingerprint, radius: number): Generator<GroupMatch> {
    if (radius < 0) return;

    if (this.prefilter?.covers(radius)) {
      for (const bucket of this.prefilter.candidates(target)) {
        const distance = hammingDistance(bucket.fingerprint, target);
        if (distance <= radius && bucket.ids.size > 0) {
          yield {
            fingerprint: bucket.fingerprint,
            itemIds: [...bucket.ids],
            distance,
          };
        }
      }
      return;
    }

    for (const match of this.tree.search(target, radius)) {
      if (match.value.ids.size > 0) {
        yield {
          fingerprint: match.fingerprint,
          itemIds: [...match.value.ids],
          distance: match.distance,
        };
      }
    }
  }

  /** Items within `radius` of `target`. One-shot. */
  *query(target: Fingerprint, radius: number): Generator<IndexMatch> {
    for (const group of this.queryGroups(target, radius)) {
      for (const itemId of group.itemIds) {
        yield { itemId, distance: group.distance };
      }
    }
  }
}
