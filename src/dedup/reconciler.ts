/**
 * Reconciliation Engine
 *
 * Merges freshly generated candidates with stored relation state:
 * create-if-absent, then re-read the stored kind of every pair, then apply
 * the visibility rule once. A rediscovered pair therefore always reports the
 * kind the user last gave it, never a default.
 */

import type { BatchUpsertResult, RelationEntry } from "@/database/relation-store";
import type { Candidate, Pair, ReconciledRelation, RelationKind } from "@/types";
import { toLedgerError } from "@/utils/errors";
import { pairKey } from "@/utils/pairs";

/** The slice of RelationStore the reconciler depends on */
export interface ReconcilerStore {
  upsertManyIfAbsent(entries: RelationEntry[]): Promise<BatchUpsertResult>;
  getKinds(pairs: Pair[]): Promise<Map<string, RelationKind>>;
  getKind(pair: Pair): Promise<RelationKind | null>;
}

export interface ReconcileOptions {
  /** Keep annotated relations in the output (default: only new_match) */
  includeAnnotated?: boolean;
}

export type ReconcileWarningCode =
  | "constraint_violation"
  | "transient_storage"
  | "missing_row"
  | "read_failed";

export interface ReconcileWarning {
  pair: Pair;
  code: ReconcileWarningCode;
  message: string;
}

export interface ReconcileResult {
  relations: ReconciledRelation[];
  warnings: ReconcileWarning[];
  /** Rows created by this pass */
  inserted: number;
}

export class Reconciler {
  constructor(private store: ReconcilerStore) {}

  async reconcile(
    candidates: Candidate[],
    options: ReconcileOptions = {},
  ): Promise<ReconcileResult> {
    const includeAnnotated = options.includeAnnotated ?? false;
    const warnings: ReconcileWarning[] = [];

    if (candidates.length === 0) {
      return { relations: [], warnings, inserted: 0 };
    }

    // 1. Create-if-absent; the only write path for discovered pairs
    const written = await this.store.upsertManyIfAbsent(
      candidates.map((c): RelationEntry => ({
        pair: c.pair,
        distance: c.distance,
        kind: "new_match",
      })),
    );

    const rejected = new Set<string>();
    for (const failure of written.failed) {
      rejected.add(pairKey(failure.entry.pair));
      warnings.push({
        pair: failure.entry.pair,
        code: failure.reason,
        message: failure.message,
      });
    }

    const remaining = candidates.filter((c) => !rejected.has(pairKey(c.pair)));

    // 2. Authoritative re-read
    const { kinds, unreadable } = await this.readKinds(
      remaining.map((c) => c.pair),
      warnings,
    );

    // 3. Visibility
    const relations: ReconciledRelation[] = [];
    for (const candidate of remaining) {
      const key = pairKey(candidate.pair);
      const kind = kinds.get(key);

      if (kind === undefined) {
        if (!unreadable.has(key)) {
          warnings.push({
            pair: candidate.pair,
            code: "missing_row",
            message: `Pair ${key} has no stored relation after the write`,
          });
        }
        continue;
      }

      if (!includeAnnotated && kind !== "new_match") continue;

      relations.push({
        a: candidate.pair.a,
        b: candidate.pair.b,
        distance: candidate.distance,
        kind,
      });
    }

    if (warnings.length > 0) {
      console.warn(
        `[dupe-ledger] Reconciliation skipped ${warnings.length} of ${candidates.length} candidate pairs`,
      );
    }

    return { relations, warnings, inserted: written.inserted.length };
  }

  /**
   * Batched read with a per-pair fallback. Pairs whose read fails are
   * reported and left out of the map.
   */
  private async readKinds(
    pairs: Pair[],
    warnings: ReconcileWarning[],
  ): Promise<{ kinds: Map<string, RelationKind>; unreadable: Set<string> }> {
    const unreadable = new Set<string>();

    try {
      return { kinds: await this.store.getKinds(pairs), unreadable };
    } catch (error) {
      console.warn(
        `[dupe-ledger] Batched kind read failed, falling back to per-pair reads: ${toLedgerError(error).message}`,
      );
    }

    const kinds = new Map<string, RelationKind>();
    for (const pair of pairs) {
      const key = pairKey(pair);
      try {
        const kind = await this.store.getKind(pair);
        if (kind !== null) {
          kinds.set(key, kind);
        }
      } catch (error) {
        unreadable.add(key);
        warnings.push({
          pair,
          code: "read_failed",
          message: toLedgerError(error).message,
        });
      }
    }
    return { kinds, unreadable };
  }
}
