import type Database from "better-sqlite3";
import {
  type ItemId,
  type Pair,
  type Relation,
  type RelationKind,
  RelationKindSchema,
  type RetryConfig,
} from "@/types";
import {
  ConstraintViolationError,
  InvalidTransitionError,
  NotFoundError,
  TransientStorageError,
  toLedgerError,
} from "@/utils/errors";
import { pairKey } from "@/utils/pairs";
import { DEFAULT_RETRY_OPTIONS, withRetry } from "@/utils/retry";

interface RelationRow {
  item_a: number;
  item_b: number;
  distance: number;
  kind: string;
  created_at: number;
  updated_at: number;
}

interface HistoryRow {
  id: number;
  item_a: number;
  item_b: number;
  previous_kind: string;
  kind: string;
}

export interface RelationEntry {
  pair: Pair;
  distance: number;
  kind?: RelationKind;
}

export type UpsertFailureReason = "constraint_violation" | "transient_storage";

export interface UpsertFailure {
  entry: RelationEntry;
  reason: UpsertFailureReason;
  message: string;
}

export interface BatchUpsertResult {
  inserted: RelationEntry[];
  /** Entries whose pair was already stored; the stored row was left as is */
  existing: RelationEntry[];
  failed: UpsertFailure[];
}

export interface RelationFilter {
  kind?: RelationKind;
  itemId?: ItemId;
  limit?: number;
}

export interface OrphanReport {
  orphanCount: number;
  /** Up to ten of the removed pairs */
  samples: Pair[];
}

export interface RelationStoreOptions {
  retry?: RetryConfig;
  /** Whether resetKind() may move an annotated pair back to new_match */
  allowReset?: boolean;
  /** Kind changes kept for undoAnnotation() (default 50) */
  historyLimit?: number;
}

// Pairs per statement for batched reads
const READ_CHUNK = 500;
const DEFAULT_HISTORY_LIMIT = 50;
const ORPHAN_SAMPLE_LIMIT = 10;

const ORPHAN_CONDITION = `
  item_a NOT IN (SELECT id FROM items)
  OR item_b NOT IN (SELECT id FROM items)
`;

/**
 * Durable record of the relationship between item pairs.
 *
 * Pairs are stored canonically (a < b) with a single current kind. Discovery
 * only ever creates rows; the kind of an existing row changes through
 * setKind(), resetKind() and the explicit undo/redo of those, nothing else.
 */
export class RelationStore {
  private readonly retry: RetryConfig;
  private readonly allowReset: boolean;
  private readonly historyLimit: number;

  constructor(
    private db: Database.Database,
    options: RelationStoreOptions = {},
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_OPTIONS;
    this.allowReset = options.allowReset ?? true;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  /**
   * Insert the pair only if it has no row yet. An existing row, distance
   * included, is never touched.
   *
   * @returns whether a row was inserted
   */
  async upsertIfAbsent(
    pair: Pair,
    distance: number,
    kind: RelationKind = "new_match",
  ): Promise<boolean> {
    this.assertEntry({ pair, distance });

    return withRetry(
      () => {
        const result = this.db
          .prepare<[number, number, number, string]>(`
            INSERT INTO relations (item_a, item_b, distance, kind)
            VALUES (?, ?, ?, ?)
            ON CONFLICT(item_a, item_b) DO NOTHING
          `)
          .run(pair.a, pair.b, distance, kind);
        return result.changes > 0;
      },
      `upsert ${pairKey(pair)}`,
      this.retry,
    );
  }

  /**
   * Batch form of upsertIfAbsent.
   *
   * Entries are checked against the live item set first; the valid ones are
   * written in a single transaction. Nothing is partially applied: if the
   * transaction cannot commit, every entry comes back as failed.
   */
  async upsertManyIfAbsent(entries: RelationEntry[]): Promise<BatchUpsertResult> {
    if (entries.length === 0) {
      return { inserted: [], existing: [], failed: [] };
    }

    try {
      return await withRetry(
        () => this.writeBatch(entries),
        `batch upsert of ${entries.length} relations`,
        this.retry,
      );
    } catch (error) {
      const ledgerError = toLedgerError(error);
      const reason: UpsertFailureReason | null =
        ledgerError instanceof TransientStorageError
          ? "transient_storage"
          : ledgerError instanceof ConstraintViolationError
            ? "constraint_violation"
            : null;

      if (reason === null) {
        throw ledgerError;
      }

      console.error(
        `[dupe-ledger] Batch upsert of ${entries.length} relations rolled back: ${ledgerError.message}`,
      );
      return {
        inserted: [],
        existing: [],
        failed: entries.map((entry) => ({
          entry,
          reason,
          message: ledgerError.message,
        })),
      };
    }
  }

  private writeBatch(entries: RelationEntry[]): BatchUpsertResult {
    const failed: UpsertFailure[] = [];
    const valid: RelationEntry[] = [];

    for (const entry of entries) {
      const problem = this.describeInvalidEntry(entry);
      if (problem) {
        failed.push({ entry, reason: "constraint_violation", message: problem });
      } else {
        valid.push(entry);
      }
    }

    const endpoints = new Set<number>();
    for (const { pair } of valid) {
      endpoints.add(pair.a);
      endpoints.add(pair.b);
    }
    const live = this.selectLiveIds(endpoints);

    const writable: RelationEntry[] = [];
    for (const entry of valid) {
      const missing = [entry.pair.a, entry.pair.b].filter((id) => !live.has(id));
      if (missing.length > 0) {
        failed.push({
          entry,
          reason: "constraint_violation",
          message: `Item ${missing.join(", ")} is not live`,
        });
      } else {
        writable.push(entry);
      }
    }

    const insert = this.db.prepare<[number, number, number, string]>(`
      INSERT INTO relations (item_a, item_b, distance, kind)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(item_a, item_b) DO NOTHING
    `);

    const write = this.db.transaction((batch: RelationEntry[]) => {
      const inserted: RelationEntry[] = [];
      const existing: RelationEntry[] = [];
      for (const entry of batch) {
        const result = insert.run(
          entry.pair.a,
          entry.pair.b,
          entry.distance,
          entry.kind ?? "new_match",
        );
        if (result.changes > 0) {
          inserted.push(entry);
        } else {
          existing.push(entry);
        }
      }
      return { inserted, existing };
    });

    const { inserted, existing } = write(writable);
    return { inserted, existing, failed };
  }

  /**
   * User annotation. Moves a stored pair to any annotated kind; the distance
   * stays as discovered.
   *
   * @throws {InvalidTransitionError} when `kind` is new_match
   * @throws {NotFoundError} when the pair has no row
   */
  async setKind(pair: Pair, kind: RelationKind): Promise<Relation> {
    if (kind === "new_match") {
      throw new InvalidTransitionError(
        `Pair ${pairKey(pair)} cannot be annotated as new_match; use resetKind`,
      );
    }
    return this.updateKind(pair, kind);
  }

  /**
   * Explicitly return a pair to new_match so it is surfaced again.
   *
   * @throws {InvalidTransitionError} when resets are disabled
   * @throws {NotFoundError} when the pair has no row
   */
  async resetKind(pair: Pair): Promise<Relation> {
    this.assertReachable(pair, "new_match");
    return this.updateKind(pair, "new_match");
  }

  /**
   * Change the kind and record the change for undo, in one transaction.
   * A new change discards whatever could still be redone.
   */
  private async updateKind(pair: Pair, kind: RelationKind): Promise<Relation> {
    const change = this.db.transaction((): RelationRow => {
      const current = this.selectRow(pair);
      if (!current) {
        throw new NotFoundError(`No relation stored for pair ${pairKey(pair)}`);
      }

      const row = this.writeKind(pair, kind);
      if (current.kind !== kind) {
        this.db.prepare("DELETE FROM annotation_history WHERE undone = 1").run();
        this.db
          .prepare<[number, number, string, string]>(`
            INSERT INTO annotation_history (item_a, item_b, previous_kind, kind)
            VALUES (?, ?, ?, ?)
          `)
          .run(pair.a, pair.b, current.kind, kind);
        this.db
          .prepare<[number]>(`
            DELETE FROM annotation_history WHERE id NOT IN (
              SELECT id FROM annotation_history ORDER BY id DESC LIMIT ?
            )
          `)
          .run(this.historyLimit);
      }
      return row;
    });

    const row = await withRetry(() => change(), `set kind of ${pairKey(pair)}`, this.retry);
    return this.mapRow(row);
  }

  /**
   * Restore the kind that the most recent annotation replaced.
   *
   * @throws {NotFoundError} when there is nothing to undo
   * @throws {InvalidTransitionError} when that would reset to new_match while resets are disabled
   */
  async undoAnnotation(): Promise<Relation> {
    const undo = this.db.transaction((): RelationRow => {
      const entry = this.db
        .prepare<[], HistoryRow>(
          "SELECT * FROM annotation_history WHERE undone = 0 ORDER BY id DESC LIMIT 1",
        )
        .get();
      if (!entry) {
        throw new NotFoundError("No annotation to undo");
      }
      return this.replay(entry, entry.previous_kind, 1);
    });

    return this.mapRow(await withRetry(() => undo(), "undo annotation", this.retry));
  }

  /**
   * Re-apply the most recently undone annotation.
   *
   * @throws {NotFoundError} when there is nothing to redo
   */
  async redoAnnotation(): Promise<Relation> {
    const redo = this.db.transaction((): RelationRow => {
      const entry = this.db
        .prepare<[], HistoryRow>(
          "SELECT * FROM annotation_history WHERE undone = 1 ORDER BY id ASC LIMIT 1",
        )
        .get();
      if (!entry) {
        throw new NotFoundError("No annotation to redo");
      }
      return this.replay(entry, entry.kind, 0);
    });

    return this.mapRow(await withRetry(() => redo(), "redo annotation", this.retry));
  }

  private replay(entry: HistoryRow, rawKind: string, undone: 0 | 1): RelationRow {
    const pair = { a: entry.item_a, b: entry.item_b };
    const kind = RelationKindSchema.parse(rawKind);
    this.assertReachable(pair, kind);

    const row = this.writeKind(pair, kind);
    this.db
      .prepare<[number, number]>("UPDATE annotation_history SET undone = ? WHERE id = ?")
      .run(undone, entry.id);
    return row;
  }

  private assertReachable(pair: Pair, kind: RelationKind): void {
    if (kind === "new_match" && !this.allowReset) {
      throw new InvalidTransitionError(
        `Resetting ${pairKey(pair)} to new_match is disabled by annotation.allowReset`,
      );
    }
  }

  private selectRow(pair: Pair): RelationRow | undefined {
    return this.db
      .prepare<[number, number], RelationRow>(
        "SELECT * FROM relations WHERE item_a = ? AND item_b = ?",
      )
      .get(pair.a, pair.b);
  }

  private writeKind(pair: Pair, kind: RelationKind): RelationRow {
    const row = this.db
      .prepare<[string, number, number], RelationRow>(`
        UPDATE relations
        SET kind = ?, updated_at = unixepoch()
        WHERE item_a = ? AND item_b = ?
        RETURNING *
      `)
      .get(kind, pair.a, pair.b);
    if (!row) {
      throw new NotFoundError(`No relation stored for pair ${pairKey(pair)}`);
    }
    return row;
  }

  async getKind(pair: Pair): Promise<RelationKind | null> {
    const relation = await this.getRelation(pair);
    return relation?.kind ?? null;
  }

  /**
   * Authoritative kinds for many pairs, keyed by pairKey().
   * Pairs with no row are absent from the map.
   */
  async getKinds(pairs: Pair[]): Promise<Map<string, RelationKind>> {
    return withRetry(
      () => {
        const kinds = new Map<string, RelationKind>();
        const statement = this.db.prepare<[string], RelationRow>(`
          SELECT r.* FROM relations r
          JOIN json_each(?) w
            ON r.item_a = json_extract(w.value, '$[0]')
           AND r.item_b = json_extract(w.value, '$[1]')
        `);

        for (let i = 0; i < pairs.length; i += READ_CHUNK) {
          const chunk = pairs.slice(i, i + READ_CHUNK).map((p) => [p.a, p.b]);
          for (const row of statement.all(JSON.stringify(chunk))) {
            const relation = this.mapRow(row);
            kinds.set(pairKey(relation), relation.kind);
          }
        }
        return kinds;
      },
      `read kinds of ${pairs.length} pairs`,
      this.retry,
    );
  }

  async getRelation(pair: Pair): Promise<Relation | null> {
    const row = await withRetry(
      () => this.selectRow(pair),
      `read ${pairKey(pair)}`,
      this.retry,
    );
    return row ? this.mapRow(row) : null;
  }

  async listRelations(filter: RelationFilter = {}): Promise<Relation[]> {
    let query = "SELECT * FROM relations WHERE 1 = 1";
    const params: (string | number)[] = [];

    if (filter.kind) {
      query += " AND kind = ?";
      params.push(filter.kind);
    }
    if (filter.itemId !== undefined) {
      query += " AND (item_a = ? OR item_b = ?)";
      params.push(filter.itemId, filter.itemId);
    }

    query += " ORDER BY item_a, item_b";
    if (filter.limit !== undefined) {
      query += " LIMIT ?";
      params.push(filter.limit);
    }

    return this.db
      .prepare<(string | number)[], RelationRow>(query)
      .all(...params)
      .map((row) => this.mapRow(row));
  }

  async countByKind(): Promise<Record<RelationKind, number>> {
    const counts: Record<RelationKind, number> = {
      new_match: 0,
      not_duplicate: 0,
      near_duplicate: 0,
      similar: 0,
      same_set: 0,
    };

    const rows = this.db
      .prepare<[], { kind: string; count: number }>(
        "SELECT kind, COUNT(*) as count FROM relations GROUP BY kind",
      )
      .all();
    for (const row of rows) {
      counts[RelationKindSchema.parse(row.kind)] = row.count;
    }
    return counts;
  }

  /**
   * Remove an item together with every relation and cluster membership that
   * references it, and tombstone its id. One transaction.
   *
   * @returns number of relations removed
   * @throws {NotFoundError} when the item is not live
   */
  async deleteItem(itemId: ItemId): Promise<number> {
    const remove = this.db.transaction((id: number) => {
      const item = this.db
        .prepare<[number], { id: number }>("SELECT id FROM items WHERE id = ?")
        .get(id);
      if (!item) {
        throw new NotFoundError(`Item ${id} is not live`);
      }

      const before = this.db
        .prepare<[number, number], { count: number }>(
          "SELECT COUNT(*) as count FROM relations WHERE item_a = ? OR item_b = ?",
        )
        .get(id, id);

      this.db.prepare<[number]>("DELETE FROM items WHERE id = ?").run(id);
      this.db
        .prepare<[number]>("INSERT OR IGNORE INTO item_tombstones (id) VALUES (?)")
        .run(id);

      return before?.count ?? 0;
    });

    return withRetry(() => remove(itemId), `delete item ${itemId}`, this.retry);
  }

  /** Relations with a missing endpoint. Zero whenever foreign keys are on. */
  async countOrphans(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>(
        `SELECT COUNT(*) as count FROM relations WHERE ${ORPHAN_CONDITION}`,
      )
      .get();
    return row?.count ?? 0;
  }

  /**
   * Count and remove orphaned relations in one transaction.
   * Any orphan means a write bypassed the cascade, so it is logged as an anomaly.
   */
  async sweepOrphans(): Promise<OrphanReport> {
    const sweep = this.db.transaction((): OrphanReport => {
      const orphans = this.db
        .prepare<[], { item_a: number; item_b: number }>(
          `SELECT item_a, item_b FROM relations WHERE ${ORPHAN_CONDITION} ORDER BY item_a, item_b`,
        )
        .all();
      if (orphans.length === 0) {
        return { orphanCount: 0, samples: [] };
      }

      this.db.prepare(`DELETE FROM relations WHERE ${ORPHAN_CONDITION}`).run();
      return {
        orphanCount: orphans.length,
        samples: orphans
          .slice(0, ORPHAN_SAMPLE_LIMIT)
          .map((row) => ({ a: row.item_a, b: row.item_b })),
      };
    });

    const report = await withRetry(() => sweep(), "orphan sweep", this.retry);
    if (report.orphanCount > 0) {
      console.error(
        `[dupe-ledger] Integrity anomaly: removed ${report.orphanCount} orphaned relations (e.g. ${report.samples.map(pairKey).join(", ")})`,
      );
    }
    return report;
  }

  private assertEntry(entry: RelationEntry): void {
    const problem = this.describeInvalidEntry(entry);
    if (problem) {
      throw new ConstraintViolationError(problem);
    }
  }

  private describeInvalidEntry({ pair, distance }: RelationEntry): string | null {
    if (!(pair.a < pair.b)) {
      return `Pair ${pairKey(pair)} is not canonical (expected a < b)`;
    }
    if (!Number.isInteger(distance) || distance < 0) {
      return `Distance ${distance} for ${pairKey(pair)} is not a non-negative integer`;
    }
    return null;
  }

  private selectLiveIds(ids: Set<number>): Set<number> {
    if (ids.size === 0) return new Set();
    const rows = this.db
      .prepare<[string], { id: number }>(
        "SELECT id FROM items WHERE id IN (SELECT value FROM json_each(?))",
      )
      .all(JSON.stringify([...ids]));
    return new Set(rows.map((row) => row.id));
  }

  private mapRow(row: RelationRow): Relation {
    return {
      a: row.item_a,
      b: row.item_b,
      distance: row.distance,
      kind: RelationKindSchema.parse(row.kind),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
