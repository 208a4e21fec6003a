import type Database from "better-sqlite3";
import type { Item, ItemId } from "@/types";
import { isUnderRoot } from "@/utils/pairs";

interface ItemRow {
  id: number;
  fingerprint: string;
  source_location: string;
  created_at: number;
  updated_at: number;
}

export interface ItemWrite {
  id: ItemId;
  /** Normalised lower-case hex */
  fingerprint: string;
  sourceLocation: string;
}

export type ItemWriteOutcome = "inserted" | "updated" | "unchanged" | "tombstoned";

export interface ItemWriteResult {
  id: ItemId;
  outcome: ItemWriteOutcome;
  fingerprintChanged: boolean;
}

/**
 * Storage for the live item set, tombstones and the persisted scan roots
 */
export class ItemStorage {
  constructor(private db: Database.Database) {}

  /**
   * Insert or refresh a batch of scanned items in one transaction.
   * Tombstoned ids are skipped and reported; they are never revived.
   */
  async upsertMany(items: ItemWrite[]): Promise<ItemWriteResult[]> {
    const findItem = this.db.prepare<[number], ItemRow>(
      "SELECT * FROM items WHERE id = ?",
    );
    const findTombstone = this.db.prepare<[number], { id: number }>(
      "SELECT id FROM item_tombstones WHERE id = ?",
    );
    const insert = this.db.prepare<[number, string, string]>(
      "INSERT INTO items (id, fingerprint, source_location) VALUES (?, ?, ?)",
    );
    const update = this.db.prepare<[string, string, number]>(
      "UPDATE items SET fingerprint = ?, source_location = ?, updated_at = unixepoch() WHERE id = ?",
    );

    const write = this.db.transaction((batch: ItemWrite[]) => {
      const results: ItemWriteResult[] = [];

      for (const item of batch) {
        if (findTombstone.get(item.id)) {
          results.push({ id: item.id, outcome: "tombstoned", fingerprintChanged: false });
          continue;
        }

        const existing = findItem.get(item.id);
        if (!existing) {
          insert.run(item.id, item.fingerprint, item.sourceLocation);
          results.push({ id: item.id, outcome: "inserted", fingerprintChanged: false });
          continue;
        }

        const fingerprintChanged = existing.fingerprint !== item.fingerprint;
        if (!fingerprintChanged && existing.source_location === item.sourceLocation) {
          results.push({ id: item.id, outcome: "unchanged", fingerprintChanged });
          continue;
        }

        update.run(item.fingerprint, item.sourceLocation, item.id);
        results.push({ id: item.id, outcome: "updated", fingerprintChanged });
      }

      return results;
    });

    return write(items);
  }

  async getItem(id: ItemId): Promise<Item | null> {
    const row = this.db
      .prepare<[number], ItemRow>("SELECT * FROM items WHERE id = ?")
      .get(id);
    return row ? this.mapRow(row) : null;
  }

  /**
   * Live items, optionally restricted to those under one of `roots`.
   */
  async listItems(roots: readonly string[] = []): Promise<Item[]> {
    const rows = this.db
      .prepare<[], ItemRow>("SELECT * FROM items ORDER BY id")
      .all();
    return rows
      .filter((row) => isUnderRoot(row.source_location, roots))
      .map((row) => this.mapRow(row));
  }

  /** The subset of `ids` that are live. */
  async liveIds(ids: Iterable<ItemId>): Promise<Set<ItemId>> {
    const wanted = [...new Set(ids)];
    if (wanted.length === 0) return new Set();

    const rows = this.db
      .prepare<[string], { id: number }>(
        "SELECT id FROM items WHERE id IN (SELECT value FROM json_each(?))",
      )
      .all(JSON.stringify(wanted));
    return new Set(rows.map((row) => row.id));
  }

  async count(): Promise<number> {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM items")
      .get();
    return row?.count ?? 0;
  }

  async getScanRoots(): Promise<string[]> {
    return this.db
      .prepare<[], { path: string }>("SELECT path FROM scan_roots ORDER BY path")
      .all()
      .map((row) => row.path);
  }

  /** Replace the persisted scan roots. */
  async setScanRoots(roots: readonly string[]): Promise<string[]> {
    const unique = [...new Set(roots.map((root) => root.trim()).filter(Boolean))];
    const insert = this.db.prepare<[string]>(
      "INSERT INTO scan_roots (path) VALUES (?)",
    );

    this.db.transaction(() => {
      this.db.prepare("DELETE FROM scan_roots").run();
      for (const root of unique) {
        insert.run(root);
      }
    })();

    return unique.sort();
  }

  private mapRow(row: ItemRow): Item {
    return {
      id: row.id,
      fingerprint: row.fingerprint,
      sourceLocation: row.source_location,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
