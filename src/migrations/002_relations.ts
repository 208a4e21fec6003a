/**
 * Relations migration
 *
 * One row per unordered item pair, stored canonically (item_a < item_b).
 * Both endpoints cascade on item deletion, so a relation can never outlive
 * either of its items.
 */

import type { Migration, MigrationDatabase } from "./types";

export const migration002Relations: Migration = {
  version: "002",
  name: "relations",
  destructive: false,

  up(db: MigrationDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS relations (
        item_a INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
        item_b INTEGER NOT NULL REFERENCES items(id) ON DELETE CASCADE,
        distance INTEGER NOT NULL CHECK (distance >= 0),
        kind TEXT NOT NULL DEFAULT 'new_match' CHECK (
          kind IN ('new_match', 'not_duplicate', 'near_duplicate', 'similar', 'same_set')
        ),
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        updated_at INTEGER NOT NULL DEFAULT (unixepoch()),
        PRIMARY KEY (item_a, item_b),
        CHECK (item_a < item_b)
      )
    `);

    // Cascades and per-item lookups hit each endpoint separately
    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_relations_item_a
      ON relations(item_a)
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_relations_item_b
      ON relations(item_b)
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_relations_kind
      ON relations(kind)
    `);
  },

  down(db: MigrationDatabase): void {
    db.exec("DROP TABLE IF EXISTS relations");
  },
};
