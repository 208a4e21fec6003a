/**
 * Items migration
 *
 * The live item set: one row per fingerprinted image. Ids come from the
 * scanner and are never reused; deleted ids are kept in item_tombstones.
 */

import type { Migration, MigrationDatabase } from "./types";

export const migration001Items: Migration = {
  version: "001",
  name: "items",
  destructive: false,

  up(db: MigrationDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS items (
        id INTEGER PRIMARY KEY,
        fingerprint TEXT NOT NULL,
        source_location TEXT NOT NULL,
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        updated_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_items_fingerprint
      ON items(fingerprint)
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_items_source
      ON items(source_location)
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS item_tombstones (
        id INTEGER PRIMARY KEY,
        deleted_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `);

    // Persisted default scan scope
    db.exec(`
      CREATE TABLE IF NOT EXISTS scan_roots (
        path TEXT PRIMARY KEY,
        added_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `);
  },

  down(db: MigrationDatabase): void {
    db.exec("DROP TABLE IF EXISTS scan_roots");
    db.exec("DROP TABLE IF EXISTS item_tombstones");
    db.exec("DROP TABLE IF EXISTS items");
  },
};
