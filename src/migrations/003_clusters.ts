/**
 * Clusters migration
 *
 * Sticky groups grown from reconciled relations. An item belongs to at most
 * one cluster; memberships disappear with either the cluster or the item.
 */

import type { Migration, MigrationDatabase } from "./types";

export const migration003Clusters: Migration = {
  version: "003",
  name: "clusters",
  destructive: false,

  up(db: MigrationDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS clusters (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        target_folder TEXT NOT NULL DEFAULT '',
        created_at INTEGER NOT NULL DEFAULT (unixepoch())
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS cluster_members (
        cluster_id INTEGER NOT NULL REFERENCES clusters(id) ON DELETE CASCADE,
        item_id INTEGER NOT NULL UNIQUE REFERENCES items(id) ON DELETE CASCADE,
        added_at INTEGER NOT NULL DEFAULT (unixepoch()),
        PRIMARY KEY (cluster_id, item_id)
      )
    `);
  },

  down(db: MigrationDatabase): void {
    db.exec("DROP TABLE IF EXISTS cluster_members");
    db.exec("DROP TABLE IF EXISTS clusters");
  },
};
