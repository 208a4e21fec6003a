/**
 * Annotation history migration
 *
 * Bounded undo/redo log of kind changes made by the user. Entries go with
 * their relation, so deleting an item also drops its history.
 */

import type { Migration, MigrationDatabase } from "./types";

export const migration004AnnotationHistory: Migration = {
  version: "004",
  name: "annotation_history",
  destructive: false,

  up(db: MigrationDatabase): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS annotation_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        item_a INTEGER NOT NULL,
        item_b INTEGER NOT NULL,
        previous_kind TEXT NOT NULL,
        kind TEXT NOT NULL,
        undone INTEGER NOT NULL DEFAULT 0 CHECK (undone IN (0, 1)),
        created_at INTEGER NOT NULL DEFAULT (unixepoch()),
        FOREIGN KEY (item_a, item_b)
          REFERENCES relations(item_a, item_b) ON DELETE CASCADE
      )
    `);

    db.exec(`
      CREATE INDEX IF NOT EXISTS idx_annotation_history_pair
      ON annotation_history(item_a, item_b)
    `);
  },

  down(db: MigrationDatabase): void {
    db.exec("DROP TABLE IF EXISTS annotation_history");
  },
};
