/**
 * Database migrations module
 */

import { migration001Items } from "./001_items";
import { migration002Relations } from "./002_relations";
import { migration003Clusters } from "./003_clusters";
import { migration004AnnotationHistory } from "./004_annotation_history";
import { MigrationRunner } from "./runner";
import type { Migration } from "./types";

export { IN_MEMORY, MigrationRunner } from "./runner";
export type {
  Migration,
  MigrationDatabase,
  MigrationOptions,
  MigrationResult,
  MigrationStatus,
} from "./types";

/**
 * All migrations in version order
 */
export const migrations: Migration[] = [
  migration001Items,
  migration002Relations,
  migration003Clusters,
  migration004AnnotationHistory,
];

export function createMigrationRunner(dbPath: string): MigrationRunner {
  return new MigrationRunner(dbPath, migrations);
}
