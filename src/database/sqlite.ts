import type Database from "better-sqlite3";
import { createMigrationRunner, IN_MEMORY } from "@/migrations";

/**
 * Open the ledger database and bring its schema up to date.
 * Pass ":memory:" for a throwaway database (tests).
 */
export async function openLedgerDatabase(
  dbPath: string,
): Promise<Database.Database> {
  const runner = createMigrationRunner(dbPath);
  const result = await runner.migrate();

  if (!result.success) {
    runner.close();
    throw new Error(
      `Migration ${result.failed} failed for ${dbPath}: ${result.error ?? "unknown error"}`,
    );
  }

  if (result.applied.length > 0 && dbPath !== IN_MEMORY) {
    console.error(
      `[dupe-ledger] Applied migrations ${result.applied.join(", ")} to ${dbPath}`,
    );
  }

  return runner.getDatabase();
}

export function foreignKeysEnabled(db: Database.Database): boolean {
  return db.pragma("foreign_keys", { simple: true }) === 1;
}
