/**
 * Tests for the database migration runner
 */

import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IN_MEMORY, MigrationRunner, migrations } from "@/migrations";
import type { Migration, MigrationDatabase } from "@/migrations/types";

function tableMigration(version: string, table: string, destructive = false): Migration {
  return {
    version,
    name: `create ${table}`,
    destructive,
    up: (db: MigrationDatabase) => {
      db.exec(`CREATE TABLE ${table} (id INTEGER)`);
    },
    down: (db: MigrationDatabase) => {
      db.exec(`DROP TABLE ${table}`);
    },
  };
}

function tableNames(runner: MigrationRunner): string[] {
  return runner
    .getDatabase()
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
    )
    .all()
    .map((row) => row.name);
}

describe("MigrationRunner", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "dupe-ledger-migrations-"));
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true });
    }
  });

  describe("initialization", () => {
    it("creates the database directory if it doesn't exist", () => {
      const runner = new MigrationRunner(join(testDir, "nested", "ledger.db"), []);
      expect(existsSync(join(testDir, "nested"))).toBe(true);
      runner.close();
    });

    it("creates its bookkeeping tables and enables foreign keys", () => {
      const runner = new MigrationRunner(IN_MEMORY, []);
      expect(tableNames(runner)).toEqual(["_ledger_meta", "_ledger_migrations"]);
      expect(runner.getDatabase().pragma("foreign_keys", { simple: true })).toBe(1);
      expect(runner.getCurrentVersion()).toBeNull();
      runner.close();
    });
  });

  describe("migrate", () => {
    it("applies pending migrations in version order", async () => {
      const runner = new MigrationRunner(IN_MEMORY, [
        tableMigration("002", "second"),
        tableMigration("001", "first"),
      ]);

      const result = await runner.migrate();

      expect(result).toEqual({
        success: true,
        applied: ["001", "002"],
        failed: null,
        backupPath: undefined,
      });
      expect(runner.getCurrentVersion()).toBe("002");
      expect(runner.getStatus().map((s) => s.status)).toEqual(["applied", "applied"]);
      runner.close();
    });

    it("stops at the target version", async () => {
      const runner = new MigrationRunner(IN_MEMORY, [
        tableMigration("001", "first"),
        tableMigration("002", "second"),
      ]);

      const result = await runner.migrate({ targetVersion: "001" });
      expect(result.applied).toEqual(["001"]);
      expect(runner.getPendingMigrations().map((m) => m.version)).toEqual(["002"]);
      runner.close();
    });

    it("rolls back a failing migration and reports it", async () => {
      const failing: Migration = {
        version: "002",
        name: "broken",
        up: (db) => {
          db.exec("CREATE TABLE half_done (id INTEGER)");
          db.exec("THIS IS NOT SQL");
        },
        down: () => {},
      };
      const runner = new MigrationRunner(IN_MEMORY, [tableMigration("001", "first"), failing]);

      const result = await runner.migrate();

      expect(result.success).toBe(false);
      expect(result.applied).toEqual(["001"]);
      expect(result.failed).toBe("002");
      expect(tableNames(runner)).not.toContain("half_done");
      expect(runner.getCurrentVersion()).toBe("001");
      runner.close();
    });

    it("dry run applies nothing", async () => {
      const runner = new MigrationRunner(IN_MEMORY, [tableMigration("001", "first")]);
      const result = await runner.migrate({ dryRun: true });

      expect(result.applied).toEqual(["001"]);
      expect(tableNames(runner)).not.toContain("first");
      runner.close();
    });

    it("backs up file databases before destructive migrations", async () => {
      const dbPath = join(testDir, "ledger.db");
      const runner = new MigrationRunner(dbPath, [tableMigration("001", "first", true)]);

      const result = await runner.migrate();

      expect(result.success).toBe(true);
      expect(result.backupPath).toBeDefined();
      expect(existsSync(result.backupPath ?? "")).toBe(true);
      runner.close();
    });
  });

  describe("rollback", () => {
    it("reverts migrations above the target", async () => {
      const runner = new MigrationRunner(join(testDir, "ledger.db"), [
        tableMigration("001", "first"),
        tableMigration("002", "second"),
      ]);
      await runner.migrate();

      const result = await runner.rollback("001");

      expect(result.success).toBe(true);
      expect(result.applied).toEqual(["002"]);
      expect(runner.getCurrentVersion()).toBe("001");
      expect(tableNames(runner)).not.toContain("second");
      runner.close();
    });
  });

  describe("ledger schema", () => {
    it("creates the ledger tables", async () => {
      const runner = new MigrationRunner(IN_MEMORY, migrations);
      await runner.migrate();

      expect(tableNames(runner)).toEqual(
        expect.arrayContaining([
          "items",
          "item_tombstones",
          "scan_roots",
          "relations",
          "clusters",
          "cluster_members",
          "annotation_history",
        ]),
      );
      expect(runner.getCurrentVersion()).toBe("004");
      runner.close();
    });

    it("rolls all the way back", async () => {
      const runner = new MigrationRunner(join(testDir, "ledger.db"), migrations);
      await runner.migrate();
      await runner.rollback("0");

      expect(tableNames(runner)).toEqual(["_ledger_meta", "_ledger_migrations"]);
      expect(runner.getCurrentVersion()).toBeNull();
      runner.close();
    });
  });
});
