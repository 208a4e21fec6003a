/**
 * Schema migration runner
 *
 * Opens the ledger database, tracks applied versions and runs each pending
 * migration in its own transaction. Destructive migrations get a file backup
 * first.
 */

import { copyFileSync, existsSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import Database from "better-sqlite3";
import type {
  Migration,
  MigrationDatabase,
  MigrationOptions,
  MigrationResult,
  MigrationStatus,
} from "./types";

const META_TABLE = "_ledger_meta";
const MIGRATIONS_TABLE = "_ledger_migrations";

export const IN_MEMORY = ":memory:";

export class MigrationRunner {
  private db: Database.Database;
  private dbPath: string;
  private migrations: Migration[];

  constructor(dbPath: string, migrations: Migration[]) {
    this.dbPath = dbPath;
    this.migrations = [...migrations].sort((a, b) =>
      a.version.localeCompare(b.version),
    );

    if (dbPath !== IN_MEMORY) {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    // Cascades (items -> relations, clusters -> members) depend on this; it is per-connection
    this.db.pragma("foreign_keys = ON");
    this.ensureTables();
  }

  private ensureTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${META_TABLE} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER DEFAULT (unixepoch())
      );
      CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE} (
        version TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at INTEGER DEFAULT (unixepoch())
      );
    `);
  }

  getCurrentVersion(): string | null {
    const row = this.db
      .prepare<[], { value: string }>(
        `SELECT value FROM ${META_TABLE} WHERE key = 'schema_version'`,
      )
      .get();
    return row?.value ?? null;
  }

  private setCurrentVersion(version: string): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO ${META_TABLE} (key, value, updated_at) VALUES ('schema_version', ?, unixepoch())`,
      )
      .run(version);
  }

  getLatestVersion(): string | null {
    if (this.migrations.length === 0) return null;
    return this.migrations[this.migrations.length - 1].version;
  }

  getStatus(): MigrationStatus[] {
    const applied = this.getAppliedMigrations();

    return this.migrations.map((migration) => {
      const appliedAt = applied.get(migration.version);
      return {
        version: migration.version,
        name: migration.name,
        appliedAt: appliedAt ?? null,
        status: appliedAt !== undefined ? "applied" : "pending",
      };
    });
  }

  private getAppliedMigrations(): Map<string, number> {
    const rows = this.db
      .prepare<[], { version: string; applied_at: number }>(
        `SELECT version, applied_at FROM ${MIGRATIONS_TABLE}`,
      )
      .all();
    return new Map(rows.map((r) => [r.version, r.applied_at]));
  }

  private recordMigration(migration: Migration): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO ${MIGRATIONS_TABLE} (version, name, applied_at) VALUES (?, ?, unixepoch())`,
      )
      .run(migration.version, migration.name);
  }

  private removeMigrationRecord(version: string): void {
    this.db
      .prepare(`DELETE FROM ${MIGRATIONS_TABLE} WHERE version = ?`)
      .run(version);
  }

  /**
   * Copy the database file (and WAL) into a sibling backups/ directory.
   * Returns null for in-memory databases.
   */
  createBackup(): string | null {
    if (this.dbPath === IN_MEMORY) return null;

    const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
    const backupDir = join(dirname(this.dbPath), "backups");
    if (!existsSync(backupDir)) {
      mkdirSync(backupDir, { recursive: true });
    }

    const backupPath = join(
      backupDir,
      `backup-${timestamp}-${this.getCurrentVersion() ?? "initial"}.db`,
    );

    this.db.pragma("wal_checkpoint(TRUNCATE)");
    copyFileSync(this.dbPath, backupPath);

    const walPath = `${this.dbPath}-wal`;
    if (existsSync(walPath)) {
      copyFileSync(walPath, `${backupPath}-wal`);
    }

    return backupPath;
  }

  getPendingMigrations(targetVersion?: string): Migration[] {
    const applied = this.getAppliedMigrations();

    return this.migrations.filter((migration) => {
      if (applied.has(migration.version)) return false;
      if (targetVersion && migration.version > targetVersion) return false;
      return true;
    });
  }

  hasDestructivePending(targetVersion?: string): boolean {
    return this.getPendingMigrations(targetVersion).some((m) => m.destructive);
  }

  private createMigrationDb(): MigrationDatabase {
    return {
      run: (sql, ...params) => {
        this.db.prepare(sql).run(...params);
      },
      exec: (sql) => {
        this.db.exec(sql);
      },
      query: <T>(sql: string, ...params: unknown[]): T[] =>
        this.db.prepare<unknown[], T>(sql).all(...params),
      get: <T>(sql: string, ...params: unknown[]): T | undefined =>
        this.db.prepare<unknown[], T>(sql).get(...params),
    };
  }

  async migrate(options: MigrationOptions = {}): Promise<MigrationResult> {
    const { targetVersion, backup = true, dryRun = false } = options;

    const pending = this.getPendingMigrations(targetVersion);
    if (pending.length === 0) {
      return { success: true, applied: [], failed: null };
    }

    let backupPath: string | undefined;
    if (backup && !dryRun && this.hasDestructivePending(targetVersion)) {
      backupPath = this.createBackup() ?? undefined;
    }

    const applied: string[] = [];
    const migrationDb = this.createMigrationDb();

    for (const migration of pending) {
      if (dryRun) {
        applied.push(migration.version);
        continue;
      }

      try {
        this.db.exec("BEGIN");
        migration.up(migrationDb);
        this.recordMigration(migration);
        this.setCurrentVersion(migration.version);
        this.db.exec("COMMIT");
        applied.push(migration.version);
      } catch (error) {
        this.db.exec("ROLLBACK");
        return {
          success: false,
          applied,
          failed: migration.version,
          error: error instanceof Error ? error.message : String(error),
          backupPath,
        };
      }
    }

    return { success: true, applied, failed: null, backupPath };
  }

  async rollback(targetVersion: string): Promise<MigrationResult> {
    const currentVersion = this.getCurrentVersion();
    if (!currentVersion || currentVersion <= targetVersion) {
      return { success: true, applied: [], failed: null };
    }

    const applied = this.getAppliedMigrations();
    const toRollback = this.migrations
      .filter((m) => applied.has(m.version) && m.version > targetVersion)
      .reverse();

    if (toRollback.length === 0) {
      return { success: true, applied: [], failed: null };
    }

    const backupPath = this.createBackup() ?? undefined;
    const rolledBack: string[] = [];
    const migrationDb = this.createMigrationDb();

    for (const migration of toRollback) {
      try {
        this.db.exec("BEGIN");
        migration.down(migrationDb);
        this.removeMigrationRecord(migration.version);
        this.db.exec("COMMIT");
        rolledBack.push(migration.version);
      } catch (error) {
        this.db.exec("ROLLBACK");
        return {
          success: false,
          applied: rolledBack,
          failed: migration.version,
          error: error instanceof Error ? error.message : String(error),
          backupPath,
        };
      }
    }

    if (targetVersion === "0") {
      this.db.prepare(`DELETE FROM ${META_TABLE} WHERE key = 'schema_version'`).run();
    } else {
      this.setCurrentVersion(targetVersion);
    }

    return { success: true, applied: rolledBack, failed: null, backupPath };
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
