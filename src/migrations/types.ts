/**
 * Migration contracts
 */

export interface Migration {
  /** Zero-padded version, compared lexically ("001", "002") */
  version: string;
  name: string;
  /** Back the database file up before applying */
  destructive?: boolean;
  up: (db: MigrationDatabase) => void;
  down: (db: MigrationDatabase) => void;
}

/**
 * The narrow SQL surface a migration may use.
 * Every call runs inside the migration's transaction.
 */
export interface MigrationDatabase {
  run(sql: string, ...params: unknown[]): void;
  exec(sql: string): void;
  query<T = unknown>(sql: string, ...params: unknown[]): T[];
  get<T = unknown>(sql: string, ...params: unknown[]): T | undefined;
}

export interface MigrationStatus {
  version: string;
  name: string;
  appliedAt: number | null;
  status: "pending" | "applied" | "failed";
}

export interface MigrationResult {
  success: boolean;
  applied: string[];
  failed: string | null;
  error?: string;
  backupPath?: string;
}

export interface MigrationOptions {
  /** Stop after this version (default: latest) */
  targetVersion?: string;
  /** Back up before destructive migrations (default: true) */
  backup?: boolean;
  /** Report what would run without running it */
  dryRun?: boolean;
}
