import { z } from "zod";

// Relation kinds
export const RelationKindSchema = z.enum([
  "new_match",
  "not_duplicate",
  "near_duplicate",
  "similar",
  "same_set",
]);
export type RelationKind = z.infer<typeof RelationKindSchema>;

/** Kinds a user can annotate a pair with. */
export const AnnotatedKindSchema = RelationKindSchema.exclude(["new_match"]);
export type AnnotatedKind = z.infer<typeof AnnotatedKindSchema>;

export const ItemIdSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
export type ItemId = z.infer<typeof ItemIdSchema>;

// Scanner input
export const ScannedItemSchema = z.object({
  itemId: ItemIdSchema,
  fingerprint: z.string().min(1),
  sourceLocation: z.string().min(1),
});
export type ScannedItem = z.infer<typeof ScannedItemSchema>;

export interface Item {
  id: ItemId;
  fingerprint: string;
  sourceLocation: string;
  createdAt: number;
  updatedAt: number;
}

/** Unordered item pair in canonical form: `a < b`. */
export interface Pair {
  a: ItemId;
  b: ItemId;
}

export interface Relation extends Pair {
  distance: number;
  kind: RelationKind;
  createdAt: number;
  updatedAt: number;
}

/** A pair produced by the candidate generator, before reconciliation. */
export interface Candidate {
  pair: Pair;
  distance: number;
}

/** A candidate after reconciliation, carrying the stored kind. */
export interface ReconciledRelation extends Pair {
  distance: number;
  kind: RelationKind;
}

// Config
export const StorageConfigSchema = z.object({
  dbPath: z.string().default(".dupe-ledger/ledger.db"),
});

export const FingerprintConfigSchema = z.object({
  /** Code width in bits; perceptual hashes are usually 64 */
  bits: z.number().int().positive().multipleOf(4).default(64),
  /** Slices for the multi-index prefilter; 0 disables it */
  multiIndexSlices: z.number().int().min(0).max(64).default(0),
});

export const ScanConfigSchema = z.object({
  threshold: z.number().int().min(0).default(5),
  includeAnnotated: z.boolean().default(false),
  /** Sweep orphaned relations before each scan */
  integrityCheck: z.boolean().default(true),
  batchSize: z.number().int().positive().default(500),
});

export const RetryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  baseDelayMs: z.number().min(0).default(25),
  maxDelayMs: z.number().min(0).default(1000),
  jitter: z.boolean().default(true),
});

export const AnnotationConfigSchema = z.object({
  /** Whether an annotated pair may be explicitly reset to new_match */
  allowReset: z.boolean().default(true),
  /** Annotation changes kept for undo and redo */
  historyLimit: z.number().int().min(0).default(50),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  fingerprint: FingerprintConfigSchema.default({}),
  scan: ScanConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  annotation: AnnotationConfigSchema.default({}),
});
export type Config = z.infer<typeof ConfigSchema>;
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});
