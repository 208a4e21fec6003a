/**
 * Duplicate engine facade
 *
 * Owns the live fingerprint index and wires the stores, the candidate
 * generator, the reconciler and the cluster projector behind the operations
 * the tool surface exposes.
 */

import type Database from "better-sqlite3";
import { ClusterProjector, type ProjectionCriteria, type ProjectionResult } from "@/clusters";
import { getDbPath } from "@/config";
import { type Cluster, ClusterStorage } from "@/database/clusters";
import { ItemStorage, type ItemWrite } from "@/database/items";
import { RelationStore } from "@/database/relation-store";
import { foreignKeysEnabled, openLedgerDatabase } from "@/database/sqlite";
import {
  FingerprintIndex,
  type FingerprintIndexOptions,
  parseFingerprint,
} from "@/fingerprint";
import {
  type AnnotatedKind,
  type Config,
  type ItemId,
  type Pair,
  type ReconciledRelation,
  type Relation,
  type ScannedItem,
  ScannedItemSchema,
} from "@/types";
import { IntegrityAnomalyError } from "@/utils/errors";
import { canonicalPair, pairKey } from "@/utils/pairs";
import { withRetry } from "@/utils/retry";
import {
  assertThreshold,
  type CandidateSourceItem,
  type GenerationStats,
  generateCandidates,
} from "./candidate-generator";
import { Reconciler, type ReconcileWarning } from "./reconciler";

export interface IngestRejection {
  itemId: ItemId | null;
  reason: "invalid_input" | "invalid_fingerprint" | "tombstoned";
  message: string;
}

export interface IngestResult {
  ingested: number;
  updated: number;
  unchanged: number;
  rejected: IngestRejection[];
}

export interface FindDuplicatesOptions {
  threshold?: number;
  /** Source roots; defaults to the persisted scan roots */
  scope?: readonly string[];
  includeAnnotated?: boolean;
  signal?: AbortSignal;
}

export interface IntegrityWarning {
  code: "integrity_anomaly";
  message: string;
  orphanCount: number;
}

export type FindWarning = ReconcileWarning | IntegrityWarning;

export interface FindDuplicatesResult {
  relations: ReconciledRelation[];
  warnings: FindWarning[];
  cancelled: boolean;
  stats: GenerationStats & {
    inserted: number;
    /** Candidates dropped because an endpoint was deleted while the pass ran */
    deletedDuringScan: number;
  };
}

export interface IntegrityReport {
  orphanCount: number;
  foreignKeysEnabled: boolean;
  anomaly: { message: string; samples: Pair[] } | null;
}

export interface DeleteResult {
  itemId: ItemId;
  relationsRemoved: number;
}

export class DuplicateEngine {
  readonly items: ItemStorage;
  readonly relations: RelationStore;
  readonly clusters: ClusterStorage;
  private readonly projector: ClusterProjector;
  private readonly reconciler: Reconciler;
  private readonly indexOptions: FingerprintIndexOptions;

  private index: FingerprintIndex | null = null;
  private readonly liveItems = new Map<ItemId, CandidateSourceItem>();

  constructor(
    private db: Database.Database,
    readonly config: Config,
  ) {
    this.items = new ItemStorage(db);
    this.relations = new RelationStore(db, {
      retry: config.retry,
      allowReset: config.annotation.allowReset,
      historyLimit: config.annotation.historyLimit,
    });
    this.clusters = new ClusterStorage(db);
    this.projector = new ClusterProjector(this.clusters);
    this.reconciler = new Reconciler(this.relations);
    this.indexOptions = {
      bits: config.fingerprint.bits,
      multiIndexSlices: config.fingerprint.multiIndexSlices,
    };
  }

  static async open(
    config: Config,
    projectPath: string = process.cwd(),
  ): Promise<DuplicateEngine> {
    const db = await openLedgerDatabase(getDbPath(config, projectPath));
    return new DuplicateEngine(db, config);
  }

  /**
   * Record scanned items in batches of scan.batchSize, one transaction per
   * batch. The live index follows along; a changed fingerprint forces a
   * rebuild before the next scan.
   */
  async ingest(
    source: Iterable<unknown> | AsyncIterable<unknown>,
  ): Promise<IngestResult> {
    const result: IngestResult = { ingested: 0, updated: 0, unchanged: 0, rejected: [] };
    let batch: CandidateSourceItem[] = [];

    for await (const raw of source) {
      const accepted = this.acceptScanned(raw, result.rejected);
      if (!accepted) continue;

      batch.push(accepted);
      if (batch.length >= this.config.scan.batchSize) {
        await this.writeBatch(batch, result);
        batch = [];
      }
    }

    if (batch.length > 0) {
      await this.writeBatch(batch, result);
    }

    if (result.rejected.length > 0) {
      console.warn(
        `[dupe-ledger] Ingest rejected ${result.rejected.length} items`,
      );
    }
    return result;
  }

  private acceptScanned(
    raw: unknown,
    rejected: IngestRejection[],
  ): CandidateSourceItem | null {
    const parsed = ScannedItemSchema.safeParse(raw);
    if (!parsed.success) {
      rejected.push({
        itemId: null,
        reason: "invalid_input",
        message: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
      return null;
    }

    const item: ScannedItem = parsed.data;
    try {
      return {
        id: item.itemId,
        fingerprint: parseFingerprint(item.fingerprint, this.indexOptions.bits),
        sourceLocation: item.sourceLocation,
      };
    } catch (error) {
      rejected.push({
        itemId: item.itemId,
        reason: "invalid_fingerprint",
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  private async writeBatch(
    batch: CandidateSourceItem[],
    result: IngestResult,
  ): Promise<void> {
    const writes: ItemWrite[] = batch.map((item) => ({
      id: item.id,
      fingerprint: item.fingerprint.hex,
      sourceLocation: item.sourceLocation,
    }));
    const outcomes = await withRetry(
      () => this.items.upsertMany(writes),
      `ingest of ${writes.length} items`,
      this.config.retry,
    );

    outcomes.forEach((outcome, i) => {
      const item = batch[i];
      switch (outcome.outcome) {
        case "tombstoned":
          result.rejected.push({
            itemId: item.id,
            reason: "tombstoned",
            message: `Item ${item.id} was deleted and its id cannot be reused`,
          });
          return;
        case "inserted":
          result.ingested++;
          break;
        case "updated":
          result.updated++;
          break;
        case "unchanged":
          result.unchanged++;
          break;
      }

      this.liveItems.set(item.id, item);
      if (!this.index) return;
      if (outcome.fingerprintChanged) {
        this.index = null;
      } else {
        this.index.insert(item);
      }
    });
  }

  private async ensureIndex(): Promise<FingerprintIndex> {
    if (this.index) return this.index;

    this.liveItems.clear();
    for (const item of await this.items.listItems()) {
      try {
        this.liveItems.set(item.id, {
          id: item.id,
          fingerprint: parseFingerprint(item.fingerprint, this.indexOptions.bits),
          sourceLocation: item.sourceLocation,
        });
      } catch (error) {
        console.warn(
          `[dupe-ledger] Skipping item ${item.id}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    this.index = FingerprintIndex.build(this.liveItems.values(), this.indexOptions);
    return this.index;
  }

  /**
   * Generate candidates over the live set and reconcile them against the
   * stored relations.
   *
   * @throws {InvalidArgumentError} for a negative or fractional threshold
   */
  async findDuplicates(
    options: FindDuplicatesOptions = {},
  ): Promise<FindDuplicatesResult> {
    const threshold = options.threshold ?? this.config.scan.threshold;
    assertThreshold(threshold);
    const warnings: FindWarning[] = [];

    if (this.config.scan.integrityCheck) {
      const report = await this.relations.sweepOrphans();
      if (report.orphanCount > 0) {
        warnings.push({
          code: "integrity_anomaly",
          message: `Removed ${report.orphanCount} orphaned relations before scanning`,
          orphanCount: report.orphanCount,
        });
      }
    }

    const index = await this.ensureIndex();
    const scope = options.scope ?? (await this.items.getScanRoots());

    const generated = await generateCandidates({
      items: [...this.liveItems.values()],
      index,
      indexOptions: this.indexOptions,
      threshold,
      scope,
      signal: options.signal,
    });

    // Deletes can land while generation yields; those pairs are already gone
    const endpoints = new Set<ItemId>();
    for (const { pair } of generated.candidates) {
      endpoints.add(pair.a);
      endpoints.add(pair.b);
    }
    const live = await this.items.liveIds(endpoints);
    const candidates = generated.candidates.filter(
      ({ pair }) => live.has(pair.a) && live.has(pair.b),
    );

    const reconciled = await this.reconciler.reconcile(candidates, {
      includeAnnotated: options.includeAnnotated ?? this.config.scan.includeAnnotated,
    });
    warnings.push(...reconciled.warnings);

    return {
      relations: reconciled.relations,
      warnings,
      cancelled: generated.cancelled,
      stats: {
        ...generated.stats,
        inserted: reconciled.inserted,
        deletedDuringScan: generated.candidates.length - candidates.length,
      },
    };
  }

  async annotate(pair: Pair, kind: AnnotatedKind): Promise<Relation> {
    return this.relations.setKind(canonicalPair(pair.a, pair.b), kind);
  }

  async resetToNew(pair: Pair): Promise<Relation> {
    return this.relations.resetKind(canonicalPair(pair.a, pair.b));
  }

  async undoAnnotation(): Promise<Relation> {
    return this.relations.undoAnnotation();
  }

  async redoAnnotation(): Promise<Relation> {
    return this.relations.redoAnnotation();
  }

  /**
   * Remove an item and everything referencing it. The item is hidden from the
   * live index first and restored if the delete does not commit.
   */
  async itemDeleted(itemId: ItemId): Promise<DeleteResult> {
    const item = this.liveItems.get(itemId);
    const hidden = this.index?.exclude(itemId) ?? false;

    let relationsRemoved: number;
    try {
      relationsRemoved = await this.relations.deleteItem(itemId);
    } catch (error) {
      if (hidden && item) {
        this.index?.restore(item);
      }
      throw error;
    }

    this.liveItems.delete(itemId);
    return { itemId, relationsRemoved };
  }

  /**
   * Sweep orphaned relations and report what was found.
   *
   * @throws {IntegrityAnomalyError} in strict mode when orphans were found
   */
  async integrityCheck(options: { strict?: boolean } = {}): Promise<IntegrityReport> {
    const report = await this.relations.sweepOrphans();
    const anomaly =
      report.orphanCount > 0
        ? new IntegrityAnomalyError(
            `Found ${report.orphanCount} relations referencing deleted items (${report.samples.map(pairKey).join(", ")})`,
            report.orphanCount,
            report.samples,
          )
        : null;

    if (anomaly && options.strict) {
      throw anomaly;
    }

    return {
      orphanCount: report.orphanCount,
      foreignKeysEnabled: foreignKeysEnabled(this.db),
      anomaly: anomaly ? { message: anomaly.message, samples: anomaly.samples } : null,
    };
  }

  async getScanRoots(): Promise<string[]> {
    return this.items.getScanRoots();
  }

  async setScanRoots(roots: readonly string[]): Promise<string[]> {
    return this.items.setScanRoots(roots);
  }

  /**
   * Project clusters from the stored relations. The scope defaults to the
   * persisted scan roots.
   */
  async projectClusters(criteria: ProjectionCriteria = {}): Promise<ProjectionResult> {
    const scope = criteria.scope ?? (await this.items.getScanRoots());
    const locations = new Map<ItemId, string>();
    if (scope.length > 0) {
      for (const item of await this.items.listItems()) {
        locations.set(item.id, item.sourceLocation);
      }
    }

    return this.projector.project(
      await this.relations.listRelations(),
      { ...criteria, scope },
      locations,
    );
  }

  async createCluster(
    name: string,
    itemIds: ItemId[],
    targetFolder?: string,
  ): Promise<Cluster> {
    return this.projector.createCluster(name, itemIds, targetFolder);
  }

  close(): void {
    this.db.close();
  }
}
