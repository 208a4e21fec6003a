import type Database from "better-sqlite3";
import type { ItemId } from "@/types";
import { NotFoundError, toLedgerError } from "@/utils/errors";

interface ClusterRow {
  id: number;
  name: string;
  target_folder: string;
  created_at: number;
}

export interface Cluster {
  id: number;
  name: string;
  targetFolder: string;
  itemIds: ItemId[];
  createdAt: number;
}

/**
 * Storage for persisted (sticky) clusters and their members.
 * An item belongs to at most one cluster.
 */
export class ClusterStorage {
  constructor(private db: Database.Database) {}

  /**
   * Create a cluster with its initial members.
   *
   * @throws {ConstraintViolationError} if a member is not live or already clustered
   */
  async createCluster(
    name: string,
    itemIds: ItemId[],
    targetFolder = "",
  ): Promise<Cluster> {
    const create = this.db.transaction((): number => {
      const row = this.db
        .prepare<[string, string], { id: number }>(
          "INSERT INTO clusters (name, target_folder) VALUES (?, ?) RETURNING id",
        )
        .get(name, targetFolder);
      if (!row) {
        throw new Error(`Cluster "${name}" was not created`);
      }

      const insert = this.db.prepare<[number, number]>(
        "INSERT INTO cluster_members (cluster_id, item_id) VALUES (?, ?)",
      );
      for (const itemId of new Set(itemIds)) {
        insert.run(row.id, itemId);
      }
      return row.id;
    });

    let clusterId: number;
    try {
      clusterId = create();
    } catch (error) {
      throw toLedgerError(error);
    }

    const cluster = await this.getCluster(clusterId);
    if (!cluster) {
      throw new NotFoundError(`Cluster ${clusterId} vanished after creation`);
    }
    return cluster;
  }

  /**
   * Add items that are not yet in any cluster.
   * Items already clustered elsewhere are left where they are.
   *
   * @returns number of members added
   */
  async addMembers(clusterId: number, itemIds: ItemId[]): Promise<number> {
    const insert = this.db.prepare<[number, number]>(`
      INSERT INTO cluster_members (cluster_id, item_id) VALUES (?, ?)
      ON CONFLICT(item_id) DO NOTHING
    `);

    const add = this.db.transaction((ids: ItemId[]) => {
      let added = 0;
      for (const itemId of ids) {
        added += insert.run(clusterId, itemId).changes;
      }
      return added;
    });

    try {
      return add([...new Set(itemIds)]);
    } catch (error) {
      throw toLedgerError(error);
    }
  }

  async getCluster(id: number): Promise<Cluster | null> {
    const row = this.db
      .prepare<[number], ClusterRow>("SELECT * FROM clusters WHERE id = ?")
      .get(id);
    if (!row) return null;

    const members = this.db
      .prepare<[number], { item_id: number }>(
        "SELECT item_id FROM cluster_members WHERE cluster_id = ? ORDER BY item_id",
      )
      .all(id);
    return this.mapRow(row, members.map((m) => m.item_id));
  }

  async listClusters(): Promise<Cluster[]> {
    const rows = this.db
      .prepare<[], ClusterRow>("SELECT * FROM clusters ORDER BY id")
      .all();
    const members = await this.getMemberships();

    const byCluster = new Map<number, ItemId[]>();
    for (const [itemId, clusterId] of members) {
      const list = byCluster.get(clusterId) ?? [];
      list.push(itemId);
      byCluster.set(clusterId, list);
    }

    return rows.map((row) =>
      this.mapRow(row, (byCluster.get(row.id) ?? []).sort((x, y) => x - y)),
    );
  }

  /** item id -> cluster id for every clustered item */
  async getMemberships(): Promise<Map<ItemId, number>> {
    const rows = this.db
      .prepare<[], { item_id: number; cluster_id: number }>(
        "SELECT item_id, cluster_id FROM cluster_members ORDER BY item_id",
      )
      .all();
    return new Map(rows.map((r): [ItemId, number] => [r.item_id, r.cluster_id]));
  }

  async deleteCluster(id: number): Promise<boolean> {
    const result = this.db
      .prepare<[number]>("DELETE FROM clusters WHERE id = ?")
      .run(id);
    return result.changes > 0;
  }

  private mapRow(row: ClusterRow, itemIds: ItemId[]): Cluster {
    return {
      id: row.id,
      name: row.name,
      targetFolder: row.target_folder,
      itemIds,
      createdAt: row.created_at,
    };
  }
}
