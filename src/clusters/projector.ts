/**
 * Cluster Projector
 *
 * Groups related items into clusters from stored relations. Positive kinds
 * link items, not_duplicate pairs veto a link, and each connected component
 * of two or more items becomes a cluster. Clusters are sticky: once an item
 * is persisted in a cluster it stays there across projections, and new
 * components that touch existing clusters grow the lowest-numbered one.
 */

import type { Cluster, ClusterStorage } from "@/database/clusters";
import type { ItemId, Relation, RelationKind } from "@/types";
import { isUnderRoot, pairKey } from "@/utils/pairs";

export type ProjectableRelation = Pick<Relation, "a" | "b" | "kind" | "distance">;

export interface ProjectionCriteria {
  /** Kinds that link two items (default: new_match, near_duplicate, similar) */
  positiveKinds?: RelationKind[];
  /** Also link every distance-0 pair, whatever its kind */
  exactFingerprint?: boolean;
  /** Let positive links override not_duplicate annotations */
  ignoreNegative?: boolean;
  /** Write new members of touched clusters (default true) */
  persist?: boolean;
  /**
   * Source roots. Only relations with both items under a root link items, and
   * only clusters and proposals lying wholly under the roots are returned.
   */
  scope?: readonly string[];
}

export interface ProjectedCluster {
  clusterId: number;
  name: string;
  targetFolder: string;
  itemIds: ItemId[];
  /** Members persisted by this projection */
  addedItemIds: ItemId[];
}

export interface ProjectionResult {
  clusters: ProjectedCluster[];
  /** Components touching no existing cluster, not yet persisted */
  proposals: ItemId[][];
}

export const DEFAULT_POSITIVE_KINDS: readonly RelationKind[] = [
  "new_match",
  "near_duplicate",
  "similar",
];

/**
 * Connected components of size >= 2, each sorted, ordered by smallest member.
 */
export function findComponents(
  relations: readonly ProjectableRelation[],
  criteria: ProjectionCriteria = {},
): ItemId[][] {
  const positive = new Set(criteria.positiveKinds ?? DEFAULT_POSITIVE_KINDS);
  const negative = new Set<string>();
  if (!criteria.ignoreNegative) {
    for (const relation of relations) {
      if (relation.kind === "not_duplicate") {
        negative.add(pairKey(relation));
      }
    }
  }

  const adjacency = new Map<ItemId, Set<ItemId>>();
  const link = (from: ItemId, to: ItemId) => {
    const neighbours = adjacency.get(from) ?? new Set<ItemId>();
    neighbours.add(to);
    adjacency.set(from, neighbours);
  };

  for (const relation of relations) {
    const isEdge =
      positive.has(relation.kind) ||
      (criteria.exactFingerprint === true && relation.distance === 0);
    if (!isEdge || negative.has(pairKey(relation))) continue;

    link(relation.a, relation.b);
    link(relation.b, relation.a);
  }

  const components: ItemId[][] = [];
  const seen = new Set<ItemId>();
  const nodes = [...adjacency.keys()].sort((x, y) => x - y);

  for (const start of nodes) {
    if (seen.has(start)) continue;

    const component: ItemId[] = [];
    const queue: ItemId[] = [start];
    seen.add(start);
    while (queue.length > 0) {
      const node = queue.shift();
      if (node === undefined) break;
      component.push(node);
      for (const next of adjacency.get(node) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          queue.push(next);
        }
      }
    }

    if (component.length > 1) {
      components.push(component.sort((x, y) => x - y));
    }
  }

  return components;
}

export class ClusterProjector {
  constructor(private storage: ClusterStorage) {}

  /**
   * @param locations source location of each item, consulted when a scope is set
   */
  async project(
    relations: readonly ProjectableRelation[],
    criteria: ProjectionCriteria = {},
    locations: ReadonlyMap<ItemId, string> = new Map(),
  ): Promise<ProjectionResult> {
    const persist = criteria.persist ?? true;
    const scope = criteria.scope ?? [];
    const inScope = (itemId: ItemId): boolean => {
      if (scope.length === 0) return true;
      const location = locations.get(itemId);
      return location !== undefined && isUnderRoot(location, scope);
    };

    const components = findComponents(
      relations.filter((relation) => inScope(relation.a) && inScope(relation.b)),
      criteria,
    );
    const memberships = await this.storage.getMemberships();
    const existing = await this.storage.listClusters();

    const views = new Map<number, Set<ItemId>>(
      existing.map((cluster) => [cluster.id, new Set<ItemId>()]),
    );
    const added = new Map<number, ItemId[]>();
    const proposals: ItemId[][] = [];
    const processed = new Set<ItemId>();

    for (const component of components) {
      const touched = new Set<number>();
      for (const itemId of component) {
        const clusterId = memberships.get(itemId);
        if (clusterId !== undefined) touched.add(clusterId);
      }

      if (touched.size === 0) {
        // Every item already passed the scope filter through its relations
        proposals.push(component);
      } else {
        const primary = Math.min(...touched);
        const unclustered = component.filter((id) => !memberships.has(id));

        if (persist && unclustered.length > 0) {
          await this.storage.addMembers(primary, unclustered);
          added.set(primary, [...(added.get(primary) ?? []), ...unclustered]);
        }

        const view = views.get(primary) ?? new Set<ItemId>();
        for (const itemId of component) view.add(itemId);
        views.set(primary, view);
      }

      for (const itemId of component) processed.add(itemId);
    }

    // Sticky members keep their cluster even when no relation reaches them now
    for (const [itemId, clusterId] of memberships) {
      if (!processed.has(itemId)) {
        views.get(clusterId)?.add(itemId);
      }
    }

    const clusters: ProjectedCluster[] = [];
    for (const cluster of existing) {
      const view = views.get(cluster.id);
      if (!view || view.size === 0) continue;
      if (![...view].every(inScope)) continue;
      clusters.push({
        clusterId: cluster.id,
        name: cluster.name,
        targetFolder: cluster.targetFolder,
        itemIds: [...view].sort((x, y) => x - y),
        addedItemIds: (added.get(cluster.id) ?? []).sort((x, y) => x - y),
      });
    }

    return { clusters, proposals };
  }

  /** Persist a proposal (or any hand-picked group) as a new cluster. */
  async createCluster(
    name: string,
    itemIds: ItemId[],
    targetFolder?: string,
  ): Promise<Cluster> {
    return this.storage.createCluster(name, itemIds, targetFolder);
  }
}
