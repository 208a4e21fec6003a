export {
  ClusterProjector,
  DEFAULT_POSITIVE_KINDS,
  findComponents,
  type ProjectableRelation,
  type ProjectedCluster,
  type ProjectionCriteria,
  type ProjectionResult,
} from "./projector";
