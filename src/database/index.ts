export { type Cluster, ClusterStorage } from "./clusters";
export {
  ItemStorage,
  type ItemWrite,
  type ItemWriteOutcome,
  type ItemWriteResult,
} from "./items";
export {
  type BatchUpsertResult,
  type OrphanReport,
  type RelationEntry,
  type RelationFilter,
  RelationStore,
  type RelationStoreOptions,
  type UpsertFailure,
  type UpsertFailureReason,
} from "./relation-store";
export { foreignKeysEnabled, openLedgerDatabase } from "./sqlite";
