export {
  type AnnotatePairInput,
  AnnotatePairInputSchema,
  annotatePair,
  type ResetPairInput,
  ResetPairInputSchema,
  resetPair,
} from "./annotate";
export { type DeleteItemInput, DeleteItemInputSchema, deleteItem } from "./delete";
export {
  type FindDuplicatesInput,
  FindDuplicatesInputSchema,
  findDuplicates,
} from "./find";
export {
  type RedoAnnotationInput,
  RedoAnnotationInputSchema,
  redoAnnotation,
  type UndoAnnotationInput,
  UndoAnnotationInputSchema,
  undoAnnotation,
} from "./history";
export { type IngestItemsInput, IngestItemsInputSchema, ingestItems } from "./ingest";
export {
  type IntegrityCheckInput,
  IntegrityCheckInputSchema,
  integrityCheck,
} from "./integrity";
export {
  type SetScanRootsInput,
  SetScanRootsInputSchema,
  setScanRoots,
} from "./scan-roots";
