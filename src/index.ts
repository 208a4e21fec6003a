#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getProjectPath, loadConfig } from "./config";
import { DuplicateEngine } from "./dedup/engine";
import {
  CreateClusterInputSchema,
  createCluster,
  ProjectClustersInputSchema,
  projectClusters,
} from "./tools/clusters";
import {
  AnnotatePairInputSchema,
  annotatePair,
  DeleteItemInputSchema,
  deleteItem,
  FindDuplicatesInputSchema,
  findDuplicates,
  IngestItemsInputSchema,
  IntegrityCheckInputSchema,
  ingestItems,
  integrityCheck,
  RedoAnnotationInputSchema,
  ResetPairInputSchema,
  redoAnnotation,
  resetPair,
  SetScanRootsInputSchema,
  setScanRoots,
  UndoAnnotationInputSchema,
  undoAnnotation,
} from "./tools/ledger";
import { respond } from "./tools/respond";

// Initialize services
const projectPath = getProjectPath();
const config = loadConfig(projectPath);
const engine = await DuplicateEngine.open(config, projectPath);

const server = new McpServer({
  name: "dupe-ledger",
  version: "0.1.0",
});

// Ledger tools
server.registerTool(
  "dupe_ingest",
  {
    title: "Ingest Items",
    description:
      "Record fingerprinted items from a scan. Deleted item IDs are rejected and never reused.",
    inputSchema: IngestItemsInputSchema.shape,
  },
  async (args) => respond(() => ingestItems(args, engine)),
);

server.registerTool(
  "dupe_find_duplicates",
  {
    title: "Find Duplicates",
    description:
      "Find near-duplicate pairs within a Hamming distance. Pairs the user already decided on are hidden unless includeAnnotated is set.",
    inputSchema: FindDuplicatesInputSchema.shape,
  },
  async (args) => respond(() => findDuplicates(args, engine)),
);

server.registerTool(
  "dupe_annotate",
  {
    title: "Annotate Pair",
    description:
      "Record a decision for a discovered pair: not_duplicate, near_duplicate, similar or same_set",
    inputSchema: AnnotatePairInputSchema.shape,
  },
  async (args) => respond(() => annotatePair(args, engine)),
);

server.registerTool(
  "dupe_reset_relation",
  {
    title: "Reset Pair",
    description: "Clear a decision so the pair is reported as a new match again",
    inputSchema: ResetPairInputSchema.shape,
  },
  async (args) => respond(() => resetPair(args, engine)),
);

server.registerTool(
  "dupe_undo_annotation",
  {
    title: "Undo Annotation",
    description: "Restore the kind that the most recent annotation or reset replaced",
    inputSchema: UndoAnnotationInputSchema.shape,
  },
  async (args) => respond(() => undoAnnotation(args, engine)),
);

server.registerTool(
  "dupe_redo_annotation",
  {
    title: "Redo Annotation",
    description: "Re-apply the most recently undone annotation",
    inputSchema: RedoAnnotationInputSchema.shape,
  },
  async (args) => respond(() => redoAnnotation(args, engine)),
);

server.registerTool(
  "dupe_delete_item",
  {
    title: "Delete Item",
    description: "Delete an item together with every relation that references it",
    inputSchema: DeleteItemInputSchema.shape,
  },
  async (args) => respond(() => deleteItem(args, engine)),
);

server.registerTool(
  "dupe_integrity_check",
  {
    title: "Integrity Check",
    description:
      "Remove relations that reference deleted items and report how many were found",
    inputSchema: IntegrityCheckInputSchema.shape,
  },
  async (args) => respond(() => integrityCheck(args, engine)),
);

server.registerTool(
  "dupe_set_scan_roots",
  {
    title: "Set Scan Roots",
    description: "Set the directories that scans are restricted to by default",
    inputSchema: SetScanRootsInputSchema.shape,
  },
  async (args) => respond(() => setScanRoots(args, engine)),
);

// Cluster tools
server.registerTool(
  "dupe_project_clusters",
  {
    title: "Project Clusters",
    description:
      "Group related items into clusters. Existing clusters keep their members and absorb new matches.",
    inputSchema: ProjectClustersInputSchema.shape,
  },
  async (args) => respond(() => projectClusters(args, engine)),
);

server.registerTool(
  "dupe_create_cluster",
  {
    title: "Create Cluster",
    description: "Save a proposed group of items as a named cluster",
    inputSchema: CreateClusterInputSchema.shape,
  },
  async (args) => respond(() => createCluster(args, engine)),
);

// Start server
const transport = new StdioServerTransport();
await server.connect(transport);
console.error("[dupe-ledger] MCP server started");

const shutdown = () => {
  engine.close();
  process.exit(0);
};
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
