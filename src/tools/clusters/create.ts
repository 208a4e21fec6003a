import { z } from "zod";
import type { Cluster } from "@/database/clusters";
import type { DuplicateEngine } from "@/dedup/engine";
import { ItemIdSchema } from "@/types";

export const CreateClusterInputSchema = z.object({
  name: z.string().min(1).describe("Cluster name"),
  itemIds: z.array(ItemIdSchema).min(2).describe("Items to group"),
  targetFolder: z
    .string()
    .optional()
    .describe("Folder the cluster's files should be moved to"),
});

export type CreateClusterInput = z.infer<typeof CreateClusterInputSchema>;

export async function createCluster(
  input: CreateClusterInput,
  engine: DuplicateEngine,
): Promise<Cluster> {
  return engine.createCluster(input.name, input.itemIds, input.targetFolder);
}
