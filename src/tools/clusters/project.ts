import { z } from "zod";
import type { ProjectionResult } from "@/clusters";
import type { DuplicateEngine } from "@/dedup/engine";
import { RelationKindSchema } from "@/types";

export const ProjectClustersInputSchema = z.object({
  positiveKinds: z
    .array(RelationKindSchema)
    .optional()
    .describe("Relation kinds that link items (default: new_match, near_duplicate, similar)"),
  exactFingerprint: z
    .boolean()
    .optional()
    .describe("Also link pairs with identical fingerprints"),
  ignoreNegative: z
    .boolean()
    .optional()
    .describe("Ignore not_duplicate decisions when linking"),
  persist: z
    .boolean()
    .optional()
    .describe("Save new members of existing clusters (default: true)"),
  scope: z
    .array(z.string())
    .optional()
    .describe("Source roots clusters must lie under (default: saved scan roots)"),
});

export type ProjectClustersInput = z.infer<typeof ProjectClustersInputSchema>;

export async function projectClusters(
  input: ProjectClustersInput,
  engine: DuplicateEngine,
): Promise<ProjectionResult> {
  return engine.projectClusters(input);
}
