import { z } from "zod";
import type { DuplicateEngine } from "@/dedup/engine";
import { AnnotatedKindSchema, ItemIdSchema, type Relation } from "@/types";

export const AnnotatePairInputSchema = z.object({
  a: ItemIdSchema.describe("First item ID"),
  b: ItemIdSchema.describe("Second item ID"),
  kind: AnnotatedKindSchema.describe("Decision for the pair"),
});

export type AnnotatePairInput = z.infer<typeof AnnotatePairInputSchema>;

export async function annotatePair(
  input: AnnotatePairInput,
  engine: DuplicateEngine,
): Promise<Relation> {
  return engine.annotate({ a: input.a, b: input.b }, input.kind);
}

export const ResetPairInputSchema = z.object({
  a: ItemIdSchema.describe("First item ID"),
  b: ItemIdSchema.describe("Second item ID"),
});

export type ResetPairInput = z.infer<typeof ResetPairInputSchema>;

/**
 * Return an annotated pair to new_match so later scans surface it again
 */
export async function resetPair(
  input: ResetPairInput,
  engine: DuplicateEngine,
): Promise<Relation> {
  return engine.resetToNew({ a: input.a, b: input.b });
}
