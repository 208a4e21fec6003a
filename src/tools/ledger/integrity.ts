import { z } from "zod";
import type { DuplicateEngine, IntegrityReport } from "@/dedup/engine";

export const IntegrityCheckInputSchema = z.object({
  strict: z
    .boolean()
    .optional()
    .describe("Fail the call when orphaned relations are found"),
});

export type IntegrityCheckInput = z.infer<typeof IntegrityCheckInputSchema>;

export async function integrityCheck(
  input: IntegrityCheckInput,
  engine: DuplicateEngine,
): Promise<IntegrityReport> {
  return engine.integrityCheck({ strict: input.strict });
}
