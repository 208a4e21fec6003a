import { z } from "zod";
import type { DuplicateEngine, FindDuplicatesResult } from "@/dedup/engine";

export const FindDuplicatesInputSchema = z.object({
  threshold: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Maximum Hamming distance (default: scan.threshold)"),
  scope: z
    .array(z.string())
    .optional()
    .describe("Source roots to restrict the scan to (default: saved scan roots)"),
  includeAnnotated: z
    .boolean()
    .optional()
    .describe("Also return pairs the user already annotated"),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Stop generating candidates after this many milliseconds"),
});

export type FindDuplicatesInput = z.infer<typeof FindDuplicatesInputSchema>;

export async function findDuplicates(
  input: FindDuplicatesInput,
  engine: DuplicateEngine,
): Promise<FindDuplicatesResult> {
  return engine.findDuplicates({
    threshold: input.threshold,
    scope: input.scope,
    includeAnnotated: input.includeAnnotated,
    signal:
      input.timeoutMs !== undefined
        ? AbortSignal.timeout(input.timeoutMs)
        : undefined,
  });
}
