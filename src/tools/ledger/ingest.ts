import { z } from "zod";
import type { DuplicateEngine, IngestResult } from "@/dedup/engine";
import { ScannedItemSchema } from "@/types";

export const IngestItemsInputSchema = z.object({
  items: z
    .array(ScannedItemSchema)
    .min(1)
    .describe("Scanned items: id, hex fingerprint and source location"),
});

export type IngestItemsInput = z.infer<typeof IngestItemsInputSchema>;

export async function ingestItems(
  input: IngestItemsInput,
  engine: DuplicateEngine,
): Promise<IngestResult> {
  return engine.ingest(input.items);
}
