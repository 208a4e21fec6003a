import { z } from "zod";
import type { DuplicateEngine } from "@/dedup/engine";

export const SetScanRootsInputSchema = z.object({
  roots: z
    .array(z.string())
    .describe("Directories scanned by default; an empty list clears the scope"),
});

export type SetScanRootsInput = z.infer<typeof SetScanRootsInputSchema>;

export async function setScanRoots(
  input: SetScanRootsInput,
  engine: DuplicateEngine,
): Promise<{ roots: string[] }> {
  return { roots: await engine.setScanRoots(input.roots) };
}
