import { z } from "zod";
import type { DeleteResult, DuplicateEngine } from "@/dedup/engine";
import { ItemIdSchema } from "@/types";

export const DeleteItemInputSchema = z.object({
  itemId: ItemIdSchema.describe("Item ID to delete"),
});

export type DeleteItemInput = z.infer<typeof DeleteItemInputSchema>;

export async function deleteItem(
  input: DeleteItemInput,
  engine: DuplicateEngine,
): Promise<DeleteResult> {
  return engine.itemDeleted(input.itemId);
}
