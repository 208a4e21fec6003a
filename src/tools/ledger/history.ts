import { z } from "zod";
import type { DuplicateEngine } from "@/dedup/engine";
import type { Relation } from "@/types";

export const UndoAnnotationInputSchema = z.object({});

export type UndoAnnotationInput = z.infer<typeof UndoAnnotationInputSchema>;

/**
 * Restore the kind the most recent annotation replaced
 */
export async function undoAnnotation(
  _input: UndoAnnotationInput,
  engine: DuplicateEngine,
): Promise<Relation> {
  return engine.undoAnnotation();
}

export const RedoAnnotationInputSchema = z.object({});

export type RedoAnnotationInput = z.infer<typeof RedoAnnotationInputSchema>;

export async function redoAnnotation(
  _input: RedoAnnotationInput,
  engine: DuplicateEngine,
): Promise<Relation> {
  return engine.redoAnnotation();
}
