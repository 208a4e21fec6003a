import { normalize, sep } from "node:path";
import type { ItemId, Pair } from "@/types";
import { ConstraintViolationError } from "./errors";

/**
 * Order two item ids as a canonical pair (smaller first).
 *
 * @throws {ConstraintViolationError} for a self-pair
 */
export function canonicalPair(x: ItemId, y: ItemId): Pair {
  if (x === y) {
    throw new ConstraintViolationError(`Item ${x} cannot be paired with itself`);
  }
  return x < y ? { a: x, b: y } : { a: y, b: x };
}

export function pairKey(pair: Pair): string {
  return `${pair.a}:${pair.b}`;
}

/**
 * Whether a source location sits at or below one of the given roots.
 * An empty root list means "no restriction".
 */
export function isUnderRoot(location: string, roots: readonly string[]): boolean {
  if (roots.length === 0) return true;

  const path = normalize(location);
  return roots.some((root) => {
    const base = normalize(root).replace(/[\\/]+$/, "");
    return path === base || path.startsWith(base + sep);
  });
}
