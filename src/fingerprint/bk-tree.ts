/**
 * Burkhard-Keller tree over Hamming space.
 *
 * Each node holds one distinct fingerprint; the edge to a child is labelled
 * with the exact distance between them. Queries prune with the triangle
 * inequality: only children whose label c satisfies |c - d0| <= radius can
 * hold a match.
 */

import { type Fingerprint, hammingDistance } from "./fingerprint";

interface BKNode<T> {
  fingerprint: Fingerprint;
  value: T;
  children: Map<number, BKNode<T>>;
}

export interface BKMatch<T> {
  fingerprint: Fingerprint;
  value: T;
  distance: number;
}

export class BKTree<T> {
  private root: BKNode<T> | null = null;
  private count = 0;

  get size(): number {
    return this.count;
  }

  /**
   * Insert a fingerprint. A fingerprint already in the tree (distance 0 from
   * an existing node) is not inserted again; the existing node is returned.
   */
  add(fingerprint: Fingerprint, value: T): T {
    if (!this.root) {
      this.root = { fingerprint, value, children: new Map() };
      this.count++;
      return value;
    }

    let node = this.root;
    for (;;) {
      const distance = hammingDistance(node.fingerprint, fingerprint);
      if (distance === 0) {
        return node.value;
      }

      const child = node.children.get(distance);
      if (!child) {
        node.children.set(distance, { fingerprint, value, children: new Map() });
        this.count++;
        return value;
      }
      node = child;
    }
  }

  /**
   * All entries within `radius` of `target`. Iterative, so deep trees built
   * from clustered codes cannot overflow the call stack.
   */
  *search(target: Fingerprint, radius: number): Generator<BKMatch<T>> {
    if (!this.root || radius < 0) return;

    const stack: BKNode<T>[] = [this.root];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      const distance = hammingDistance(node.fingerprint, target);
      if (distance <= radius) {
        yield { fingerprint: node.fingerprint, value: node.value, distance };
      }

      const low = distance - radius;
      const high = distance + radius;
      for (const [edge, child] of node.children) {
        if (edge >= low && edge <= high) {
          stack.push(child);
        }
      }
    }
  }
}
