import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { RelationStore } from "@/database/relation-store";
import {
  ConstraintViolationError,
  InvalidTransitionError,
  NotFoundError,
} from "@/utils/errors";
import { createTestDb, insertItems, TEST_RETRY } from "../fixtures/ledger";

const busy = () => new Database.SqliteError("database is locked", "SQLITE_BUSY");

describe("RelationStore", () => {
  let db: Database.Database;
  let store: RelationStore;

  beforeEach(async () => {
    db = await createTestDb();
    insertItems(db, [1, 2, 3, 4]);
    store = new RelationStore(db, { retry: TEST_RETRY });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
  });

  describe("upsertIfAbsent", () => {
    test("creates a new_match row once", async () => {
      expect(await store.upsertIfAbsent({ a: 1, b: 2 }, 3)).toBe(true);
      expect(await store.upsertIfAbsent({ a: 1, b: 2 }, 5)).toBe(false);

      const relation = await store.getRelation({ a: 1, b: 2 });
      expect(relation?.kind).toBe("new_match");
      expect(relation?.distance).toBe(3);
    });

    test("never overwrites an annotated kind", async () => {
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
      await store.setKind({ a: 1, b: 2 }, "not_duplicate");

      expect(await store.upsertIfAbsent({ a: 1, b: 2 }, 0)).toBe(false);
      expect(await store.getKind({ a: 1, b: 2 })).toBe("not_duplicate");
    });

    test("rejects non-canonical pairs and unknown items", async () => {
      await expect(store.upsertIfAbsent({ a: 2, b: 1 }, 3)).rejects.toBeInstanceOf(
        ConstraintViolationError,
      );
      await expect(store.upsertIfAbsent({ a: 1, b: 99 }, 3)).rejects.toBeInstanceOf(
        ConstraintViolationError,
      );
      await expect(store.upsertIfAbsent({ a: 1, b: 2 }, -1)).rejects.toBeInstanceOf(
        ConstraintViolationError,
      );
    });
  });

  describe("upsertManyIfAbsent", () => {
    test("writes valid entries and reports the rest", async () => {
      await store.upsertIfAbsent({ a: 1, b: 3 }, 4);

      const result = await store.upsertManyIfAbsent([
        { pair: { a: 1, b: 2 }, distance: 2 },
        { pair: { a: 1, b: 3 }, distance: 1 },
        { pair: { a: 2, b: 99 }, distance: 1 },
        { pair: { a: 3, b: 2 }, distance: 1 },
      ]);

      expect(result.inserted.map((e) => e.pair)).toEqual([{ a: 1, b: 2 }]);
      expect(result.existing.map((e) => e.pair)).toEqual([{ a: 1, b: 3 }]);
      expect(
        result.failed.map((f) => [f.entry.pair, f.reason, f.message]),
      ).toEqual([
        [{ a: 3, b: 2 }, "constraint_violation", "Pair 3:2 is not canonical (expected a < b)"],
        [{ a: 2, b: 99 }, "constraint_violation", "Item 99 is not live"],
      ]);
      expect((await store.getRelation({ a: 1, b: 3 }))?.distance).toBe(4);
    });

    test("retries a transient failure and then succeeds", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.spyOn(db, "prepare").mockImplementationOnce(() => {
        throw busy();
      });

      const result = await store.upsertManyIfAbsent([{ pair: { a: 1, b: 2 }, distance: 2 }]);

      expect(result.inserted).toHaveLength(1);
      expect(result.failed).toEqual([]);
    });

    test("reports every entry when the batch cannot commit", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => {});
      vi.spyOn(console, "error").mockImplementation(() => {});
      const spy = vi.spyOn(db, "prepare").mockImplementation(() => {
        throw busy();
      });

      const result = await store.upsertManyIfAbsent([
        { pair: { a: 1, b: 2 }, distance: 2 },
        { pair: { a: 3, b: 4 }, distance: 5 },
      ]);
      spy.mockRestore();

      expect(result.inserted).toEqual([]);
      expect(result.failed.map((f) => f.reason)).toEqual([
        "transient_storage",
        "transient_storage",
      ]);
      expect(await store.listRelations()).toEqual([]);
    });

    test("returns an empty result for an empty batch", async () => {
      expect(await store.upsertManyIfAbsent([])).toEqual({
        inserted: [],
        existing: [],
        failed: [],
      });
    });
  });

  describe("setKind and resetKind", () => {
    beforeEach(async () => {
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
    });

    test("annotates and re-annotates without touching the distance", async () => {
      const similar = await store.setKind({ a: 1, b: 2 }, "similar");
      expect(similar.kind).toBe("similar");
      expect(similar.distance).toBe(3);

      const sameSet = await store.setKind({ a: 1, b: 2 }, "same_set");
      expect(sameSet.kind).toBe("same_set");
    });

    test("refuses new_match as an annotation", async () => {
      await expect(store.setKind({ a: 1, b: 2 }, "new_match")).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    });

    test("fails for a pair with no row", async () => {
      await expect(store.setKind({ a: 3, b: 4 }, "similar")).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });

    test("reset moves an annotated pair back to new_match", async () => {
      await store.setKind({ a: 1, b: 2 }, "similar");
      const reset = await store.resetKind({ a: 1, b: 2 });
      expect(reset.kind).toBe("new_match");
    });

    test("reset is refused when the policy disallows it", async () => {
      const strict = new RelationStore(db, { retry: TEST_RETRY, allowReset: false });
      await expect(strict.resetKind({ a: 1, b: 2 })).rejects.toBeInstanceOf(
        InvalidTransitionError,
      );
    });
  });

  describe("annotation history", () => {
    beforeEach(async () => {
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
    });

    test("undo restores the kind an annotation replaced and redo re-applies it", async () => {
      await store.setKind({ a: 1, b: 2 }, "similar");
      await store.setKind({ a: 1, b: 2 }, "not_duplicate");

      expect((await store.undoAnnotation()).kind).toBe("similar");
      expect((await store.redoAnnotation()).kind).toBe("not_duplicate");

      await store.undoAnnotation();
      const restored = await store.undoAnnotation();
      expect(restored.kind).toBe("new_match");
      expect(restored.distance).toBe(3);

      await expect(store.undoAnnotation()).rejects.toBeInstanceOf(NotFoundError);
    });

    test("a new annotation discards what could be redone", async () => {
      await store.setKind({ a: 1, b: 2 }, "similar");
      await store.undoAnnotation();
      await store.setKind({ a: 1, b: 2 }, "same_set");

      await expect(store.redoAnnotation()).rejects.toBeInstanceOf(NotFoundError);
      expect(await store.getKind({ a: 1, b: 2 })).toBe("same_set");
    });

    test("re-annotating with the same kind records nothing", async () => {
      await store.setKind({ a: 1, b: 2 }, "similar");
      await store.setKind({ a: 1, b: 2 }, "similar");

      expect((await store.undoAnnotation()).kind).toBe("new_match");
      await expect(store.undoAnnotation()).rejects.toBeInstanceOf(NotFoundError);
    });

    test("keeps at most historyLimit changes", async () => {
      const short = new RelationStore(db, { retry: TEST_RETRY, historyLimit: 1 });
      await short.setKind({ a: 1, b: 2 }, "similar");
      await short.setKind({ a: 1, b: 2 }, "same_set");

      expect((await short.undoAnnotation()).kind).toBe("similar");
      await expect(short.undoAnnotation()).rejects.toBeInstanceOf(NotFoundError);
    });

    test("undo back to new_match honours allowReset", async () => {
      const strict = new RelationStore(db, { retry: TEST_RETRY, allowReset: false });
      await strict.setKind({ a: 1, b: 2 }, "similar");

      await expect(strict.undoAnnotation()).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(await strict.getKind({ a: 1, b: 2 })).toBe("similar");
    });

    test("history goes with a deleted item", async () => {
      await store.setKind({ a: 1, b: 2 }, "similar");
      await store.deleteItem(2);

      await expect(store.undoAnnotation()).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("reads", () => {
    beforeEach(async () => {
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
      await store.upsertIfAbsent({ a: 2, b: 3 }, 1);
      await store.upsertIfAbsent({ a: 3, b: 4 }, 0);
      await store.setKind({ a: 2, b: 3 }, "near_duplicate");
    });

    test("getKinds returns stored kinds keyed by pair", async () => {
      const kinds = await store.getKinds([
        { a: 1, b: 2 },
        { a: 2, b: 3 },
        { a: 1, b: 4 },
      ]);
      expect([...kinds.entries()].sort()).toEqual([
        ["1:2", "new_match"],
        ["2:3", "near_duplicate"],
      ]);
    });

    test("getKind is null for an absent pair", async () => {
      expect(await store.getKind({ a: 1, b: 4 })).toBeNull();
    });

    test("listRelations filters by kind and item", async () => {
      const newMatches = await store.listRelations({ kind: "new_match" });
      expect(newMatches.map((r) => [r.a, r.b])).toEqual([
        [1, 2],
        [3, 4],
      ]);

      const forItem3 = await store.listRelations({ itemId: 3 });
      expect(forItem3.map((r) => [r.a, r.b])).toEqual([
        [2, 3],
        [3, 4],
      ]);

      expect(await store.listRelations({ limit: 1 })).toHaveLength(1);
    });

    test("countByKind covers every kind", async () => {
      expect(await store.countByKind()).toEqual({
        new_match: 2,
        not_duplicate: 0,
        near_duplicate: 1,
        similar: 0,
        same_set: 0,
      });
    });
  });

  describe("deleteItem", () => {
    test("removes the item, its relations and records a tombstone", async () => {
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
      await store.upsertIfAbsent({ a: 2, b: 3 }, 1);
      await store.upsertIfAbsent({ a: 3, b: 4 }, 1);

      expect(await store.deleteItem(2)).toBe(2);

      expect((await store.listRelations()).map((r) => [r.a, r.b])).toEqual([[3, 4]]);
      expect(db.prepare("SELECT id FROM item_tombstones").all()).toEqual([{ id: 2 }]);
      expect(await store.countOrphans()).toBe(0);
    });

    test("fails for an item that is not live", async () => {
      await expect(store.deleteItem(42)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("sweepOrphans", () => {
    test("removes relations left behind by a write that bypassed the cascade", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      await store.upsertIfAbsent({ a: 1, b: 2 }, 3);
      await store.upsertIfAbsent({ a: 3, b: 4 }, 3);

      db.pragma("foreign_keys = OFF");
      db.prepare("DELETE FROM items WHERE id = 2").run();
      db.pragma("foreign_keys = ON");

      expect(await store.countOrphans()).toBe(1);
      expect(await store.sweepOrphans()).toEqual({
        orphanCount: 1,
        samples: [{ a: 1, b: 2 }],
      });
      expect(error).toHaveBeenCalledTimes(1);
      expect(await store.sweepOrphans()).toEqual({ orphanCount: 0, samples: [] });
    });
  });
});
