import type Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { ItemStorage } from "@/database/items";
import { RelationStore } from "@/database/relation-store";
import { createTestDb, TEST_RETRY } from "../fixtures/ledger";

describe("ItemStorage", () => {
  let db: Database.Database;
  let items: ItemStorage;

  beforeEach(async () => {
    db = await createTestDb();
    items = new ItemStorage(db);
  });

  afterEach(() => {
    db.close();
  });

  test("inserts, refreshes and skips unchanged items", async () => {
    const first = await items.upsertMany([
      { id: 1, fingerprint: "00ff", sourceLocation: "/photos/a.jpg" },
      { id: 2, fingerprint: "0f0f", sourceLocation: "/photos/b.jpg" },
    ]);
    expect(first.map((r) => r.outcome)).toEqual(["inserted", "inserted"]);

    const second = await items.upsertMany([
      { id: 1, fingerprint: "00ff", sourceLocation: "/photos/a.jpg" },
      { id: 2, fingerprint: "0f0f", sourceLocation: "/archive/b.jpg" },
      { id: 3, fingerprint: "ffff", sourceLocation: "/photos/c.jpg" },
    ]);
    expect(second).toEqual([
      { id: 1, outcome: "unchanged", fingerprintChanged: false },
      { id: 2, outcome: "updated", fingerprintChanged: false },
      { id: 3, outcome: "inserted", fingerprintChanged: false },
    ]);

    const third = await items.upsertMany([
      { id: 1, fingerprint: "0000", sourceLocation: "/photos/a.jpg" },
    ]);
    expect(third).toEqual([{ id: 1, outcome: "updated", fingerprintChanged: true }]);
    expect((await items.getItem(1))?.fingerprint).toBe("0000");
    expect(await items.count()).toBe(3);
  });

  test("never revives a deleted id", async () => {
    await items.upsertMany([{ id: 7, fingerprint: "00ff", sourceLocation: "/photos/a.jpg" }]);
    await new RelationStore(db, { retry: TEST_RETRY }).deleteItem(7);

    const result = await items.upsertMany([
      { id: 7, fingerprint: "00ff", sourceLocation: "/photos/a.jpg" },
    ]);

    expect(result).toEqual([{ id: 7, outcome: "tombstoned", fingerprintChanged: false }]);
    expect(await items.getItem(7)).toBeNull();
  });

  test("lists items under the given roots", async () => {
    await items.upsertMany([
      { id: 1, fingerprint: "00ff", sourceLocation: "/photos/2024/a.jpg" },
      { id: 2, fingerprint: "00ff", sourceLocation: "/scans/b.jpg" },
      { id: 3, fingerprint: "00ff", sourceLocation: "/photos-old/c.jpg" },
    ]);

    expect((await items.listItems()).map((i) => i.id)).toEqual([1, 2, 3]);
    expect((await items.listItems(["/photos"])).map((i) => i.id)).toEqual([1]);
    expect((await items.listItems(["/photos", "/scans"])).map((i) => i.id)).toEqual([1, 2]);
  });

  test("liveIds returns the live subset", async () => {
    await items.upsertMany([
      { id: 1, fingerprint: "00ff", sourceLocation: "/a" },
      { id: 2, fingerprint: "00ff", sourceLocation: "/b" },
    ]);
    expect([...(await items.liveIds([2, 5, 1, 2]))].sort()).toEqual([1, 2]);
    expect(await items.liveIds([])).toEqual(new Set());
  });

  test("scan roots are replaced as a whole", async () => {
    expect(await items.setScanRoots(["/scans", " /photos ", "/scans", ""])).toEqual([
      "/photos",
      "/scans",
    ]);
    expect(await items.getScanRoots()).toEqual(["/photos", "/scans"]);

    await items.setScanRoots([]);
    expect(await items.getScanRoots()).toEqual([]);
  });
});
