import { describe, expect, it } from "vitest";

import { MemoryStore } from "../store/memory.js";
import { DuplicateKeyError } from "../utils/errors.js";
import { assetData, detailData } from "./fixtures.js";

function gate() {
  let open: () => void = () => undefined;
  const wait = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { open: () => open(), wait };
}

describe("MemoryStore", () => {
  it("enforces unique keys, skipping empty values", async () => {
    const store = new MemoryStore();
    const a = await store.assets.insert(assetData());

    const dup = store.assets.insert(assetData({ inventoryCode: "PC-0002" }));
    await expect(dup).rejects.toBeInstanceOf(DuplicateKeyError);
    await expect(dup).rejects.toMatchObject({ collection: "assets", fields: ["serialNumber"] });

    const b = await store.assets.insert(assetData({ inventoryCode: "PC-0002", serialNumber: "SN-0002" }));
    await store.computerDetails.insert(detailData(a.id, { uniqueIdentifier: "" }));
    await store.computerDetails.insert(detailData(b.id, { uniqueIdentifier: "" }));
    expect(await store.computerDetails.count()).toBe(2);

    await expect(store.assets.update(b.id, { inventoryCode: "PC-0001" })).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it("hands out copies", async () => {
    const store = new MemoryStore();
    const dept = await store.departments.insert({ name: "TI" });
    dept.name = "changed";

    expect((await store.departments.findById(dept.id))?.name).toBe("TI");
  });

  it("filters by value or list, sorts and pages", async () => {
    const store = new MemoryStore();
    for (const name of ["Delta", "Alfa", "Charlie", "Bravo"]) {
      await store.departments.insert({ name });
    }

    const page = await store.departments.find({}, { sort: { name: 1 }, skip: 1, limit: 2 });
    expect(page.map((d) => d.name)).toEqual(["Bravo", "Charlie"]);

    const some = await store.departments.find({ name: ["Alfa", "Delta"] }, { sort: { name: -1 } });
    expect(some.map((d) => d.name)).toEqual(["Delta", "Alfa"]);
    expect(await store.departments.count({ name: "Bravo" })).toBe(1);
    expect(await store.departments.deleteMany({ name: ["Alfa", "Bravo"] })).toBe(2);
  });

  it("rolls back every collection and counter on failure", async () => {
    const store = new MemoryStore();
    await store.departments.insert({ name: "Antes" });
    expect(await store.nextSequence("k", 0)).toBe(1);

    await expect(
      store.withTransaction(async (tx) => {
        await tx.departments.insert({ name: "Durante" });
        await tx.assets.insert(assetData());
        expect(await tx.nextSequence("k", 0)).toBe(2);
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect((await store.departments.find()).map((d) => d.name)).toEqual(["Antes"]);
    expect(await store.assets.count()).toBe(0);
    expect(await store.nextSequence("k", 0)).toBe(2);
  });

  it("joins the enclosing transaction when nested", async () => {
    const store = new MemoryStore();

    await expect(
      store.withTransaction(async (tx) => {
        await tx.withTransaction(async (inner) => {
          await inner.departments.insert({ name: "Anidado" });
        });
        throw new Error("abort");
      })
    ).rejects.toThrow("abort");

    expect(await store.departments.count()).toBe(0);
  });

  it("runs transactions one at a time", async () => {
    const store = new MemoryStore();
    const events: string[] = [];
    const tick = () => new Promise((resolve) => setTimeout(resolve, 5));

    await Promise.all([
      store.withTransaction(async () => {
        events.push("a:start");
        await tick();
        events.push("a:end");
      }),
      store.withTransaction(async () => {
        events.push("b:start");
        events.push("b:end");
      }),
    ]);

    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps concurrent writes when an open transaction rolls back", async () => {
    const store = new MemoryStore();
    const inserted = gate();
    const release = gate();

    const failing = store.withTransaction(async (tx) => {
      await tx.departments.insert({ name: "Temporal" });
      inserted.open();
      await release.wait;
      throw new Error("abort");
    });

    await inserted.wait;
    expect(await store.departments.find()).toEqual([]);

    const plainDepartment = store.departments.insert({ name: "Concurrente" });
    const plainAudit = store.auditLogs.insert({
      systemUserId: null,
      actorName: "admin",
      action: "CREATE",
      targetTable: "department",
      targetId: "64b0000000000000000000aa",
      details: {},
    });

    release.open();
    await expect(failing).rejects.toThrow("abort");
    await Promise.all([plainDepartment, plainAudit]);

    expect((await store.departments.find()).map((d) => d.name)).toEqual(["Concurrente"]);
    expect(await store.auditLogs.count()).toBe(1);
  });

  it("shows transaction writes to others only after commit", async () => {
    const store = new MemoryStore();
    const inserted = gate();
    const release = gate();
    let seenInside = 0;

    const committing = store.withTransaction(async (tx) => {
      await tx.departments.insert({ name: "Nuevo" });
      seenInside = await tx.departments.count();
      inserted.open();
      await release.wait;
    });

    await inserted.wait;
    expect(seenInside).toBe(1);
    expect(await store.departments.count()).toBe(0);

    release.open();
    await committing;
    expect((await store.departments.find()).map((d) => d.name)).toEqual(["Nuevo"]);
  });

  it("never allocates a sequence at or below the floor", async () => {
    const store = new MemoryStore();
    expect(await store.nextSequence("inventory:PC-", 7)).toBe(8);
    expect(await store.nextSequence("inventory:PC-", 3)).toBe(9);
  });
});
