import { describe, expect, it } from "vitest";

import { MemoryStore } from "../store/memory.js";
import { catalogLimits, getPagination, listPage } from "../utils/pagination.js";

const limits = { defaultLimit: 2, maxLimit: 3 };

describe("getPagination", () => {
  it("falls back on malformed values and caps the limit", () => {
    expect(getPagination({}, catalogLimits)).toEqual({ page: 1, limit: 100, skip: 0 });
    expect(getPagination({ page: "3", limit: "2" }, limits)).toEqual({ page: 3, limit: 2, skip: 4 });
    expect(getPagination({ page: "0", limit: "1.5" }, limits)).toEqual({ page: 1, limit: 2, skip: 0 });
    expect(getPagination({ page: ["2"], limit: "50" }, limits)).toEqual({ page: 1, limit: 3, skip: 0 });
  });
});

describe("listPage", () => {
  it("reports whether another page follows", async () => {
    const store = new MemoryStore();
    for (const name of ["Alfa", "Bravo", "Charlie"]) {
      await store.departments.insert({ name });
    }

    const first = await listPage(store.departments, {}, {}, { name: 1 }, limits);
    expect(first.items.map((d) => d.name)).toEqual(["Alfa", "Bravo"]);
    expect(first).toMatchObject({ page: 1, limit: 2, hasMore: true });

    const last = await listPage(store.departments, { page: "2" }, {}, { name: 1 }, limits);
    expect(last.items.map((d) => d.name)).toEqual(["Charlie"]);
    expect(last.hasMore).toBe(false);

    const filtered = await listPage(store.departments, {}, { name: "Bravo" }, undefined, limits);
    expect(filtered).toEqual({ items: [expect.objectContaining({ name: "Bravo" })], page: 1, limit: 2, hasMore: false });
  });
});
