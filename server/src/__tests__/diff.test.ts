import { describe, expect, it } from "vitest";

import { canonical, diffEntities, hasChanges } from "../audit/diff.js";

describe("canonical", () => {
  it("keeps null and serializes the rest as strings", () => {
    expect(canonical(null)).toBeNull();
    expect(canonical(undefined)).toBeNull();
    expect(canonical(8)).toBe("8");
    expect(canonical(false)).toBe("false");
    expect(canonical(new Date("2024-03-01T12:00:00.000Z"))).toBe("2024-03-01T12:00:00.000Z");
    expect(canonical({ b: 1, a: [2, { d: 3, c: 4 }] })).toBe('{"a":[2,{"c":4,"d":3}],"b":1}');
  });
});

describe("diffEntities", () => {
  const fields = ["name", "ramGb", "purchased", "evidence"];

  it("returns old and new canonical values for changed fields", () => {
    const changes = diffEntities(
      { name: "PC-1", ramGb: 8, purchased: null, evidence: null },
      { name: "PC-1", ramGb: 16, purchased: new Date("2024-01-02T00:00:00.000Z"), evidence: null },
      { fields }
    );
    expect(changes).toEqual({
      ramGb: { old: "8", new: "16" },
      purchased: { old: null, new: "2024-01-02T00:00:00.000Z" },
    });
  });

  it("treats objects with reordered keys as equal", () => {
    const changes = diffEntities(
      { evidence: { path: "C:/x.exe", reason: "crack" } },
      { evidence: { reason: "crack", path: "C:/x.exe" } },
      { fields: ["evidence"] }
    );
    expect(hasChanges(changes)).toBe(false);
  });

  it("treats equal dates in different instances as equal", () => {
    const changes = diffEntities(
      { purchased: new Date("2024-01-02T00:00:00.000Z") },
      { purchased: new Date("2024-01-02T00:00:00.000Z") },
      { fields: ["purchased"] }
    );
    expect(changes).toEqual({});
  });

  it("is empty without a previous snapshot", () => {
    expect(diffEntities(null, { name: "x" }, { fields: ["name"] })).toEqual({});
  });

  it("never reports generated or sensitive fields", () => {
    const changes = diffEntities(
      { id: "1", updatedAt: new Date(0), passwordHash: "a", licenseKey: "k1", username: "ana" },
      { id: "2", updatedAt: new Date(1), passwordHash: "b", licenseKey: "k2", username: "ana.p" },
      { fields: ["id", "updatedAt", "passwordHash", "licenseKey", "username"] }
    );
    expect(changes).toEqual({ username: { old: "ana", new: "ana.p" } });
  });

  it("applies per-entity redaction", () => {
    const changes = diffEntities({ token: "a", name: "x" }, { token: "b", name: "x" }, { fields: ["token", "name"], redact: ["token"] });
    expect(changes).toEqual({});
  });
});
