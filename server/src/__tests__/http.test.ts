import type { Server } from "node:http";
import type { AddressInfo } from "node:net";

import bcrypt from "bcryptjs";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { createApp } from "../app.js";
import { loadConfig } from "../config.js";
import type { User } from "../models/User.js";
import { auditedStore, reportBody } from "./fixtures.js";

const password = "test-password";
const { base, context, store } = auditedStore();
const config = loadConfig({ DATA_STORE: "memory", JWT_SECRET: "test-secret", AGENT_API_KEY: "test-agent-key" });

let server: Server;
let baseUrl = "";
let admin: User;

function call(path: string, init: { method?: string; token?: string; body?: unknown; headers?: Record<string, string> } = {}) {
  const headers: Record<string, string> = { ...init.headers };
  if (init.body !== undefined) headers["content-type"] = "application/json";
  if (init.token) headers.authorization = `Bearer ${init.token}`;
  return fetch(`${baseUrl}${path}`, {
    method: init.method ?? "GET",
    headers,
    body: init.body === undefined ? undefined : typeof init.body === "string" ? init.body : JSON.stringify(init.body),
  });
}

async function readJson(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (typeof body !== "object" || body === null || Array.isArray(body)) throw new Error("expected a JSON object");
  return Object.fromEntries(Object.entries(body));
}

async function login(username: string): Promise<string> {
  const res = await call("/auth/login", { method: "POST", body: { username, password } });
  const { token } = await readJson(res);
  if (typeof token !== "string") throw new Error(`login failed for ${username}`);
  return token;
}

beforeAll(async () => {
  const passwordHash = bcrypt.hashSync(password, 4);
  admin = await base.users.insert({
    username: "admin",
    email: "admin@example.test",
    firstName: "",
    lastName: "",
    role: "admin",
    isActive: true,
    passwordHash,
  });
  await base.users.insert({
    username: "tecnico",
    email: "tecnico@example.test",
    firstName: "",
    lastName: "",
    role: "technician",
    isActive: true,
    passwordHash,
  });

  const app = createApp({ store, config, requestContext: context });
  await new Promise<void>((resolve) => {
    server = app.listen(0, () => resolve());
  });
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("http api", () => {
  it("reports health and echoes the request id", async () => {
    const res = await call("/health", { headers: { "x-request-id": "req-1" } });

    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("req-1");
    expect(await res.json()).toEqual({ ok: true, dataStore: "memory", dbConnected: true });
  });

  it("rejects missing tokens and bad credentials", async () => {
    const anonymous = await call("/departments");
    expect(anonymous.status).toBe(401);
    expect(await anonymous.json()).toEqual({ ok: false, error: "Unauthorized" });

    const wrong = await call("/auth/login", { method: "POST", body: { username: "admin", password: "nope" } });
    expect(wrong.status).toBe(401);
    expect(await wrong.json()).toEqual({ ok: false, error: "Invalid credentials" });
  });

  it("records the authenticated actor on writes", async () => {
    const token = await login("admin");

    const res = await call("/departments", { method: "POST", token, body: { name: " Finanzas " } });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({ ok: true, department: { name: "Finanzas" } });

    const department = await base.departments.findOne({ name: "Finanzas" });
    if (!department) throw new Error("department not stored");
    const entries = await base.auditLogs.find({ targetId: department.id });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      systemUserId: admin.id,
      actorName: "admin",
      action: "CREATE",
      targetTable: "department",
    });
  });

  it("maps role, duplicate and body errors", async () => {
    const tech = await login("tecnico");
    const forbidden = await call("/departments", { method: "POST", token: tech, body: { name: "Bodega" } });
    expect(forbidden.status).toBe(403);

    const token = await login("admin");
    await call("/departments", { method: "POST", token, body: { name: "Contabilidad" } });
    const dup = await call("/departments", { method: "POST", token, body: { name: "Contabilidad" } });
    expect(dup.status).toBe(409);
    expect(await dup.json()).toMatchObject({ ok: false, error: "Duplicate value", details: { name: "already in use" } });

    const missing = await call("/departments", { method: "POST", token, body: {} });
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ ok: false, error: "name is required" });

    const malformed = await call("/departments", { method: "POST", token, body: "{not json" });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ ok: false, error: "Invalid request body" });

    const badId = await call("/departments/nope", { token });
    expect(badId.status).toBe(400);
    expect(await badId.json()).toMatchObject({ ok: false, error: "id is invalid" });
  });

  it("ingests agent reports behind the agent key", async () => {
    const denied = await call("/agent/hardware-report", { method: "POST", body: reportBody() });
    expect(denied.status).toBe(401);

    const headers = { "x-agent-api-key": "test-agent-key" };
    const first = await call("/agent/hardware-report", { method: "POST", headers, body: reportBody() });
    expect(first.status).toBe(201);
    const created = await readJson(first);
    expect(created).toMatchObject({ ok: true, assetCreated: true, inventoryCode: "NB-0001" });

    const again = await call("/agent/hardware-report", { method: "POST", headers, body: reportBody() });
    expect(again.status).toBe(200);
    expect(await again.json()).toMatchObject({ ok: true, assetCreated: false, assetId: created.assetId });

    const invalid = await call("/agent/hardware-report", { method: "POST", headers, body: { hardware: {} } });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ ok: false, error: "Invalid hardware report" });
  });

  it("masks license keys for technicians only", async () => {
    const token = await login("admin");
    const software = await store.software.insert({ name: "Office", developer: "Microsoft" });
    const created = await call("/licenses", {
      method: "POST",
      token,
      body: { softwareId: software.id, licenseKey: "ABCDE-FGHIJ-KLMNO-12345", quantity: 2 },
    });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ license: { licenseKey: "ABCDE-FGHIJ-KLMNO-12345" } });

    const license = await base.licenses.findOne({ softwareId: software.id });
    if (!license) throw new Error("license not stored");

    const tech = await login("tecnico");
    const seen = await call(`/licenses/${license.id}`, { token: tech });
    expect(seen.status).toBe(200);
    expect(await seen.json()).toMatchObject({ license: { licenseKey: "****-****-****-2345" }, used: 0 });
  });

  it("serves filtered reports and rejects malformed filters", async () => {
    const token = await login("tecnico");

    const specs = await call("/reports/assets-specs?ramMin=8&ramMax=16&hasEmployee=false", { token });
    expect(specs.status).toBe(200);
    expect(await specs.json()).toMatchObject({ ok: true, total: 1, items: [{ inventoryCode: "NB-0001", ramGb: 16 }] });

    const summary = await call("/reports/summary", { token });
    expect(await summary.json()).toMatchObject({ ok: true, summary: { assets: { total: 1 }, hardware: { avgRamGb: 16 } } });

    const badFlag = await call("/reports/assets-specs?hasEmployee=maybe", { token });
    expect(badFlag.status).toBe(400);
    expect(await badFlag.json()).toMatchObject({ ok: false, error: "hasEmployee must be true or false" });

    const badNumber = await call("/reports/assets-specs?ramMin=lots", { token });
    expect(badNumber.status).toBe(400);
    expect(await badNumber.json()).toMatchObject({ ok: false, error: "ramMin must be a number" });
  });
});
