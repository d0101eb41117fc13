import express from "express";

import type { AppContext } from "../context.js";
import { createRequireAuth, requireRole } from "../middleware/auth.js";
import { assetStatuses, assetTypes, type AssetData } from "../models/Asset.js";
import { getRules } from "../services/rules.js";
import { evaluateAsset, loadHardware } from "../services/obsolescence.js";
import type { Repositories } from "../store/types.js";
import { NotFoundError } from "../utils/errors.js";
import { catalogLimits, listPage } from "../utils/pagination.js";
import {
  asBody,
  asDateFromString,
  asEnum,
  asObjectId,
  asString,
  check,
  idParam,
  queryString,
} from "../utils/validate.js";

async function assertOwners(store: Repositories, patch: Partial<AssetData>): Promise<void> {
  if (patch.employeeId && !(await store.employees.findById(patch.employeeId))) {
    throw new NotFoundError("Employee not found");
  }
  if (patch.departmentId && !(await store.departments.findById(patch.departmentId))) {
    throw new NotFoundError("Department not found");
  }
}

function ownerRefs(body: Record<string, unknown>): Partial<AssetData> {
  const refs: Partial<AssetData> = {};
  if (body.employeeId !== undefined) {
    refs.employeeId = check(asObjectId(body.employeeId, { field: "employeeId" })) ?? null;
  }
  if (body.departmentId !== undefined) {
    refs.departmentId = check(asObjectId(body.departmentId, { field: "departmentId" })) ?? null;
  }
  return refs;
}

export function createAssetsRouter(ctx: AppContext) {
  const router = express.Router();

  router.use(createRequireAuth(ctx));

  router.get("/", async (req, res) => {
    const filter = {
      assetType: check(asEnum(queryString(req.query.assetType), assetTypes, { field: "assetType" })),
      status: check(asEnum(queryString(req.query.status), assetStatuses, { field: "status" })),
      departmentId: check(asObjectId(queryString(req.query.departmentId), { field: "departmentId" })),
      employeeId: check(asObjectId(queryString(req.query.employeeId), { field: "employeeId" })),
    };
    const result = await listPage(ctx.store.assets, req.query, filter, { inventoryCode: 1 }, catalogLimits);
    res.json({ ok: true, ...result });
  });

  router.post("/", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const refs = ownerRefs(body);
    await assertOwners(ctx.store, refs);

    const asset = await ctx.store.assets.insert({
      inventoryCode: check(asString(body.inventoryCode, { field: "inventoryCode", required: true, trim: true, maxLen: 50 })),
      serialNumber: check(asString(body.serialNumber, { field: "serialNumber", required: true, trim: true, maxLen: 100 })),
      assetType: check(asEnum(body.assetType, assetTypes, { field: "assetType", required: true })),
      status: check(asEnum(body.status, assetStatuses, { field: "status" })) ?? "IN_STORAGE",
      brand: check(asString(body.brand, { field: "brand", trim: true, maxLen: 100 })) ?? "",
      model: check(asString(body.model, { field: "model", trim: true, maxLen: 100 })) ?? "",
      acquisitionDate: check(asDateFromString(body.acquisitionDate, { field: "acquisitionDate" })) ?? null,
      employeeId: refs.employeeId ?? null,
      departmentId: refs.departmentId ?? null,
    });
    res.status(201).json({ ok: true, asset });
  });

  router.get("/:id", async (req, res) => {
    const asset = await ctx.store.assets.findById(idParam(req.params.id));
    if (!asset) throw new NotFoundError("Asset not found");

    const [computerDetail, storageDevices, graphicsCards, installations] = await Promise.all([
      ctx.store.computerDetails.findOne({ assetId: asset.id }),
      ctx.store.storageDevices.find({ assetId: asset.id }),
      ctx.store.graphicsCards.find({ assetId: asset.id }),
      ctx.store.installations.find({ assetId: asset.id }),
    ]);
    res.json({ ok: true, asset, computerDetail, storageDevices, graphicsCards, installations });
  });

  router.get("/:id/obsolescence", async (req, res) => {
    const asset = await ctx.store.assets.findById(idParam(req.params.id));
    if (!asset) throw new NotFoundError("Asset not found");

    const rules = await getRules(ctx.store, ctx.config.obsolescence);
    const result = evaluateAsset(asset, await loadHardware(ctx.store, asset.id), rules);
    res.json({ ok: true, assetId: asset.id, inventoryCode: asset.inventoryCode, ...result });
  });

  router.patch("/:id", requireRole("admin"), async (req, res) => {
    const body = asBody(req.body);
    const patch: Partial<AssetData> = {
      inventoryCode: check(asString(body.inventoryCode, { field: "inventoryCode", trim: true, minLen: 1, maxLen: 50 })),
      serialNumber: check(asString(body.serialNumber, { field: "serialNumber", trim: true, minLen: 1, maxLen: 100 })),
      assetType: check(asEnum(body.assetType, assetTypes, { field: "assetType" })),
      status: check(asEnum(body.status, assetStatuses, { field: "status" })),
      brand: check(asString(body.brand, { field: "brand", trim: true, maxLen: 100 })),
      model: check(asString(body.model, { field: "model", trim: true, maxLen: 100 })),
      ...ownerRefs(body),
    };
    if (body.acquisitionDate !== undefined) {
      patch.acquisitionDate = check(asDateFromString(body.acquisitionDate, { field: "acquisitionDate" })) ?? null;
    }
    await assertOwners(ctx.store, patch);

    const asset = await ctx.store.assets.update(idParam(req.params.id), patch);
    if (!asset) throw new NotFoundError("Asset not found");
    res.json({ ok: true, asset });
  });

  router.delete("/:id", requireRole("admin"), async (req, res) => {
    const id = idParam(req.params.id);

    await ctx.store.withTransaction(async (tx) => {
      const asset = await tx.assets.findById(id);
      if (!asset) throw new NotFoundError("Asset not found");

      await tx.computerDetails.deleteMany({ assetId: id });
      await tx.storageDevices.deleteMany({ assetId: id });
      await tx.graphicsCards.deleteMany({ assetId: id });
      await tx.installations.deleteMany({ assetId: id });
      await tx.warnings.deleteMany({ assetId: id });
      await tx.checkins.deleteMany({ assetId: id });
      await tx.assets.delete(id);
    });

    res.json({ ok: true });
  });

  return router;
}
