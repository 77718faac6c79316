// src/routes/trainingCenters.ts
import { Request, Response, Router } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { DuplicateKeyError, ValidationError } from "../middleware/errorHandler";
import { parseCreateRequest } from "../lib/trainingCenterValidation";
import { fromRequest, toWire } from "../lib/trainingCenterSerializer";
import { FILTER_KEYS, TrainingCenterStore } from "../lib/trainingCenterStore";
import type { TrainingCenterFilters } from "../types/trainingCenter";

function readFilters(query: Request["query"]): TrainingCenterFilters {
  const filters: TrainingCenterFilters = {};

  for (const key of FILTER_KEYS) {
    const value = query[key];
    if (value === undefined) continue;
    // ?city=a&city=b or ?city[x]=a parse to arrays/objects
    if (typeof value !== "string") {
      throw new ValidationError("InvalidType", `${key} must be a single value`, key);
    }
    filters[key] = value;
  }

  return filters;
}

export default function trainingCenterRoutes(store: TrainingCenterStore): Router {
  const router = Router();

  /**
   * CREATE Training Center
   */
  router.post(
    "/training-center",
    asyncHandler(async (req: Request, res: Response) => {
      const payload = parseCreateRequest(req.body);

      // The unique index still catches a concurrent duplicate; that one surfaces as a StoreError
      const existing = await store.findByCode(payload.center_code);
      if (existing) {
        throw new DuplicateKeyError("A training center with this CenterCode already exists");
      }

      const center = await store.insert(fromRequest(payload));
      console.log(`[HTTP] Training center ${center.center_code} created`);

      res.status(201).json(toWire(center));
    })
  );

  /**
   * GET Training Centers, optionally filtered by city/state/pincode
   */
  router.get(
    "/training-centers",
    asyncHandler(async (req: Request, res: Response) => {
      const centers = await store.list(readFilters(req.query));
      res.status(200).json(centers.map(toWire));
    })
  );

  return router;
}
