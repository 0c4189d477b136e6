// src/routes/sourceRoutes.ts
import { Router } from "express";
import type { TenderService } from "../services/tenderService";
import { sendOutcome, sendUnexpected } from "./respond";

export function createSourceRouter(tenders: TenderService): Router {
  const router = Router();

  /**
   * POST /api/source/import
   * Pulls the configured tender feed and adds tenders whose title is new.
   * Nothing is committed when the feed fails.
   */
  router.post("/import", async (_req, res) => {
    try {
      return sendOutcome(res, await tenders.importFeed());
    } catch (err) {
      return sendUnexpected(res, "importing tenders", err);
    }
  });

  return router;
}
