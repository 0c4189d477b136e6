// src/routes/dashboardRoutes.ts
import { Router } from "express";
import type { TenderService } from "../services/tenderService";
import { sendOutcome, sendUnexpected } from "./respond";

/**
 * GET /api/dashboard
 * Metrics, deadline notices (3 days), kanban lanes and calendar points
 * computed from one snapshot of the store.
 */
export function createDashboardRouter(tenders: TenderService): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      return sendOutcome(res, await tenders.dashboard());
    } catch (err) {
      return sendUnexpected(res, "computing dashboard", err);
    }
  });

  return router;
}
