// src/routes/tenderRoutes.ts
import { Router, type Request } from "express";
import { z } from "zod";
import { summarize } from "../services/boardService";
import { tendersToCsv } from "../services/csvExport";
import type { TenderFilters } from "../services/filterService";
import type { TenderService } from "../services/tenderService";
import { TENDER_STATUSES } from "../types/tender";
import { intParam, sendInvalid, sendOutcome, sendUnexpected } from "./respond";

const statusSchema = z.enum(TENDER_STATUSES);

const tenderFields = {
  org: z.string().optional(),
  sector: z.string().optional(),
  deadline: z.string().optional(),
  description: z.string().optional(),
  status: statusSchema.optional(),
  score: z.coerce.number().min(0).max(100).optional(),
  assignee: z.string().optional(),
};

export const createTenderSchema = z.object({
  title: z.string().trim().min(1),
  ...tenderFields,
});

export const updateTenderSchema = z
  .object({ title: z.string().trim().min(1).optional(), ...tenderFields })
  .strict();

const bulkIdsSchema = z.array(z.coerce.number().int().positive()).min(1);

export const bulkStatusSchema = z.object({ ids: bulkIdsSchema, status: statusSchema });
export const bulkIdsBodySchema = z.object({ ids: bulkIdsSchema });

function queryText(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

function queryList(value: unknown): string[] | undefined {
  const raw = Array.isArray(value) ? value.join(",") : queryText(value);
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length ? items : undefined;
}

export function filtersFromQuery(query: Request["query"]): TenderFilters {
  return {
    search: queryText(query.q),
    ask: queryText(query.ask),
    statuses: queryList(query.status),
    sectors: queryList(query.sector),
    from: queryText(query.from),
    to: queryText(query.to),
  };
}

export function createTenderRouter(tenders: TenderService): Router {
  const router = Router();

  /**
   * GET /api/tenders?q=&ask=&status=Draft,Pending&sector=&from=&to=
   */
  router.get("/", async (req, res) => {
    try {
      return sendOutcome(res, await tenders.list(filtersFromQuery(req.query)));
    } catch (err) {
      return sendUnexpected(res, "listing tenders", err);
    }
  });

  /**
   * GET /api/tenders/export.csv
   * Same filters as the list.
   */
  router.get("/export.csv", async (req, res) => {
    try {
      const outcome = await tenders.list(filtersFromQuery(req.query));
      if (!outcome.ok) return sendOutcome(res, outcome);
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="tenders_filtered.csv"`);
      return res.send(tendersToCsv(outcome.data));
    } catch (err) {
      return sendUnexpected(res, "exporting tenders", err);
    }
  });

  /**
   * POST /api/tenders/bulk/status
   * { "ids": [1, 2], "status": "Submitted" }
   */
  router.post("/bulk/status", async (req, res) => {
    const body = bulkStatusSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      return sendOutcome(res, await tenders.bulkStatus(body.data.ids, body.data.status));
    } catch (err) {
      return sendUnexpected(res, "updating statuses", err);
    }
  });

  /**
   * POST /api/tenders/bulk/eoi
   * { "ids": [1, 2] }
   */
  router.post("/bulk/eoi", async (req, res) => {
    const body = bulkIdsBodySchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      return sendOutcome(res, await tenders.bulkGenerateEoi(body.data.ids));
    } catch (err) {
      return sendUnexpected(res, "generating EOIs", err);
    }
  });

  router.get("/:id", async (req, res) => {
    const id = intParam(req.params.id);
    if (id === null) return res.status(400).json({ error: "Invalid tender id" });
    try {
      const outcome = await tenders.get(id);
      if (!outcome.ok) return sendOutcome(res, outcome);
      return res.json({
        data: { ...outcome.data, summary: summarize(outcome.data.description) },
        notices: outcome.notices,
      });
    } catch (err) {
      return sendUnexpected(res, "fetching tender", err);
    }
  });

  router.post("/", async (req, res) => {
    const body = createTenderSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      return sendOutcome(res, await tenders.create(body.data), 201);
    } catch (err) {
      return sendUnexpected(res, "creating tender", err);
    }
  });

  router.patch("/:id", async (req, res) => {
    const id = intParam(req.params.id);
    if (id === null) return res.status(400).json({ error: "Invalid tender id" });
    const body = updateTenderSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      return sendOutcome(res, await tenders.update(id, body.data));
    } catch (err) {
      return sendUnexpected(res, "updating tender", err);
    }
  });

  // Idempotent: deleting an unknown id is still 204
  router.delete("/:id", async (req, res) => {
    const id = intParam(req.params.id);
    if (id === null) return res.status(400).json({ error: "Invalid tender id" });
    try {
      const outcome = await tenders.remove(id);
      if (!outcome.ok) return sendOutcome(res, outcome);
      return res.status(204).send();
    } catch (err) {
      return sendUnexpected(res, "deleting tender", err);
    }
  });

  return router;
}
