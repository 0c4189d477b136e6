// src/routes/draftRoutes.ts
import { Router, type Response } from "express";
import { z } from "zod";
import type { TenderService } from "../services/tenderService";
import { DRAFT_STATUSES } from "../types/tender";
import { intParam, sendInvalid, sendOutcome, sendUnexpected } from "./respond";

const draftContent = {
  type: z.string().trim().min(1).optional(),
  to: z.string().optional(),
  cc: z.string().optional(),
  subject: z.string().optional(),
  body: z.string().optional(),
  value: z.string().optional(),
  attachments: z.array(z.string()).optional(),
};

export const createDraftSchema = z.object({
  ...draftContent,
  // Write the .docx right away (the "Generate EOI" action)
  export: z.boolean().optional().default(true),
});

export const updateDraftSchema = z
  .object({ ...draftContent, status: z.enum(DRAFT_STATUSES).optional() })
  .strict();

type DraftParams = { id?: string; version?: string };

function tenderIdOf(params: DraftParams): number | null {
  return intParam(params.id);
}

function draftKey(params: DraftParams, res: Response): { id: number; version: number } | null {
  const id = intParam(params.id);
  const version = intParam(params.version);
  if (id === null || version === null) {
    res.status(400).json({ error: "Invalid tender id or draft version" });
    return null;
  }
  return { id, version };
}

/** Mounted at /api/tenders/:id/drafts */
export function createDraftRouter(tenders: TenderService): Router {
  const router = Router({ mergeParams: true });

  router.post("/", async (req, res) => {
    const id = tenderIdOf(req.params);
    if (id === null) return res.status(400).json({ error: "Invalid tender id" });
    const body = createDraftSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      const { export: exportDocument, ...input } = body.data;
      return sendOutcome(res, await tenders.addDraft(id, input, exportDocument), 201);
    } catch (err) {
      return sendUnexpected(res, "creating draft", err);
    }
  });

  router.patch("/:version", async (req, res) => {
    const key = draftKey(req.params, res);
    if (!key) return;
    const body = updateDraftSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    try {
      return sendOutcome(res, await tenders.editDraft(key.id, key.version, body.data));
    } catch (err) {
      return sendUnexpected(res, "updating draft", err);
    }
  });

  router.post("/:version/advance", async (req, res) => {
    const key = draftKey(req.params, res);
    if (!key) return;
    try {
      return sendOutcome(res, await tenders.advanceDraft(key.id, key.version));
    } catch (err) {
      return sendUnexpected(res, "advancing draft", err);
    }
  });

  router.post("/:version/export", async (req, res) => {
    const key = draftKey(req.params, res);
    if (!key) return;
    try {
      return sendOutcome(res, await tenders.exportDraft(key.id, key.version));
    } catch (err) {
      return sendUnexpected(res, "exporting draft", err);
    }
  });

  router.post("/:version/send", async (req, res) => {
    const key = draftKey(req.params, res);
    if (!key) return;
    try {
      return sendOutcome(res, await tenders.sendDraft(key.id, key.version));
    } catch (err) {
      return sendUnexpected(res, "sending draft", err);
    }
  });

  router.delete("/:version", async (req, res) => {
    const key = draftKey(req.params, res);
    if (!key) return;
    try {
      const outcome = await tenders.deleteDraft(key.id, key.version);
      if (!outcome.ok) return sendOutcome(res, outcome);
      return res.status(204).send();
    } catch (err) {
      return sendUnexpected(res, "deleting draft", err);
    }
  });

  return router;
}

/** GET /api/drafts: every draft with its tender. */
export function createDraftLibraryRouter(tenders: TenderService): Router {
  const router = Router();

  router.get("/", async (_req, res) => {
    try {
      return sendOutcome(res, await tenders.library());
    } catch (err) {
      return sendUnexpected(res, "listing drafts", err);
    }
  });

  return router;
}
