// src/routes/settingsRoutes.ts
import { Router } from "express";
import { z } from "zod";
import type { Session } from "../services/tenderService";
import { sendInvalid } from "./respond";

export const settingsSchema = z
  .object({
    defaultRecipient: z.string().trim().min(1),
    bidEmail: z.string().trim().email(),
    bidPhone: z.string(),
    companyName: z.string().trim().min(1),
  })
  .partial()
  .strict();

export function createSettingsRouter(session: Session): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({ data: session.settings });
  });

  router.put("/", (req, res) => {
    const body = settingsSchema.safeParse(req.body ?? {});
    if (!body.success) return sendInvalid(res, body.error);
    session.settings = { ...session.settings, ...body.data };
    return res.json({ data: session.settings });
  });

  return router;
}
