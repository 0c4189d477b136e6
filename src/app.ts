// src/app.ts
import express from "express";
import cors from "cors";
import { requireAuth } from "./middleware/auth";
import { createDashboardRouter } from "./routes/dashboardRoutes";
import { createDraftLibraryRouter, createDraftRouter } from "./routes/draftRoutes";
import { createSettingsRouter } from "./routes/settingsRoutes";
import { createSourceRouter } from "./routes/sourceRoutes";
import { createTenderRouter } from "./routes/tenderRoutes";
import type { Session, TenderService } from "./services/tenderService";

export interface AppContext {
  tenders: TenderService;
  session: Session;
  jwtSecret: string;
}

export function createApp(ctx: AppContext) {
  const app = express();

  // The dashboard UI may be served from another origin
  app.use(
    cors({
      origin: "*",
    })
  );

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", requireAuth(ctx.jwtSecret));
  app.use("/api/tenders/:id/drafts", createDraftRouter(ctx.tenders));
  app.use("/api/tenders", createTenderRouter(ctx.tenders));
  app.use("/api/drafts", createDraftLibraryRouter(ctx.tenders));
  app.use("/api/dashboard", createDashboardRouter(ctx.tenders));
  app.use("/api/settings", createSettingsRouter(ctx.session));
  app.use("/api/source", createSourceRouter(ctx.tenders));

  return app;
}
