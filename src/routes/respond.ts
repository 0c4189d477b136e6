// src/routes/respond.ts
import type { Response } from "express";
import type { ZodError } from "zod";
import type { Failure, FailureReason, Outcome } from "../services/tenderService";

const STATUS_BY_REASON: Record<FailureReason, number> = {
  not_found: 404,
  failed: 500,
  unavailable: 503,
};

export function sendFailure(res: Response, failure: Failure) {
  return res.status(STATUS_BY_REASON[failure.reason]).json({
    error: failure.error.message,
    notice: failure.error,
  });
}

export function sendOutcome<T>(res: Response, outcome: Outcome<T>, status = 200) {
  if (!outcome.ok) return sendFailure(res, outcome);
  return res.status(status).json({ data: outcome.data, notices: outcome.notices });
}

export function sendInvalid(res: Response, error: ZodError) {
  return res.status(400).json({ error: "Invalid request", issues: error.issues });
}

export function sendUnexpected(res: Response, label: string, err: unknown) {
  console.error(`Error ${label}:`, err);
  return res.status(500).json({ error: `Failed ${label}` });
}

/** Positive integer route parameter, or null. */
export function intParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const n = Number(value);
  return n > 0 ? n : null;
}
