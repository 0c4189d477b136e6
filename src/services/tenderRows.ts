// src/services/tenderRows.ts
import {
  DRAFT_STATUSES,
  TENDER_STATUSES,
  type Draft,
  type DraftStatus,
  type Tender,
  type TenderRow,
  type TenderStatus,
} from "../types/tender";

export const UNASSIGNED = "Unassigned";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function str(value: unknown, fallback = ""): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return fallback;
}

function positiveInt(value: unknown): number | null {
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof n === "number" && Number.isInteger(n) && n > 0 ? n : null;
}

export function normalizeStatus(raw: unknown): TenderStatus {
  const s = str(raw).trim();
  return TENDER_STATUSES.find((status) => status === s) ?? "Draft";
}

export function normalizeDraftStatus(raw: unknown): DraftStatus {
  const s = str(raw).trim();
  return DRAFT_STATUSES.find((status) => status === s) ?? "Draft";
}

export function normalizeAssignee(raw: unknown): string {
  return str(raw).trim() || UNASSIGNED;
}

/** Fit score in [0, 100]; unparseable input is 0. */
export function parseScore(raw: unknown): number {
  const n = typeof raw === "string" ? parseFloat(raw) : raw;
  if (typeof n !== "number" || !Number.isFinite(n)) return 0;
  return Math.min(100, Math.max(0, n));
}

export function uniqueAttachments(paths: readonly unknown[]): string[] {
  const out: string[] = [];
  for (const p of paths) {
    const s = str(p).trim();
    if (s && !out.includes(s)) out.push(s);
  }
  return out;
}

export function draftId(tenderId: number, version: number): string {
  return `${tenderId}:${version}`;
}

/**
 * Accepts both the full draft shape and the early `{ type, file, version }`
 * entries. Versions that are missing or already taken get the next free one.
 */
function parseDrafts(raw: unknown, tenderId: number, now: Date): Draft[] {
  let list: unknown = raw;
  if (typeof raw === "string") {
    try {
      list = raw.trim() ? JSON.parse(raw) : [];
    } catch {
      console.warn(`[tenderRows] tender ${tenderId}: unreadable drafts column, treating as empty`);
      list = [];
    }
  }
  if (!Array.isArray(list)) return [];

  const drafts: Draft[] = [];
  const taken = new Set<number>();
  for (const item of list) {
    if (!isRecord(item)) continue;

    let version = positiveInt(item.version);
    if (version === null || taken.has(version)) {
      version = Math.max(0, ...taken) + 1;
    }
    taken.add(version);

    drafts.push({
      id: draftId(tenderId, version),
      type: str(item.type).trim() || "Doc",
      version,
      status: normalizeDraftStatus(item.status),
      to: str(item.to),
      cc: str(item.cc),
      subject: str(item.subject),
      body: str(item.body),
      value: str(item.value),
      attachments: Array.isArray(item.attachments) ? uniqueAttachments(item.attachments) : [],
      file: str(item.file),
      last_updated: str(item.last_updated) || now.toISOString(),
    });
  }
  return drafts;
}

/**
 * Map any stored shape (file record or table row) to a Tender. Returns null
 * only when there is no usable id; every other field falls back to a default.
 */
export function parseTender(raw: unknown, now: Date = new Date()): Tender | null {
  if (!isRecord(raw)) return null;
  const id = positiveInt(raw.id);
  if (id === null) return null;

  return {
    id,
    title: str(raw.title),
    org: str(raw.org),
    sector: str(raw.sector),
    deadline: str(raw.deadline),
    description: str(raw.description),
    status: normalizeStatus(raw.status),
    score: parseScore(raw.score),
    assignee: normalizeAssignee(raw.assignee),
    drafts: parseDrafts(raw.drafts, id, now),
  };
}

export function parseTenders(rows: readonly unknown[], now: Date = new Date()): Tender[] {
  const out: Tender[] = [];
  for (const row of rows) {
    const tender = parseTender(row, now);
    if (tender) {
      out.push(tender);
    } else {
      console.warn("[tenderRows] skipping record without a usable id");
    }
  }
  return out;
}

export function toRow(tender: Tender): TenderRow {
  return {
    id: tender.id,
    title: tender.title,
    org: tender.org,
    sector: tender.sector,
    deadline: tender.deadline,
    description: tender.description,
    status: tender.status,
    score: tender.score,
    assignee: tender.assignee,
    drafts: JSON.stringify(tender.drafts),
  };
}

export function nextTenderId(tenders: readonly Pick<Tender, "id">[]): number {
  return tenders.reduce((max, t) => Math.max(max, t.id), 0) + 1;
}

export function nextDraftVersion(drafts: readonly Pick<Draft, "version">[]): number {
  return drafts.reduce((max, d) => Math.max(max, d.version), 0) + 1;
}
