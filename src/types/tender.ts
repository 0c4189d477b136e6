// src/types/tender.ts
export const TENDER_STATUSES = [
  "Draft",
  "Submitted",
  "Pending",
  "Awarded",
  "Won",
  "Lost",
  "Rejected",
] as const;

export type TenderStatus = (typeof TENDER_STATUSES)[number];

export const SUCCESS_STATUSES: readonly TenderStatus[] = ["Awarded", "Won"];
export const FAILURE_STATUSES: readonly TenderStatus[] = ["Lost", "Rejected"];

export const DRAFT_STATUSES = ["Draft", "Ready", "Sent", "Submitted"] as const;

export type DraftStatus = (typeof DRAFT_STATUSES)[number];

// Open set: "EOI" and "Proposal" are the kinds the UI offers.
export type DraftType = "EOI" | "Proposal" | (string & {});

export interface Draft {
  id: string; // "<tenderId>:<version>"
  type: DraftType;
  version: number;
  status: DraftStatus;
  to: string; // comma-separated
  cc: string; // comma-separated
  subject: string;
  body: string;
  value: string;
  attachments: string[];
  file: string; // last exported artifact, "" if never exported
  last_updated: string; // ISO
}

export interface Tender {
  id: number;
  title: string;
  org: string;
  sector: string;
  deadline: string; // YYYY-MM-DD, anything else means "no deadline"
  description: string;
  status: TenderStatus;
  score: number;
  assignee: string;
  drafts: Draft[];
}

/** Persisted single-table layout; drafts travel as serialized JSON text. */
export interface TenderRow {
  id: number;
  title: string;
  org: string;
  sector: string;
  deadline: string;
  description: string;
  status: string;
  score: number;
  assignee: string;
  drafts: string;
}

export type NoticeLevel = "info" | "success" | "warning" | "error";

export interface Notice {
  level: NoticeLevel;
  message: string;
}

export interface SessionSettings {
  defaultRecipient: string;
  bidEmail: string;
  bidPhone: string;
  companyName: string;
}
