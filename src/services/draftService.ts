// src/services/draftService.ts
import {
  DRAFT_STATUSES,
  type Draft,
  type DraftStatus,
  type DraftType,
  type SessionSettings,
  type Tender,
} from "../types/tender";
import { renderTemplate, templateValues } from "./documentService";
import { draftId, nextDraftVersion, uniqueAttachments } from "./tenderRows";

/** Buyer name fragment (lowercase) → procurement inbox. */
const KNOWN_BUYER_INBOXES: ReadonlyArray<[string, string]> = [["mtn", "procurement@mtn.com"]];

export function suggestRecipient(org: string): string {
  const name = org.toLowerCase();
  const hit = KNOWN_BUYER_INBOXES.find(([fragment]) => name.includes(fragment));
  return hit ? hit[1] : "";
}

export interface NewDraftInput {
  type?: DraftType;
  to?: string;
  cc?: string;
  subject?: string;
  body?: string;
  value?: string;
  attachments?: string[];
}

export type DraftPatch = Partial<
  Pick<Draft, "type" | "status" | "to" | "cc" | "subject" | "body" | "value" | "attachments" | "file">
>;

export interface DraftContext {
  settings: SessionSettings;
  template: string;
  now: Date;
}

export function createDraft(tender: Tender, input: NewDraftInput, ctx: DraftContext): Draft {
  const type = input.type?.trim() || "EOI";
  const version = nextDraftVersion(tender.drafts);
  const values = templateValues(tender, ctx.settings.defaultRecipient, ctx.settings.companyName);

  return {
    id: draftId(tender.id, version),
    type,
    version,
    status: "Draft",
    to: input.to ?? suggestRecipient(tender.org),
    cc: input.cc ?? "",
    subject: input.subject ?? `${type}: ${tender.title || "Untitled"}`,
    body: input.body ?? renderTemplate(ctx.template, values),
    value: input.value ?? "",
    attachments: uniqueAttachments(input.attachments ?? []),
    file: "",
    last_updated: ctx.now.toISOString(),
  };
}

export function findDraft(tender: Tender, version: number): Draft | undefined {
  return tender.drafts.find((d) => d.version === version);
}

export function appendDraft(tender: Tender, draft: Draft): Tender {
  return { ...tender, drafts: [...tender.drafts, draft] };
}

export function replaceDraft(tender: Tender, draft: Draft): Tender {
  return {
    ...tender,
    drafts: tender.drafts.map((d) => (d.version === draft.version ? draft : d)),
  };
}

/** Drops one draft; the remaining versions keep their numbers. */
export function removeDraft(tender: Tender, version: number): Tender {
  return { ...tender, drafts: tender.drafts.filter((d) => d.version !== version) };
}

export function updateDraft(draft: Draft, patch: DraftPatch, now: Date): Draft {
  return {
    id: draft.id,
    version: draft.version,
    type: patch.type ?? draft.type,
    status: patch.status ?? draft.status,
    to: patch.to ?? draft.to,
    cc: patch.cc ?? draft.cc,
    subject: patch.subject ?? draft.subject,
    body: patch.body ?? draft.body,
    value: patch.value ?? draft.value,
    attachments: uniqueAttachments(patch.attachments ?? draft.attachments),
    file: patch.file ?? draft.file,
    last_updated: now.toISOString(),
  };
}

/** Draft → Ready → Sent → Submitted; Submitted stays put. */
export function nextDraftStatus(status: DraftStatus): DraftStatus {
  const i = DRAFT_STATUSES.indexOf(status);
  return DRAFT_STATUSES[Math.min(i + 1, DRAFT_STATUSES.length - 1)];
}
