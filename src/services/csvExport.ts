// src/services/csvExport.ts
import type { Tender } from "../types/tender";

export const CSV_HEADERS = [
  "id",
  "title",
  "org",
  "sector",
  "deadline",
  "status",
  "score",
  "assignee",
  "drafts",
] as const;

export function csvEscape(value: string | number | null | undefined): string {
  if (value == null) return "";
  const str = String(value);
  if (/[",\n]/.test(str)) return `"${str.replace(/"/g, '""')}"`;
  return str;
}

export function tendersToCsv(tenders: readonly Tender[]): string {
  const lines = [CSV_HEADERS.join(",")];
  for (const t of tenders) {
    lines.push(
      [
        csvEscape(t.id),
        csvEscape(t.title),
        csvEscape(t.org),
        csvEscape(t.sector),
        csvEscape(t.deadline),
        csvEscape(t.status),
        csvEscape(t.score),
        csvEscape(t.assignee),
        csvEscape(t.drafts.length),
      ].join(",")
    );
  }
  return lines.join("\n");
}
