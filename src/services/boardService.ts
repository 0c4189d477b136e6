// src/services/boardService.ts
import { formatDay, parseDeadline } from "../lib/dates";
import type { DraftStatus, Tender, TenderStatus } from "../types/tender";

export const KANBAN_LANES: readonly TenderStatus[] = ["Draft", "Submitted", "Pending", "Won", "Lost"];

export interface KanbanLane {
  status: TenderStatus;
  tenders: Tender[];
}

export interface CalendarPoint {
  id: number;
  date: string;
  title: string;
  org: string;
  sector: string;
  status: TenderStatus;
  assignee: string;
}

export interface LibraryEntry {
  tenderId: number;
  draftId: string;
  tender: string;
  buyer: string;
  type: string;
  version: number;
  status: DraftStatus;
  tenderStatus: TenderStatus;
  file: string;
  deadline: string;
  last_updated: string;
}

// Tenders in statuses without a lane (Awarded, Rejected) are left off the board.
export function kanbanLanes(tenders: readonly Tender[]): KanbanLane[] {
  return KANBAN_LANES.map((status) => ({
    status,
    tenders: tenders.filter((t) => t.status === status),
  }));
}

export function calendarPoints(tenders: readonly Tender[]): CalendarPoint[] {
  const points: CalendarPoint[] = [];
  for (const t of tenders) {
    const d = parseDeadline(t.deadline);
    if (!d) continue;
    points.push({
      id: t.id,
      date: formatDay(d),
      title: t.title,
      org: t.org,
      sector: t.sector,
      status: t.status,
      assignee: t.assignee,
    });
  }
  return points.sort((a, b) => a.date.localeCompare(b.date));
}

export function draftLibrary(tenders: readonly Tender[]): LibraryEntry[] {
  return tenders.flatMap((t) =>
    t.drafts.map((d) => ({
      tenderId: t.id,
      draftId: d.id,
      tender: t.title,
      buyer: t.org,
      type: d.type,
      version: d.version,
      status: d.status,
      tenderStatus: t.status,
      file: d.file,
      deadline: t.deadline,
      last_updated: d.last_updated,
    }))
  );
}

// Placeholder until a real summarizer is wired in
export function summarize(description: string): string {
  return `Summary: ${description.slice(0, 180)}...`;
}
