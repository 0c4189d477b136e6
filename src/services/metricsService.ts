// src/services/metricsService.ts
import { statSync } from "fs";
import path from "path";
import type { Dayjs } from "dayjs";
import { formatDay, parseDeadline } from "../lib/dates";
import {
  FAILURE_STATUSES,
  SUCCESS_STATUSES,
  type DraftStatus,
  type Notice,
  type Tender,
  type TenderStatus,
} from "../types/tender";
import { normalizeAssignee } from "./tenderRows";

/** Modification time of a generated artifact, or null when it is not on disk. */
export type FileTimeLookup = (file: string) => Date | null;

export const diskFileTime: FileTimeLookup = (file) => {
  if (!file) return null;
  try {
    return statSync(file).mtime;
  } catch {
    return null;
  }
};

export interface MetricsClock {
  today: Dayjs;
  now: Date;
  fileTime?: FileTimeLookup;
}

export interface ActivityEntry {
  when: string; // ISO
  tenderId: number;
  tender: string;
  type: string;
  version: number;
  status: DraftStatus;
  tenderStatus: TenderStatus;
  file: string; // basename
}

export interface DeadlineBucket {
  date: string;
  tenders: number;
}

export interface DashboardMetrics {
  total: number;
  overdue: number;
  due3: number;
  due7: number;
  drafts: number;
  inflight: number;
  awarded: number;
  winRate: number;
  overdueList: Tender[];
  soonList: Tender[];
  assigneeCounts: Record<string, number>;
  deadline30: DeadlineBucket[];
  activity: ActivityEntry[];
}

export const isSuccess = (status: TenderStatus) => SUCCESS_STATUSES.includes(status);
export const isFailure = (status: TenderStatus) => FAILURE_STATUSES.includes(status);
export const isActive = (status: TenderStatus) => !isSuccess(status) && !isFailure(status);

export function overdue(tenders: readonly Tender[], today: Dayjs): Tender[] {
  return tenders.filter((t) => {
    const d = parseDeadline(t.deadline);
    return d !== null && d.isBefore(today, "day") && isActive(t.status);
  });
}

/** Deadline within [today, today + days], whatever the status. */
export function dueIn(tenders: readonly Tender[], days: number, today: Dayjs): Tender[] {
  const end = today.add(days, "day");
  return tenders.filter((t) => {
    const d = parseDeadline(t.deadline);
    return d !== null && !d.isBefore(today, "day") && !d.isAfter(end, "day");
  });
}

export function winRate(tenders: readonly Tender[]): number {
  const wins = tenders.filter((t) => isSuccess(t.status)).length;
  const decided = wins + tenders.filter((t) => isFailure(t.status)).length;
  if (decided === 0) return 0;
  return Math.round((wins / decided) * 1000) / 10;
}

export function workloadByAssignee(tenders: readonly Tender[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const t of tenders) {
    const who = normalizeAssignee(t.assignee);
    counts[who] = (counts[who] ?? 0) + 1;
  }
  return counts;
}

export function deadlineHistogram(
  tenders: readonly Tender[],
  today: Dayjs,
  windowDays = 30
): DeadlineBucket[] {
  const counts = new Map<string, number>();
  for (const t of dueIn(tenders, windowDays, today)) {
    const d = parseDeadline(t.deadline);
    if (!d) continue;
    const key = formatDay(d);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, n]) => ({ date, tenders: n }));
}

export function activityFeed(
  tenders: readonly Tender[],
  now: Date,
  fileTime: FileTimeLookup = diskFileTime
): ActivityEntry[] {
  const feed: ActivityEntry[] = [];
  for (const t of tenders) {
    for (const d of t.drafts) {
      const when = (d.file && fileTime(d.file)) || now;
      feed.push({
        when: when.toISOString(),
        tenderId: t.id,
        tender: t.title || "Untitled",
        type: d.type || "Doc",
        version: d.version,
        status: d.status,
        tenderStatus: t.status,
        file: d.file ? path.basename(d.file) : "",
      });
    }
  }
  // ISO strings of the same format sort chronologically
  return feed.sort((a, b) => b.when.localeCompare(a.when));
}

/** Earliest parseable deadlines first. */
export function soonest(tenders: readonly Tender[], limit = 10): Tender[] {
  return tenders
    .map((t) => ({ t, d: parseDeadline(t.deadline) }))
    .filter((x): x is { t: Tender; d: Dayjs } => x.d !== null)
    .sort((a, b) => a.d.valueOf() - b.d.valueOf())
    .slice(0, limit)
    .map((x) => x.t);
}

export function computeDashboard(tenders: readonly Tender[], clock: MetricsClock): DashboardMetrics {
  const { today, now } = clock;
  const overdueList = overdue(tenders, today);
  return {
    total: tenders.length,
    overdue: overdueList.length,
    due3: dueIn(tenders, 3, today).length,
    due7: dueIn(tenders, 7, today).length,
    drafts: tenders.filter((t) => t.status === "Draft").length,
    inflight: tenders.filter((t) => t.status === "Submitted" || t.status === "Pending").length,
    awarded: tenders.filter((t) => isSuccess(t.status)).length,
    winRate: winRate(tenders),
    overdueList,
    soonList: soonest(tenders),
    assigneeCounts: workloadByAssignee(tenders),
    deadline30: deadlineHistogram(tenders, today, 30),
    activity: activityFeed(tenders, now, clock.fileTime),
  };
}

/** One warning per tender due within `days` (past deadlines included). */
export function deadlineNotices(tenders: readonly Tender[], today: Dayjs, days = 3): Notice[] {
  const soon = today.add(days, "day");
  const notices: Notice[] = [];
  for (const t of tenders) {
    const d = parseDeadline(t.deadline);
    if (d && !d.isAfter(soon, "day")) {
      notices.push({
        level: "warning",
        message: `Tender '${t.title || "Untitled"}' is due on ${formatDay(d)}!`,
      });
    }
  }
  return notices;
}
