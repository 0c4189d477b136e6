// src/services/filterService.ts
import type { Dayjs } from "dayjs";
import { parseDeadline } from "../lib/dates";
import type { Tender } from "../types/tender";

export interface TenderFilters {
  /** Case-insensitive substring of `title + " " + org`. */
  search?: string;
  /** Empty or absent: every status. */
  statuses?: readonly string[];
  /** Empty or absent: every sector. */
  sectors?: readonly string[];
  /** Inclusive deadline range (YYYY-MM-DD). */
  from?: string;
  to?: string;
  /** Free-form question; only the shortcut keywords below are understood. */
  ask?: string;
}

export interface Shortcut {
  keyword: string;
  label: string;
  matches: (deadline: Dayjs, today: Dayjs) => boolean;
}

/**
 * Keyword → deadline predicate, checked in order. Tenders without a
 * parseable deadline never match a shortcut.
 */
export const SHORTCUTS: readonly Shortcut[] = [
  {
    keyword: "due this week",
    label: "Deadline within the next 7 days (or already passed)",
    matches: (deadline, today) => !deadline.isAfter(today.add(7, "day"), "day"),
  },
  {
    keyword: "overdue",
    label: "Deadline before today",
    matches: (deadline, today) => deadline.isBefore(today, "day"),
  },
];

export function findShortcut(ask: string | undefined): Shortcut | null {
  const q = (ask ?? "").trim().toLowerCase();
  if (!q) return null;
  return SHORTCUTS.find((s) => q.includes(s.keyword)) ?? null;
}

function inSet(value: string, set: readonly string[] | undefined): boolean {
  return !set || set.length === 0 || set.includes(value);
}

/**
 * AND of every filter. A recognized shortcut replaces the explicit date range
 * and the status/sector sets; the text search still applies.
 */
export function filterTenders(
  tenders: readonly Tender[],
  filters: TenderFilters,
  today: Dayjs
): Tender[] {
  const search = (filters.search ?? "").trim().toLowerCase();
  const shortcut = findShortcut(filters.ask);
  const from = parseDeadline(filters.from);
  const to = parseDeadline(filters.to);

  return tenders.filter((t) => {
    const text = `${t.title} ${t.org}`.toLowerCase();
    if (search && !text.includes(search)) return false;

    const deadline = parseDeadline(t.deadline);

    if (shortcut) {
      return deadline !== null && shortcut.matches(deadline, today);
    }

    if (!inSet(t.status, filters.statuses)) return false;
    if (!inSet(t.sector, filters.sectors)) return false;

    // No deadline: never excluded by the range
    if (deadline === null) return true;
    if (from && deadline.isBefore(from, "day")) return false;
    if (to && deadline.isAfter(to, "day")) return false;
    return true;
  });
}
