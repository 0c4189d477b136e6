import { describe, expect, it } from "vitest";
import { toDay } from "../lib/dates";
import type { Tender } from "../types/tender";
import { filterTenders, findShortcut } from "./filterService";

const today = toDay("2025-08-10");

function tender(id: number, overrides: Partial<Tender>): Tender {
  return {
    id,
    title: `Tender ${id}`,
    org: "",
    sector: "Other",
    deadline: "",
    description: "",
    status: "Draft",
    score: 0,
    assignee: "Unassigned",
    drafts: [],
    ...overrides,
  };
}

const tenders = [
  tender(1, {
    title: "Airport Concourse Cleaning",
    org: "Airports Authority",
    deadline: "2025-08-09",
    status: "Pending",
    sector: "Facilities Management",
  }),
  tender(2, {
    title: "Streetlight Retrofit",
    org: "City Works Department",
    deadline: "2025-08-20",
    status: "Draft",
    sector: "Energy",
  }),
  tender(3, { title: "Office Fit-out", deadline: "not-a-date", sector: "Facilities Management" }),
  tender(4, { title: "Depot Security", deadline: "2025-08-15", status: "Submitted", sector: "Security" }),
];

const ids = (list: Tender[]) => list.map((t) => t.id);

describe("filterTenders", () => {
  it("returns everything without filters", () => {
    expect(ids(filterTenders(tenders, {}, today))).toEqual([1, 2, 3, 4]);
  });

  it("searches title and organization case-insensitively", () => {
    expect(ids(filterTenders(tenders, { search: "city works" }, today))).toEqual([2]);
    expect(ids(filterTenders(tenders, { search: "AIRPORT" }, today))).toEqual([1]);
  });

  it("filters by status and sector sets", () => {
    expect(ids(filterTenders(tenders, { statuses: ["Pending"] }, today))).toEqual([1]);
    expect(ids(filterTenders(tenders, { sectors: ["Facilities Management"] }, today))).toEqual([1, 3]);
    expect(ids(filterTenders(tenders, { statuses: [], sectors: [] }, today))).toEqual([1, 2, 3, 4]);
  });

  it("keeps tenders without a deadline inside any date range", () => {
    expect(ids(filterTenders(tenders, { from: "2025-08-10", to: "2025-08-16" }, today))).toEqual([3, 4]);
  });

  it("treats the range bounds as inclusive", () => {
    expect(ids(filterTenders(tenders, { from: "2025-08-15", to: "2025-08-20" }, today))).toEqual([2, 3, 4]);
  });

  it("answers the overdue shortcut", () => {
    expect(ids(filterTenders(tenders, { ask: "What is overdue?" }, today))).toEqual([1]);
  });

  it("answers the due this week shortcut, already-passed deadlines included", () => {
    expect(ids(filterTenders(tenders, { ask: "Due this week" }, today))).toEqual([1, 4]);
  });

  it("lets a shortcut override the status set and date range", () => {
    const filters = { ask: "due this week", statuses: ["Draft"], from: "2025-08-18" };
    expect(ids(filterTenders(tenders, filters, today))).toEqual([1, 4]);
  });

  it("lets a shortcut override a sector set that would exclude the match", () => {
    expect(ids(filterTenders(tenders, { ask: "overdue", sectors: ["Energy"] }, today))).toEqual([1]);
  });

  it("still applies the text search alongside a shortcut", () => {
    expect(ids(filterTenders(tenders, { ask: "due this week", search: "depot" }, today))).toEqual([4]);
  });

  it("ignores questions it does not understand", () => {
    expect(ids(filterTenders(tenders, { ask: "show me everything" }, today))).toEqual([1, 2, 3, 4]);
  });
});

describe("findShortcut", () => {
  it("prefers due this week when both keywords appear", () => {
    expect(findShortcut("overdue or due this week")?.keyword).toBe("due this week");
  });

  it("returns null for blank input", () => {
    expect(findShortcut("   ")).toBeNull();
    expect(findShortcut(undefined)).toBeNull();
  });
});
