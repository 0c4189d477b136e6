import { describe, expect, it } from "vitest";
import { toDay } from "../lib/dates";
import type { Draft, Tender, TenderStatus } from "../types/tender";
import {
  activityFeed,
  computeDashboard,
  deadlineHistogram,
  deadlineNotices,
  dueIn,
  overdue,
  winRate,
  workloadByAssignee,
} from "./metricsService";

const today = toDay("2025-08-10");

function tender(id: number, overrides: Partial<Tender> = {}): Tender {
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

function draft(tenderId: number, version: number, overrides: Partial<Draft> = {}): Draft {
  return {
    id: `${tenderId}:${version}`,
    type: "EOI",
    version,
    status: "Draft",
    to: "",
    cc: "",
    subject: "",
    body: "",
    value: "",
    attachments: [],
    file: "",
    last_updated: "2025-08-10T08:00:00.000Z",
    ...overrides,
  };
}

const withStatuses = (...statuses: TenderStatus[]) => statuses.map((status, i) => tender(i + 1, { status }));

describe("deadline buckets", () => {
  const a = tender(1, { deadline: "2025-08-09", status: "Pending" });
  const b = tender(2, { deadline: "2025-08-12", status: "Draft" });
  const c = tender(3, { deadline: "not-a-date" });
  const all = [a, b, c];

  it("counts an active tender past its deadline as overdue", () => {
    expect(overdue(all, today)).toEqual([a]);
  });

  it("puts a deadline two days out in both the 3 and 7 day windows", () => {
    expect(dueIn(all, 3, today)).toEqual([b]);
    expect(dueIn(all, 7, today)).toEqual([b]);
  });

  it("does not count decided tenders as overdue", () => {
    const won = tender(4, { deadline: "2025-08-01", status: "Won" });
    const lost = tender(5, { deadline: "2025-08-01", status: "Lost" });
    expect(overdue([won, lost], today)).toEqual([]);
  });

  it("includes today and the window edge", () => {
    const edge = [tender(1, { deadline: "2025-08-10" }), tender(2, { deadline: "2025-08-13" })];
    expect(dueIn(edge, 3, today).map((t) => t.id)).toEqual([1, 2]);
    expect(dueIn(edge, 2, today).map((t) => t.id)).toEqual([1]);
  });

  it("leaves unparseable deadlines out of every bucket but in the total", () => {
    const metrics = computeDashboard(all, { today, now: new Date(2025, 7, 10, 12) });
    expect(metrics.total).toBe(3);
    expect(metrics.overdue).toBe(1);
    expect(metrics.due3).toBe(1);
    expect(metrics.due7).toBe(1);
    expect(metrics.soonList.map((t) => t.id)).toEqual([1, 2]);
  });
});

describe("winRate", () => {
  it("is 0 when nothing has been decided", () => {
    expect(winRate(withStatuses("Draft", "Pending", "Submitted"))).toBe(0);
    expect(winRate([])).toBe(0);
  });

  it("rounds to one decimal", () => {
    expect(winRate(withStatuses("Won", "Awarded", "Lost"))).toBe(66.7);
    expect(winRate(withStatuses("Won", "Lost", "Lost"))).toBe(33.3);
  });

  it("counts Rejected as a loss", () => {
    expect(winRate(withStatuses("Won", "Rejected"))).toBe(50);
  });
});

describe("workloadByAssignee", () => {
  it("groups blank assignees under Unassigned", () => {
    const tenders = [tender(1, { assignee: "" }), tender(2, { assignee: "  " }), tender(3, { assignee: "ada" })];
    expect(workloadByAssignee(tenders)).toEqual({ Unassigned: 2, ada: 1 });
  });
});

describe("deadlineHistogram", () => {
  it("counts tenders per day over the next 30 days, in date order", () => {
    const tenders = ["2025-08-12", "2025-08-12", "2025-08-10", "2025-09-09", "2025-09-10", "2025-08-09"].map(
      (deadline, i) => tender(i + 1, { deadline })
    );
    expect(deadlineHistogram(tenders, today)).toEqual([
      { date: "2025-08-10", tenders: 1 },
      { date: "2025-08-12", tenders: 2 },
      { date: "2025-09-09", tenders: 1 },
    ]);
  });
});

describe("activityFeed", () => {
  const now = new Date(2025, 7, 10, 12);
  const older = new Date(2025, 7, 1, 9);
  const newer = new Date(2025, 7, 5, 9);
  const fileTimes: Record<string, Date> = {
    "/eois/a_EOI_v1.docx": older,
    "/eois/b_EOI_v1.docx": newer,
  };
  const lookup = (file: string) => fileTimes[file] ?? null;

  const tenders = [
    tender(1, {
      title: "Alpha",
      drafts: [draft(1, 1, { file: "/eois/a_EOI_v1.docx" }), draft(1, 2, { file: "/eois/gone.docx" })],
    }),
    tender(2, { title: "", status: "Submitted", drafts: [draft(2, 1, { file: "/eois/b_EOI_v1.docx", status: "Sent" })] }),
  ];

  it("orders entries newest first, using now for drafts without a file on disk", () => {
    const feed = activityFeed(tenders, now, lookup);
    expect(feed.map((e) => [e.tenderId, e.version])).toEqual([
      [1, 2],
      [2, 1],
      [1, 1],
    ]);
    expect(feed[0].when).toBe(now.toISOString());
    expect(feed[2].when).toBe(older.toISOString());
  });

  it("describes each entry", () => {
    const feed = activityFeed(tenders, now, lookup);
    expect(feed[1]).toEqual({
      when: newer.toISOString(),
      tenderId: 2,
      tender: "Untitled",
      type: "EOI",
      version: 1,
      status: "Sent",
      tenderStatus: "Submitted",
      file: "b_EOI_v1.docx",
    });
  });
});

describe("deadlineNotices", () => {
  it("warns about tenders due within three days, past ones included", () => {
    const tenders = [
      tender(1, { title: "Late", deadline: "2025-08-01" }),
      tender(2, { title: "Soon", deadline: "2025-08-13" }),
      tender(3, { title: "Later", deadline: "2025-08-14" }),
      tender(4, { title: "Unknown", deadline: "" }),
    ];
    expect(deadlineNotices(tenders, today)).toEqual([
      { level: "warning", message: "Tender 'Late' is due on 2025-08-01!" },
      { level: "warning", message: "Tender 'Soon' is due on 2025-08-13!" },
    ]);
  });
});
