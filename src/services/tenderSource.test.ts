import { describe, expect, it, vi } from "vitest";
import type { Tender } from "../types/tender";
import { TenderSource, mergeFeed } from "./tenderSource";

const FEED_URL = "https://feed.example.test/tenders";

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "Content-Type": "application/json" },
    ...init,
  });
}

describe("TenderSource.fetchFeed", () => {
  it("reports an unconfigured feed without fetching", async () => {
    const fetchFn = vi.fn();
    const source = new TenderSource("", fetchFn);

    expect(source.configured).toBe(false);
    expect(await source.fetchFeed()).toEqual({
      items: [],
      error: { level: "info", message: "No tender feed configured (set TENDER_SOURCE_URL)." },
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("accepts a bare array and drops items without a title", async () => {
    const fetchFn = vi.fn(async () =>
      jsonResponse([{ title: "Depot Security", buyer: "Transit Agency", score: "70" }, { org: "No title" }, 42])
    );
    const source = new TenderSource(FEED_URL, fetchFn);

    const result = await source.fetchFeed();
    expect(result.error).toBeNull();
    expect(result.items).toHaveLength(1);
    expect(result.items[0].title).toBe("Depot Security");
    expect(fetchFn).toHaveBeenCalledWith(FEED_URL, { method: "GET", headers: { Accept: "application/json" } });
  });

  it("accepts an { items } envelope", async () => {
    const source = new TenderSource(FEED_URL, async () => jsonResponse({ items: [{ title: "Grounds Care" }] }));
    const result = await source.fetchFeed();
    expect(result.items.map((i) => i.title)).toEqual(["Grounds Care"]);
  });

  it("turns an HTTP failure into a notice", async () => {
    const source = new TenderSource(FEED_URL, async () =>
      new Response("down", { status: 503, statusText: "Service Unavailable" })
    );
    expect(await source.fetchFeed()).toEqual({
      items: [],
      error: { level: "error", message: "Tender feed unavailable: 503 Service Unavailable" },
    });
  });

  it("turns a non-list body into a notice", async () => {
    const source = new TenderSource(FEED_URL, async () => jsonResponse({ results: [] }));
    expect((await source.fetchFeed()).error).toEqual({
      level: "error",
      message: "Tender feed unavailable: expected an array of tenders",
    });
  });

  it("turns a network error into a notice", async () => {
    const source = new TenderSource(FEED_URL, async () => {
      throw new Error("connect ECONNREFUSED");
    });
    expect((await source.fetchFeed()).error).toEqual({
      level: "error",
      message: "Tender feed unavailable: connect ECONNREFUSED",
    });
  });
});

describe("mergeFeed", () => {
  const existing: Tender[] = [
    {
      id: 3,
      title: "Depot Security",
      org: "Transit Agency",
      sector: "Security",
      deadline: "2025-08-15",
      description: "",
      status: "Submitted",
      score: 0,
      assignee: "Unassigned",
      drafts: [],
    },
  ];

  it("adds only unseen titles with defaults filled in", () => {
    const added = mergeFeed(
      existing,
      [
        { title: "Depot Security" },
        { title: " Grounds Care ", buyer: "Parks Board", score: "150", assignee: " " },
        { title: "Grounds Care", org: "Duplicate" },
        { title: "Fleet Fuel", org: "Transit Agency", sector: "Energy", status: "Won", deadline: "2025-09-01" },
      ],
      4
    );

    expect(added).toEqual([
      {
        id: 4,
        title: "Grounds Care",
        org: "Parks Board",
        sector: "Other",
        deadline: "",
        description: "",
        status: "Pending",
        score: 100,
        assignee: "Unassigned",
        drafts: [],
      },
      {
        id: 5,
        title: "Fleet Fuel",
        org: "Transit Agency",
        sector: "Energy",
        deadline: "2025-09-01",
        description: "",
        status: "Won",
        score: 0,
        assignee: "Unassigned",
        drafts: [],
      },
    ]);
  });
});
