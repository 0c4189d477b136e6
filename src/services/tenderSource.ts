// src/services/tenderSource.ts
import { z } from "zod";
import type { Notice, Tender } from "../types/tender";
import { normalizeAssignee, normalizeStatus, parseScore } from "./tenderRows";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const text = z.preprocess(
  (v) => (typeof v === "number" ? String(v) : v),
  z.string().optional().catch(undefined)
);

export const feedItemSchema = z
  .object({
    title: text,
    org: text,
    buyer: text,
    sector: text,
    deadline: text,
    description: text,
    status: text,
    score: z.unknown().optional(),
    assignee: text,
  })
  .passthrough();

export type FeedItem = z.infer<typeof feedItemSchema>;

const feedEnvelopeSchema = z.object({ items: z.array(z.unknown()) });

export interface FeedResult {
  items: FeedItem[];
  error: Notice | null;
}

function feedNotice(reason: string): Notice {
  return { level: "error", message: `Tender feed unavailable: ${reason}` };
}

export class TenderSource {
  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  get configured(): boolean {
    return this.url !== "";
  }

  async fetchFeed(): Promise<FeedResult> {
    if (!this.configured) {
      return {
        items: [],
        error: { level: "info", message: "No tender feed configured (set TENDER_SOURCE_URL)." },
      };
    }

    try {
      const res = await this.fetchFn(this.url, {
        method: "GET",
        headers: { Accept: "application/json" },
      });
      const body = await res.text();
      if (!res.ok) {
        console.error(`[TenderSource] ${res.status} ${res.statusText}:`, body.slice(0, 500));
        return { items: [], error: feedNotice(`${res.status} ${res.statusText}`) };
      }

      let json: unknown;
      try {
        json = body ? JSON.parse(body) : [];
      } catch (e) {
        return { items: [], error: feedNotice(`invalid JSON (${String(e)})`) };
      }

      const wrapped = feedEnvelopeSchema.safeParse(json);
      const list = Array.isArray(json) ? json : wrapped.success ? wrapped.data.items : null;
      if (!list) {
        return { items: [], error: feedNotice("expected an array of tenders") };
      }

      const items: FeedItem[] = [];
      for (const raw of list) {
        const parsed = feedItemSchema.safeParse(raw);
        if (parsed.success && parsed.data.title?.trim()) items.push(parsed.data);
      }
      console.log(`[TenderSource] fetched ${items.length} of ${list.length} feed items`);
      return { items, error: null };
    } catch (err) {
      console.error("[TenderSource] fetch failed:", err);
      return { items: [], error: feedNotice(err instanceof Error ? err.message : String(err)) };
    }
  }
}

/**
 * New tenders for every feed item whose title is not already tracked.
 * Ids continue from `firstId`; duplicate titles inside the feed count once.
 */
export function mergeFeed(existing: readonly Tender[], items: readonly FeedItem[], firstId: number): Tender[] {
  const titles = new Set(existing.map((t) => t.title));
  const added: Tender[] = [];
  let id = firstId;
  for (const item of items) {
    const title = (item.title ?? "").trim();
    if (!title || titles.has(title)) continue;
    titles.add(title);
    added.push({
      id: id++,
      title,
      org: item.org ?? item.buyer ?? "",
      sector: item.sector ?? "Other",
      deadline: item.deadline ?? "",
      description: item.description ?? "",
      status: item.status ? normalizeStatus(item.status) : "Pending",
      score: parseScore(item.score),
      assignee: normalizeAssignee(item.assignee),
      drafts: [],
    });
  }
  return added;
}
