// src/services/tenderStore.ts
import type { Notice, Tender } from "../types/tender";

export interface StoreReadResult {
  data: Tender[];
  error: Notice | null;
}

export interface StoreWriteResult {
  error: Notice | null;
}

/**
 * Durable mapping from tender id to Tender (drafts included).
 *
 * Implementations never throw: a storage failure is logged and handed back
 * as an error notice, and the write leaves the stored state as it was.
 */
export interface TenderStore {
  loadAll(): Promise<StoreReadResult>;

  /** Upsert by id, replacing every field of an existing tender. */
  save(tender: Tender): Promise<StoreWriteResult>;

  /** Upsert several tenders in one write. */
  saveMany(tenders: Tender[]): Promise<StoreWriteResult>;

  /** Removes the tender and its drafts; unknown ids are not an error. */
  delete(id: number): Promise<StoreWriteResult>;
}

export function storeNotice(action: string, err: unknown): Notice {
  const reason = err instanceof Error ? err.message : String(err);
  return { level: "error", message: `Error ${action}: ${reason}` };
}
