// src/services/supabaseTenderStore.ts
import type { SupabaseClient } from "@supabase/supabase-js";
import type { Tender } from "../types/tender";
import { parseTenders, toRow } from "./tenderRows";
import {
  storeNotice,
  type StoreReadResult,
  type StoreWriteResult,
  type TenderStore,
} from "./tenderStore";

const TABLE = "tenders";

/**
 * Single `tenders` table with the row layout of TenderRow:
 * id (int, primary key), title, org, sector, deadline, description, status,
 * score (float), assignee, drafts (text, serialized JSON).
 */
export class SupabaseTenderStore implements TenderStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async loadAll(): Promise<StoreReadResult> {
    try {
      const { data, error } = await this.supabase
        .from(TABLE)
        .select("*")
        .order("id", { ascending: true });

      if (error) {
        console.error("[SupabaseTenderStore] select error:", JSON.stringify(error, null, 2));
        return { data: [], error: storeNotice("loading tenders", error.message) };
      }
      const rows: unknown[] = data ?? [];
      return { data: parseTenders(rows), error: null };
    } catch (err) {
      console.error("[SupabaseTenderStore] load failed:", err);
      return { data: [], error: storeNotice("loading tenders", err) };
    }
  }

  async save(tender: Tender): Promise<StoreWriteResult> {
    return this.saveMany([tender]);
  }

  async saveMany(tenders: Tender[]): Promise<StoreWriteResult> {
    if (tenders.length === 0) return { error: null };
    const action = tenders.length === 1 ? "saving tender" : "saving tenders";
    try {
      const { error } = await this.supabase
        .from(TABLE)
        .upsert(tenders.map(toRow), { onConflict: "id" });

      if (error) {
        console.error("[SupabaseTenderStore] upsert error:", error);
        return { error: storeNotice(action, error.message) };
      }
      return { error: null };
    } catch (err) {
      console.error(`[SupabaseTenderStore] ${action} failed:`, err);
      return { error: storeNotice(action, err) };
    }
  }

  async delete(id: number): Promise<StoreWriteResult> {
    try {
      const { error } = await this.supabase.from(TABLE).delete().eq("id", id);
      if (error) {
        console.error("[SupabaseTenderStore] delete error:", error);
        return { error: storeNotice("deleting tender", error.message) };
      }
      return { error: null };
    } catch (err) {
      console.error("[SupabaseTenderStore] delete failed:", err);
      return { error: storeNotice("deleting tender", err) };
    }
  }
}
