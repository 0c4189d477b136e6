// src/services/createTenderStore.ts
import path from "path";
import type { Env } from "../config/env";
import { getSupabase } from "../lib/supabase";
import { FileTenderStore } from "./fileTenderStore";
import { SupabaseTenderStore } from "./supabaseTenderStore";
import type { TenderStore } from "./tenderStore";

export function createTenderStore(
  config: Pick<Env, "STORE_DRIVER" | "DATA_FILE" | "SUPABASE_URL" | "SUPABASE_SERVICE_ROLE_KEY">
): TenderStore {
  if (config.STORE_DRIVER === "supabase") {
    console.log("[TenderStore] using Supabase table 'tenders'");
    return new SupabaseTenderStore(getSupabase(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY));
  }
  const file = path.resolve(config.DATA_FILE);
  console.log(`[TenderStore] using file ${file}`);
  return new FileTenderStore(file);
}
