// src/config/env.ts
export type StoreDriver = "file" | "supabase";

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function storeDriver(value: string | undefined): StoreDriver {
  return value === "supabase" ? "supabase" : "file";
}

export function readEnv(source: NodeJS.ProcessEnv = process.env) {
  return {
    NODE_ENV: source.NODE_ENV || "development",
    PORT: parseInt(source.PORT || "10000", 10),

    // Tender store
    STORE_DRIVER: storeDriver(source.STORE_DRIVER),
    DATA_FILE: source.DATA_FILE || "data/tenders.json",
    SEED_SAMPLE_DATA: flag(source.SEED_SAMPLE_DATA, true),

    // Supabase (only when STORE_DRIVER=supabase)
    SUPABASE_URL: source.SUPABASE_URL || "",
    SUPABASE_SERVICE_ROLE_KEY: source.SUPABASE_SERVICE_ROLE_KEY || "",

    // Generated documents
    DRAFTS_DIR: source.DRAFTS_DIR || "eois",

    // API guard; empty leaves /api open
    API_JWT_SECRET: source.API_JWT_SECRET || "",

    // SMTP (optional)
    SMTP_HOST: source.SMTP_HOST || "",
    SMTP_PORT: source.SMTP_PORT ? Number(source.SMTP_PORT) : 0,
    SMTP_USER: source.SMTP_USER || "",
    SMTP_PASS: source.SMTP_PASS || "",

    // External tender feed
    TENDER_SOURCE_URL: source.TENDER_SOURCE_URL || "",

    // Session defaults
    DEFAULT_RECIPIENT: source.DEFAULT_RECIPIENT || "Procurement Team",
    BID_EMAIL: source.BID_EMAIL || "bids@example.com",
    BID_PHONE: source.BID_PHONE || "",
    COMPANY_NAME: source.COMPANY_NAME || "Our team",
  };
}

export type Env = ReturnType<typeof readEnv>;

export const env: Env = readEnv();
