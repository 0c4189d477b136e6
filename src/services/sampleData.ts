// src/services/sampleData.ts
import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";
import { TENDER_STATUSES } from "../types/tender";
import type { SampleTender } from "./tenderService";

export const SAMPLE_TENDERS_PATH = path.resolve(__dirname, "../../data/sample-tenders.json");

const sampleSchema = z.array(
  z.object({
    title: z.string().min(1),
    org: z.string(),
    sector: z.string(),
    deadlineInDays: z.number().int(),
    description: z.string(),
    status: z.enum(TENDER_STATUSES),
    assignee: z.string(),
  })
);

export function loadSampleTenders(file: string = SAMPLE_TENDERS_PATH): SampleTender[] {
  const parsed = sampleSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
  if (!parsed.success) {
    throw new Error(`Invalid sample tenders in ${file}: ${parsed.error.message}`);
  }
  return parsed.data;
}
