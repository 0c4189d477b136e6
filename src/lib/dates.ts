// src/lib/dates.ts
import dayjs, { type Dayjs } from "dayjs";
import customParseFormat from "dayjs/plugin/customParseFormat";

dayjs.extend(customParseFormat);

export const DATE_FORMAT = "YYYY-MM-DD";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Strict `YYYY-MM-DD` parse. Anything else (including impossible dates such
 * as 2025-02-30) is `null`, which callers treat as "no deadline".
 */
export function parseDeadline(value: unknown): Dayjs | null {
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!DATE_PATTERN.test(s)) return null;
  const d = dayjs(s, DATE_FORMAT, true);
  return d.isValid() ? d.startOf("day") : null;
}

export function toDay(value?: Dayjs | Date | string): Dayjs {
  if (typeof value === "string") {
    return parseDeadline(value) ?? dayjs().startOf("day");
  }
  return dayjs(value).startOf("day");
}

export function formatDay(d: Dayjs): string {
  return d.format(DATE_FORMAT);
}
