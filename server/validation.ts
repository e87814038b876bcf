const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const TIMESTAMP_REGEX =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d{1,9})?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/;

export interface ParsedTimestamp {
  timestamp: string;
  day: string;
}

export function isValidDateString(date: string): boolean {
  if (typeof date !== "string") return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + "T00:00:00Z");
  if (isNaN(d.getTime())) return false;
  return d.toISOString().slice(0, 10) === date;
}

export function isValidTimeZone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function toCalendarDate(instant: Date, timezone?: string | null): string {
  if (timezone) {
    const parts = new Intl.DateTimeFormat("en-CA", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
    }).formatToParts(instant);
    const y = parts.find((p) => p.type === "year")?.value;
    const m = parts.find((p) => p.type === "month")?.value;
    const day = parts.find((p) => p.type === "day")?.value;
    if (y && m && day) return `${y}-${m}-${day}`;
  }
  return instant.toISOString().slice(0, 10);
}

function normalizeOffset(offset: string): string | null {
  if (offset === "Z") return "Z";
  const sign = offset[0];
  const digits = offset.slice(1).replace(":", "");
  const hh = parseInt(digits.slice(0, 2), 10);
  const mm = parseInt(digits.slice(2, 4), 10);
  if (hh > 23 || mm > 59) return null;
  return `${sign}${digits.slice(0, 2)}:${digits.slice(2, 4)}`;
}

/**
 * Parses a CSV timestamp cell. The calendar day is the date as written,
 * except that values carrying `Z` or an offset are converted to `timezone`
 * first when one is given.
 */
export function parseTimestamp(raw: string, timezone?: string | null): ParsedTimestamp | null {
  const m = TIMESTAMP_REGEX.exec(raw.trim());
  if (!m) return null;

  const [, date, hh = "00", mi = "00", ss = "00", fraction, offset] = m;
  if (!isValidDateString(date)) return null;
  if (parseInt(hh, 10) > 23 || parseInt(mi, 10) > 59 || parseInt(ss, 10) > 59) return null;

  const ms = ((fraction ?? ".").slice(1) + "000").slice(0, 3);
  const zone = offset ? normalizeOffset(offset) : "Z";
  if (!zone) return null;

  const instant = new Date(`${date}T${hh}:${mi}:${ss}.${ms}${zone}`);
  if (isNaN(instant.getTime())) return null;

  return {
    timestamp: instant.toISOString(),
    day: offset && timezone ? toCalendarDate(instant, timezone) : date,
  };
}

export function parseCellValue(raw: string): number | string | null {
  const s = raw.trim();
  if (s === "") return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : s;
}

export function toNumberOrNull(value: number | string | null | undefined): number | null {
  if (value == null) return null;
  if (typeof value === "number") return value;
  const n = Number(value);
  return value.trim() !== "" && Number.isFinite(n) ? n : null;
}
