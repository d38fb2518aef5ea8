const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;
const COMPACT_RE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/i;
const MONTH_FIRST_RE = /^([a-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})(?:,?\s+(?:at\s+)?(\d{1,2}):(\d{2})\s*(am|pm)?)?$/i;
const DAY_FIRST_RE = /^(\d{1,2})(?:st|nd|rd|th)?\s+([a-z]+)\.?,?\s+(\d{4})$/i;
const SLASHED_YMD_RE = /^(\d{4})[/.](\d{1,2})[/.](\d{1,2})$/;
const SLASHED_MDY_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

const DATE_PREFIX_RE = /^(?:published|updated|posted|modified|last updated|date)(?:\s+on)?\s*:?\s*/i;
const WEEKDAY_RE = /^(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\.?,?\s+/i;

type Parts = {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
  offsetMinutes?: number;
};

function monthNumber(name: string): number | undefined {
  const key = name.toLowerCase();
  return MONTHS[key] ?? MONTHS[key.slice(0, 3)];
}

function offsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const digits = zone.slice(1).replace(":", "");
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4));
  return zone.startsWith("-") ? -minutes : minutes;
}

function toIso(parts: Parts): string {
  const { year, month, day } = parts;
  if (month < 1 || month > 12 || day < 1 || day > 31) return "";
  const ms =
    Date.UTC(year, month - 1, day, parts.hour ?? 0, parts.minute ?? 0, parts.second ?? 0) -
    (parts.offsetMinutes ?? 0) * 60_000;
  const date = new Date(ms);
  if (Number.isNaN(date.getTime())) return "";
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function twelveHour(hour: number, meridiem: string | undefined): number {
  if (!meridiem) return hour;
  const pm = meridiem.toLowerCase() === "pm";
  if (hour === 12) return pm ? 12 : 0;
  return pm ? hour + 12 : hour;
}

/** ISO 8601 forms only. Returns a UTC ISO string truncated to seconds, or "". */
export function parseIsoDate(raw: string): string {
  const value = raw.trim();
  const iso = ISO_RE.exec(value);
  if (iso) {
    const [, y, mo, d, h, mi, s, zone] = iso;
    return toIso({
      year: Number(y),
      month: Number(mo),
      day: Number(d),
      hour: h ? Number(h) : 0,
      minute: mi ? Number(mi) : 0,
      second: s ? Number(s) : 0,
      offsetMinutes: offsetMinutes(zone),
    });
  }
  const compact = COMPACT_RE.exec(value);
  if (compact) {
    const [, y, mo, d, h, mi, s] = compact;
    return toIso({
      year: Number(y),
      month: Number(mo),
      day: Number(d),
      hour: Number(h),
      minute: Number(mi),
      second: Number(s),
    });
  }
  return "";
}

export function cleanupDateString(raw: string): string {
  return raw
    .replace(/\s+/g, " ")
    .trim()
    .replace(DATE_PREFIX_RE, "")
    .replace(WEEKDAY_RE, "")
    .trim();
}

/** ISO forms plus the common written ones ("October 24, 2014", "24 Oct 2014", "2014/10/24"). */
export function parseFlexibleDate(raw: string): string {
  const value = cleanupDateString(raw);
  if (!value) return "";

  const iso = parseIsoDate(value);
  if (iso) return iso;

  const monthFirst = MONTH_FIRST_RE.exec(value);
  if (monthFirst) {
    const [, name = "", d, y, h, mi, meridiem] = monthFirst;
    const month = monthNumber(name);
    if (month === undefined) return "";
    return toIso({
      year: Number(y),
      month,
      day: Number(d),
      hour: h ? twelveHour(Number(h), meridiem) : 0,
      minute: mi ? Number(mi) : 0,
    });
  }

  const dayFirst = DAY_FIRST_RE.exec(value);
  if (dayFirst) {
    const [, d, name = "", y] = dayFirst;
    const month = monthNumber(name);
    if (month === undefined) return "";
    return toIso({ year: Number(y), month, day: Number(d) });
  }

  const ymd = SLASHED_YMD_RE.exec(value);
  if (ymd) {
    const [, y, mo, d] = ymd;
    return toIso({ year: Number(y), month: Number(mo), day: Number(d) });
  }

  const mdy = SLASHED_MDY_RE.exec(value);
  if (mdy) {
    const [, mo, d, y] = mdy;
    return toIso({ year: Number(y), month: Number(mo), day: Number(d) });
  }

  return "";
}

export function hasTimeOfDay(iso: string): boolean {
  return !iso.endsWith("T00:00:00Z");
}
