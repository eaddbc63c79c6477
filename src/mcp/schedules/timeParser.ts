import { DateTime } from "luxon";

// Tried in order after the ISO, SQL, RFC 2822 and HTTP forms have failed.
const LENIENT_FORMATS = [
  "yyyy/MM/dd HH:mm:ss",
  "yyyy/MM/dd HH:mm",
  "yyyy/MM/dd",
  "MM/dd/yyyy HH:mm:ss",
  "MM/dd/yyyy HH:mm",
  "MM/dd/yyyy",
  "MMM d, yyyy HH:mm:ss",
  "MMM d, yyyy HH:mm",
  "MMM d, yyyy h:mm a",
  "MMM d, yyyy",
  "d MMM yyyy HH:mm",
  "d MMM yyyy"
];

/**
 * Keeps a trailing `Z` as is and rewrites `YYYY-MM-DD HH:MM:SS UTC` to
 * `YYYY-MM-DDTHH:MM:SSZ`. Everything else is only trimmed.
 */
export function normalizeIso(value: string): string {
  const v = value.trim();
  if (v.endsWith("Z")) return v;
  if (v.toUpperCase().endsWith(" UTC")) {
    let core = v.slice(0, -4).trim();
    if (!core.includes("T") && core.includes(" ")) {
      const i = core.indexOf(" ");
      core = `${core.slice(0, i)}T${core.slice(i + 1)}`;
    }
    return `${core}Z`;
  }
  return v;
}

/**
 * Values without an offset are read in the process zone, values with one keep
 * it, so comparing instants matches a naive-vs-naive or aware-vs-aware check.
 */
export function parseTimestamp(value: string): DateTime | null {
  const raw = value.trim();
  if (!raw) return null;

  const strict = DateTime.fromISO(normalizeIso(raw), { setZone: true });
  if (strict.isValid) return strict;

  const fallbacks = [
    DateTime.fromSQL(raw, { setZone: true }),
    DateTime.fromRFC2822(raw, { setZone: true }),
    DateTime.fromHTTP(raw, { setZone: true })
  ];
  for (const dt of fallbacks) {
    if (dt.isValid) return dt;
  }

  for (const fmt of LENIENT_FORMATS) {
    const dt = DateTime.fromFormat(raw, fmt, { setZone: true, locale: "en-US" });
    if (dt.isValid) return dt;
  }
  return null;
}

export function isAfter(dt: DateTime, now: Date): boolean {
  return dt.toMillis() > now.getTime();
}

const MIN_STORABLE_MS = Date.parse("0000-01-01T00:00:00.000Z");
const MAX_STORABLE_MS = Date.parse("9999-12-31T23:59:59.999Z");

/** Four-digit-year instants only; anything else breaks the store's text ordering. */
export function isStorableInstant(d: Date): boolean {
  const ms = d.getTime();
  return !Number.isNaN(ms) && ms >= MIN_STORABLE_MS && ms <= MAX_STORABLE_MS;
}
