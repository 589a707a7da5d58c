import { format, getHours, getMinutes, getSeconds, isValid, parse } from "date-fns";
import { fromZonedTime } from "date-fns-tz";
import { TZDate } from "@date-fns/tz";

const OFFSET_SUFFIX = /\s*(Z|[+-]\d{2}:?\d{2})$/;

// Order matters: two-digit years must be tried before four-digit ones
const WALL_CLOCK_FORMATS = [
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm",
  "MM/dd/yy HH:mm:ss",
  "MM/dd/yyyy HH:mm:ss",
  "MM/dd/yyyy HH:mm",
  "yyyy-MM-dd",
  "MM/dd/yy",
  "MM/dd/yyyy",
];

const SECONDS_PER_DAY = 86_400;
const HALF_DAY_SECONDS = 43_200;

export interface ParsedTimestamp {
  /**
   * Wall-clock fields as written, held in a UTC TZDate so that neither the
   * host timezone nor its DST gaps move them.
   */
  wallClock: Date;
  /** Offset written in the string (e.g. "+01:00"), or null when none was given. */
  offset: string | null;
}

function normalizeOffset(raw: string): string {
  if (raw === 'Z') {
    return '+00:00';
  }
  return raw.includes(':') ? raw : `${raw.slice(0, 3)}:${raw.slice(3)}`;
}

export function formatUtcOffset(offsetMinutes: number): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${sign}${hours}:${minutes}`;
}

export function parseTimestamp(raw: string): ParsedTimestamp | null {
  const trimmed = raw.trim();
  if (!trimmed) {
    return null;
  }

  const offsetMatch = OFFSET_SUFFIX.exec(trimmed);
  const offset = offsetMatch ? normalizeOffset(offsetMatch[1]) : null;
  const wallClockText = offsetMatch ? trimmed.slice(0, offsetMatch.index) : trimmed;

  // Every pattern carries a full date; the reference only settles two-digit years
  const reference = new TZDate(Date.now(), 'UTC');
  for (const pattern of WALL_CLOCK_FORMATS) {
    const candidate = parse(wallClockText, pattern, reference);
    if (isValid(candidate)) {
      return { wallClock: candidate, offset };
    }
  }
  return null;
}

/**
 * Resolve a parsed wall-clock time to a UTC instant. The offset written in the
 * string wins, then the adapter-declared offset, then the IANA timezone.
 * With `dateOnly` the time of day is dropped and the instant is local midnight.
 */
export function resolveInstant(
  parsed: ParsedTimestamp,
  fallback: { utcOffsetMinutes?: number; timezone: string },
  dateOnly = false
): Date | null {
  const zone = parsed.offset
    ?? (fallback.utcOffsetMinutes !== undefined ? formatUtcOffset(fallback.utcOffsetMinutes) : fallback.timezone);
  const wallClockIso = dateOnly
    ? format(parsed.wallClock, "yyyy-MM-dd'T'00:00:00.000")
    : format(parsed.wallClock, "yyyy-MM-dd'T'HH:mm:ss.SSS");
  const instant = fromZonedTime(wallClockIso, zone);
  return isValid(instant) ? instant : null;
}

/**
 * Seconds from local midnight, wrapped to [-12h, +12h) so that bedtimes on
 * either side of midnight stay numerically close (23:00 -> -3600, 00:30 -> 1800).
 */
export function clockOffsetSeconds(wallClock: Date): number {
  const seconds = getHours(wallClock) * 3600 + getMinutes(wallClock) * 60 + getSeconds(wallClock);
  return seconds >= HALF_DAY_SECONDS ? seconds - SECONDS_PER_DAY : seconds;
}
