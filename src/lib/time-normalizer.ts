/**
 * Time Normalizer
 * Projects wall-clock times in an IANA zone onto a fixed reference date so
 * that only the time of day takes part in comparisons.
 */

import {
  REFERENCE_DATE_UTC,
  fail,
  ok,
  type ClockReading,
  type NormalizedInstant,
  type ScheduleResult,
  type WallClock,
} from '@/types/schedule';

const WALL_CLOCK_PATTERN = /^(\d{1,2}):(\d{2})$/;
const MINUTE_MS = 60_000;

interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: string;
}

/**
 * Parse "HH:MM" (single-digit hours allowed). Returns null when malformed
 * or out of range.
 */
export function parseWallClock(value: string): WallClock | null {
  const match = WALL_CLOCK_PATTERN.exec(value);
  if (!match) return null;

  const hour = Number.parseInt(match[1], 10);
  const minute = Number.parseInt(match[2], 10);
  if (hour > 23 || minute > 59) return null;

  return { hour, minute };
}

/**
 * Resolve an IANA zone identifier to its canonical name.
 * An empty value resolves to UTC.
 */
export function resolveTimeZone(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return 'UTC';
  try {
    return new Intl.DateTimeFormat('en-US', { timeZone: trimmed }).resolvedOptions().timeZone;
  } catch {
    return null;
  }
}

function readZonedParts(nowMs: number, timeZone: string): ZonedParts {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    weekday: 'long',
    hourCycle: 'h23',
  }).formatToParts(new Date(nowMs));

  const map: Record<string, string> = {};
  for (const part of parts) {
    if (part.type !== 'literal') map[part.type] = part.value;
  }

  return {
    year: Number(map.year),
    month: Number(map.month),
    day: Number(map.day),
    hour: Number(map.hour),
    minute: Number(map.minute),
    second: Number(map.second),
    weekday: map.weekday ?? '',
  };
}

/**
 * UTC offset of the zone at the given instant, in minutes east of UTC.
 */
function offsetMinutesAt(nowMs: number, parts: ZonedParts): number {
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second);
  const truncatedNow = Math.floor(nowMs / 1000) * 1000;
  return Math.round((asUtc - truncatedNow) / MINUTE_MS);
}

function anchor(wallClock: WallClock, timeZone: string, utcOffsetMinutes: number): NormalizedInstant {
  const minutesOfDay = wallClock.hour * 60 + wallClock.minute;
  return {
    hour: wallClock.hour,
    minute: wallClock.minute,
    timeZone,
    utcOffsetMinutes,
    epochMs: REFERENCE_DATE_UTC + (minutesOfDay - utcOffsetMinutes) * MINUTE_MS,
  };
}

/**
 * Current time of day and weekday abbreviation in the given zone.
 */
export function readClock(timeZone: string, nowMs: number): ScheduleResult<ClockReading> {
  const zone = resolveTimeZone(timeZone);
  if (!zone) return fail({ code: 'INVALID_TIME_ZONE', timeZone });

  const parts = readZonedParts(nowMs, zone);
  const now = anchor({ hour: parts.hour, minute: parts.minute }, zone, offsetMinutesAt(nowMs, parts));

  return ok({ now, today: parts.weekday.slice(0, 3) });
}

/**
 * Anchor a wall-clock time with the zone and offset of a reference instant,
 * typically the `now` of a clock reading.
 */
export function anchorWallClock(wallClock: WallClock, reference: NormalizedInstant): NormalizedInstant {
  return anchor(wallClock, reference.timeZone, reference.utcOffsetMinutes);
}

/**
 * Normalize an "HH:MM" string in the given zone, using the offset the zone
 * observes at nowMs.
 */
export function normalizeWallClock(
  value: string,
  timeZone: string,
  nowMs: number
): ScheduleResult<NormalizedInstant> {
  const wallClock = parseWallClock(value);
  if (!wallClock) return fail({ code: 'INVALID_TIME_FORMAT', field: 'time', value });

  const clock = readClock(timeZone, nowMs);
  if (!clock.ok) return clock;

  return ok(anchorWallClock(wallClock, clock.value.now));
}

export function isBefore(a: NormalizedInstant, b: NormalizedInstant): boolean {
  return a.epochMs < b.epochMs;
}

export function isAfter(a: NormalizedInstant, b: NormalizedInstant): boolean {
  return a.epochMs > b.epochMs;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * "20:00 Europe/Prague (UTC+01:00)"
 */
export function formatInstant(instant: NormalizedInstant): string {
  const sign = instant.utcOffsetMinutes < 0 ? '-' : '+';
  const offset = Math.abs(instant.utcOffsetMinutes);
  const utc = `UTC${sign}${pad2(Math.floor(offset / 60))}:${pad2(offset % 60)}`;
  return `${pad2(instant.hour)}:${pad2(instant.minute)} ${instant.timeZone} (${utc})`;
}
