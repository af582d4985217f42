import type { Logger } from './log';

export const DEFAULT_MAX_AGE_DAYS = 15;

const DAY_MS = 24 * 60 * 60 * 1000;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Parse a GitHub `YYYY-MM-DDTHH:MM:SSZ` timestamp. Returns null for anything else,
 * including out-of-range fields such as February 30th.
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const ms = Date.UTC(year, month - 1, day, hour, minute, second);
  const date = new Date(ms);
  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;
  return roundTrips ? date : null;
}

// True when fewer than `windowDays` whole days have passed since creation.
export function isFresh(
  createdAt: string,
  windowDays: number = DEFAULT_MAX_AGE_DAYS,
  now: Date = new Date(),
  log?: Logger
): boolean {
  const created = parseTimestamp(createdAt);
  if (!created) {
    log?.error(`⚠️ Could not parse creation date '${createdAt}'`);
    return false;
  }
  const days = Math.floor((now.getTime() - created.getTime()) / DAY_MS);
  return days < windowDays;
}
