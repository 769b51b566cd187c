/**
 * Occurrence Time Resolution
 *
 * Apple Health imports arrive with a timestamp pinned to the end of the
 * day; the real entry time only survives in the server's fulltext, e.g.
 * "2025-Sep-26 entered at 07:21 by me via BeemiOS".
 */

import type { Occurrence, RemoteDatapoint, WallClockTime } from "../../../types/index.js";

const ENTERED_AT_PATTERN = /\b(\d{4})-([A-Za-z]{3})-(\d{1,2}) entered at (\d{1,2}):(\d{2})/;

const MONTH_ABBREVIATIONS = [
  "jan", "feb", "mar", "apr", "may", "jun",
  "jul", "aug", "sep", "oct", "nov", "dec",
] as const;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
      second: "numeric",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Civil date and time of a unix timestamp in `timezone`
 */
export function toWallClock(timestamp: number, timezone: string): WallClockTime {
  const parts = formatterFor(timezone).formatToParts(new Date(timestamp * 1000));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value);

  return {
    year: part("year"),
    month: part("month"),
    day: part("day"),
    hour: part("hour"),
    minute: part("minute"),
    second: part("second"),
  };
}

/**
 * Read "YYYY-Mon-DD entered at HH:MM" out of a fulltext string.
 * Returns null when the pattern is absent or names an impossible date or time.
 */
export function parseEnteredAt(fulltext: string): WallClockTime | null {
  const match = ENTERED_AT_PATTERN.exec(fulltext);
  if (!match) return null;

  const [, yearText, monthText, dayText, hourText, minuteText] = match;
  if (!yearText || !monthText || !dayText || !hourText || !minuteText) return null;

  const monthIndex = MONTH_ABBREVIATIONS.findIndex((m) => m === monthText.toLowerCase());
  if (monthIndex === -1) return null;

  const year = Number(yearText);
  const month = monthIndex + 1;
  const day = Number(dayText);
  const hour = Number(hourText);
  const minute = Number(minuteText);

  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59) return null;

  return { year, month, day, hour, minute, second: 0 };
}

/**
 * When the datapoint happened, in `timezone`.
 *
 * Datapoints whose comment carries `autoImportMarker` are read from their
 * fulltext only; if that fails they resolve to null rather than falling
 * back to the untrustworthy timestamp.
 */
export function resolveOccurrence(
  datapoint: RemoteDatapoint,
  timezone: string,
  autoImportMarker: string
): Occurrence | null {
  if (datapoint.comment.includes(autoImportMarker)) {
    const time = datapoint.fulltext === undefined ? null : parseEnteredAt(datapoint.fulltext);
    return time ? { time, source: "fulltext" } : null;
  }

  return { time: toWallClock(datapoint.timestamp, timezone), source: "timestamp" };
}

export function secondsOfDay(time: WallClockTime): number {
  return time.hour * 3600 + time.minute * 60 + time.second;
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

/**
 * YYYY-MM-DD
 */
export function calendarDate(time: WallClockTime): string {
  return `${pad(time.year, 4)}-${pad(time.month)}-${pad(time.day)}`;
}

/**
 * HH:MM
 */
export function clockTime(time: WallClockTime): string {
  return `${pad(time.hour)}:${pad(time.minute)}`;
}
