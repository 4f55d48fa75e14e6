import type { DatasetCode, DateStrategy, ReportDate } from "./types";
import { getDataset } from "./datasets";

export const DEFAULT_TIME_ZONE = "America/Edmonton";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function parseReportDate(value: string): ReportDate | undefined {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const year = Number.parseInt(match[1], 10);
  const month = Number.parseInt(match[2], 10);
  const day = Number.parseInt(match[3], 10);

  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return undefined;
  }

  return { year, month, day };
}

export function formatReportDate(date: ReportDate): string {
  const month = `${date.month}`.padStart(2, "0");
  const day = `${date.day}`.padStart(2, "0");
  return `${date.year}-${month}-${day}`;
}

export function addDays(date: ReportDate, days: number): ReportDate {
  const shifted = new Date(Date.UTC(date.year, date.month - 1, date.day + days));
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  };
}

export function isWeekend(date: ReportDate): boolean {
  const weekday = new Date(Date.UTC(date.year, date.month - 1, date.day)).getUTCDay();
  return weekday === 0 || weekday === 6;
}

export function previousBusinessDay(date: ReportDate): ReportDate {
  let current = date;
  while (isWeekend(current)) {
    current = addDays(current, -1);
  }
  return current;
}

export interface ZonedClock {
  date: ReportDate;
  hour: number;
}

export function toZonedClock(now: Date, timeZone: string): ZonedClock {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hourCycle: "h23"
  }).formatToParts(now);

  const read = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((entry) => entry.type === type);
    if (!part) {
      throw new Error(`Unable to read ${type} for time zone ${timeZone}`);
    }
    return Number.parseInt(part.value, 10);
  };

  return {
    date: { year: read("year"), month: read("month"), day: read("day") },
    hour: read("hour")
  };
}

export interface ResolveReportDateOptions {
  now?: Date;
  timeZone?: string;
  strategy?: DateStrategy;
}

export function resolveReportDate(
  dataset: DatasetCode,
  options: ResolveReportDateOptions = {}
): ReportDate {
  const clock = toZonedClock(options.now ?? new Date(), options.timeZone ?? DEFAULT_TIME_ZONE);
  if ((options.strategy ?? "calendar") === "calendar") {
    return clock.date;
  }

  const { publicationHour } = getDataset(dataset);

  // Weekend runs report on Friday's file regardless of the hour.
  if (isWeekend(clock.date)) {
    return previousBusinessDay(clock.date);
  }
  if (clock.hour < publicationHour) {
    return previousBusinessDay(addDays(clock.date, -1));
  }
  return clock.date;
}
