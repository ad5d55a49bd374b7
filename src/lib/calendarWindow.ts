// src/lib/calendarWindow.ts
import { DateTime } from "luxon";

export const DAYS_PER_WEEK = 7;

// Simple day labels for a Monday-start week view
export const DAY_LABELS: readonly string[] = Object.freeze([
  "Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun",
]);

export const WEEK_NAMES: readonly string[] = Object.freeze([
  "previous", "current", "next", "next+1",
]);

/** Seven consecutive ISO dates (YYYY-MM-DD), Monday first. */
export type Week = readonly string[];

export type CalendarWindow = {
  todayISO: string;
  weeks: readonly Week[]; // [previous, current, next, next+1]
  days: readonly string[]; // all 28 dates in order
  startISO: string;
  endISO: string;
};

// Helper: yyyy-mm-dd guard
export function isISODate(s: string | null | undefined): s is string {
  return !!s && /^\d{4}-\d{2}-\d{2}$/.test(s) && DateTime.fromISO(s).isValid;
}

function toISO(dt: DateTime): string {
  return dt.toFormat("yyyy-MM-dd");
}

function fromISO(iso: string): DateTime {
  const dt = DateTime.fromISO(iso);
  if (!dt.isValid) throw new Error(`Invalid date: ${iso}`);
  return dt.startOf("day");
}

/** 0 = Monday … 6 = Sunday (Luxon weekdays are 1..7). */
export function weekdayIndex(dateISO: string): number {
  return fromISO(dateISO).weekday - 1;
}

export function addDays(dateISO: string, days: number): string {
  return toISO(fromISO(dateISO).plus({ days }));
}

export function mondayISOFrom(dateISO: string): string {
  const dt = fromISO(dateISO);
  return toISO(dt.minus({ days: dt.weekday - 1 }));
}

export function weekStartingOn(mondayISO: string): Week {
  const d0 = fromISO(mondayISO);
  const dates: string[] = [];
  for (let i = 0; i < DAYS_PER_WEEK; i++) dates.push(toISO(d0.plus({ days: i })));
  return Object.freeze(dates);
}

/**
 * The four visible weeks around `anchorISO` (defaults to today): one week
 * before the anchor's week, the anchor's week, then two weeks after.
 */
export function computeWindow(anchorISO?: string): CalendarWindow {
  const todayISO = anchorISO ?? toISO(DateTime.local());
  if (!isISODate(todayISO)) throw new Error(`Invalid anchor date: ${todayISO}`);

  const monday = mondayISOFrom(todayISO);
  const weeks = [-7, 0, 7, 14].map((offset) => weekStartingOn(addDays(monday, offset)));
  const days = weeks.flat();

  return Object.freeze({
    todayISO,
    weeks: Object.freeze(weeks),
    days: Object.freeze(days),
    startISO: days[0],
    endISO: days[days.length - 1],
  });
}

/** Lines like "current: 2024-03-11 – 2024-03-17", for console output. */
export function describeWindow(window: CalendarWindow): string[] {
  const lines = [`anchor: ${window.todayISO}`];
  window.weeks.forEach((week, i) => {
    lines.push(`${WEEK_NAMES[i]}: ${week[0]} – ${week[week.length - 1]}`);
  });
  return lines;
}
