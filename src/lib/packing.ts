// src/lib/packing.ts
// First-fit row assignment for multi-day events inside the visible window.

import type { CalendarWindow } from "./calendarWindow";
import type { CalendarEvent, DayOccupancy, PackedEvent } from "./types";

export type PackResult = {
  events: PackedEvent[]; // relevant events only, in packing order
  occupancy: DayOccupancy;
  maxRows: number; // rows used on the busiest visible day
};

export function overlapsWindow(event: CalendarEvent, window: CalendarWindow): boolean {
  return !(event.endISO < window.startISO || event.startISO > window.endISO);
}

/** Visible dates the event covers, in order. */
export function clippedDates(event: CalendarEvent, window: CalendarWindow): string[] {
  return window.days.filter((d) => d >= event.startISO && d <= event.endISO);
}

function rowIsFree(slots: (PackedEvent | null)[], row: number): boolean {
  return row >= slots.length || slots[row] === null;
}

/**
 * Assign each event overlapping the window the lowest row that is free on
 * every visible day it covers. Events are taken in the order given, so the
 * result is stable for a fixed input order but not guaranteed minimal.
 *
 * Input events are not mutated; the returned events carry `row`.
 */
export function packEvents(events: readonly CalendarEvent[], window: CalendarWindow): PackResult {
  const slotsByDay = new Map<string, (PackedEvent | null)[]>();
  for (const d of window.days) slotsByDay.set(d, []);

  const slotsFor = (d: string): (PackedEvent | null)[] => {
    const slots = slotsByDay.get(d);
    if (!slots) throw new Error(`Date ${d} is outside the window`);
    return slots;
  };

  const packed: PackedEvent[] = [];
  for (const event of events) {
    if (!overlapsWindow(event, window)) continue;
    const dates = clippedDates(event, window);

    let row = 0;
    while (!dates.every((d) => rowIsFree(slotsFor(d), row))) row++;

    const placed: PackedEvent = {
      ...event,
      row,
      visibleStartISO: dates[0],
      visibleEndISO: dates[dates.length - 1],
    };
    for (const d of dates) {
      const slots = slotsFor(d);
      while (slots.length <= row) slots.push(null);
      slots[row] = placed;
    }
    packed.push(placed);
  }

  let maxRows = 0;
  for (const slots of slotsByDay.values()) maxRows = Math.max(maxRows, slots.length);

  return { events: packed, occupancy: slotsByDay, maxRows };
}
