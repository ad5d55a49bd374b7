// src/lib/bands.ts
// Cuts packed events into week-bounded bands ready for drawing.

import { weekdayIndex, type CalendarWindow } from "./calendarWindow";
import { eventKey } from "./events";
import { colorFor } from "./palette";
import type { Band, CalendarEvent, DayOccupancy, OwnerColors } from "./types";

export const LABEL_MAX_CHARS = 15;

export function formatBandLabel(event: Pick<CalendarEvent, "owner" | "description">): string {
  const desc = event.description;
  if (!desc.trim()) return event.owner;
  // count code points so astral characters are never split
  const chars = Array.from(desc);
  const short = chars.slice(0, LABEL_MAX_CHARS).join("");
  return chars.length > LABEL_MAX_CHARS ? `${event.owner}: ${short}...` : `${event.owner}: ${short}`;
}

/**
 * One band per (event, week) the event is visible in. Days are scanned Mon→Sun
 * and rows top→bottom; a band is emitted when the scan reaches the event's
 * first day inside that week. Every band is labelled, including the
 * continuation of an event that started in an earlier week.
 */
export function synthesizeBands(
  occupancy: DayOccupancy,
  window: CalendarWindow,
  colors: OwnerColors
): Band[] {
  const bands: Band[] = [];

  window.weeks.forEach((week, weekIndex) => {
    const weekStart = week[0];
    const weekEnd = week[week.length - 1];
    const drawn = new Set<string>();

    for (const dateISO of week) {
      const slots = occupancy.get(dateISO) ?? [];
      slots.forEach((event, row) => {
        if (!event) return;
        const key = eventKey(event);
        if (drawn.has(key)) return;

        const startInWeek = event.startISO > weekStart ? event.startISO : weekStart;
        const endInWeek = event.endISO < weekEnd ? event.endISO : weekEnd;
        if (startInWeek !== dateISO) return;
        drawn.add(key);

        const firstDayIndex = weekdayIndex(startInWeek);
        bands.push({
          key,
          owner: event.owner,
          color: colorFor(colors, event.owner),
          row,
          weekIndex,
          firstDayIndex,
          lengthInDays: weekdayIndex(endInWeek) - firstDayIndex + 1,
          startISO: startInWeek,
          endISO: endInWeek,
          label: formatBandLabel(event),
        });
      });
    }
  });

  return bands;
}
