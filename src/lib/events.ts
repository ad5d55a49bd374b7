// src/lib/events.ts
// Turns raw CSV records into deduplicated events plus a stable owner->color map.

import { DateTime } from "luxon";
import { PALETTE } from "./palette";
import type { CalendarEvent, OwnerColors, RawEventRecord, RejectedRecord } from "./types";

export const RECORD_DATE_FORMAT = "yyyy/M/d"; // accepts 2024/03/01 and 2024/3/1

export type ParsedRecord =
  | { ok: true; event: CalendarEvent }
  | { ok: false; reason: string };

export type EventStore = {
  events: CalendarEvent[];
  colors: OwnerColors;
  rejected: RejectedRecord[];
};

// "2024/03/15" -> "2024-03-15"; null if not a real calendar day
export function parseRecordDate(raw: string): string | null {
  const dt = DateTime.fromFormat(raw.trim(), RECORD_DATE_FORMAT);
  return dt.isValid ? dt.toFormat("yyyy-MM-dd") : null;
}

export function parseEventRecord(record: RawEventRecord): ParsedRecord {
  if (record.length < 4) {
    return { ok: false, reason: `expected 4 fields, got ${record.length}` };
  }
  const [startRaw, endRaw, ownerRaw, descriptionRaw] = record;

  const startISO = parseRecordDate(startRaw);
  if (!startISO) return { ok: false, reason: `bad start date "${startRaw}"` };
  const endISO = parseRecordDate(endRaw);
  if (!endISO) return { ok: false, reason: `bad end date "${endRaw}"` };
  if (startISO > endISO) return { ok: false, reason: `start ${startISO} is after end ${endISO}` };

  const owner = ownerRaw.trim();
  if (!owner) return { ok: false, reason: "missing owner" };

  return { ok: true, event: { owner, startISO, endISO, description: descriptionRaw } };
}

export function eventKey(e: Pick<CalendarEvent, "owner" | "startISO" | "endISO">): string {
  return `${e.owner}|${e.startISO}|${e.endISO}`;
}

/**
 * Same owner + same range is one event. A Map keeps the slot of the first
 * occurrence while later records overwrite its fields.
 */
export function dedupeEvents(events: readonly CalendarEvent[]): CalendarEvent[] {
  const byKey = new Map<string, CalendarEvent>();
  for (const e of events) byKey.set(eventKey(e), e);
  return Array.from(byKey.values());
}

/** Sorted owners take palette colors in turn, wrapping when owners outnumber colors. */
export function assignOwnerColors(
  events: readonly CalendarEvent[],
  palette: readonly string[] = PALETTE
): OwnerColors {
  const owners = Array.from(new Set(events.map((e) => e.owner))).sort();
  const colors = new Map<string, string>();
  owners.forEach((owner, i) => colors.set(owner, palette[i % palette.length]));
  return colors;
}

export function buildEvents(
  records: readonly RawEventRecord[],
  palette: readonly string[] = PALETTE
): EventStore {
  const parsed: CalendarEvent[] = [];
  const rejected: RejectedRecord[] = [];

  records.forEach((record, index) => {
    const res = parseEventRecord(record);
    if (res.ok) parsed.push(res.event);
    else rejected.push({ index, reason: res.reason, record });
  });

  const events = dedupeEvents(parsed);
  return { events, colors: assignOwnerColors(events, palette), rejected };
}
