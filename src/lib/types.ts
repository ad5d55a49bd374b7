// src/lib/types.ts

/** Raw CSV fields in file order: start, end, owner, description. */
export type RawEventRecord = readonly string[];

export type CalendarEvent = {
  owner: string;
  startISO: string; // inclusive, YYYY-MM-DD
  endISO: string;   // inclusive, YYYY-MM-DD
  description: string;
};

export type RejectedRecord = {
  index: number; // 0-based position among the data records
  reason: string;
  record: RawEventRecord;
};

/** owner -> color */
export type OwnerColors = ReadonlyMap<string, string>;

export type PackedEvent = CalendarEvent & {
  row: number;
  visibleStartISO: string; // event range clipped to the window
  visibleEndISO: string;
};

/**
 * Row slots per visible day. A slot is null when no event sits in that row
 * on that day.
 */
export type DayOccupancy = ReadonlyMap<string, readonly (PackedEvent | null)[]>;

export type Band = {
  key: string; // owner|start|end
  owner: string;
  color: string;
  row: number;
  weekIndex: number;     // 0..3
  firstDayIndex: number; // 0..6 (Mon..Sun)
  lengthInDays: number;
  startISO: string;
  endISO: string;
  label: string;
};
