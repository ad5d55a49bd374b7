// src/lib/calendar.ts
import { synthesizeBands } from "./bands";
import { computeWindow, type CalendarWindow } from "./calendarWindow";
import { buildEvents } from "./events";
import {
  DEFAULT_LAYOUT,
  canvasSize,
  dayCells,
  headerCells,
  mapBandsToPixels,
  resolveCellHeight,
  type DayCell,
  type HeaderCell,
  type LayoutConfig,
  type PositionedBand,
} from "./geometry";
import { packEvents } from "./packing";
import type { RawEventRecord, RejectedRecord } from "./types";

export type CalendarLayout = {
  window: CalendarWindow;
  config: LayoutConfig;
  width: number;
  height: number;
  cellHeight: number;
  maxRows: number;
  headers: HeaderCell[];
  days: DayCell[];
  bands: PositionedBand[];
  colors: Record<string, string>; // owner -> color, owners sorted
  eventCount: number; // after dedup, before window filtering
  rejected: RejectedRecord[];
};

export type BuildCalendarOptions = {
  records: readonly RawEventRecord[];
  today?: string; // YYYY-MM-DD, defaults to now
  config?: Partial<LayoutConfig>;
};

/** Records in, fully positioned calendar out. No I/O. */
export function buildCalendar({ records, today, config }: BuildCalendarOptions): CalendarLayout {
  const layoutConfig: LayoutConfig = { ...DEFAULT_LAYOUT, ...config };
  const window = computeWindow(today);
  const { events, colors, rejected } = buildEvents(records);
  const { occupancy, maxRows } = packEvents(events, window);
  const bands = synthesizeBands(occupancy, window, colors);

  const cellHeight = resolveCellHeight(layoutConfig, maxRows);
  const { width, height } = canvasSize(layoutConfig, cellHeight, window.weeks.length);

  return {
    window,
    config: layoutConfig,
    width,
    height,
    cellHeight,
    maxRows,
    headers: headerCells(layoutConfig),
    days: dayCells(window, layoutConfig, cellHeight),
    bands: mapBandsToPixels(bands, layoutConfig, cellHeight),
    colors: Object.fromEntries(colors),
    eventCount: events.length,
    rejected,
  };
}
