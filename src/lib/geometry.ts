// src/lib/geometry.ts
// Pixel geometry for the 4-week grid and the event bands drawn on it.

import { DateTime } from "luxon";
import { DAY_LABELS, type CalendarWindow } from "./calendarWindow";
import type { Band } from "./types";

export type LayoutConfig = {
  cellWidth: number;
  cellHeight: number;     // used as-is when no event is visible
  headerHeight: number;
  margin: number;
  eventRowHeight: number;
  rowSpacing: number;
  eventTop: number;       // offset of row 0 from the cell's top edge
  minCellHeight: number;
  cellHeightBase: number; // fixed part of a cell's height once rows are in use
  bandInset: number;
};

export const DEFAULT_LAYOUT: Readonly<LayoutConfig> = Object.freeze({
  cellWidth: 120,
  cellHeight: 140,
  headerHeight: 40,
  margin: 10,
  eventRowHeight: 18,
  rowSpacing: 2,
  eventTop: 30,
  minCellHeight: 120,
  cellHeightBase: 60,
  bandInset: 4,
});

export type Rect = { x: number; y: number; width: number; height: number };

export type HeaderCell = Rect & { label: string };

export type DayCell = Rect & {
  dateISO: string;
  dayOfMonth: number;
  monthLabel: string | null; // only on the 1st of a month
  isToday: boolean;
  isSaturday: boolean;
  isSunday: boolean;
};

export type PositionedBand = Band & {
  rect: Rect;
  labelX: number;
  labelY: number;
};

export function resolveCellHeight(config: LayoutConfig, maxRows: number): number {
  if (maxRows <= 0) return config.cellHeight;
  return Math.max(
    config.minCellHeight,
    config.cellHeightBase + maxRows * (config.eventRowHeight + config.rowSpacing)
  );
}

export function canvasSize(config: LayoutConfig, cellHeight: number, weeks: number) {
  return {
    width: 7 * config.cellWidth + 2 * config.margin,
    height: config.headerHeight + weeks * cellHeight + 2 * config.margin,
  };
}

function cellOrigin(config: LayoutConfig, cellHeight: number, weekIndex: number, dayIndex: number) {
  return {
    x: config.margin + dayIndex * config.cellWidth,
    y: config.margin + config.headerHeight + weekIndex * cellHeight,
  };
}

export function headerCells(config: LayoutConfig): HeaderCell[] {
  return DAY_LABELS.map((label, i) => ({
    label,
    x: config.margin + i * config.cellWidth,
    y: config.margin,
    width: config.cellWidth,
    height: config.headerHeight,
  }));
}

export function dayCells(window: CalendarWindow, config: LayoutConfig, cellHeight: number): DayCell[] {
  const cells: DayCell[] = [];
  window.weeks.forEach((week, weekIndex) => {
    week.forEach((dateISO, dayIndex) => {
      const dt = DateTime.fromISO(dateISO, { locale: "en-US" });
      const isToday = dateISO === window.todayISO;
      cells.push({
        ...cellOrigin(config, cellHeight, weekIndex, dayIndex),
        width: config.cellWidth,
        height: cellHeight,
        dateISO,
        dayOfMonth: dt.day,
        monthLabel: dt.day === 1 ? dt.toFormat("LLL") : null,
        isToday,
        // today's highlight wins over weekend shading
        isSaturday: !isToday && dayIndex === 5,
        isSunday: !isToday && dayIndex === 6,
      });
    });
  });
  return cells;
}

export function mapBandsToPixels(
  bands: readonly Band[],
  config: LayoutConfig,
  cellHeight: number
): PositionedBand[] {
  return bands.map((band) => {
    const cell = cellOrigin(config, cellHeight, band.weekIndex, band.firstDayIndex);
    const y = cell.y + config.eventTop + band.row * (config.eventRowHeight + config.rowSpacing);
    return {
      ...band,
      rect: {
        x: cell.x + config.bandInset / 2,
        y,
        width: band.lengthInDays * config.cellWidth - config.bandInset,
        height: config.eventRowHeight,
      },
      labelX: cell.x + config.bandInset,
      labelY: y + 12,
    };
  });
}
