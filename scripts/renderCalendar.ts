#!/usr/bin/env ts-node
/**
 * Render the rolling four-week calendar (previous week, this week, two
 * following weeks) with member events as an SVG file.
 *
 * Input CSV (first line is a header):
 *   start,end,member,description
 *   2024/03/16,2024/03/19,Alice,Ski trip
 *
 * Run:
 *   npx ts-node --project tsconfig.scripts.json scripts/renderCalendar.ts \
 *     --csv data/vacation.csv --out calendar.svg --today 2024-03-15
 *
 * Layout flags (override CALENDAR_* env vars):
 *   --cell-width --cell-height --header-height --margin --event-row-height
 */

import * as fs from "fs";
import * as path from "path";
import { buildCalendar } from "../src/lib/calendar";
import { describeWindow, isISODate } from "../src/lib/calendarWindow";
import { eventsCsvPath, layoutFromEnv, parseLayoutValue } from "../src/lib/config";
import { csvLineOf, loadEventRecords } from "../src/lib/eventSource";
import type { LayoutConfig } from "../src/lib/geometry";
import { renderCalendarSvg } from "../src/lib/svg";

function arg(name: string, fallback?: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx >= 0 && process.argv[idx + 1]) return process.argv[idx + 1];
  return fallback;
}

const LAYOUT_FLAGS: ReadonlyArray<[string, keyof LayoutConfig]> = [
  ["cell-width", "cellWidth"],
  ["cell-height", "cellHeight"],
  ["header-height", "headerHeight"],
  ["margin", "margin"],
  ["event-row-height", "eventRowHeight"],
];

function layoutFromArgs(): Partial<LayoutConfig> {
  const out: Partial<LayoutConfig> = {};
  for (const [flag, field] of LAYOUT_FLAGS) {
    const raw = arg(flag);
    if (raw === undefined) continue;
    const n = parseLayoutValue(field, raw);
    if (n == null) {
      const expected = field === "margin" ? "a non-negative integer" : "a positive integer";
      throw new Error(`--${flag} expects ${expected}, got "${raw}"`);
    }
    out[field] = n;
  }
  return out;
}

function main() {
  const csvPath = path.resolve(arg("csv", eventsCsvPath()) ?? "");
  const outPath = path.resolve(arg("out", "calendar.svg") ?? "calendar.svg");
  const today = arg("today");
  if (today !== undefined && !isISODate(today)) {
    console.error("Usage: --today YYYY-MM-DD");
    process.exit(1);
  }

  const layout = buildCalendar({
    records: loadEventRecords(csvPath),
    today,
    config: { ...layoutFromEnv(), ...layoutFromArgs() },
  });

  for (const r of layout.rejected) {
    console.warn(`[events] skipped line ${csvLineOf(r.index)}: ${r.reason}`);
  }

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, renderCalendarSvg(layout));
  console.log(`✅ Wrote calendar → ${path.relative(process.cwd(), outPath)}`);

  for (const line of describeWindow(layout.window)) console.log(`  ${line}`);
  const owners = Object.keys(layout.colors);
  console.log(`\n[render] events loaded: ${layout.eventCount}`);
  console.log(`[render] members: ${owners.length}`);
  for (const owner of owners) console.log(`  ${owner}: ${layout.colors[owner]}`);
}

try {
  main();
} catch (err: unknown) {
  console.error("❌ Failed to render calendar.");
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
}
