// src/lib/config.ts
import type { LayoutConfig } from "./geometry";

export const DEFAULT_EVENTS_CSV = "data/vacation.csv";

type Env = Record<string, string | undefined>;

// Env var -> layout field. Only the options a deployment is expected to tune.
export const LAYOUT_ENV: ReadonlyArray<[string, keyof LayoutConfig]> = [
  ["CALENDAR_CELL_WIDTH", "cellWidth"],
  ["CALENDAR_CELL_HEIGHT", "cellHeight"],
  ["CALENDAR_HEADER_HEIGHT", "headerHeight"],
  ["CALENDAR_MARGIN", "margin"],
  ["CALENDAR_EVENT_ROW_HEIGHT", "eventRowHeight"],
];

export function parseNonNegativeInt(raw: string | undefined): number | null {
  if (raw == null || !/^\s*\d+\s*$/.test(raw)) return null;
  return parseInt(raw, 10);
}

export function parsePositiveInt(raw: string | undefined): number | null {
  const n = parseNonNegativeInt(raw);
  return n != null && n > 0 ? n : null;
}

/** Sizes must be positive; the margin may be 0. */
export function parseLayoutValue(field: keyof LayoutConfig, raw: string | undefined): number | null {
  return field === "margin" ? parseNonNegativeInt(raw) : parsePositiveInt(raw);
}

/** Layout overrides found in the environment; unset or invalid values are left out. */
export function layoutFromEnv(env: Env = process.env): Partial<LayoutConfig> {
  const out: Partial<LayoutConfig> = {};
  for (const [name, field] of LAYOUT_ENV) {
    const n = parseLayoutValue(field, env[name]);
    if (n != null) out[field] = n;
  }
  return out;
}

export function eventsCsvPath(env: Env = process.env): string {
  return env.CALENDAR_EVENTS_CSV || DEFAULT_EVENTS_CSV;
}
