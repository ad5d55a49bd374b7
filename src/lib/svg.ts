// src/lib/svg.ts
// Serializes a CalendarLayout into a standalone SVG document.

import type { CalendarLayout } from "./calendar";
import type { DayCell } from "./geometry";

const STYLE = `
    .header { font-family: Arial, sans-serif; font-size: 16px; font-weight: bold; text-anchor: middle; }
    .month { font-family: Arial, sans-serif; font-size: 18px; font-weight: bold; text-anchor: start; }
    .day-number { font-family: Arial, sans-serif; font-size: 14px; text-anchor: end; }
    .event { font-family: Arial, sans-serif; font-size: 10px; text-anchor: start; }
    .event-rect { stroke: #666666; stroke-width: 0.5; }
    .cell { fill: white; stroke: #cccccc; stroke-width: 1; }
    .saturday { fill: #e3f2fd; }
    .sunday { fill: #ffebee; }
    .today { fill: #ffffa8; stroke: #cccccc; stroke-width: 1; }`;

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function cellClass(cell: DayCell): string {
  if (cell.isToday) return "cell today";
  if (cell.isSaturday) return "cell saturday";
  if (cell.isSunday) return "cell sunday";
  return "cell";
}

export function renderCalendarSvg(layout: CalendarLayout): string {
  const out: string[] = [];
  out.push(`<?xml version="1.0" encoding="UTF-8"?>`);
  out.push(`<svg width="${layout.width}" height="${layout.height}" xmlns="http://www.w3.org/2000/svg">`);
  out.push(`  <defs><style>${STYLE}\n  </style></defs>`);
  out.push(`  <rect width="${layout.width}" height="${layout.height}" fill="#fafafa"/>`);

  for (const h of layout.headers) {
    out.push(`  <rect x="${h.x}" y="${h.y}" width="${h.width}" height="${h.height}" class="cell" fill="#e0e0e0"/>`);
    const tx = h.x + Math.floor(h.width / 2);
    const ty = h.y + Math.floor(h.height / 2) + 5;
    out.push(`  <text x="${tx}" y="${ty}" class="header">${escapeXml(h.label)}</text>`);
  }

  // cells first so bands paint over them
  for (const c of layout.days) {
    out.push(`  <!-- ${c.dateISO} -->`);
    out.push(`  <rect x="${c.x}" y="${c.y}" width="${c.width}" height="${c.height}" class="${cellClass(c)}"/>`);
    if (c.monthLabel) {
      out.push(`  <text x="${c.x + 8}" y="${c.y + 20}" class="month">${escapeXml(c.monthLabel)}</text>`);
    }
    out.push(`  <text x="${c.x + c.width - 8}" y="${c.y + 20}" class="day-number">${c.dayOfMonth}</text>`);
  }

  for (const b of layout.bands) {
    const r = b.rect;
    out.push(
      `  <rect x="${r.x}" y="${r.y}" width="${r.width}" height="${r.height}" fill="${b.color}" class="event-rect"/>`
    );
    if (b.label) {
      out.push(`  <text x="${b.labelX}" y="${b.labelY}" class="event">${escapeXml(b.label)}</text>`);
    }
  }

  out.push(`</svg>`);
  return out.join("\n") + "\n";
}
