// src/app/api/calendar/route.ts
import { NextResponse } from "next/server";
import { buildCalendar } from "@/lib/calendar";
import { isISODate } from "@/lib/calendarWindow";
import { eventsCsvPath, layoutFromEnv } from "@/lib/config";
import { loadEventRecords } from "@/lib/eventSource";
import { renderCalendarSvg } from "@/lib/svg";

export const dynamic = "force-dynamic";

/**
 * GET /api/calendar?today=YYYY-MM-DD&format=json|svg
 * Lays out the four-week window around `today` (defaults to now) with the
 * events from the configured CSV.
 */
export async function GET(req: Request) {
  try {
    const url = new URL(req.url);
    const today = url.searchParams.get("today");
    const format = url.searchParams.get("format") ?? "json";

    if (today !== null && !isISODate(today)) {
      return NextResponse.json({ error: "Provide today=YYYY-MM-DD" }, { status: 400 });
    }
    if (format !== "json" && format !== "svg") {
      return NextResponse.json({ error: "format must be json or svg" }, { status: 400 });
    }

    const layout = buildCalendar({
      records: loadEventRecords(eventsCsvPath()),
      today: today ?? undefined,
      config: layoutFromEnv(),
    });
    if (layout.rejected.length) {
      console.warn(`[/api/calendar] skipped ${layout.rejected.length} malformed record(s)`);
    }

    if (format === "svg") {
      return new NextResponse(renderCalendarSvg(layout), {
        headers: { "Content-Type": "image/svg+xml; charset=utf-8" },
      });
    }
    return NextResponse.json(layout);
  } catch (err) {
    console.error("[/api/calendar] error:", err);
    // Always return JSON so the client doesn’t hit “Unexpected end of JSON input”
    return NextResponse.json({ error: "Internal Server Error" }, { status: 500 });
  }
}
