// src/lib/eventSource.ts
import * as fs from "fs";
import type { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import type { RawEventRecord } from "./types";

/** CSV line number of a data record (the header is line 1). */
export function csvLineOf(index: number): number {
  return index + 2;
}

function describeSkip(err: CsvError | undefined): string {
  const lines: unknown = err?.lines;
  const where = typeof lines === "number" ? `line ${lines}` : "a record";
  return err ? `${where}: ${err.message}` : where;
}

/**
 * A record the parser cannot read is logged and dropped; the records around
 * it are kept. Stray quotes inside unquoted fields (`12" snow`) are literal.
 */
export function parseEventCsv(raw: string | Buffer): RawEventRecord[] {
  const rows: string[][] = parse(raw, {
    bom: true,
    from_line: 2, // header
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    skip_records_with_error: true,
    on_skip: (err) => {
      console.warn(`[events] skipped ${describeSkip(err)}`);
      return undefined;
    },
    trim: true,
  });
  return rows;
}

/**
 * Reads start,end,owner,description rows. A missing or unreadable file is
 * reported on the console and treated as an empty event list.
 */
export function loadEventRecords(csvPath: string): RawEventRecord[] {
  if (!fs.existsSync(csvPath)) {
    console.warn(`[events] ${csvPath} not found, rendering without events`);
    return [];
  }
  try {
    return parseEventCsv(fs.readFileSync(csvPath));
  } catch (err: unknown) {
    console.error(`[events] could not read ${csvPath}:`, err instanceof Error ? err.message : err);
    return [];
  }
}
