import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { csvLineOf, loadEventRecords, parseEventCsv } from "../src/lib/eventSource";

describe("parseEventCsv", () => {
  it("skips the header and blank lines, trims fields and allows ragged rows", () => {
    const raw = "\uFEFFstart,end,member,description\n2024/03/01,2024/03/02, Alice ,Trip\n\n2024/03/05,2024/03/05,Bob\n";
    expect(parseEventCsv(raw)).toEqual([
      ["2024/03/01", "2024/03/02", "Alice", "Trip"],
      ["2024/03/05", "2024/03/05", "Bob"],
    ]);
  });

  it("keeps quoted commas inside the description", () => {
    const raw = `start,end,member,description\n2024/03/01,2024/03/02,Alice,"Trip, long"\n`;
    expect(parseEventCsv(raw)).toEqual([["2024/03/01", "2024/03/02", "Alice", "Trip, long"]]);
  });
});

describe("loadEventRecords", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "calendar-csv-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("reads records from a file", () => {
    const file = path.join(dir, "vacation.csv");
    fs.writeFileSync(file, "start,end,member,description\n2024/03/01,2024/03/02,Alice,Trip\n");
    expect(loadEventRecords(file)).toEqual([["2024/03/01", "2024/03/02", "Alice", "Trip"]]);
  });

  it("treats a missing file as no events", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = path.join(dir, "missing.csv");
    expect(loadEventRecords(file)).toEqual([]);
    expect(warn).toHaveBeenCalledWith(`[events] ${file} not found, rendering without events`);
  });

  it("keeps stray quotes inside unquoted fields", () => {
    const file = path.join(dir, "vacation.csv");
    fs.writeFileSync(
      file,
      `start,end,member,description\n2024/03/01,2024/03/02,Alice,Trip\n2024/03/05,2024/03/06,Bob,12" snow\n2024/03/08,2024/03/09,Carol,Ski\n`
    );
    expect(loadEventRecords(file)).toEqual([
      ["2024/03/01", "2024/03/02", "Alice", "Trip"],
      ["2024/03/05", "2024/03/06", "Bob", '12" snow'],
      ["2024/03/08", "2024/03/09", "Carol", "Ski"],
    ]);
  });

  it("drops only the record it cannot parse", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const file = path.join(dir, "broken.csv");
    fs.writeFileSync(
      file,
      `start,end,member,description\n2024/03/01,2024/03/02,Alice,Trip\n2024/03/05,2024/03/06,Bob,Ski\n2024/03/08,2024/03/09,Carol,"unterminated\n`
    );
    expect(loadEventRecords(file)).toEqual([
      ["2024/03/01", "2024/03/02", "Alice", "Trip"],
      ["2024/03/05", "2024/03/06", "Bob", "Ski"],
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(/^\[events\] skipped /);
  });

  it("treats a source that cannot be read as no events", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    expect(loadEventRecords(dir)).toEqual([]);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("csvLineOf", () => {
  it("accounts for the header line", () => {
    expect(csvLineOf(0)).toBe(2);
  });
});
