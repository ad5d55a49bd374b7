import { describe, it, expect } from "vitest";
import {
  assignOwnerColors,
  buildEvents,
  parseEventRecord,
  parseRecordDate,
} from "../src/lib/events";
import { PALETTE } from "../src/lib/palette";

describe("parseRecordDate", () => {
  it("accepts padded and unpadded dates", () => {
    expect(parseRecordDate("2024/03/01")).toBe("2024-03-01");
    expect(parseRecordDate("2024/3/1")).toBe("2024-03-01");
  });

  it("rejects impossible or differently formatted dates", () => {
    expect(parseRecordDate("2024/02/30")).toBeNull();
    expect(parseRecordDate("2024-03-01")).toBeNull();
    expect(parseRecordDate("")).toBeNull();
  });
});

describe("parseEventRecord", () => {
  it("builds an event from four fields, trimming only the owner", () => {
    expect(parseEventRecord(["2024/03/10", "2024/03/12", " Alice ", " Trip "])).toEqual({
      ok: true,
      event: { owner: "Alice", startISO: "2024-03-10", endISO: "2024-03-12", description: " Trip " },
    });
  });

  it("explains why a record is rejected", () => {
    expect(parseEventRecord(["2024/03/10", "2024/03/12", "Alice"])).toEqual({
      ok: false,
      reason: "expected 4 fields, got 3",
    });
    expect(parseEventRecord(["2024/13/01", "2024/03/12", "Alice", ""])).toEqual({
      ok: false,
      reason: 'bad start date "2024/13/01"',
    });
    expect(parseEventRecord(["2024/03/01", "soon", "Alice", ""])).toEqual({
      ok: false,
      reason: 'bad end date "soon"',
    });
    expect(parseEventRecord(["2024/03/12", "2024/03/10", "Alice", ""])).toEqual({
      ok: false,
      reason: "start 2024-03-12 is after end 2024-03-10",
    });
    expect(parseEventRecord(["2024/03/10", "2024/03/12", "  ", ""])).toEqual({
      ok: false,
      reason: "missing owner",
    });
  });
});

describe("buildEvents", () => {
  it("keeps the later of two records with the same key", () => {
    const { events } = buildEvents([
      ["2024/03/01", "2024/03/01", "A", "x"],
      ["2024/03/01", "2024/03/01", "A", "y"],
    ]);
    expect(events).toEqual([
      { owner: "A", startISO: "2024-03-01", endISO: "2024-03-01", description: "y" },
    ]);
  });

  it("keeps first-appearance order for deduplicated events", () => {
    const { events } = buildEvents([
      ["2024/03/01", "2024/03/02", "A", "x"],
      ["2024/03/05", "2024/03/06", "B", ""],
      ["2024/03/01", "2024/03/02", "A", "y"],
    ]);
    expect(events.map((e) => `${e.owner}:${e.description}`)).toEqual(["A:y", "B:"]);
  });

  it("treats a different range for the same owner as a separate event", () => {
    const { events } = buildEvents([
      ["2024/03/01", "2024/03/02", "A", "x"],
      ["2024/03/01", "2024/03/03", "A", "x"],
    ]);
    expect(events).toHaveLength(2);
  });

  it("skips malformed records and keeps loading", () => {
    const { events, rejected } = buildEvents([
      ["2024/03/01", "2024/03/02"],
      ["2024/03/05", "2024/03/06", "B", ""],
      ["2024/03/09", "2024/03/08", "C", ""],
    ]);
    expect(events.map((e) => e.owner)).toEqual(["B"]);
    expect(rejected.map((r) => [r.index, r.reason])).toEqual([
      [0, "expected 4 fields, got 2"],
      [2, "start 2024-03-09 is after end 2024-03-08"],
    ]);
  });

  it("colors owners by sorted name, independent of input order", () => {
    const records = [
      ["2024/03/01", "2024/03/01", "Carol", ""],
      ["2024/03/01", "2024/03/01", "alice", ""],
      ["2024/03/01", "2024/03/01", "Bob", ""],
    ];
    const forward = buildEvents(records).colors;
    const backward = buildEvents([...records].reverse()).colors;

    expect(Array.from(forward.entries())).toEqual([
      ["Bob", PALETTE[0]],
      ["Carol", PALETTE[1]],
      ["alice", PALETTE[2]],
    ]);
    expect(Array.from(backward.entries())).toEqual(Array.from(forward.entries()));
  });

  it("does not color owners whose only records were rejected", () => {
    const { colors } = buildEvents([
      ["2024/03/01", "2024/03/01", "A", ""],
      ["nope", "2024/03/01", "B", ""],
    ]);
    expect(Array.from(colors.keys())).toEqual(["A"]);
  });
});

describe("assignOwnerColors", () => {
  it("wraps around the palette", () => {
    const ev = (owner: string) => ({ owner, startISO: "2024-03-01", endISO: "2024-03-01", description: "" });
    const colors = assignOwnerColors([ev("C"), ev("A"), ev("B")], ["#111111", "#222222"]);
    expect(colors.get("A")).toBe("#111111");
    expect(colors.get("B")).toBe("#222222");
    expect(colors.get("C")).toBe("#111111");
  });
});
