import { describe, expect, it } from "vitest";
import { DEFAULT_COLUMN_HEADERS } from "../../config/HeatmapConfig";
import { bindRows, bindRowsWithStats, copyRows, createSnapshot, nextSnapshot, type HeatmapRow } from "../HeatmapData";

type Detail = { day: number; count: number };
type Person = { name: string; details: Detail[] };

const byDay = (detail: Detail) => detail.day - 1;

describe("bindRows", () => {
  it("places details in the columns returned by the index mapper", () => {
    const first = { day: 1, count: 7000 };
    const third = { day: 3, count: 3000 };
    const rows = bindRows<Person, Detail>(
      [{ name: "Allen", details: [first, third] }],
      (person) => person.name,
      (person) => person.details,
      byDay
    );

    expect(rows).toHaveLength(1);
    expect(rows[0].label).toBe("Allen");
    expect([...rows[0].cells.keys()].sort()).toEqual([0, 2]);
    expect(rows[0].cells.has(1)).toBe(false);
    expect(rows[0].cells.get(0)).toBe(first);
    expect(rows[0].cells.get(2)).toBe(third);
  });

  it("uses each detail's position when no mapper is given", () => {
    const rows = bindRows(
      [{ label: "Reading", values: ["a", "b", "c"] }],
      (item) => item.label,
      (item) => item.values
    );
    expect([...rows[0].cells.entries()]).toEqual([
      [0, "a"],
      [1, "b"],
      [2, "c"]
    ]);
  });

  it("passes the detail position to the mapper", () => {
    const seen: Array<[string, number]> = [];
    bindRows(
      [{ label: "x", values: ["p", "q"] }],
      (item) => item.label,
      (item) => item.values,
      (detail, position) => {
        seen.push([detail, position]);
        return position;
      }
    );
    expect(seen).toEqual([
      ["p", 0],
      ["q", 1]
    ]);
  });

  it("drops details mapped to negative or non-integer columns", () => {
    const result = bindRowsWithStats(
      [{ label: "Allen", values: [-1, 0, 1.5, Number.NaN, 4] }],
      (item) => item.label,
      (item) => item.values,
      (value) => value
    );
    expect([...result.rows[0].cells.keys()]).toEqual([0, 4]);
    expect(result.stats).toEqual({ rows: 1, cells: 2, dropped: 3 });
  });

  it("keeps the last detail mapped to a column", () => {
    const rows = bindRows<Person, Detail>(
      [{ name: "Allen", details: [{ day: 2, count: 1 }, { day: 2, count: 2 }] }],
      (person) => person.name,
      (person) => person.details,
      byDay
    );
    expect(rows[0].cells.size).toBe(1);
    expect(rows[0].cells.get(1)?.count).toBe(2);
  });

  it("stores indices beyond the column axis", () => {
    const rows = bindRows(
      [{ label: "Allen", values: [99] }],
      (item) => item.label,
      (item) => item.values,
      (value) => value
    );
    expect(rows[0].cells.get(99)).toBe(99);
  });

  it("accepts any iterable for items and details", () => {
    function* people(): Generator<Person> {
      yield { name: "A", details: [{ day: 1, count: 1 }] };
      yield { name: "B", details: [] };
    }
    const rows = bindRows<Person, Detail>(people(), (p) => p.name, (p) => new Set(p.details), byDay);
    expect(rows.map((row) => row.label)).toEqual(["A", "B"]);
    expect(rows[1].cells.size).toBe(0);
  });

  it("propagates extractor failures", () => {
    expect(() =>
      bindRows(
        [{ label: "x" }],
        () => {
          throw new Error("label extractor failed");
        },
        () => []
      )
    ).toThrow("label extractor failed");

    expect(() =>
      bindRows(
        [{ label: "x" }],
        (item) => item.label,
        () => {
          throw new TypeError("details extractor failed");
        }
      )
    ).toThrow(TypeError);
  });
});

describe("snapshots", () => {
  it("starts with month headers", () => {
    const snapshot = createSnapshot();
    expect(snapshot.headers).toEqual(DEFAULT_COLUMN_HEADERS);
    expect(snapshot.columnCount).toBe(12);
    expect(snapshot.rows).toEqual([]);
  });

  it("takes the column count from supplied headers", () => {
    const week = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"];
    const snapshot = nextSnapshot(createSnapshot(), [], week);
    expect(snapshot.columnCount).toBe(7);
    expect(snapshot.headers).toEqual(week);

    week.push("Extra");
    expect(snapshot.headers).toHaveLength(7);
  });

  it("keeps headers and column count when none are supplied", () => {
    const withWeek = nextSnapshot(createSnapshot(), [], ["M", "T", "W"]);
    const rows: HeatmapRow<number>[] = [{ label: "a", cells: new Map([[0, 1]]) }];
    const refreshed = nextSnapshot(withWeek, rows, undefined);
    expect(refreshed.headers).toBe(withWeek.headers);
    expect(refreshed.columnCount).toBe(3);
    expect(refreshed.rows).toBe(rows);
  });

  it("treats empty headers as zero columns", () => {
    expect(nextSnapshot(createSnapshot(), [], []).columnCount).toBe(0);
  });

  it("copies caller rows and drops invalid keys", () => {
    const cells = new Map<number, string>([
      [0, "a"],
      [-3, "bad"]
    ]);
    const copied = copyRows([{ label: "row", cells }]);
    cells.set(1, "late");

    expect([...copied[0].cells.entries()]).toEqual([[0, "a"]]);
  });
});
