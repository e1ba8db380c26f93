import { describe, expect, test } from "vitest";
import { buildTrackLayout, layoutTitle } from "../../src/alignment/layout";
import { AlignmentRecord } from "../../src/alignment/record";
import { ColorToken } from "../../src/types";

const { GRAY, GREEN, GOLD, PURPLE, RED, WHITE } = ColorToken;

const mismatched = new AlignmentRecord("AAAA", "AAAT", { alignment: ["AAAA", "AAAT"] });
const exact = new AlignmentRecord("AAAA", "AAAA", { alignment: ["AAAA", "AAAA"] });
const inserted = new AlignmentRecord("AAAA", "AAGAA", { alignment: ["AA-AA", "AAGAA"] });

describe("layoutTitle", () => {
  test("includes the caller title when given", () => {
    expect(layoutTitle(3, "Demo")).toBe("Demo | Alignments: 3");
    expect(layoutTitle(3)).toBe("Alignments: 3");
    expect(layoutTitle(0, "")).toBe("Alignments: 0");
  });
});

describe("buildTrackLayout", () => {
  test("truncated layout orders rows best first and attaches markers", () => {
    const layout = buildTrackLayout([mismatched, exact, inserted], { title: "Demo" });

    expect(layout.title).toBe("Demo | Alignments: 3");
    expect(layout.truncated).toBe(true);
    expect(layout.width).toBe(4);
    expect(layout.rows.map((row) => row.record)).toEqual([exact, mismatched, inserted]);
    expect(layout.reference.colors).toEqual([GREEN, GREEN, GREEN, GREEN]);
    expect(layout.reference.bases).toEqual(["A", "A", "A", "A"]);
    expect(layout.rows[1].row.colors).toEqual([GRAY, GRAY, GRAY, RED]);
    expect(layout.rows[2].row.colors).toEqual([GRAY, GRAY, GRAY, GRAY]);
    expect(layout.rows[2].markers).toEqual([{ startPosition: 2, length: 1 }]);
    expect(layout.rows[0].markers).toEqual([]);
    expect(layout.markerColor).toBe(PURPLE);
  });

  test("full layout pads every row to the widest", () => {
    const layout = buildTrackLayout([mismatched, exact, inserted], { truncate: false });

    expect(layout.width).toBe(5);
    expect(layout.reference.colors).toEqual([GREEN, GREEN, GREEN, GREEN, WHITE]);
    expect(layout.reference.bases).toEqual(["A", "A", "A", "A", " "]);
    expect(layout.rows[0].row.colors).toEqual([GRAY, GRAY, GRAY, GRAY, WHITE]);
    expect(layout.rows[0].row.symbols).toEqual([" ", " ", " ", " ", " "]);
    expect(layout.rows[2].row.colors).toEqual([GRAY, GRAY, GOLD, GRAY, GRAY]);
    expect(layout.rows[2].row.symbols).toEqual([" ", " ", "I", " ", " "]);
    expect(layout.rows[2].markers).toEqual([]);
  });

  test("does not reorder the caller's array", () => {
    const records = [mismatched, exact];
    buildTrackLayout(records);

    expect(records).toEqual([mismatched, exact]);
  });

  test("no records gives an empty layout", () => {
    const layout = buildTrackLayout([]);

    expect(layout.title).toBe("Alignments: 0");
    expect(layout.width).toBe(0);
    expect(layout.rows).toEqual([]);
    expect(layout.reference).toEqual({ colors: [], symbols: [], bases: [] });
  });
});
