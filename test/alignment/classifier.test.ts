import { describe, expect, test } from "vitest";
import {
  classifyAlignment,
  classifyColumn,
  countEdits,
} from "../../src/alignment/classifier";
import { MalformedAlignmentError } from "../../src/errors";
import { EditTag } from "../../src/types";

describe("classifyColumn", () => {
  test("applies the column rules", () => {
    expect(classifyColumn("A", "A", 0)).toBe(EditTag.MATCH);
    expect(classifyColumn("A", "T", 0)).toBe(EditTag.MISMATCH);
    expect(classifyColumn("-", "T", 0)).toBe(EditTag.INSERTION);
    expect(classifyColumn("A", "-", 0)).toBe(EditTag.DELETION);
  });

  test("compares bases case-sensitively", () => {
    expect(classifyColumn("a", "A", 0)).toBe(EditTag.MISMATCH);
  });

  test("rejects a column gapped on both sides", () => {
    expect(() => classifyColumn("-", "-", 7)).toThrow(MalformedAlignmentError);
  });
});

describe("classifyAlignment", () => {
  test("identical sequences are all matches", () => {
    const { edits, counts } = classifyAlignment("AAAA", "AAAA");

    expect(edits).toEqual([EditTag.MATCH, EditTag.MATCH, EditTag.MATCH, EditTag.MATCH]);
    expect(counts).toEqual({ matchCount: 4, mutationCount: 0, insertionCount: 0, deletionCount: 0 });
  });

  test("counts a single mismatch at the last column", () => {
    const { edits, counts } = classifyAlignment("AAAA", "AAAT");

    expect(edits[3]).toBe(EditTag.MISMATCH);
    expect(edits.slice(0, 3)).toEqual([EditTag.MATCH, EditTag.MATCH, EditTag.MATCH]);
    expect(counts.mutationCount).toBe(1);
    expect(counts.insertionCount).toBe(0);
    expect(counts.deletionCount).toBe(0);
  });

  test("gap in the target is an insertion", () => {
    const { edits, counts } = classifyAlignment("AAAA-", "AAAAA");

    expect(edits).toEqual([
      EditTag.MATCH,
      EditTag.MATCH,
      EditTag.MATCH,
      EditTag.MATCH,
      EditTag.INSERTION,
    ]);
    expect(counts.insertionCount).toBe(1);
  });

  test("gap in the query is a deletion", () => {
    const { edits, counts } = classifyAlignment("AAAAA", "AAAA-");

    expect(edits[4]).toBe(EditTag.DELETION);
    expect(counts.deletionCount).toBe(1);
  });

  test("adjacent insertion and deletion stay separate columns", () => {
    const { edits } = classifyAlignment("A-A", "AA-");

    expect(edits).toEqual([EditTag.MATCH, EditTag.INSERTION, EditTag.DELETION]);
  });

  test("records the drawn base for each column", () => {
    const { columns } = classifyAlignment("AC-GA", "ATTG-");

    expect(columns).toEqual([
      { tag: EditTag.MATCH, base: "A" },
      { tag: EditTag.MISMATCH, base: "T" },
      { tag: EditTag.INSERTION, base: "T" },
      { tag: EditTag.MATCH, base: "G" },
      { tag: EditTag.DELETION, base: " " },
    ]);
  });

  test("counts add up to the alignment length", () => {
    const target = "AC--GTTA-CA";
    const query = "ACGGG-TCCCA";
    const { edits, counts } = classifyAlignment(target, query);

    expect(edits).toHaveLength(target.length);
    expect(
      counts.matchCount + counts.mutationCount + counts.insertionCount + counts.deletionCount
    ).toBe(target.length);
    expect(counts).toEqual({ matchCount: 6, mutationCount: 1, insertionCount: 3, deletionCount: 1 });
  });

  test("empty pair classifies to nothing", () => {
    const { edits, counts } = classifyAlignment("", "");

    expect(edits).toEqual([]);
    expect(counts).toEqual({ matchCount: 0, mutationCount: 0, insertionCount: 0, deletionCount: 0 });
  });

  test("fails on a co-gapped column instead of calling it a match", () => {
    try {
      classifyAlignment("A-A", "A-A");
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedAlignmentError);
      const malformed = error as MalformedAlignmentError;
      expect(malformed.reason).toBe("co-gapped-column");
      expect(malformed.column).toBe(1);
      expect(malformed.code).toBe("MALFORMED_ALIGNMENT");
    }
  });

  test("fails on unequal lengths", () => {
    try {
      classifyAlignment("AAAA", "AAA");
      expect.unreachable("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedAlignmentError);
      expect((error as MalformedAlignmentError).reason).toBe("length-mismatch");
      expect((error as MalformedAlignmentError).message).toBe(
        "Aligned sequences differ in length: target 4, query 3"
      );
    }
  });
});

describe("countEdits", () => {
  test("counts columns, not runs", () => {
    const counts = countEdits([
      EditTag.INSERTION,
      EditTag.INSERTION,
      EditTag.INSERTION,
      EditTag.MATCH,
      EditTag.DELETION,
    ]);

    expect(counts.insertionCount).toBe(3);
    expect(counts.deletionCount).toBe(1);
    expect(counts.matchCount).toBe(1);
  });
});
