/**
 * Building a track from a handful of pre-aligned reads
 *
 * Shows the record API, both display modes and the layout a renderer
 * would consume.
 */

import { AlignmentRecord, buildTrackLayout, mergeAdjacentIndels } from "../src";

// ============================================================================
// Example 1: One record
// ============================================================================

function example1_singleRecord() {
  console.log("\n=== Example 1: One record ===\n");

  const record = new AlignmentRecord("GATTACA", "GACTTACCA", {
    alignment: ["GA-TTAC-A", "GACTTACCA"],
  });

  console.log(record.toString());
  console.log(`Inserted bases: ${record.insertionCount}, insertion events: ${record.insertionEvents}`);
  console.log("Truncated colors:", record.displayRow({ truncate: true }).colors.join(" "));
  console.log("Markers:", record.insertionMarkers());
}

// ============================================================================
// Example 2: Substitutions written as indels
// ============================================================================

function example2_compactView() {
  console.log("\n=== Example 2: Compact view ===\n");

  const record = new AlignmentRecord("AAACCCAAA", "AAATTTAAA", {
    alignment: ["AAA---CCCAAA", "AAATTT---AAA"],
  });
  const compact = mergeAdjacentIndels(record.columns);

  console.log(`Column-exact edits: ${record.totalEdits}`);
  console.log(`Compact mismatches: ${compact.filter((c) => c.tag === "mismatch").length}`);
}

// ============================================================================
// Example 3: Layout for a renderer
// ============================================================================

function example3_layout() {
  console.log("\n=== Example 3: Layout ===\n");

  const records = [
    new AlignmentRecord("ACGTACGT", "ACGTTCGT", { alignment: ["ACGTACGT", "ACGTTCGT"] }),
    new AlignmentRecord("ACGTACGT", "ACGTACGT", { alignment: ["ACGTACGT", "ACGTACGT"] }),
    new AlignmentRecord("ACGTACGT", "ACGGTACG", { alignment: ["ACG-TACGT", "ACGGTACG-"] }),
  ];
  const layout = buildTrackLayout(records, { title: "Amplicon demo" });

  console.log(layout.title);
  console.log("Reference:", layout.reference.bases.join(""));
  for (const { row, markers } of layout.rows) {
    const labels = markers.map((m) => `${m.length}@${m.startPosition}`).join(",");
    console.log(`${row.symbols.join("")}|${labels}`);
  }
}

example1_singleRecord();
example2_compactView();
example3_layout();
