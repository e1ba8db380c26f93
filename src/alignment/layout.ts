/**
 * Track layout: the data a renderer needs to draw a stack of alignments
 *
 * Records are ordered best-first, a reference row built from the leading
 * record's target is placed on top, and every row is padded to a common
 * width. Nothing here draws; the layout is plain data.
 *
 * @module alignment/layout
 */

import { resolveTrackLayoutOptions, type TrackLayoutOptions } from "../config";
import { ColorToken, type DisplayRow, INSERTION_MARKER_COLOR, type InsertionMarker } from "../types";
import { baseColor } from "./display";
import { compareAlignments } from "./ordering";
import type { AlignmentRecord } from "./record";

const PAD_COLOR: ColorToken = ColorToken.WHITE;
const PAD_TEXT = " ";

/**
 * One alignment row of a layout
 */
export interface TrackRow {
  readonly record: AlignmentRecord;
  /** Display row padded to the layout width */
  readonly row: DisplayRow;
  /** Collapsed insertion runs; always empty in full mode */
  readonly markers: readonly InsertionMarker[];
}

export interface TrackLayout {
  readonly title: string;
  readonly truncated: boolean;
  readonly width: number;
  /** Background for the length labels drawn at insertion markers */
  readonly markerColor: ColorToken;
  /** Target bases of the best record, colored by base identity */
  readonly reference: DisplayRow;
  /** Rows ordered best match first */
  readonly rows: readonly TrackRow[];
}

function padRow(row: DisplayRow, width: number): DisplayRow {
  const missing = Math.max(0, width - row.colors.length);
  if (missing === 0) return row;
  const text = Array<string>(missing).fill(PAD_TEXT);
  return {
    colors: [...row.colors, ...Array<ColorToken>(missing).fill(PAD_COLOR)],
    symbols: [...row.symbols, ...text],
    bases: [...row.bases, ...text],
  };
}

function referenceRow(target: string): DisplayRow {
  const bases = [...target];
  return {
    colors: bases.map(baseColor),
    symbols: bases.map(() => PAD_TEXT),
    bases,
  };
}

export function layoutTitle(count: number, title?: string): string {
  return title !== undefined && title !== ""
    ? `${title} | Alignments: ${count}`
    : `Alignments: ${count}`;
}

/**
 * Build a padded, ordered layout for a set of records
 *
 * @example
 * ```typescript
 * const layout = buildTrackLayout(records, { title: "Amplicon 3" });
 * layout.title;         // "Amplicon 3 | Alignments: 12"
 * layout.rows[0].record // the record with the fewest edits
 * ```
 */
export function buildTrackLayout(
  records: readonly AlignmentRecord[],
  options: TrackLayoutOptions = {}
): TrackLayout {
  const { truncate, title } = resolveTrackLayoutOptions(options);
  const sorted = [...records].sort(compareAlignments);

  const reference = referenceRow(sorted[0]?.target ?? "");
  const rows = sorted.map((record) => ({
    record,
    row: record.displayRow({ truncate }),
    markers: truncate ? record.insertionMarkers() : [],
  }));

  const width = rows.reduce((max, { row }) => Math.max(max, row.colors.length), reference.colors.length);

  return {
    title: layoutTitle(records.length, title),
    truncated: truncate,
    width,
    markerColor: INSERTION_MARKER_COLOR,
    reference: padRow(reference, width),
    rows: rows.map((entry) => ({ ...entry, row: padRow(entry.row, width) })),
  };
}
