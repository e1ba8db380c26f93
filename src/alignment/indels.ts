/**
 * Compact view that folds adjacent insertion/deletion blocks into substitutions
 *
 * Aligners frequently express a substitution as a deletion immediately
 * followed (or preceded) by an insertion. This view pairs such blocks up:
 * the overlapping part of each pair becomes mismatch columns carrying the
 * inserted query bases, and whatever is left of the longer block is kept.
 * The record's own column-exact edits are not affected.
 *
 * @module alignment/indels
 */

import { type AlignmentColumn, type EditBlock, EditTag } from "../types";
import { editBlocks } from "./insertions";

function isIndelPair(previous: EditTag, current: EditTag): boolean {
  return (
    (previous === EditTag.INSERTION && current === EditTag.DELETION) ||
    (previous === EditTag.DELETION && current === EditTag.INSERTION)
  );
}

function pushRange(
  out: AlignmentColumn[],
  columns: readonly AlignmentColumn[],
  start: number,
  end: number
): void {
  for (let i = start; i < end; i++) {
    out.push(columns[i]);
  }
}

/**
 * Merge adjacent insertion/deletion blocks into mismatch columns
 *
 * @example
 * ```typescript
 * // target AAA---CCCAAA, query AAATTT---AAA
 * const compact = mergeAdjacentIndels(record.columns);
 * compact.map((c) => c.base).join(""); // "AAATTTAAA"
 * compact.filter((c) => c.tag === "mismatch").length; // 3
 * ```
 */
export function mergeAdjacentIndels(columns: readonly AlignmentColumn[]): AlignmentColumn[] {
  const merged: AlignmentColumn[] = [];
  let pending: EditBlock | undefined;

  for (const block of editBlocks(columns.map((column) => column.tag))) {
    if (pending === undefined || !isIndelPair(pending.tag, block.tag)) {
      if (pending !== undefined) pushRange(merged, columns, pending.start, pending.end);
      pending = block;
      continue;
    }

    const overlap = Math.min(pending.end - pending.start, block.end - block.start);
    pushRange(merged, columns, pending.start, pending.end - overlap);

    // Substituted bases come from the insertion side of the pair
    const insertedFrom = pending.tag === EditTag.INSERTION ? pending.end - overlap : block.start;
    for (let i = 0; i < overlap; i++) {
      merged.push({ tag: EditTag.MISMATCH, base: columns[insertedFrom + i].base });
    }

    pending = { tag: block.tag, start: block.start + overlap, end: block.end };
  }

  if (pending !== undefined) pushRange(merged, columns, pending.start, pending.end);
  return merged;
}
