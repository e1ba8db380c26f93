/**
 * Edit runs and insertion collapsing
 *
 * @module alignment/insertions
 */

import { type EditBlock, EditTag, type InsertionMarker } from "../types";

/**
 * Yield maximal runs of equal tags in column order
 *
 * @example
 * ```typescript
 * [...editBlocks(["match", "insertion", "insertion", "match"])];
 * // [{ tag: "match", start: 0, end: 1 },
 * //  { tag: "insertion", start: 1, end: 3 },
 * //  { tag: "match", start: 3, end: 4 }]
 * ```
 */
export function* editBlocks(edits: readonly EditTag[]): Generator<EditBlock> {
  let start = 0;
  for (let i = 1; i <= edits.length; i++) {
    const tag = edits[start];
    if (tag === undefined) return;
    if (i === edits.length || edits[i] !== tag) {
      yield { tag, start, end: i };
      start = i;
    }
  }
}

/**
 * Collapse each insertion run into a marker positioned in truncated coordinates
 *
 * A marker's `startPosition` counts the non-insertion columns before the run,
 * so it is the index in the truncated row at which the run would have been
 * drawn. Marker lengths sum to the insertion count.
 */
export function collapseInsertions(edits: readonly EditTag[]): InsertionMarker[] {
  const markers: InsertionMarker[] = [];
  let insertedSoFar = 0;

  for (const block of editBlocks(edits)) {
    if (block.tag !== EditTag.INSERTION) continue;
    const length = block.end - block.start;
    markers.push({ startPosition: block.start - insertedSoFar, length });
    insertedSoFar += length;
  }

  return markers;
}
