/**
 * Column-by-column classification of a gapped alignment pair
 *
 * Walks the target and query gapped strings in lockstep and assigns one
 * {@link EditTag} per column. Classification is a pure function of the two
 * strings; the only failure modes are unequal lengths and columns where both
 * strings are gapped.
 *
 * @module alignment/classifier
 */

import { MalformedAlignmentError } from "../errors";
import { type AlignmentColumn, type EditCounts, EditTag, GAP } from "../types";

/**
 * Result of classifying one alignment pair
 */
export interface Classification {
  readonly edits: readonly EditTag[];
  readonly columns: readonly AlignmentColumn[];
  readonly counts: EditCounts;
}

/**
 * Classify a single column
 *
 * @throws {MalformedAlignmentError} When both characters are gaps
 */
export function classifyColumn(targetChar: string, queryChar: string, column: number): EditTag {
  const targetGapped = targetChar === GAP;
  const queryGapped = queryChar === GAP;

  if (targetGapped && queryGapped) {
    throw new MalformedAlignmentError(
      `Both sequences are gapped at column ${column}`,
      "co-gapped-column",
      column
    );
  }
  if (targetGapped) return EditTag.INSERTION;
  if (queryGapped) return EditTag.DELETION;
  return targetChar === queryChar ? EditTag.MATCH : EditTag.MISMATCH;
}

/**
 * Character drawn for a classified column
 */
function columnBase(tag: EditTag, targetChar: string, queryChar: string): string {
  switch (tag) {
    case EditTag.MATCH:
      return targetChar;
    case EditTag.MISMATCH:
    case EditTag.INSERTION:
      return queryChar;
    case EditTag.DELETION:
      return " ";
  }
}

/**
 * Count columns of each edit kind
 */
export function countEdits(edits: readonly EditTag[]): EditCounts {
  let matchCount = 0;
  let mutationCount = 0;
  let insertionCount = 0;
  let deletionCount = 0;

  for (const tag of edits) {
    switch (tag) {
      case EditTag.MATCH:
        matchCount++;
        break;
      case EditTag.MISMATCH:
        mutationCount++;
        break;
      case EditTag.INSERTION:
        insertionCount++;
        break;
      case EditTag.DELETION:
        deletionCount++;
        break;
    }
  }

  return { matchCount, mutationCount, insertionCount, deletionCount };
}

/**
 * Classify every column of a gapped alignment pair
 *
 * @throws {MalformedAlignmentError} When the strings differ in length or a
 *   column is gapped on both sides
 *
 * @example
 * ```typescript
 * const { edits, counts } = classifyAlignment("AAAA-", "AAAAA");
 * // edits: ["match", "match", "match", "match", "insertion"]
 * // counts.insertionCount: 1
 * ```
 */
export function classifyAlignment(targetAlignment: string, queryAlignment: string): Classification {
  if (targetAlignment.length !== queryAlignment.length) {
    throw new MalformedAlignmentError(
      `Aligned sequences differ in length: target ${targetAlignment.length}, query ${queryAlignment.length}`,
      "length-mismatch"
    );
  }

  const edits: EditTag[] = [];
  const columns: AlignmentColumn[] = [];

  for (let i = 0; i < targetAlignment.length; i++) {
    const targetChar = targetAlignment.charAt(i);
    const queryChar = queryAlignment.charAt(i);
    const tag = classifyColumn(targetChar, queryChar, i);
    edits.push(tag);
    columns.push({ tag, base: columnBase(tag, targetChar, queryChar) });
  }

  return { edits, columns, counts: countEdits(edits) };
}
