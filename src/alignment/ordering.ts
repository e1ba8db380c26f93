/**
 * Quality order over alignment records
 *
 * Fewer total edits (insertions + deletions + mismatches) sorts first.
 * Equal totals compare as equal, so a stable sort keeps their input order.
 *
 * @module alignment/ordering
 */

/**
 * The counts the order depends on
 */
export interface EditTotals {
  readonly insertionCount: number;
  readonly deletionCount: number;
  readonly mutationCount: number;
}

/**
 * Sort key: total number of edit columns
 */
export function alignmentSortKey(record: EditTotals): number {
  return record.insertionCount + record.deletionCount + record.mutationCount;
}

/**
 * Comparator for `Array.prototype.sort`
 *
 * @example
 * ```typescript
 * const rows = [...records].sort(compareAlignments);
 * ```
 */
export function compareAlignments(a: EditTotals, b: EditTotals): number {
  return alignmentSortKey(a) - alignmentSortKey(b);
}

/**
 * Strict "better match than" relation
 */
export function isBetterAlignment(a: EditTotals, b: EditTotals): boolean {
  return alignmentSortKey(a) < alignmentSortKey(b);
}
