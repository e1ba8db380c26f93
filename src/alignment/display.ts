/**
 * Display rows for rendering an alignment as a colored track
 *
 * Full mode emits one cell per alignment column. Truncated mode drops the
 * insertion columns entirely; the dropped runs are reported separately by
 * {@link collapseInsertions} so renderers can draw a length-labeled marker
 * in their place.
 *
 * @module alignment/display
 */

import { type DisplayOptions, resolveDisplayOptions } from "../config";
import {
  type AlignmentColumn,
  BASE_COLORS,
  type ColorToken,
  DELETION_COLOR,
  type DisplayRow,
  EDIT_SYMBOLS,
  EditTag,
  FALLBACK_BASE_COLOR,
  MATCH_COLOR,
} from "../types";

/**
 * Base-identity color, falling back for letters other than A, C, G, T
 */
export function baseColor(base: string): ColorToken {
  return BASE_COLORS[base] ?? FALLBACK_BASE_COLOR;
}

/**
 * Color of one classified column
 */
export function columnColor(column: AlignmentColumn): ColorToken {
  switch (column.tag) {
    case EditTag.MATCH:
      return MATCH_COLOR;
    case EditTag.DELETION:
      return DELETION_COLOR;
    case EditTag.MISMATCH:
    case EditTag.INSERTION:
      return baseColor(column.base);
  }
}

/**
 * Build the display row for a sequence of classified columns
 *
 * @example
 * ```typescript
 * const row = buildDisplayRow(record.columns, { truncate: true });
 * row.colors.length === record.length - record.insertionCount; // true
 * ```
 */
export function buildDisplayRow(
  columns: readonly AlignmentColumn[],
  options: DisplayOptions = {}
): DisplayRow {
  const { truncate } = resolveDisplayOptions(options);

  const colors: ColorToken[] = [];
  const symbols: string[] = [];
  const bases: string[] = [];

  for (const column of columns) {
    if (truncate && column.tag === EditTag.INSERTION) continue;
    colors.push(columnColor(column));
    symbols.push(EDIT_SYMBOLS[column.tag]);
    bases.push(column.base);
  }

  return { colors, symbols, bases };
}
