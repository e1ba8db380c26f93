/**
 * Core type definitions for alignment annotation
 *
 * A pairwise alignment is two equal-length strings over a nucleotide (or
 * other single-letter) alphabet plus the gap character. Everything derived
 * from it - edit tags, display rows, insertion markers - is described here
 * together with the arktype schemas used to check values at the boundary.
 */

import { type } from "arktype";

// =============================================================================
// PRIMITIVES
// =============================================================================

/**
 * The only gap marker accepted in gapped sequences
 */
export const GAP = "-";

/**
 * Gapped sequence: the sequence alphabet plus the gap marker
 */
export const GappedSequenceSchema = type(/^[A-Za-z*-]*$/);

/**
 * Two gapped sequences, target first, query second
 */
export const AlignmentPairSchema = type([GappedSequenceSchema, GappedSequenceSchema]);

/**
 * Target and query gapped strings as produced by an aligner
 */
export type AlignmentPair = readonly [targetAlignment: string, queryAlignment: string];

// =============================================================================
// EDIT TAGS
// =============================================================================

/**
 * Per-column classification of an alignment
 *
 * - MATCH: both bases present and equal
 * - MISMATCH: both bases present and different
 * - INSERTION: query has a base where the target is gapped
 * - DELETION: target has a base where the query is gapped
 */
export const EditTag = {
  MATCH: "match",
  MISMATCH: "mismatch",
  INSERTION: "insertion",
  DELETION: "deletion",
} as const;

/**
 * Type for edit tag values
 */
export type EditTag = (typeof EditTag)[keyof typeof EditTag];

/**
 * Single-character symbol drawn for each edit tag
 */
export const EDIT_SYMBOLS: Readonly<Record<EditTag, string>> = {
  match: " ",
  mismatch: "M",
  insertion: "I",
  deletion: "D",
};

/**
 * One alignment column: its tag and the base drawn in it
 *
 * `base` is the target base for matches, the query base for mismatches and
 * insertions, and a space for deletions.
 */
export interface AlignmentColumn {
  readonly tag: EditTag;
  readonly base: string;
}

/**
 * Column counts by edit kind
 *
 * `insertionCount` and `deletionCount` count columns (bases), not runs.
 * The number of insertion events is the number of {@link InsertionMarker}s.
 */
export interface EditCounts {
  readonly matchCount: number;
  readonly mutationCount: number;
  readonly insertionCount: number;
  readonly deletionCount: number;
}

/**
 * Maximal run of equal edit tags, `[start, end)` in alignment columns
 */
export interface EditBlock {
  readonly tag: EditTag;
  readonly start: number;
  readonly end: number;
}

// =============================================================================
// DISPLAY
// =============================================================================

/**
 * Color tokens understood by rendering code
 */
export const ColorToken = {
  GREEN: "green",
  RED: "red",
  GOLD: "gold",
  BLUE: "blue",
  GRAY: "gray",
  WHITE: "white",
  PURPLE: "purple",
} as const;

export type ColorToken = (typeof ColorToken)[keyof typeof ColorToken];

/**
 * Base-identity colors used for mismatches and insertions
 */
export const BASE_COLORS: Readonly<Record<string, ColorToken>> = {
  A: ColorToken.GREEN,
  T: ColorToken.RED,
  G: ColorToken.GOLD,
  C: ColorToken.BLUE,
};

/** Color for bases outside {@link BASE_COLORS} */
export const FALLBACK_BASE_COLOR: ColorToken = ColorToken.GRAY;
export const MATCH_COLOR: ColorToken = ColorToken.GRAY;
export const DELETION_COLOR: ColorToken = ColorToken.WHITE;
/** Background of the length-labeled marker drawn for a collapsed insertion run */
export const INSERTION_MARKER_COLOR: ColorToken = ColorToken.PURPLE;

/**
 * Collapsed insertion run
 *
 * `startPosition` is an index into the truncated row (insertion columns
 * removed): the number of non-insertion columns preceding the run.
 */
export interface InsertionMarker {
  readonly startPosition: number;
  readonly length: number;
}

/**
 * Display-ready row for one alignment
 *
 * All three arrays have the same length: the alignment length in full mode,
 * or the alignment length minus the insertion count in truncated mode.
 */
export interface DisplayRow {
  readonly colors: readonly ColorToken[];
  readonly symbols: readonly string[];
  readonly bases: readonly string[];
}

// =============================================================================
// BATCH INPUT
// =============================================================================

/**
 * One row of a batch: sequences plus an optional pre-computed alignment
 */
export const AlignmentInputSchema = type({
  target: "string",
  query: "string",
  "alignment?": AlignmentPairSchema,
});

export type AlignmentInput = typeof AlignmentInputSchema.infer;
