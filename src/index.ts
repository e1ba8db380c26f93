/**
 * alntrack - alignment-to-track annotation
 *
 * Turns a gapped pairwise alignment into per-column edit tags, counts,
 * colored display rows and collapsed insertion markers, ready for a
 * renderer to draw as a track.
 */

// Aligner collaborator
export { type Aligner, AlignerService, type AlignerServiceShape, alignWith, trivialAlignment } from "./aligner";
// Alignment core
export {
  ALPHABET_PATTERNS,
  AlignmentRecord,
  type AlignmentRecordInit,
  alignmentSortKey,
  type BatchError,
  baseColor,
  buildDisplayRow,
  buildRecord,
  buildTrackLayout,
  type Classification,
  classifyAlignment,
  classifyColumn,
  collapseInsertions,
  columnColor,
  compareAlignments,
  countEdits,
  editBlocks,
  type EditTotals,
  isBetterAlignment,
  layoutTitle,
  mergeAdjacentIndels,
  type PreparedBatch,
  prepareAlignments,
  type RejectedInput,
  type TrackLayout,
  type TrackRow,
  ungap,
  validateNonEmpty,
  validateRoundTrip,
  validateSequence,
  validateSequences,
} from "./alignment";
// Configuration
export {
  type AlignmentOptions,
  AlignmentOptionsSchema,
  AlphabetMode,
  AlphabetModeSchema,
  DEFAULT_ALIGNMENT_OPTIONS,
  DEFAULT_DISPLAY_OPTIONS,
  DEFAULT_TRACK_LAYOUT_OPTIONS,
  type DisplayOptions,
  DisplayOptionsSchema,
  type ResolvedAlignmentOptions,
  type ResolvedDisplayOptions,
  type ResolvedTrackLayoutOptions,
  resolveAlignmentOptions,
  resolveDisplayOptions,
  resolveTrackLayoutOptions,
  type TrackLayoutOptions,
  TrackLayoutOptionsSchema,
} from "./config";
// Error types
export {
  AlignerFailureError,
  AlntrackError,
  EmptyInputError,
  isRecordError,
  MalformedAlignmentError,
  type MalformedAlignmentReason,
  type RecordError,
  SequenceError,
  ValidationError,
} from "./errors";
// Core types
export {
  type AlignmentColumn,
  type AlignmentInput,
  AlignmentInputSchema,
  type AlignmentPair,
  AlignmentPairSchema,
  BASE_COLORS,
  ColorToken,
  DELETION_COLOR,
  type DisplayRow,
  EDIT_SYMBOLS,
  type EditBlock,
  type EditCounts,
  EditTag,
  FALLBACK_BASE_COLOR,
  GAP,
  GappedSequenceSchema,
  INSERTION_MARKER_COLOR,
  type InsertionMarker,
  MATCH_COLOR,
} from "./types";
