/**
 * Alignment classification, display rows and layout
 */

export {
  type BatchError,
  buildRecord,
  type PreparedBatch,
  prepareAlignments,
  type RejectedInput,
} from "./batch";
export { type Classification, classifyAlignment, classifyColumn, countEdits } from "./classifier";
export { baseColor, buildDisplayRow, columnColor } from "./display";
export { mergeAdjacentIndels } from "./indels";
export { collapseInsertions, editBlocks } from "./insertions";
export { buildTrackLayout, layoutTitle, type TrackLayout, type TrackRow } from "./layout";
export {
  alignmentSortKey,
  compareAlignments,
  type EditTotals,
  isBetterAlignment,
} from "./ordering";
export { AlignmentRecord, type AlignmentRecordInit } from "./record";
export {
  ALPHABET_PATTERNS,
  ungap,
  validateNonEmpty,
  validateRoundTrip,
  validateSequence,
  validateSequences,
} from "./validation";
