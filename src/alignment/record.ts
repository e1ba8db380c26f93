/**
 * Immutable alignment record
 *
 * An {@link AlignmentRecord} pairs a target and query with their gapped
 * alignment and classifies every column once, at construction. Counts,
 * edits and columns are frozen afterwards; display rows and insertion
 * markers are derived on demand and may be requested repeatedly with
 * different truncation settings.
 *
 * @module alignment/record
 * @since v0.1.0
 */

import { type Aligner, alignWith, trivialAlignment } from "../aligner/aligner";
import { type AlignmentOptions, type DisplayOptions, resolveAlignmentOptions } from "../config";
import { AlignerFailureError } from "../errors";
import type { AlignmentColumn, AlignmentPair, DisplayRow, EditTag, InsertionMarker } from "../types";
import { classifyAlignment } from "./classifier";
import { buildDisplayRow } from "./display";
import { collapseInsertions } from "./insertions";
import { validateRoundTrip, validateSequences } from "./validation";

/**
 * Construction inputs besides the two sequences
 *
 * Supply either `alignment` (a pre-computed gapped pair) or `aligner`. When
 * both are given the alignment wins and the aligner is never called.
 */
export interface AlignmentRecordInit extends AlignmentOptions {
  alignment?: AlignmentPair;
  aligner?: Aligner;
}

/**
 * Classified pairwise alignment
 *
 * @example
 * ```typescript
 * const record = new AlignmentRecord("AAAA", "AAAAA", { alignment: ["AAAA-", "AAAAA"] });
 * record.insertionCount;     // 1
 * record.insertionMarkers(); // [{ startPosition: 4, length: 1 }]
 * ```
 */
export class AlignmentRecord {
  readonly target: string;
  readonly query: string;
  readonly targetAlignment: string;
  readonly queryAlignment: string;
  readonly edits: readonly EditTag[];
  readonly columns: readonly AlignmentColumn[];
  readonly matchCount: number;
  readonly mutationCount: number;
  /** Inserted bases (columns), not insertion events */
  readonly insertionCount: number;
  /** Deleted bases (columns) */
  readonly deletionCount: number;

  /**
   * @throws {EmptyInputError} When `allowEmpty` is false and a sequence is empty
   * @throws {SequenceError} When a sequence leaves the selected alphabet
   * @throws {AlignerFailureError} When no alignment is supplied and none can be obtained
   * @throws {MalformedAlignmentError} When the gapped pair is not an alignment of the sequences
   */
  constructor(target: string, query: string, init: AlignmentRecordInit = {}) {
    const { alignment, aligner, ...options } = init;
    validateSequences(target, query, resolveAlignmentOptions(options));

    const [targetAlignment, queryAlignment] = alignment ?? obtainAlignment(target, query, aligner);
    const { edits, columns, counts } = classifyAlignment(targetAlignment, queryAlignment);
    validateRoundTrip(targetAlignment, target, "target");
    validateRoundTrip(queryAlignment, query, "query");

    this.target = target;
    this.query = query;
    this.targetAlignment = targetAlignment;
    this.queryAlignment = queryAlignment;
    this.edits = Object.freeze(edits);
    this.columns = Object.freeze(columns.map((column) => Object.freeze(column)));
    this.matchCount = counts.matchCount;
    this.mutationCount = counts.mutationCount;
    this.insertionCount = counts.insertionCount;
    this.deletionCount = counts.deletionCount;
    Object.freeze(this);
  }

  /**
   * Number of alignment columns
   */
  get length(): number {
    return this.edits.length;
  }

  /**
   * Insertion, deletion and mismatch columns combined
   */
  get totalEdits(): number {
    return this.insertionCount + this.deletionCount + this.mutationCount;
  }

  /**
   * Number of insertion runs (events), as opposed to inserted bases
   */
  get insertionEvents(): number {
    return this.insertionMarkers().length;
  }

  displayRow(options: DisplayOptions = {}): DisplayRow {
    return buildDisplayRow(this.columns, options);
  }

  insertionMarkers(): InsertionMarker[] {
    return collapseInsertions(this.edits);
  }

  toString(): string {
    const { symbols, bases } = this.displayRow();
    return `Target: ${this.target}\n Query: ${bases.join("")}\n Edits: ${symbols.join("")}`;
  }
}

function obtainAlignment(
  target: string,
  query: string,
  aligner: Aligner | undefined
): AlignmentPair {
  if (aligner !== undefined) return alignWith(aligner, target, query);

  const trivial = trivialAlignment(target, query);
  if (trivial !== undefined) return trivial;
  throw new AlignerFailureError("No alignment supplied and no aligner configured", target, query);
}
