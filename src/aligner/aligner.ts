/**
 * Pairwise aligner contract
 *
 * The library does not compute alignments itself. Callers that do not have
 * a gapped pair at hand supply an {@link Aligner}, and every call goes
 * through {@link alignWith} so that "no alignment" and thrown errors both
 * surface as {@link AlignerFailureError}.
 *
 * @module aligner/aligner
 */

import { AlignerFailureError } from "../errors";
import { type AlignmentPair, GAP } from "../types";

/**
 * Anything that can align a query against a target
 *
 * Implementations return two equal-length gapped strings using `-` as the
 * gap character, or `undefined` when no alignment exists.
 *
 * @example
 * ```typescript
 * const identity: Aligner = {
 *   align: (target, query) => (target === query ? [target, query] : undefined),
 * };
 * ```
 */
export interface Aligner {
  align(target: string, query: string): AlignmentPair | undefined;
}

/**
 * Alignment of a sequence against an empty one: all gaps on the empty side
 */
export function trivialAlignment(target: string, query: string): AlignmentPair | undefined {
  if (target.length === 0) return [GAP.repeat(query.length), query];
  if (query.length === 0) return [target, GAP.repeat(target.length)];
  return undefined;
}

/**
 * Align through an aligner, short-circuiting empty inputs
 *
 * @throws {AlignerFailureError} When the aligner throws or finds no alignment
 */
export function alignWith(aligner: Aligner, target: string, query: string): AlignmentPair {
  const trivial = trivialAlignment(target, query);
  if (trivial !== undefined) return trivial;

  let pair: AlignmentPair | undefined;
  try {
    pair = aligner.align(target, query);
  } catch (error) {
    throw AlignerFailureError.fromThrown(target, query, error);
  }

  if (pair === undefined) {
    throw new AlignerFailureError("Aligner found no alignment", target, query);
  }
  return pair;
}
