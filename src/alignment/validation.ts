/**
 * Input checks run before classification
 *
 * @module alignment/validation
 */

import { AlphabetMode, type ResolvedAlignmentOptions } from "../config";
import { EmptyInputError, MalformedAlignmentError, SequenceError } from "../errors";
import { GAP } from "../types";

/**
 * Ungapped sequence patterns per alphabet mode
 */
export const ALPHABET_PATTERNS: Readonly<Record<AlphabetMode, RegExp>> = {
  [AlphabetMode.STRICT]: /^[ACGTacgt]*$/,
  [AlphabetMode.NORMAL]: /^[ACGTURYSWKMBDHVNacgturyswkmbdhvn]*$/,
  [AlphabetMode.PERMISSIVE]: /^[A-Za-z*]*$/,
};

/**
 * Index of the first character rejected by the alphabet, or -1
 */
function firstInvalidIndex(sequence: string, pattern: RegExp): number {
  if (pattern.test(sequence)) return -1;
  for (let i = 0; i < sequence.length; i++) {
    if (!pattern.test(sequence.charAt(i))) return i;
  }
  return -1;
}

/**
 * Check that an ungapped sequence uses only the selected alphabet
 *
 * @throws {SequenceError} On the first rejected character
 */
export function validateSequence(
  sequence: string,
  role: "target" | "query",
  alphabet: AlphabetMode
): void {
  const index = firstInvalidIndex(sequence, ALPHABET_PATTERNS[alphabet]);
  if (index === -1) return;

  const char = sequence.charAt(index);
  throw new SequenceError(
    char === GAP
      ? `gap character at position ${index}; ungapped sequences must not contain '${GAP}'`
      : `character '${char}' at position ${index} is not in the ${alphabet} alphabet`,
    role
  );
}

/**
 * Reject empty sequences when the caller disallows them
 *
 * @throws {EmptyInputError}
 */
export function validateNonEmpty(target: string, query: string): void {
  if (target.length === 0) throw new EmptyInputError("target");
  if (query.length === 0) throw new EmptyInputError("query");
}

/**
 * Run the per-sequence checks selected by the resolved options
 *
 * @throws {EmptyInputError | SequenceError}
 */
export function validateSequences(
  target: string,
  query: string,
  options: ResolvedAlignmentOptions
): void {
  if (!options.allowEmpty) {
    validateNonEmpty(target, query);
  }
  validateSequence(target, "target", options.alphabet);
  validateSequence(query, "query", options.alphabet);
}

/**
 * Remove gap markers from a gapped sequence
 */
export function ungap(gapped: string): string {
  return gapped.split(GAP).join("");
}

/**
 * Check that a gapped string is its sequence with gaps inserted
 *
 * @throws {MalformedAlignmentError} With reason `sequence-mismatch`
 */
export function validateRoundTrip(
  gapped: string,
  sequence: string,
  role: "target" | "query"
): void {
  const stripped = ungap(gapped);
  if (stripped !== sequence) {
    throw new MalformedAlignmentError(
      `Aligned ${role} does not reproduce the ${role} sequence once gaps are removed`,
      "sequence-mismatch",
      undefined,
      `expected "${sequence}", got "${stripped}"`
    );
  }
}
