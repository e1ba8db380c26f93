/**
 * Option objects, their schemas and defaults
 *
 * Each public entry point accepts a partial options object. The matching
 * `resolve*` function validates it with arktype and fills in defaults so the
 * rest of the code only ever sees complete options.
 *
 * @module config
 */

import { type } from "arktype";
import { ValidationError } from "./errors";

// =============================================================================
// ALPHABETS
// =============================================================================

/**
 * Alphabet strictness for ungapped sequences
 *
 * - STRICT: A, C, G, T only
 * - NORMAL: IUPAC nucleotide codes, including U and N
 * - PERMISSIVE: any letter, plus `*`
 */
export const AlphabetMode = {
  STRICT: "strict",
  NORMAL: "normal",
  PERMISSIVE: "permissive",
} as const;

export type AlphabetMode = (typeof AlphabetMode)[keyof typeof AlphabetMode];

export const AlphabetModeSchema = type('"strict"|"normal"|"permissive"');

// =============================================================================
// SCHEMAS
// =============================================================================

export const AlignmentOptionsSchema = type({
  "alphabet?": AlphabetModeSchema,
  "allowEmpty?": "boolean",
});

export const DisplayOptionsSchema = type({
  "truncate?": "boolean",
});

export const TrackLayoutOptionsSchema = type({
  "truncate?": "boolean",
  "title?": "string",
});

export type AlignmentOptions = typeof AlignmentOptionsSchema.infer;
export type DisplayOptions = typeof DisplayOptionsSchema.infer;
export type TrackLayoutOptions = typeof TrackLayoutOptionsSchema.infer;

export interface ResolvedAlignmentOptions {
  readonly alphabet: AlphabetMode;
  readonly allowEmpty: boolean;
}

export interface ResolvedDisplayOptions {
  readonly truncate: boolean;
}

export interface ResolvedTrackLayoutOptions {
  readonly truncate: boolean;
  readonly title?: string;
}

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_ALIGNMENT_OPTIONS: ResolvedAlignmentOptions = {
  alphabet: AlphabetMode.PERMISSIVE,
  allowEmpty: true,
};

export const DEFAULT_DISPLAY_OPTIONS: ResolvedDisplayOptions = {
  truncate: false,
};

// Layouts are truncated unless asked otherwise
export const DEFAULT_TRACK_LAYOUT_OPTIONS: ResolvedTrackLayoutOptions = {
  truncate: true,
};

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveAlignmentOptions(options: AlignmentOptions = {}): ResolvedAlignmentOptions {
  const result = AlignmentOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid alignment options: ${result.summary}`);
  }
  return {
    alphabet: result.alphabet ?? DEFAULT_ALIGNMENT_OPTIONS.alphabet,
    allowEmpty: result.allowEmpty ?? DEFAULT_ALIGNMENT_OPTIONS.allowEmpty,
  };
}

export function resolveDisplayOptions(options: DisplayOptions = {}): ResolvedDisplayOptions {
  const result = DisplayOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid display options: ${result.summary}`);
  }
  return { truncate: result.truncate ?? DEFAULT_DISPLAY_OPTIONS.truncate };
}

export function resolveTrackLayoutOptions(
  options: TrackLayoutOptions = {}
): ResolvedTrackLayoutOptions {
  const result = TrackLayoutOptionsSchema(options);
  if (result instanceof type.errors) {
    throw new ValidationError(`Invalid track layout options: ${result.summary}`);
  }
  const truncate = result.truncate ?? DEFAULT_TRACK_LAYOUT_OPTIONS.truncate;
  return result.title === undefined ? { truncate } : { truncate, title: result.title };
}
