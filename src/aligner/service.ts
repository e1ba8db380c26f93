/**
 * Effect-based aligner service
 *
 * Wraps the {@link Aligner} contract in an Effect `Context.Tag` so batch
 * programs can have their aligner injected as a layer, and swapped for a
 * stub in tests.
 *
 * @example Providing a synchronous aligner
 * ```typescript
 * import { Effect } from "effect";
 * import { AlignerService, prepareAlignments } from "alntrack";
 *
 * const batch = await Effect.runPromise(
 *   prepareAlignments(inputs).pipe(Effect.provide(AlignerService.fromAligner(myAligner)))
 * );
 * ```
 *
 * @module aligner/service
 */

import { Context, Effect, Layer } from "effect";
import { AlignerFailureError } from "../errors";
import type { AlignmentPair } from "../types";
import { type Aligner, alignWith } from "./aligner";

// =============================================================================
// SERVICE SHAPE
// =============================================================================

export interface AlignerServiceShape {
  /**
   * Align a query against a target
   *
   * @returns Effect producing the gapped pair, failing with
   *   {@link AlignerFailureError} when no alignment is found
   */
  readonly align: (target: string, query: string) => Effect.Effect<AlignmentPair, AlignerFailureError>;
}

// =============================================================================
// SERVICE TAG
// =============================================================================

export class AlignerService extends Context.Tag("@alntrack/AlignerService")<
  AlignerService,
  AlignerServiceShape
>() {
  /**
   * Layer backed by a synchronous {@link Aligner}
   */
  static fromAligner(aligner: Aligner): Layer.Layer<AlignerService> {
    return Layer.succeed(AlignerService, {
      align: (target, query) =>
        Effect.try({
          try: () => alignWith(aligner, target, query),
          catch: (error) =>
            error instanceof AlignerFailureError
              ? error
              : AlignerFailureError.fromThrown(target, query, error),
        }),
    });
  }

  /**
   * Layer for callers that only ever supply pre-computed alignments
   *
   * Empty inputs still get their trivial alignment; anything else fails.
   */
  static readonly Unavailable: Layer.Layer<AlignerService> = AlignerService.fromAligner({
    align: () => undefined,
  });
}
