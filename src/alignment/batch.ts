/**
 * Batch preparation of alignment records
 *
 * Builds one record per input, aligning through the injected
 * {@link AlignerService} where no alignment was supplied. A record that
 * cannot be built is reported in `rejected` and logged as a warning; the
 * rest of the batch carries on.
 *
 * @module alignment/batch
 */

import { type } from "arktype";
import { Effect, Either } from "effect";
import { trivialAlignment } from "../aligner/aligner";
import { AlignerService } from "../aligner/service";
import { type AlignmentOptions, resolveAlignmentOptions } from "../config";
import { isRecordError, type RecordError, ValidationError } from "../errors";
import { type AlignmentInput, AlignmentInputSchema, type AlignmentPair } from "../types";
import { AlignmentRecord } from "./record";
import { validateSequences } from "./validation";

export type BatchError = RecordError | ValidationError;

export interface RejectedInput {
  readonly index: number;
  readonly input: AlignmentInput;
  readonly error: BatchError;
}

export interface PreparedBatch {
  /** Records in input order */
  readonly records: readonly AlignmentRecord[];
  readonly rejected: readonly RejectedInput[];
}

function isBatchError(error: unknown): error is BatchError {
  return isRecordError(error) || error instanceof ValidationError;
}

/**
 * Run a throwing step; library errors fail the effect, anything else is a defect
 */
function attempt<A>(thunk: () => A): Effect.Effect<A, BatchError> {
  return Effect.suspend(() => {
    try {
      return Effect.succeed(thunk());
    } catch (error) {
      return isBatchError(error) ? Effect.fail(error) : Effect.die(error);
    }
  });
}

function checkInput(input: AlignmentInput): Effect.Effect<AlignmentInput, ValidationError> {
  const result = AlignmentInputSchema(input);
  return result instanceof type.errors
    ? Effect.fail(new ValidationError(`Invalid alignment input: ${result.summary}`))
    : Effect.succeed(result);
}

/**
 * Build a single record, aligning through the service when needed
 */
export function buildRecord(
  input: AlignmentInput,
  options: AlignmentOptions = {}
): Effect.Effect<AlignmentRecord, BatchError, AlignerService> {
  return Effect.gen(function* () {
    const { target, query, alignment } = yield* checkInput(input);
    const resolved = yield* attempt(() => resolveAlignmentOptions(options));
    yield* attempt(() => validateSequences(target, query, resolved));

    // An empty side aligns against gaps without consulting the service
    let pair: AlignmentPair | undefined = alignment ?? trivialAlignment(target, query);
    if (pair === undefined) {
      const aligner = yield* AlignerService;
      pair = yield* aligner.align(target, query);
    }

    return yield* attempt(() => new AlignmentRecord(target, query, { ...options, alignment: pair }));
  });
}

/**
 * Build records for a batch of inputs
 *
 * Fails only when `options` itself is invalid; per-input failures land in
 * `rejected` and are logged with `Effect.logWarning`.
 */
export function prepareAlignments(
  inputs: readonly AlignmentInput[],
  options: AlignmentOptions = {}
): Effect.Effect<PreparedBatch, ValidationError, AlignerService> {
  return Effect.gen(function* () {
    yield* Effect.try({
      try: () => resolveAlignmentOptions(options),
      catch: (error) =>
        error instanceof ValidationError ? error : new ValidationError(String(error)),
    });

    const records: AlignmentRecord[] = [];
    const rejected: RejectedInput[] = [];

    for (const [index, input] of inputs.entries()) {
      const outcome = yield* Effect.either(buildRecord(input, options));
      if (Either.isRight(outcome)) {
        records.push(outcome.right);
        continue;
      }

      const error = outcome.left;
      rejected.push({ index, input, error });
      yield* Effect.logWarning(`Skipping alignment ${index}: ${error.message}`).pipe(
        Effect.annotateLogs({ index, code: error.code })
      );
    }

    return { records, rejected };
  });
}
