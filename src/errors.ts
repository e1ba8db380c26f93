/**
 * Error handling for alignment annotation
 *
 * Every failure raised by the library is an {@link AlntrackError} subclass
 * so callers can catch the whole family or one condition at a time.
 */

/**
 * Base error class for all alntrack errors
 */
export class AlntrackError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly column?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "AlntrackError";
  }

  /**
   * Create a message that includes column and context when present
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.column !== undefined) {
      msg += ` (column ${this.column})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Invalid option objects or input records
 */
export class ValidationError extends AlntrackError {
  constructor(message: string, column?: number, context?: string) {
    super(message, "VALIDATION_ERROR", column, context);
    this.name = "ValidationError";
  }
}

/**
 * Sequence containing characters outside the selected alphabet
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly role: "target" | "query",
    column?: number,
    context?: string
  ) {
    super(`${role === "target" ? "Target" : "Query"} sequence: ${message}`, column, context);
    this.name = "SequenceError";
  }
}

/**
 * Why a gapped pair was rejected
 */
export type MalformedAlignmentReason = "length-mismatch" | "co-gapped-column" | "sequence-mismatch";

/**
 * Gapped pair that does not describe a legal alignment of its sequences
 */
export class MalformedAlignmentError extends AlntrackError {
  constructor(
    message: string,
    public readonly reason: MalformedAlignmentReason,
    column?: number,
    context?: string
  ) {
    super(message, "MALFORMED_ALIGNMENT", column, context);
    this.name = "MalformedAlignmentError";
  }
}

/**
 * The aligner produced no alignment for a target/query pair
 */
export class AlignerFailureError extends AlntrackError {
  constructor(
    message: string,
    public readonly target: string,
    public readonly query: string,
    cause?: unknown
  ) {
    super(message, "ALIGNER_FAILURE");
    this.name = "AlignerFailureError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }

  /**
   * Wrap an error thrown by an aligner implementation
   */
  static fromThrown(target: string, query: string, thrown: unknown): AlignerFailureError {
    const errorMessage = thrown instanceof Error ? thrown.message : String(thrown);
    return new AlignerFailureError(`Aligner failed: ${errorMessage}`, target, query, thrown);
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nTarget length: ${this.target.length}, query length: ${this.query.length}`;
    if (this.cause instanceof Error) {
      msg += `\nCaused by: ${this.cause.name}: ${this.cause.message}`;
    }
    return msg;
  }
}

/**
 * Empty target or query when the caller disallowed empty sequences
 */
export class EmptyInputError extends AlntrackError {
  constructor(public readonly role: "target" | "query") {
    super(`${role === "target" ? "Target" : "Query"} sequence is empty`, "EMPTY_INPUT");
    this.name = "EmptyInputError";
  }
}

/**
 * Failures a single record's construction can raise
 */
export type RecordError =
  | MalformedAlignmentError
  | AlignerFailureError
  | SequenceError
  | EmptyInputError;

/**
 * Narrow an unknown thrown value to a record construction failure
 */
export function isRecordError(error: unknown): error is RecordError {
  return (
    error instanceof MalformedAlignmentError ||
    error instanceof AlignerFailureError ||
    error instanceof SequenceError ||
    error instanceof EmptyInputError
  );
}
