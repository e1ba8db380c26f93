import { describe, expect, test } from "vitest";
import {
  AlignerFailureError,
  AlntrackError,
  EmptyInputError,
  isRecordError,
  MalformedAlignmentError,
  SequenceError,
  ValidationError,
} from "../src/errors";

describe("error hierarchy", () => {
  test("all errors share the base class", () => {
    expect(new MalformedAlignmentError("x", "length-mismatch")).toBeInstanceOf(AlntrackError);
    expect(new AlignerFailureError("x", "A", "C")).toBeInstanceOf(AlntrackError);
    expect(new EmptyInputError("query")).toBeInstanceOf(AlntrackError);
    expect(new SequenceError("x", "query")).toBeInstanceOf(ValidationError);
  });

  test("isRecordError recognises construction failures only", () => {
    expect(isRecordError(new MalformedAlignmentError("x", "co-gapped-column", 3))).toBe(true);
    expect(isRecordError(new SequenceError("x", "target"))).toBe(true);
    expect(isRecordError(new EmptyInputError("target"))).toBe(true);
    expect(isRecordError(new ValidationError("x"))).toBe(false);
    expect(isRecordError(new Error("x"))).toBe(false);
  });
});

describe("toString", () => {
  test("includes column and context", () => {
    const error = new MalformedAlignmentError(
      "Both sequences are gapped at column 1",
      "co-gapped-column",
      1,
      "A-A / A-A"
    );

    expect(error.toString()).toBe(
      "MalformedAlignmentError: Both sequences are gapped at column 1 (column 1)\nContext: A-A / A-A"
    );
  });

  test("aligner failures describe the inputs and cause", () => {
    const error = AlignerFailureError.fromThrown("ACGT", "ACG", new Error("boom"));

    expect(error.toString()).toBe(
      "AlignerFailureError: Aligner failed: boom\nTarget length: 4, query length: 3\nCaused by: Error: boom"
    );
  });

  test("empty input message names the side", () => {
    expect(new EmptyInputError("query").message).toBe("Query sequence is empty");
    expect(new EmptyInputError("query").code).toBe("EMPTY_INPUT");
  });
});
