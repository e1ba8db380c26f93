import { describe, expect, test } from "vitest";
import {
  DEFAULT_ALIGNMENT_OPTIONS,
  resolveAlignmentOptions,
  resolveDisplayOptions,
  resolveTrackLayoutOptions,
} from "../src/config";
import { ValidationError } from "../src/errors";

describe("option resolution", () => {
  test("alignment defaults", () => {
    expect(resolveAlignmentOptions()).toEqual(DEFAULT_ALIGNMENT_OPTIONS);
    expect(resolveAlignmentOptions()).toEqual({ alphabet: "permissive", allowEmpty: true });
  });

  test("explicit values override defaults", () => {
    expect(resolveAlignmentOptions({ alphabet: "strict" })).toEqual({
      alphabet: "strict",
      allowEmpty: true,
    });
    expect(resolveDisplayOptions({ truncate: true })).toEqual({ truncate: true });
  });

  test("display is full by default, layouts truncated", () => {
    expect(resolveDisplayOptions()).toEqual({ truncate: false });
    expect(resolveTrackLayoutOptions()).toEqual({ truncate: true });
    expect(resolveTrackLayoutOptions({ title: "run 7" })).toEqual({
      truncate: true,
      title: "run 7",
    });
  });

  test("rejects values of the wrong type", () => {
    expect(() => resolveAlignmentOptions(JSON.parse('{"alphabet":"protein"}'))).toThrow(
      ValidationError
    );
    expect(() => resolveTrackLayoutOptions(JSON.parse('{"title":42}'))).toThrow(
      "Invalid track layout options"
    );
  });
});
