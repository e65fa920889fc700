import { describe, expect, test } from "vitest";
import { InvalidInputError } from "../../src/core/machine/errors.js";
import { assertBits, formatBits, parseInputSequence, simulate } from "../../src/core/machine/simulate.js";
import { catchError, detectorTables } from "../helpers/machines.js";

describe("input parsing", () => {
  test("reads compact digit strings", () => {
    expect(parseInputSequence("1110111")).toEqual([1, 1, 1, 0, 1, 1, 1]);
  });

  test("reads comma and whitespace separated values", () => {
    expect(parseInputSequence(" 1, 0  1,1 ")).toEqual([1, 0, 1, 1]);
  });

  test("empty input is an empty sequence", () => {
    expect(parseInputSequence("   ")).toEqual([]);
  });

  test("names the offending token and its position", () => {
    const error = catchError(() => parseInputSequence("10x1"));
    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error instanceof InvalidInputError && error.index).toBe(2);
    expect(error instanceof Error && error.message).toBe('Invalid input at position 2: "x" (expected 0 or 1)');

    const separated = catchError(() => parseInputSequence("1, 10"));
    expect(separated instanceof InvalidInputError && separated.value).toBe("10");
    expect(separated instanceof InvalidInputError && separated.index).toBe(1);
  });
});

describe("simulate", () => {
  test("returns outputs, final state and cycles", () => {
    const result = simulate(detectorTables(), [1, 1, 1, 0, 1, 1, 1]);
    expect(result.outputs).toEqual([0, 0, 1, 0, 0, 0, 1]);
    expect(result.finalState).toBe("S3");
    expect(result.cycles).toHaveLength(7);
    expect(result.cycles[2]).toEqual({ cycle: 2, state: "S2", input: 1, output: 1, next: "S3" });
  });

  test("validates the whole sequence before the first cycle", () => {
    const error = catchError(() => simulate(detectorTables(), [1, 1, 3]));
    expect(error instanceof InvalidInputError && error.index).toBe(2);
  });

  test("assertBits narrows valid sequences", () => {
    expect(assertBits([0, 1, 1])).toEqual([0, 1, 1]);
    expect(() => assertBits([0, -1])).toThrow("Invalid input at position 1: -1 (expected 0 or 1)");
  });

  test("formats bits compactly", () => {
    expect(formatBits([0, 0, 1])).toBe("001");
  });
});
