import { describe, expect, test } from "vitest";
import {
  designSmallFsm19,
  listSampleDesigns,
  rewriteSmallFsm17,
  tabulate,
} from "../../src/core/machine/designs.js";
import { checkEquivalence } from "../../src/core/machine/equivalence.js";
import { MooreEvaluator } from "../../src/core/machine/evaluator.js";
import { detectorTables } from "../helpers/machines.js";

describe("sample designs", () => {
  test("case formulation tabulates to the detector tables", () => {
    const design = designSmallFsm19();
    const expected = detectorTables();
    expect(design.name).toBe("design_small_fsm_19");
    expect(design.states).toEqual(expected.states);
    expect(design.initial).toBe("S0");
    expect(design.transitions).toEqual(expected.transitions);
    expect(design.outputs).toEqual(expected.outputs);
  });

  test("nested-if formulation yields the same tables", () => {
    const a = designSmallFsm19();
    const b = rewriteSmallFsm17();
    expect(b.transitions).toEqual(a.transitions);
    expect(b.outputs).toEqual(a.outputs);
  });

  test("both formulations agree on every sequence up to length 10", () => {
    const result = checkEquivalence(designSmallFsm19(), rewriteSmallFsm17(), 10);
    expect(result).toEqual({ equivalent: true, depth: 10, sequencesChecked: 1024 });
  });

  test("asserts output after three consecutive ones", () => {
    for (const design of [designSmallFsm19(), rewriteSmallFsm17()]) {
      const machine = new MooreEvaluator(design);
      expect([...machine.run([1, 1, 1, 0, 1, 1, 1])]).toEqual([0, 0, 1, 0, 0, 0, 1]);
    }
  });

  test("tabulate evaluates next-state and output functions over every pair", () => {
    const toggle = tabulate(
      "toggle",
      ["A", "B"],
      "A",
      (state, input) => (input === 1 ? (state === "A" ? "B" : "A") : state),
      (state) => (state === "B" ? 1 : 0),
    );

    expect(toggle).toEqual({
      version: "1.0",
      name: "toggle",
      states: ["A", "B"],
      initial: "A",
      transitions: {
        A: { "0": "A", "1": "B" },
        B: { "0": "B", "1": "A" },
      },
      outputs: { A: 0, B: 1 },
    });
  });

  test("lists registered designs", () => {
    expect(listSampleDesigns()).toEqual(["design_small_fsm_19", "rewrite_small_fsm_17"]);
  });
});
