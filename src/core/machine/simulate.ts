import type { Bit } from "../../contracts/machine.js";
import { InvalidInputError } from "./errors.js";
import { isBit, MooreEvaluator, type CycleRecord, type MachineTables } from "./evaluator.js";

export interface SimulationResult {
  outputs: Bit[];
  finalState: string;
  cycles: CycleRecord[];
}

export function assertBits(inputs: readonly number[]): Bit[] {
  return inputs.map((value, index) => {
    if (!isBit(value)) {
      throw new InvalidInputError(value, index);
    }
    return value;
  });
}

export function simulate(tables: MachineTables, inputs: readonly number[]): SimulationResult {
  const bits = assertBits(inputs);
  const evaluator = new MooreEvaluator(tables);
  const cycles = [...evaluator.trace(bits)];

  return {
    outputs: cycles.map((cycle) => cycle.output),
    finalState: evaluator.currentState,
    cycles,
  };
}

export function parseInputSequence(text: string): Bit[] {
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }

  const tokens = /[\s,]/.test(trimmed) ? trimmed.split(/[\s,]+/).filter(Boolean) : [...trimmed];

  return tokens.map((token, index) => {
    if (token === "0") {
      return 0;
    }
    if (token === "1") {
      return 1;
    }
    throw new InvalidInputError(token, index);
  });
}

export function formatBits(bits: readonly Bit[]): string {
  return bits.join("");
}
