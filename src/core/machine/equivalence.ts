import type { Bit } from "../../contracts/machine.js";
import { MooreEvaluator, type MachineTables } from "./evaluator.js";

export const MAX_EQUIVALENCE_DEPTH = 16;

export type EquivalenceResult =
  | { equivalent: true; depth: number; sequencesChecked: number }
  | { equivalent: false; depth: number; sequencesChecked: number; inputs: Bit[]; left: Bit[]; right: Bit[] };

function sequenceFor(mask: number, depth: number): Bit[] {
  const bits: Bit[] = [];
  for (let i = depth - 1; i >= 0; i -= 1) {
    bits.push((mask >> i) & 1 ? 1 : 0);
  }
  return bits;
}

export function checkEquivalence(left: MachineTables, right: MachineTables, depth: number): EquivalenceResult {
  if (!Number.isInteger(depth) || depth < 0 || depth > MAX_EQUIVALENCE_DEPTH) {
    throw new RangeError(`depth must be an integer between 0 and ${MAX_EQUIVALENCE_DEPTH}, got ${depth}`);
  }

  const a = new MooreEvaluator(left);
  const b = new MooreEvaluator(right);
  const total = 2 ** depth;

  for (let mask = 0; mask < total; mask += 1) {
    const inputs = sequenceFor(mask, depth);
    a.reset();
    b.reset();

    const leftOut: Bit[] = [];
    const rightOut: Bit[] = [];
    for (const input of inputs) {
      leftOut.push(a.step(input));
      rightOut.push(b.step(input));
      if (leftOut[leftOut.length - 1] !== rightOut[rightOut.length - 1]) {
        return {
          equivalent: false,
          depth,
          sequencesChecked: mask + 1,
          inputs: inputs.slice(0, leftOut.length),
          left: leftOut,
          right: rightOut,
        };
      }
    }
  }

  return { equivalent: true, depth, sequencesChecked: total };
}
