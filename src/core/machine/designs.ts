import type { Bit, MachineDefinition } from "../../contracts/machine.js";

export const SAMPLE_STATES = ["S0", "S1", "S2", "S3"] as const;

export type SampleState = (typeof SAMPLE_STATES)[number];

export function tabulate<S extends string>(
  name: string,
  states: readonly S[],
  initial: S,
  nextState: (state: S, input: Bit) => S,
  output: (state: S) => Bit,
): MachineDefinition {
  const transitions: MachineDefinition["transitions"] = {};
  const outputs: MachineDefinition["outputs"] = {};

  for (const state of states) {
    transitions[state] = { "0": nextState(state, 0), "1": nextState(state, 1) };
    outputs[state] = output(state);
  }

  return {
    version: "1.0",
    name,
    states: [...states],
    initial,
    transitions,
    outputs,
  };
}

// Sequence detector written as a case statement with a default arm.
export function designSmallFsm19(): MachineDefinition {
  const next = (state: SampleState, input: Bit): SampleState => {
    switch (state) {
      case "S0":
        return input === 1 ? "S1" : "S0";
      case "S1":
        return input === 1 ? "S2" : "S0";
      case "S2":
        return input === 1 ? "S3" : "S0";
      default:
        return input === 1 ? "S3" : "S0";
    }
  };

  return tabulate("design_small_fsm_19", SAMPLE_STATES, "S0", next, (state) => (state === "S2" ? 1 : 0));
}

// Same detector as nested conditionals: any 0 falls back to S0, a 1 climbs toward S3.
export function rewriteSmallFsm17(): MachineDefinition {
  const next = (state: SampleState, input: Bit): SampleState => {
    if (input === 0) {
      return "S0";
    }
    if (state === "S0") {
      return "S1";
    }
    if (state === "S1") {
      return "S2";
    }
    return "S3";
  };

  const output = (state: SampleState): Bit => {
    if (state === "S2") {
      return 1;
    }
    return 0;
  };

  return tabulate("rewrite_small_fsm_17", SAMPLE_STATES, "S0", next, output);
}

export const SAMPLE_DESIGNS: Record<string, () => MachineDefinition> = {
  design_small_fsm_19: designSmallFsm19,
  rewrite_small_fsm_17: rewriteSmallFsm17,
};

export function listSampleDesigns(): string[] {
  return Object.keys(SAMPLE_DESIGNS).sort();
}
