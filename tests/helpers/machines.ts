export interface EditableTables {
  states: string[];
  initial: string;
  transitions: Record<string, Partial<Record<"0" | "1", string>>>;
  outputs: Record<string, number>;
}

export function detectorTables(): EditableTables {
  return {
    states: ["S0", "S1", "S2", "S3"],
    initial: "S0",
    transitions: {
      S0: { "0": "S0", "1": "S1" },
      S1: { "0": "S0", "1": "S2" },
      S2: { "0": "S0", "1": "S3" },
      S3: { "0": "S0", "1": "S3" },
    },
    outputs: { S0: 0, S1: 0, S2: 1, S3: 0 },
  };
}

export const PATH_TO_STATE: Record<string, number[]> = {
  S0: [],
  S1: [1],
  S2: [1, 1],
  S3: [1, 1, 1],
};

export function catchError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}
