import type { Bit } from "../../contracts/machine.js";
import { InvalidInputError, InvalidSpecError } from "./errors.js";

export const INPUT_BITS = [0, 1] as const;

export interface MachineTables {
  states: readonly string[];
  initial: string;
  transitions: Readonly<Record<string, Readonly<Partial<Record<"0" | "1", string>>>>>;
  outputs: Readonly<Record<string, number>>;
}

export interface CycleRecord {
  cycle: number;
  state: string;
  input: Bit;
  output: Bit;
  next: string;
}

interface CompiledTables {
  states: readonly string[];
  initial: number;
  next: readonly number[];
  output: readonly Bit[];
}

export function isBit(value: unknown): value is Bit {
  return value === 0 || value === 1;
}

function bitKey(bit: Bit): "0" | "1" {
  return bit === 0 ? "0" : "1";
}

function compileTables(tables: MachineTables): CompiledTables {
  const issues: string[] = [];
  const ordinals = new Map<string, number>();

  if (tables.states.length === 0) {
    issues.push("states must not be empty");
  }

  for (const state of tables.states) {
    if (ordinals.has(state)) {
      issues.push(`duplicate state ${state}`);
      continue;
    }
    ordinals.set(state, ordinals.size);
  }

  const initial = ordinals.get(tables.initial);
  if (initial === undefined) {
    issues.push(`initial state ${tables.initial} is not a declared state`);
  }

  for (const key of Object.keys(tables.transitions)) {
    if (!ordinals.has(key)) {
      issues.push(`transition table has a row for undeclared state ${key}`);
    }
  }
  for (const key of Object.keys(tables.outputs)) {
    if (!ordinals.has(key)) {
      issues.push(`output table has an entry for undeclared state ${key}`);
    }
  }

  const next: number[] = [];
  const output: Bit[] = [];

  for (const state of ordinals.keys()) {
    const row = Object.hasOwn(tables.transitions, state) ? tables.transitions[state] : undefined;
    for (const bit of INPUT_BITS) {
      const target = row?.[bitKey(bit)];
      if (target === undefined) {
        issues.push(`missing transition for (${state}, ${bit})`);
        next.push(-1);
        continue;
      }
      const ordinal = ordinals.get(target);
      if (ordinal === undefined) {
        issues.push(`transition (${state}, ${bit}) targets undeclared state ${target}`);
        next.push(-1);
        continue;
      }
      next.push(ordinal);
    }

    const value = Object.hasOwn(tables.outputs, state) ? tables.outputs[state] : undefined;
    if (value === undefined) {
      issues.push(`missing output for state ${state}`);
      output.push(0);
    } else if (!isBit(value)) {
      issues.push(`output for state ${state} must be 0 or 1, got ${String(value)}`);
      output.push(0);
    } else {
      output.push(value);
    }
  }

  if (issues.length > 0 || initial === undefined) {
    throw new InvalidSpecError(issues);
  }

  return {
    states: [...ordinals.keys()],
    initial,
    next,
    output,
  };
}

export class MooreEvaluator {
  private readonly tables: CompiledTables;
  private current: number;
  private cycle = 0;

  constructor(tables: MachineTables) {
    this.tables = compileTables(tables);
    this.current = this.tables.initial;
  }

  get states(): readonly string[] {
    return this.tables.states;
  }

  get initialState(): string {
    return this.stateName(this.tables.initial);
  }

  get currentState(): string {
    return this.stateName(this.current);
  }

  get cycles(): number {
    return this.cycle;
  }

  reset(): void {
    this.current = this.tables.initial;
    this.cycle = 0;
  }

  step(input: number): Bit {
    return this.advance(input, null).output;
  }

  *run(inputs: Iterable<number>): Generator<Bit, void, undefined> {
    let index = 0;
    for (const input of inputs) {
      yield this.advance(input, index).output;
      index += 1;
    }
  }

  *trace(inputs: Iterable<number>): Generator<CycleRecord, void, undefined> {
    let index = 0;
    for (const input of inputs) {
      yield this.advance(input, index);
      index += 1;
    }
  }

  private advance(input: number, index: number | null): CycleRecord {
    if (!isBit(input)) {
      throw new InvalidInputError(input, index);
    }

    const from = this.current;
    const output = this.tables.output[from];
    const to = this.tables.next[from * INPUT_BITS.length + input];

    const record: CycleRecord = {
      cycle: this.cycle,
      state: this.stateName(from),
      input,
      output,
      next: this.stateName(to),
    };

    this.current = to;
    this.cycle += 1;
    return record;
  }

  private stateName(ordinal: number): string {
    return this.tables.states[ordinal];
  }
}
