import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { machineDefinitionSchema, type MachineDefinition } from "../../contracts/machine.js";
import { SAMPLE_DESIGNS } from "./designs.js";
import { InvalidSpecError } from "./errors.js";

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function parseMachineDefinition(raw: unknown): MachineDefinition {
  const parsed = machineDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidSpecError(parsed.error.issues.map(describeIssue));
  }
  return parsed.data;
}

export async function loadMachineDefinition(path: string): Promise<MachineDefinition> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`Machine definition not found: ${path}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "parse error";
    throw new InvalidSpecError([`${path} is not valid JSON (${reason})`]);
  }

  return parseMachineDefinition(raw);
}

export async function resolveMachine(projectRoot: string, ref: string): Promise<MachineDefinition> {
  const sample = Object.hasOwn(SAMPLE_DESIGNS, ref) ? SAMPLE_DESIGNS[ref] : undefined;
  if (sample) {
    return sample();
  }

  const path = isAbsolute(ref) ? ref : resolve(projectRoot, ref);
  return loadMachineDefinition(path);
}
