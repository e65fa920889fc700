import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { runRecordSchema, type Bit, type RunRecord } from "../../contracts/machine.js";

export type { RunRecord };

const RUN_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

function runsDir(stateDir: string): string {
  return join(stateDir, "runs");
}

function runPath(stateDir: string, runId: string): string {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run id: ${runId}`);
  }
  return join(runsDir(stateDir), `${runId}.json`);
}

export function createRunRecord(machine: string, inputs: Bit[], outputs: Bit[], finalState: string): RunRecord {
  return {
    version: "1.0",
    runId: randomUUID(),
    machine,
    startedAt: new Date().toISOString(),
    inputs,
    outputs,
    finalState,
  };
}

export async function saveRun(stateDir: string, record: RunRecord): Promise<void> {
  const path = runPath(stateDir, record.runId);
  await mkdir(runsDir(stateDir), { recursive: true });
  await writeFile(path, JSON.stringify(runRecordSchema.parse(record), null, 2), "utf8");
}

export async function loadRun(stateDir: string, runId: string): Promise<RunRecord | null> {
  const path = runPath(stateDir, runId);
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch {
    return null;
  }
  return runRecordSchema.parse(JSON.parse(content));
}

export async function listRuns(stateDir: string): Promise<RunRecord[]> {
  let files: string[];
  try {
    files = await readdir(runsDir(stateDir));
  } catch {
    return [];
  }

  const records: RunRecord[] = [];
  for (const file of files) {
    if (!file.endsWith(".json")) {
      continue;
    }
    const runId = file.slice(0, -".json".length);
    if (!RUN_ID_PATTERN.test(runId)) {
      continue;
    }
    const record = await loadRun(stateDir, runId);
    if (record) {
      records.push(record);
    }
  }

  return records.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
}
