import { describe, expect, test } from "vitest";
import { mkdtemp, mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AuditLogger, auditFileName } from "../../src/core/audit/logger.js";

describe("audit logger", () => {
  test("appends events to the day file of their timestamp", async () => {
    const stateDir = await mkdtemp(join(tmpdir(), "moore-audit-"));
    const logger = new AuditLogger(stateDir);

    await logger.log({ ts: "2026-01-02T03:04:05.000Z", level: "info", kind: "machine.load", message: "Loaded" });
    await logger.log({
      ts: "2026-01-02T09:00:00.000Z",
      level: "error",
      kind: "command.failed",
      message: "boom",
      data: { command: "/run" },
    });

    const lines = (await readFile(join(stateDir, "audit", "2026-01-02.jsonl"), "utf8")).trim().split("\n");
    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { ts: "2026-01-02T03:04:05.000Z", level: "info", kind: "machine.load", message: "Loaded" },
      {
        ts: "2026-01-02T09:00:00.000Z",
        level: "error",
        kind: "command.failed",
        message: "boom",
        data: { command: "/run" },
      },
    ]);
  });

  test("level helpers stamp the current time", async () => {
    const stateDir = await mkdtemp(join(tmpdir(), "moore-audit-helpers-"));
    const logger = new AuditLogger(stateDir);
    await logger.warn("equivalence.checked", "mismatch", { depth: 4 });

    const [file] = await readdir(join(stateDir, "audit"));
    const event = JSON.parse((await readFile(join(stateDir, "audit", file ?? ""), "utf8")).trim());
    expect(event.level).toBe("warn");
    expect(event.kind).toBe("equivalence.checked");
    expect(event.data).toEqual({ depth: 4 });
    expect(file).toBe(auditFileName(new Date(event.ts)));
  });

  test("writes nothing when disabled", async () => {
    const stateDir = await mkdtemp(join(tmpdir(), "moore-audit-off-"));
    const logger = new AuditLogger(stateDir, false);
    await logger.info("session.start", "Session started");
    await expect(readdir(join(stateDir, "audit"))).rejects.toThrow();
  });

  test("prunes day files older than the cutoff", async () => {
    const stateDir = await mkdtemp(join(tmpdir(), "moore-audit-prune-"));
    const dir = join(stateDir, "audit");
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, "2020-01-01.jsonl"), "{}\n", "utf8");
    await writeFile(join(dir, "2026-01-02.jsonl"), "{}\n", "utf8");
    await writeFile(join(dir, "notes.txt"), "keep", "utf8");

    const logger = new AuditLogger(stateDir);
    const removed = await logger.prune(30, Date.parse("2026-01-10T00:00:00.000Z"));

    expect(removed).toBe(1);
    expect((await readdir(dir)).sort()).toEqual(["2026-01-02.jsonl", "notes.txt"]);
  });
});
