import { mkdir, appendFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";

export type AuditLevel = "info" | "warn" | "error";

export interface AuditEvent {
  ts: string;
  level: AuditLevel;
  kind: string;
  message: string;
  data?: Record<string, unknown>;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function auditFileName(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, "0");
  const d = String(date.getUTCDate()).padStart(2, "0");
  return `${y}-${m}-${d}.jsonl`;
}

export class AuditLogger {
  constructor(
    private readonly stateDir: string,
    private readonly enabled = true,
  ) {}

  get directory(): string {
    return join(this.stateDir, "audit");
  }

  async log(event: AuditEvent): Promise<void> {
    if (!this.enabled) {
      return;
    }

    await mkdir(this.directory, { recursive: true });
    const stamped = new Date(event.ts);
    const day = Number.isNaN(stamped.getTime()) ? new Date() : stamped;
    const path = join(this.directory, auditFileName(day));
    await appendFile(path, `${JSON.stringify(event)}\n`, "utf8");
  }

  async info(kind: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.write("info", kind, message, data);
  }

  async warn(kind: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.write("warn", kind, message, data);
  }

  async error(kind: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.write("error", kind, message, data);
  }

  async prune(days: number, now = Date.now()): Promise<number> {
    await mkdir(this.directory, { recursive: true });
    const files = await readdir(this.directory);
    const cutoff = now - days * DAY_MS;
    let removed = 0;

    for (const file of files) {
      if (!file.endsWith(".jsonl")) {
        continue;
      }

      const ts = Date.parse(`${file.replace(".jsonl", "")}T00:00:00.000Z`);
      if (Number.isNaN(ts)) {
        continue;
      }

      if (ts < cutoff) {
        await rm(join(this.directory, file), { force: true });
        removed += 1;
      }
    }

    return removed;
  }

  private async write(level: AuditLevel, kind: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log({
      ts: new Date().toISOString(),
      level,
      kind,
      message,
      ...(data ? { data } : {}),
    });
  }
}
