import { join, resolve } from "node:path";
import { z } from "zod";
import { MAX_EQUIVALENCE_DEPTH } from "../machine/equivalence.js";

export const STATE_DIR = ".moore";

const envSchema = z.object({
  MOORE_HOME: z.string().min(1).optional(),
  MOORE_EQUIV_DEPTH: z.coerce.number().int().min(0).max(MAX_EQUIVALENCE_DEPTH).default(8),
  MOORE_AUDIT: z.enum(["0", "1"]).default("1"),
});

export interface Settings {
  home: string;
  stateDir: string;
  equivalenceDepth: number;
  auditEnabled: boolean;
}

export function loadSettings(projectRoot: string, env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.safeParse({
    MOORE_HOME: env.MOORE_HOME || undefined,
    MOORE_EQUIV_DEPTH: env.MOORE_EQUIV_DEPTH || undefined,
    MOORE_AUDIT: env.MOORE_AUDIT || undefined,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const home = parsed.data.MOORE_HOME ? resolve(projectRoot, parsed.data.MOORE_HOME) : projectRoot;

  return {
    home,
    stateDir: join(home, STATE_DIR),
    equivalenceDepth: parsed.data.MOORE_EQUIV_DEPTH,
    auditEnabled: parsed.data.MOORE_AUDIT === "1",
  };
}
