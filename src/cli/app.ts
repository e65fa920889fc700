import { mkdir } from "node:fs/promises";
import type { Bit, MachineDefinition } from "../contracts/machine.js";
import { AuditLogger } from "../core/audit/index.js";
import { loadSettings, type Settings } from "../core/config/index.js";
import {
  checkEquivalence,
  formatBits,
  listSampleDesigns,
  MooreEvaluator,
  parseInputSequence,
  resolveMachine,
  simulate,
} from "../core/machine/index.js";
import { createRunRecord, listRuns, loadRun, saveRun } from "../core/runs/index.js";

export const EXIT_SIGNAL = "__EXIT__";

interface LoadedMachine {
  definition: MachineDefinition;
  evaluator: MooreEvaluator;
}

export class MooreApp {
  private readonly settings: Settings;
  private readonly audit: AuditLogger;
  private loaded: LoadedMachine | null = null;

  constructor(
    private readonly projectRoot: string,
    env: NodeJS.ProcessEnv = process.env,
  ) {
    this.settings = loadSettings(projectRoot, env);
    this.audit = new AuditLogger(this.settings.stateDir, this.settings.auditEnabled);
  }

  get stateDir(): string {
    return this.settings.stateDir;
  }

  async init(): Promise<void> {
    await mkdir(this.settings.stateDir, { recursive: true });
    await this.audit.info("session.start", "Session started", { home: this.settings.home });
  }

  async run(rawInput: string): Promise<string> {
    const input = rawInput.trim();
    if (!input) {
      return "";
    }

    const [command = "", ...args] = input.split(/\s+/);
    let result = "";

    try {
      switch (command) {
        case "/help":
          result = this.help();
          break;
        case "/samples":
          result = `Sample designs: ${listSampleDesigns().join(", ")}`;
          break;
        case "/load":
          result = await this.load(args);
          break;
        case "/state":
          result = this.state();
          break;
        case "/reset":
          result = this.reset();
          break;
        case "/step":
          result = this.step(args);
          break;
        case "/run":
          result = await this.runInputs(args);
          break;
        case "/trace":
          result = this.trace(args);
          break;
        case "/equiv":
          result = await this.equiv(args);
          break;
        case "/runs":
          result = await this.runs(args);
          break;
        case "/audit":
          result = await this.auditCommand(args);
          break;
        case "/exit":
          result = EXIT_SIGNAL;
          break;
        default:
          result = `Unknown command: ${command}. Try /help`;
          break;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      const kind = error instanceof Error ? error.name : "Error";
      await this.audit.error("command.failed", message, { command, args, kind });
      result = `Error: ${message}`;
    }

    return result;
  }

  private help(): string {
    return [
      "Commands:",
      "/help",
      "/samples",
      "/load <sample|path>",
      "/state",
      "/reset",
      "/step <0|1>",
      "/run <bits>",
      "/trace <bits>",
      "/equiv <sample|path> <sample|path> [depth]",
      "/runs [run-id]",
      "/audit prune [--days N]",
      "/exit",
    ].join("\n");
  }

  private requireMachine(): LoadedMachine {
    if (!this.loaded) {
      throw new Error("No machine loaded. Run /load <sample|path> first.");
    }
    return this.loaded;
  }

  private async load(args: string[]): Promise<string> {
    const [ref] = args;
    if (!ref) {
      return "Usage: /load <sample|path>";
    }

    const definition = await resolveMachine(this.projectRoot, ref);
    const evaluator = new MooreEvaluator(definition);
    this.loaded = { definition, evaluator };

    await this.audit.info("machine.load", `Loaded ${definition.name}`, { ref, states: definition.states });
    return `Loaded ${definition.name}: states=${evaluator.states.join(",")} initial=${evaluator.initialState}`;
  }

  private state(): string {
    const { definition, evaluator } = this.requireMachine();
    return `Machine ${definition.name}: state=${evaluator.currentState} cycle=${evaluator.cycles}`;
  }

  private reset(): string {
    const { evaluator } = this.requireMachine();
    evaluator.reset();
    return `Reset to ${evaluator.currentState}`;
  }

  private step(args: string[]): string {
    const { evaluator } = this.requireMachine();
    const bits = parseInputSequence(args.join(" "));
    const [bit] = bits;
    if (bit === undefined || bits.length !== 1) {
      return "Usage: /step <0|1>";
    }

    const from = evaluator.currentState;
    const output = evaluator.step(bit);
    return `Output: ${output} (${from} -> ${evaluator.currentState})`;
  }

  private async runInputs(args: string[]): Promise<string> {
    const { definition, evaluator } = this.requireMachine();
    const bits = parseInputSequence(args.join(" "));
    if (bits.length === 0) {
      return "Usage: /run <bits>";
    }

    evaluator.reset();
    const outputs: Bit[] = [...evaluator.run(bits)];
    const record = createRunRecord(definition.name, bits, outputs, evaluator.currentState);
    await saveRun(this.settings.stateDir, record);

    await this.audit.info("run.recorded", `Run ${record.runId} on ${definition.name}`, {
      runId: record.runId,
      cycles: bits.length,
    });
    return `Run ${record.runId}: outputs=${formatBits(outputs)} final=${record.finalState}`;
  }

  private trace(args: string[]): string {
    const { definition } = this.requireMachine();
    const bits = parseInputSequence(args.join(" "));
    if (bits.length === 0) {
      return "Usage: /trace <bits>";
    }

    const { cycles } = simulate(definition, bits);
    const rows = cycles.map((c) => `${c.cycle}\t${c.state}\t${c.input}\t${c.output}\t${c.next}`);
    return ["cycle\tstate\tin\tout\tnext", ...rows].join("\n");
  }

  private async equiv(args: string[]): Promise<string> {
    const [leftRef, rightRef, depthRaw] = args;
    if (!leftRef || !rightRef) {
      return "Usage: /equiv <sample|path> <sample|path> [depth]";
    }

    const depth = depthRaw === undefined ? this.settings.equivalenceDepth : Number(depthRaw);
    const left = await resolveMachine(this.projectRoot, leftRef);
    const right = await resolveMachine(this.projectRoot, rightRef);
    const result = checkEquivalence(left, right, depth);

    await this.audit.info("equivalence.checked", `${left.name} vs ${right.name}`, {
      depth,
      equivalent: result.equivalent,
      sequencesChecked: result.sequencesChecked,
    });

    if (result.equivalent) {
      return `Equivalent up to depth ${result.depth} (${result.sequencesChecked} sequences)`;
    }
    return `Not equivalent: inputs=${formatBits(result.inputs)} ${left.name}=${formatBits(result.left)} ${right.name}=${formatBits(result.right)}`;
  }

  private async runs(args: string[]): Promise<string> {
    const [runId] = args;
    if (runId) {
      const record = await loadRun(this.settings.stateDir, runId);
      if (!record) {
        return `Run not found: ${runId}`;
      }
      return [
        `Run ${record.runId}`,
        `machine=${record.machine}`,
        `startedAt=${record.startedAt}`,
        `inputs=${formatBits(record.inputs)}`,
        `outputs=${formatBits(record.outputs)}`,
        `final=${record.finalState}`,
      ].join("\n");
    }

    const records = await listRuns(this.settings.stateDir);
    if (records.length === 0) {
      return "No runs recorded.";
    }
    return records.map((r) => `${r.runId} ${r.machine} ${r.startedAt} outputs=${formatBits(r.outputs)}`).join("\n");
  }

  private async auditCommand(args: string[]): Promise<string> {
    const [action, maybeDaysFlag, maybeDaysValue] = args;
    if (action !== "prune") {
      return "Usage: /audit prune [--days N]";
    }

    let days = 30;
    if (maybeDaysFlag === "--days" && maybeDaysValue) {
      days = Number.parseInt(maybeDaysValue, 10);
    }
    if (!Number.isFinite(days) || days <= 0) {
      throw new Error("--days must be a positive integer");
    }

    const removed = await this.audit.prune(days);
    await this.audit.info("audit.prune", "Audit files pruned", { days, removed });
    return `Audit prune complete. removed=${removed}`;
  }
}
