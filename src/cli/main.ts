import { Command } from "commander";
import { cwd } from "node:process";
import { startRepl } from "./repl.js";
import { EXIT_SIGNAL, MooreApp } from "./app.js";

async function runOnce(app: MooreApp, line: string): Promise<boolean> {
  const output = await app.run(line);
  if (output && output !== EXIT_SIGNAL) {
    process.stdout.write(`${output}\n`);
  }
  return !output.startsWith("Error:");
}

export async function runCli(argv: string[]): Promise<void> {
  if (argv[2] === "run") {
    const app = new MooreApp(cwd());
    await app.init();
    if (!(await runOnce(app, argv.slice(3).join(" ")))) {
      process.exitCode = 1;
    }
    return;
  }

  const program = new Command();
  program.name("moore-eval").description("Simulate small Moore machines over bit inputs");

  program
    .command("repl")
    .description("Start interactive REPL")
    .action(async () => {
      await startRepl(cwd());
    });

  program
    .command("simulate")
    .description("Run an input sequence through a machine and record the run")
    .argument("<machine>", "sample design name or path to a JSON definition")
    .argument("<inputs>", "input bits, e.g. 1110111 or 1,1,0")
    .action(async (machine: string, inputs: string) => {
      const app = new MooreApp(cwd());
      await app.init();
      const ok = (await runOnce(app, `/load ${machine}`)) && (await runOnce(app, `/run ${inputs}`));
      if (!ok) {
        process.exitCode = 1;
      }
    });

  program
    .command("equiv")
    .description("Check two machines for equal outputs on every input sequence up to a depth")
    .argument("<left>", "sample design name or path")
    .argument("<right>", "sample design name or path")
    .option("-d, --depth <n>", "sequence length to enumerate")
    .action(async (left: string, right: string, options: { depth?: string }) => {
      const app = new MooreApp(cwd());
      await app.init();
      const line = ["/equiv", left, right, options.depth].filter((part): part is string => Boolean(part)).join(" ");
      if (!(await runOnce(app, line))) {
        process.exitCode = 1;
      }
    });

  if (argv.length <= 2) {
    await startRepl(cwd());
    return;
  }

  await program.parseAsync(argv);
}
