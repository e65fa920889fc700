import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { EXIT_SIGNAL, MooreApp } from "./app.js";

function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return error.name === "AbortError" || ("code" in error && error.code === "ABORT_ERR");
}

export async function startRepl(projectRoot: string): Promise<void> {
  const app = new MooreApp(projectRoot);
  await app.init();

  const rl = createInterface({ input, output });
  output.write("moore> Type /help for commands\n");

  try {
    while (true) {
      let line = "";
      try {
        line = await rl.question("moore> ");
      } catch (error) {
        if (isAbortError(error)) {
          output.write("\n");
          break;
        }
        throw error;
      }

      const result = await app.run(line);

      if (result === EXIT_SIGNAL) {
        break;
      }

      if (result) {
        output.write(`${result}\n`);
      }
    }
  } finally {
    rl.close();
  }
}
