#!/usr/bin/env node
import { loadEnv } from "./env";
import { USAGE, isHelpRequest } from "./config";
import { ConfigError, InterruptedError, ZipcastError } from "./errors";
import { runForecast } from "./commands/forecast";

const args = process.argv.slice(2);
const controller = new AbortController();

process.on("SIGINT", () => {
  if (controller.signal.aborted) process.exit(1);
  // In-flight requests reject and cleanup runs before main() settles.
  controller.abort();
});

async function main() {
  if (isHelpRequest(args)) {
    console.log(USAGE);
    return;
  }
  loadEnv(process.cwd());
  await runForecast(args, { signal: controller.signal });
}

main().catch((err: unknown) => {
  if (controller.signal.aborted || err instanceof InterruptedError) {
    console.error("Interrupted.");
  } else if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}`);
    console.error(USAGE);
  } else if (err instanceof ZipcastError) {
    console.error(`Error: ${err.message}`);
  } else {
    // Not one of ours (e.g. a filesystem failure): keep the stack.
    console.error(err);
  }
  process.exit(1);
});
