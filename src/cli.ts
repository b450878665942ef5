#!/usr/bin/env node

import ansis from "ansis";
import { Runner } from "./execution/runner";

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  // The command in flight finishes; nothing new starts after an interrupt
  const controller = new AbortController();
  const interrupt = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    console.error(ansis.yellow(`\nReceived ${signal}, stopping after the current command...`));
    controller.abort();
  };
  process.on("SIGINT", interrupt);
  process.on("SIGTERM", interrupt);

  const runner = new Runner();
  process.exitCode = await runner.run(args, { signal: controller.signal });
}

main().catch((error: unknown) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
