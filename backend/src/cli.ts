#!/usr/bin/env node
import { parseArgs } from "node:util";
import { logger } from "./lib/logger.js";
import { createRuntime } from "./runtime.js";
import { exportRecords } from "./services/syncService.js";

const USAGE = `Usage: tracker [--initial] [--export]

  --initial   scan the long initial window instead of the daily one
  --export    push every stored record to the sheet without fetching mail`;

const main = async (): Promise<number> => {
  const { values } = parseArgs({
    options: {
      initial: { type: "boolean", default: false },
      export: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const runtime = createRuntime();
  process.once("SIGINT", () => runtime.coordinator.abort());

  try {
    if (values.export) {
      const count = await exportRecords(runtime.store, runtime.sink);
      logger.info("Exported records", { count, sink: runtime.sink.name });
      return 0;
    }

    const summary = await runtime.coordinator.run(values.initial);
    console.log(JSON.stringify(summary, null, 2));
    return summary.failureReason ? 1 : 0;
  } finally {
    await runtime.close();
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error("Sync command failed", error);
    process.exitCode = 1;
  });
