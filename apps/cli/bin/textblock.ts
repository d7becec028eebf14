#!/usr/bin/env tsx

import { run } from "../src";

process.on("unhandledRejection", (reason) => {
  console.error(
    "Unhandled rejection:",
    reason instanceof Error ? reason.message : reason
  );
  process.exit(1);
});

void (async () => {
  try {
    await run();
  } catch (error) {
    console.error(
      "error:",
      error instanceof Error ? error.message : String(error)
    );
    process.exitCode = 1;
  }
})();
