#!/usr/bin/env node

/**
 * Marketplace sync worker
 */

import { validateConfig } from "../config/env";
import { createWorker } from "../worker";

async function main() {
  validateConfig();

  const worker = createWorker();
  const shutdown = (signal: string) => {
    console.log(`[marketplace] Received ${signal}, shutting down...`);
    worker
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error("Shutdown failed:", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  const status = await worker.start();
  if (status !== "merchant") {
    await worker.stop();
    process.exitCode = status === "not_merchant" ? 0 : 1;
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Failed to start marketplace worker:", error);
    process.exit(1);
  });
}
