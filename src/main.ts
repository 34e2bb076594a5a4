/**
 * Entry point: load config, start the gateway, shut down cleanly on SIGINT/SIGTERM.
 */

import { loadConfig, validateConfig } from "./config";
import { createGateway } from "./gateway";
import { logger, logError } from "./logging";

async function main(): Promise<void> {
  const config = loadConfig();
  for (const problem of validateConfig(config)) {
    logger.warn({ event: "CONFIG_WARNING" }, problem);
  }
  logger.info(
    {
      event: "CONFIG_LOADED",
      asr: config.asr.provider,
      llm: config.llm.provider,
      tts: config.tts.provider,
      tempDir: config.storage.tempDir,
      singleSessionMode: config.server.singleSessionMode,
    },
    "Configuration loaded"
  );

  const gateway = createGateway(config);
  await gateway.listen();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ event: "SHUTDOWN", signal }, "Shutting down");
    gateway
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logError(logger, err, { event: "SHUTDOWN_FAILED" });
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logError(logger, err);
  process.exit(1);
});
