import "@total-typescript/ts-reset";
import { loadConfig } from "./core/config";
import { createLogger } from "./core/logger";
import type { RuntimeContext } from "./core/runtime";
import { AppleScriptCaptureAdapter } from "./capture/applescript";
import { Linker } from "./linker/linker";
import { RecorderServer } from "./mcp/server";
import { RecordingEngine } from "./recorder/engine";
import { ReliabilityMonitor } from "./reliability/monitor";
import { SqliteContentStore } from "./store/sqlite-store";
import { createTools } from "./tools";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const store = SqliteContentStore.open(config.databasePath, logger);
  const capture = new AppleScriptCaptureAdapter(logger);
  const monitor = new ReliabilityMonitor(config, logger);
  const linker = new Linker(store, logger);
  const engine = new RecordingEngine(
    { store, capture, linker, monitor, logger },
    { linkLimit: config.linkLimit, maxResponseChars: config.maxResponseChars },
  );
  const recorder = new RecorderServer(logger);

  await capture.isAvailable();

  const reconciled = await engine.reconcile();
  if (reconciled.isErr()) {
    logger.error({ err: reconciled.error }, "Startup reconciliation failed");
  }
  const relinked = await engine.relinkPending();
  if (relinked.isOk() && relinked.value.relinked > 0) {
    logger.info(relinked.value, "Recomputed pending links");
  } else if (relinked.isErr()) {
    logger.error({ err: relinked.error }, "Startup relink failed");
  }

  const runtime: RuntimeContext = {
    config,
    logger,
    server: recorder.server,
    engine,
  };
  createTools().forEach((tool) => tool.register(runtime));

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    void recorder
      .stop()
      .catch((error) => logger.error({ err: error }, "Failed to close server"))
      .finally(() => store.close());
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await recorder.start();
  logger.info({ databasePath: store.location }, "Memory bank recorder ready");
}

main().catch((error) => {
  console.error("Fatal error", error);
  process.exitCode = 1;
});
