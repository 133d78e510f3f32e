import { createApp } from "./app";
import { loadConfig } from "./config";
import { createDb, ensureSchema } from "./db";
import { OrderDispatcher } from "./dispatch";
import { HistoryStore } from "./history";
import { logger, moduleLogger } from "./logger";
import { RunContext, RunCoordinator } from "./pipeline";
import { startScheduler } from "./scheduler";
import { InventorySourceClient } from "./sourceClient";

async function main() {
  const cfg = loadConfig();
  logger.level = cfg.logLevel;

  const db = createDb(cfg.databaseUrl);
  await ensureSchema(db);
  const store = new HistoryStore(db, { cooldownDays: cfg.cooldownDays });

  const source = new InventorySourceClient({
    baseUrl: cfg.inventoryUrl,
    token: cfg.inventoryToken,
    timeoutMs: cfg.inventoryTimeoutMs,
  });
  const dispatcher = cfg.dispatchOrders
    ? new OrderDispatcher(source.httpClient, moduleLogger("dispatch"), { priority: cfg.dispatchPriority })
    : null;

  const coordinator = new RunCoordinator({
    source,
    store,
    dispatcher,
    log: moduleLogger("pipeline"),
    maxOrdersPerRun: cfg.maxOrdersPerRun,
    excludedStorageUnitPrefixes: cfg.excludedStorageUnitPrefixes,
    context: new RunContext(),
  });

  const app = createApp({
    coordinator,
    store,
    source,
    log: moduleLogger("http"),
    excludedStorageUnitPrefixes: cfg.excludedStorageUnitPrefixes,
  });

  const server = app.listen(cfg.port, () => {
    logger.info({ port: cfg.port, database: cfg.databaseUrl }, "server listening");
  });
  const task = startScheduler(coordinator, cfg, moduleLogger("scheduler"));

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    task.stop();
    server.close(() => {
      db.destroy().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, "database close failed");
          process.exit(1);
        }
      );
    });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch(err => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
