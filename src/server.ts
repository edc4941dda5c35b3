import { createApp } from "./app.js";
import { config } from "./config.js";
import { createContainer } from "./container.js";
import { initDb } from "./db.js";
import { logger } from "./logger.js";

async function main() {
  const container = createContainer();
  await initDb(container.supabase);

  const app = createApp(container.appDeps);

  // Sweep jobs whose webhook never arrived
  let reconciling = false;
  const reconcileInterval = setInterval(async () => {
    if (reconciling) return;
    reconciling = true;
    try {
      await container.reconciler.reconcileStaleJobs();
    } catch (err: unknown) {
      logger.error({ err }, "Background job reconciliation failed");
    } finally {
      reconciling = false;
    }
  }, config.reconcile.intervalMs);

  const server = app.listen(config.port, () => {
    logger.info(`Backend listening on port ${config.port}`);
    logger.info(`Stale job reconciliation started (interval: ${config.reconcile.intervalMs}ms)`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    clearInterval(reconcileInterval);
    server.close(async () => {
      try {
        await container.notifications.drain();
      } catch (err: unknown) {
        logger.error({ err }, "Failed to flush notifications");
      }
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err) => {
  logger.error(err, "fatal error");
  process.exit(1);
});
