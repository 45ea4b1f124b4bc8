import { buildAdminServer } from "./adminServer.js";
import { loadShipConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createMetrics } from "./metrics.js";
import { createShipProxy } from "./ship/proxy.js";

async function main(): Promise<void> {
  const config = loadShipConfig();
  const logger = createLogger({ name: "ship", level: config.LOG_LEVEL });
  const metrics = createMetrics({ side: "ship" });
  const proxy = createShipProxy(config, logger, { metrics });

  const admin =
    config.ADMIN_PORT === undefined
      ? null
      : buildAdminServer({
          logger: logger.child({ component: "admin" }),
          metrics,
          health: { linkState: () => proxy.link.state, sessionCount: () => proxy.multiplexer.sessionCount },
        });

  let forceExitTimer: NodeJS.Timeout | null = null;
  let shuttingDown = false;

  async function shutdown(signal: string, exitCode: number): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown requested");

    forceExitTimer = setTimeout(() => {
      logger.error({ graceMs: config.SHUTDOWN_GRACE_MS }, "Graceful shutdown timed out; forcing exit");
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS);
    forceExitTimer.unref();

    try {
      await proxy.stop();
      await admin?.close();
      process.exit(exitCode);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.once("SIGTERM", () => void shutdown("SIGTERM", 0));
  process.once("SIGINT", () => void shutdown("SIGINT", 0));

  proxy.link.onStateChange((state) => {
    if (state === "GAVE_UP") void shutdown("link gave up", 1);
  });

  if (admin) {
    await admin.listen({ host: config.ADMIN_HOST, port: config.ADMIN_PORT });
  }
  await proxy.start();

  process.once("exit", () => {
    if (forceExitTimer) clearTimeout(forceExitTimer);
  });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
