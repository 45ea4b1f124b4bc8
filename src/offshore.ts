import { buildAdminServer } from "./adminServer.js";
import { loadOffshoreConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createMetrics } from "./metrics.js";
import { createOffshoreProxy } from "./offshore/proxy.js";

async function main(): Promise<void> {
  const config = loadOffshoreConfig();
  const logger = createLogger({ name: "offshore", level: config.LOG_LEVEL });
  const metrics = createMetrics({ side: "offshore" });
  const proxy = createOffshoreProxy(config, logger, { metrics });

  const admin =
    config.ADMIN_PORT === undefined
      ? null
      : buildAdminServer({
          logger: logger.child({ component: "admin" }),
          metrics,
          health: { linkState: () => proxy.link.state, sessionCount: () => proxy.demultiplexer.sessionCount },
        });

  let forceExitTimer: NodeJS.Timeout | null = null;

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown requested");

    forceExitTimer = setTimeout(() => {
      logger.error({ graceMs: config.SHUTDOWN_GRACE_MS }, "Graceful shutdown timed out; forcing exit");
      process.exit(1);
    }, config.SHUTDOWN_GRACE_MS);
    forceExitTimer.unref();

    try {
      await proxy.stop();
      await admin?.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  }

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

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
