import fastify, { type FastifyReply } from "fastify";
import type { Logger } from "pino";

import type { LinkState } from "./link/linkSupervisor.js";
import type { ProxyMetrics } from "./metrics.js";

export type HealthSource = {
  linkState(): LinkState;
  sessionCount(): number;
};

export type AdminServerOptions = {
  logger: Logger;
  metrics: ProxyMetrics;
  health: HealthSource;
};

export type HealthReport = {
  ok: boolean;
  link: LinkState;
  sessions: number;
};

/**
 * Health and Prometheus endpoints. Bound to a separate (usually loopback) port, never to the
 * proxy port.
 */
export function buildAdminServer(opts: AdminServerOptions) {
  const app = fastify({ loggerInstance: opts.logger, disableRequestLogging: true });

  const handleHealthz = async (_request: unknown, reply: FastifyReply): Promise<HealthReport> => {
    const link = opts.health.linkState();
    const report: HealthReport = { ok: link === "UP", link, sessions: opts.health.sessionCount() };
    if (!report.ok) reply.code(503);
    return report;
  };

  const handleMetrics = async (_request: unknown, reply: FastifyReply) => {
    reply.header("content-type", opts.metrics.registry.contentType);
    return opts.metrics.registry.metrics();
  };

  app.get("/healthz", handleHealthz);
  app.get("/metrics", handleMetrics);

  return app;
}
