import { Counter, Gauge, Registry, collectDefaultMetrics } from "prom-client";

import type { FailureReason } from "./errors.js";
import type { SessionMode } from "./protocol/frame.js";

export type ProxySide = "ship" | "offshore";
export type ByteDirection = "upstream" | "downstream";

export type ProxyMetrics = Readonly<{
  registry: Registry;
  sessionOpened(mode: SessionMode): void;
  sessionEnded(mode: SessionMode): void;
  sessionFailed(reason: FailureReason): void;
  bytes(direction: ByteDirection, count: number): void;
  linkUp(up: boolean): void;
  linkReconnect(): void;
}>;

export type CreateMetricsOptions = {
  side: ProxySide;
  collectDefaults?: boolean;
};

export function createMetrics(opts: CreateMetricsOptions): ProxyMetrics {
  // Per-instance registry so tests can run a ship and an offshore in one process.
  const registry = new Registry();
  if (opts.collectDefaults ?? true) collectDefaultMetrics({ register: registry });
  const side = opts.side;

  const sessionsActive = new Gauge({
    name: "proxy_sessions_active",
    help: "Sessions currently open",
    labelNames: ["side", "mode"] as const,
    registers: [registry],
  });

  const sessionsTotal = new Counter({
    name: "proxy_sessions_total",
    help: "Total number of sessions opened",
    labelNames: ["side", "mode"] as const,
    registers: [registry],
  });

  const sessionFailuresTotal = new Counter({
    name: "proxy_session_failures_total",
    help: "Total number of failed sessions by reason",
    labelNames: ["side", "reason"] as const,
    registers: [registry],
  });

  const bytesTotal = new Counter({
    name: "proxy_bytes_total",
    help: "Payload bytes relayed through sessions",
    labelNames: ["side", "direction"] as const,
    registers: [registry],
  });

  const linkUpGauge = new Gauge({
    name: "proxy_link_up",
    help: "1 while the Link is up",
    labelNames: ["side"] as const,
    registers: [registry],
  });

  const linkReconnectsTotal = new Counter({
    name: "proxy_link_reconnects_total",
    help: "Total number of Link reconnect attempts scheduled",
    registers: [registry],
  });

  linkUpGauge.set({ side }, 0);

  return {
    registry,
    sessionOpened(mode) {
      sessionsActive.inc({ side, mode });
      sessionsTotal.inc({ side, mode });
    },
    sessionEnded(mode) {
      sessionsActive.dec({ side, mode });
    },
    sessionFailed(reason) {
      sessionFailuresTotal.inc({ side, reason });
    },
    bytes(direction, count) {
      if (count > 0) bytesTotal.inc({ side, direction }, count);
    },
    linkUp(up) {
      linkUpGauge.set({ side }, up ? 1 : 0);
    },
    linkReconnect() {
      linkReconnectsTotal.inc();
    },
  };
}
