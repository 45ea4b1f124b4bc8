import type { OffshoreConfig } from "../config.js";
import { OffshoreLinkSupervisor } from "../link/linkSupervisor.js";
import type { Logger } from "../logger.js";
import type { ProxyMetrics } from "../metrics.js";
import { OffshoreDemultiplexer } from "./demultiplexer.js";
import type { LookupFn } from "./egressPolicy.js";

export type OffshoreProxy = {
  link: OffshoreLinkSupervisor;
  demultiplexer: OffshoreDemultiplexer;
  start(): Promise<void>;
  stop(): Promise<void>;
};

export type CreateOffshoreProxyOptions = {
  metrics?: ProxyMetrics;
  lookup?: LookupFn;
};

export function createOffshoreProxy(
  config: OffshoreConfig,
  logger: Logger,
  opts: CreateOffshoreProxyOptions = {},
): OffshoreProxy {
  const link = new OffshoreLinkSupervisor({
    logger: logger.child({ component: "offshore-link" }),
    metrics: opts.metrics,
    host: config.OFFSHORE_LISTEN_HOST,
    port: config.OFFSHORE_LISTEN_PORT,
    maxFramePayloadBytes: config.MAX_FRAME_PAYLOAD_BYTES,
    frameStallTimeoutMs: config.FRAME_STALL_TIMEOUT_MS,
    highWaterMarkBytes: config.LINK_HIGH_WATER_MARK_BYTES,
    idleTimeoutMs: config.LINK_IDLE_TIMEOUT_MS,
  });

  const demultiplexer = new OffshoreDemultiplexer({
    link,
    logger: logger.child({ component: "offshore-demux" }),
    metrics: opts.metrics,
    maxFramePayloadBytes: config.MAX_FRAME_PAYLOAD_BYTES,
    sessionWindowBytes: config.SESSION_WINDOW_BYTES,
    maxSessions: config.MAX_SESSIONS,
    dnsTimeoutMs: config.DNS_TIMEOUT_MS,
    targetConnectTimeoutMs: config.TARGET_CONNECT_TIMEOUT_MS,
    targetIdleTimeoutMs: config.TARGET_IDLE_TIMEOUT_MS,
    policy: {
      allowPrivateTargets: config.OFFSHORE_ALLOW_PRIVATE_TARGETS,
      allowedPorts: config.OFFSHORE_ALLOWED_PORTS,
    },
    lookup: opts.lookup,
  });

  return {
    link,
    demultiplexer,
    start: () => link.start(),
    stop: () => link.stop(),
  };
}
