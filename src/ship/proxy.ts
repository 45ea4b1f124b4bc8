import type { ShipConfig } from "../config.js";
import { ShipLinkSupervisor } from "../link/linkSupervisor.js";
import type { Logger } from "../logger.js";
import type { ProxyMetrics } from "../metrics.js";
import { ShipMultiplexer } from "./multiplexer.js";

export type ShipProxy = {
  link: ShipLinkSupervisor;
  multiplexer: ShipMultiplexer;
  start(): Promise<void>;
  stop(): Promise<void>;
};

export type CreateShipProxyOptions = {
  metrics?: ProxyMetrics;
  firstSessionId?: number;
};

export function createShipProxy(config: ShipConfig, logger: Logger, opts: CreateShipProxyOptions = {}): ShipProxy {
  const { metrics } = opts;
  const link = new ShipLinkSupervisor({
    logger: logger.child({ component: "ship-link" }),
    metrics,
    host: config.OFFSHORE_HOST,
    port: config.OFFSHORE_PORT,
    maxFramePayloadBytes: config.MAX_FRAME_PAYLOAD_BYTES,
    frameStallTimeoutMs: config.FRAME_STALL_TIMEOUT_MS,
    highWaterMarkBytes: config.LINK_HIGH_WATER_MARK_BYTES,
    idleTimeoutMs: config.LINK_IDLE_TIMEOUT_MS,
    connectTimeoutMs: config.LINK_CONNECT_TIMEOUT_MS,
    pingIntervalMs: config.LINK_PING_INTERVAL_MS,
    reconnectBaseDelayMs: config.LINK_RECONNECT_BASE_DELAY_MS,
    reconnectMaxDelayMs: config.LINK_RECONNECT_MAX_DELAY_MS,
    reconnectMaxAttempts: config.LINK_RECONNECT_MAX_ATTEMPTS,
  });

  const multiplexer = new ShipMultiplexer({
    link,
    logger: logger.child({ component: "ship-mux" }),
    metrics,
    host: config.SHIP_LISTEN_HOST,
    port: config.SHIP_LISTEN_PORT,
    maxFramePayloadBytes: config.MAX_FRAME_PAYLOAD_BYTES,
    sessionWindowBytes: config.SESSION_WINDOW_BYTES,
    maxSessions: config.MAX_SESSIONS,
    maxRequestHeadBytes: config.MAX_REQUEST_HEAD_BYTES,
    clientHeadTimeoutMs: config.CLIENT_HEAD_TIMEOUT_MS,
    sessionOpenTimeoutMs: config.SESSION_OPEN_TIMEOUT_MS,
    firstSessionId: opts.firstSessionId,
  });

  return {
    link,
    multiplexer,
    async start() {
      await multiplexer.start();
      await link.start();
    },
    async stop() {
      // Sessions fail with Shutdown before the listener goes away.
      await link.stop();
      await multiplexer.stop();
    },
  };
}
