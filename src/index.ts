export { buildAdminServer, type AdminServerOptions, type HealthReport, type HealthSource } from "./adminServer.js";
export { loadOffshoreConfig, loadShipConfig, type OffshoreConfig, type ShipConfig } from "./config.js";
export {
  FAILURE_REASON_CODES,
  InvalidStateError,
  MalformedFrameError,
  TargetDialError,
  classifySocketError,
  failureReasonCode,
  failureReasonFromCode,
  type FailureReason,
} from "./errors.js";
export {
  LinkSupervisor,
  OffshoreLinkSupervisor,
  ShipLinkSupervisor,
  type LinkDownReason,
  type LinkHandler,
  type LinkState,
} from "./link/linkSupervisor.js";
export { createLogger, type LogLevel, type Logger } from "./logger.js";
export { createMetrics, type ProxyMetrics } from "./metrics.js";
export { OffshoreDemultiplexer, type OffshoreDemultiplexerOptions } from "./offshore/demultiplexer.js";
export { type EgressPolicy, type LookupFn } from "./offshore/egressPolicy.js";
export { createOffshoreProxy, type CreateOffshoreProxyOptions, type OffshoreProxy } from "./offshore/proxy.js";
export * from "./protocol/frame.js";
export { Session, type FrameSender, type SessionFailure, type SessionObserver, type SessionState } from "./session.js";
export { ShipMultiplexer, type ShipMultiplexerOptions } from "./ship/multiplexer.js";
export { createShipProxy, type CreateShipProxyOptions, type ShipProxy } from "./ship/proxy.js";
export { SessionIdAllocator } from "./ship/sessionIds.js";
