import { once } from "node:events";
import net from "node:net";

import type { Logger } from "pino";

import { MalformedFrameError } from "../errors.js";
import type { ProxyMetrics } from "../metrics.js";
import {
  FrameDecoder,
  FrameType,
  LINK_SESSION_ID,
  MAX_PING_PAYLOAD_BYTES,
  encodeFrame,
  frameTypeName,
  type Frame,
} from "../protocol/frame.js";
import type { FrameSender } from "../session.js";
import { formatOneLineError } from "../util/text.js";

export type LinkState = "IDLE" | "CONNECTING" | "UP" | "DOWN" | "GAVE_UP" | "STOPPED";

export type LinkDownReason = "LinkLost" | "Shutdown";

/**
 * The Multiplexer or Demultiplexer on top of a Link. The supervisor calls it from the read loop
 * and on Link state changes; exceptions are logged and never take the Link down.
 */
export interface LinkHandler {
  handleFrame(frame: Frame): void;
  handleLinkDown(reason: LinkDownReason, message: string): void;
  handleDrain(): void;
}

export type LinkSupervisorOptions = {
  logger: Logger;
  metrics?: ProxyMetrics;
  maxFramePayloadBytes: number;
  frameStallTimeoutMs: number;
  highWaterMarkBytes: number;
  idleTimeoutMs: number;
};

type StateListener = (state: LinkState) => void;

// net.Socket's default writableHighWaterMark.
export const MIN_HIGH_WATER_MARK_BYTES = 16 * 1024;

/**
 * Owns the single physical Link socket. Every frame is encoded into one buffer and handed to
 * the socket in one write, so the socket's write queue is the only send queue.
 */
export abstract class LinkSupervisor implements FrameSender {
  protected readonly logger: Logger;
  protected readonly metrics: ProxyMetrics | undefined;
  private readonly maxFramePayloadBytes: number;
  private readonly frameStallTimeoutMs: number;
  private readonly highWaterMarkBytes: number;
  private readonly idleTimeoutMs: number;

  private _state: LinkState = "IDLE";
  private socket: net.Socket | null = null;
  private decoder: FrameDecoder;
  private handler: LinkHandler | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private stallTimer: NodeJS.Timeout | null = null;
  private readonly stateListeners = new Set<StateListener>();

  constructor(opts: LinkSupervisorOptions) {
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.maxFramePayloadBytes = opts.maxFramePayloadBytes;
    this.frameStallTimeoutMs = opts.frameStallTimeoutMs;
    this.highWaterMarkBytes = Math.max(opts.highWaterMarkBytes, MIN_HIGH_WATER_MARK_BYTES);
    this.idleTimeoutMs = opts.idleTimeoutMs;
    this.decoder = new FrameDecoder(opts.maxFramePayloadBytes);
  }

  get state(): LinkState {
    return this._state;
  }

  isUp(): boolean {
    return this._state === "UP";
  }

  attach(handler: LinkHandler): void {
    if (this.handler) throw new Error("link handler already attached");
    this.handler = handler;
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /**
   * Resolves true once the Link is up, or false when it will not come up within `timeoutMs`
   * (or has given up or been stopped).
   */
  waitForUp(timeoutMs: number): Promise<boolean> {
    if (this._state === "UP") return Promise.resolve(true);
    if (this._state === "GAVE_UP" || this._state === "STOPPED") return Promise.resolve(false);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(false);
      }, timeoutMs);
      const unsubscribe = this.onStateChange((state) => {
        if (state !== "UP" && state !== "GAVE_UP" && state !== "STOPPED") return;
        clearTimeout(timer);
        unsubscribe();
        resolve(state === "UP");
      });
    });
  }

  /**
   * Queues one frame on the Link. Returns false when the Link is down or its write queue is
   * above the high-water mark; the handler's `handleDrain` runs once it has drained.
   */
  send(frame: Frame): boolean {
    const socket = this.socket;
    if (!socket || this._state !== "UP" || socket.destroyed) return false;
    socket.write(encodeFrame(frame));
    // The high-water mark is never below the socket's own, so a false return here is always
    // followed by a 'drain'.
    return socket.writableLength <= this.highWaterMarkBytes;
  }

  abstract start(): Promise<void>;

  /**
   * Clean shutdown: every session fails with `Shutdown` and the Link socket is closed.
   */
  async stop(): Promise<void> {
    if (this._state === "STOPPED") return;
    this.beforeStop();
    const socket = this.socket;
    this.setState("STOPPED");
    if (socket) {
      this.detachSocket();
      this.notifyLinkDown("Shutdown", "proxy is shutting down");
      await closeSocket(socket, 1_000);
    }
    await this.afterStop();
  }

  protected beforeStop(): void {}

  protected async afterStop(): Promise<void> {}

  /** Runs after the Link has gone down and every session was failed. */
  protected onLinkLost(): void {}

  protected setState(state: LinkState): void {
    if (this._state === state) return;
    this._state = state;
    this.metrics?.linkUp(state === "UP");
    for (const listener of [...this.stateListeners]) {
      try {
        listener(state);
      } catch (err) {
        this.logger.error({ err }, "link state listener failed");
      }
    }
  }

  protected hasSocket(): boolean {
    return this.socket !== null;
  }

  protected failCurrentLink(message: string): void {
    if (this.socket) this.linkFailed(this.socket, message);
  }

  protected adoptSocket(socket: net.Socket): void {
    this.socket = socket;
    this.decoder = new FrameDecoder(this.maxFramePayloadBytes);
    socket.setNoDelay(true);

    socket.on("data", (chunk: Buffer) => this.onSocketData(socket, chunk));
    socket.on("drain", () => {
      if (socket !== this.socket) return;
      this.callHandler("drain", (handler) => handler.handleDrain());
    });
    socket.on("end", () => this.linkFailed(socket, this.describePeerClose()));
    socket.on("close", () => this.linkFailed(socket, "link socket closed"));
    socket.on("error", (err) => this.linkFailed(socket, `link socket error: ${formatOneLineError(err, 256)}`));

    this.idleTimer = setTimeout(() => this.linkFailed(socket, "link idle timeout"), this.idleTimeoutMs);
    this.setState("UP");
    this.logger.info({ remoteAddress: socket.remoteAddress, remotePort: socket.remotePort }, "link up");
  }

  /** Fails the current Link (if `socket` is still it) and every session riding on it. */
  protected linkFailed(socket: net.Socket, message: string): void {
    if (socket !== this.socket) return;
    this.detachSocket();
    socket.destroy();
    if (this._state !== "STOPPED") this.setState("DOWN");
    this.logger.warn({ reason: message }, "link down");
    this.notifyLinkDown("LinkLost", message);
    if (this._state !== "STOPPED") this.onLinkLost();
  }

  protected sendLinkFrame(type: typeof FrameType.PING | typeof FrameType.PONG, payload: Buffer): void {
    this.send({ type, sessionId: LINK_SESSION_ID, payload });
  }

  private describePeerClose(): string {
    try {
      this.decoder.finish();
      return "link closed by peer";
    } catch (err) {
      return `link closed by peer: ${formatOneLineError(err, 256)}`;
    }
  }

  private detachSocket(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    if (this.stallTimer) clearTimeout(this.stallTimer);
    this.idleTimer = null;
    this.stallTimer = null;
    this.socket = null;
  }

  private notifyLinkDown(reason: LinkDownReason, message: string): void {
    this.callHandler("link down", (handler) => handler.handleLinkDown(reason, message));
  }

  private callHandler(what: string, fn: (handler: LinkHandler) => void): void {
    const handler = this.handler;
    if (!handler) return;
    try {
      fn(handler);
    } catch (err) {
      this.logger.error({ err }, `link handler failed on ${what}`);
    }
  }

  private onSocketData(socket: net.Socket, chunk: Buffer): void {
    if (socket !== this.socket) return;
    this.idleTimer?.refresh();

    let frames: Frame[];
    try {
      frames = this.decoder.push(chunk);
    } catch (err) {
      if (err instanceof MalformedFrameError) {
        this.logger.error({ err }, "malformed frame on link");
        this.linkFailed(socket, `malformed frame: ${err.message}`);
        return;
      }
      throw err;
    }

    if (frames.length > 0 || this.decoder.pendingBytes() === 0) {
      if (this.stallTimer) clearTimeout(this.stallTimer);
      this.stallTimer = null;
    }
    if (this.decoder.pendingBytes() > 0 && !this.stallTimer) {
      this.stallTimer = setTimeout(
        () => this.linkFailed(socket, `malformed frame: partial frame stalled for ${this.frameStallTimeoutMs}ms`),
        this.frameStallTimeoutMs,
      );
    }

    for (const frame of frames) {
      // A handler may have failed or replaced the Link while this batch was dispatched.
      if (socket !== this.socket) return;
      this.dispatch(frame);
    }
  }

  private dispatch(frame: Frame): void {
    if (frame.type === FrameType.PING || frame.type === FrameType.PONG) {
      if (frame.sessionId !== LINK_SESSION_ID || frame.payload.length > MAX_PING_PAYLOAD_BYTES) {
        this.logger.warn(
          { sessionId: frame.sessionId, type: frameTypeName(frame.type), length: frame.payload.length },
          "dropping invalid heartbeat frame",
        );
        return;
      }
      if (frame.type === FrameType.PING) this.sendLinkFrame(FrameType.PONG, frame.payload);
      return;
    }

    if (frame.sessionId === LINK_SESSION_ID) {
      this.logger.warn({ type: frameTypeName(frame.type) }, "dropping session frame for reserved session id 0");
      return;
    }

    this.callHandler(`${frameTypeName(frame.type)} frame for session ${frame.sessionId}`, (handler) =>
      handler.handleFrame(frame),
    );
  }
}

async function closeSocket(socket: net.Socket, timeoutMs: number): Promise<void> {
  if (socket.destroyed) return;
  const closed = once(socket, "close").then(
    () => undefined,
    () => undefined,
  );
  socket.end();
  const timer = setTimeout(() => socket.destroy(), timeoutMs);
  try {
    await closed;
  } finally {
    clearTimeout(timer);
  }
}

export type ShipLinkSupervisorOptions = LinkSupervisorOptions & {
  host: string;
  port: number;
  connectTimeoutMs: number;
  pingIntervalMs: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  reconnectMaxAttempts: number;
};

/**
 * Ship side: dials the offshore, keeps the Link alive with PINGs and reconnects with
 * exponential backoff until `reconnectMaxAttempts` consecutive failures, then gives up.
 */
export class ShipLinkSupervisor extends LinkSupervisor {
  private readonly opts: ShipLinkSupervisorOptions;
  private failedAttempts = 0;
  private connecting: net.Socket | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private pingTimer: NodeJS.Timeout | null = null;

  constructor(opts: ShipLinkSupervisorOptions) {
    super(opts);
    this.opts = opts;
  }

  async start(): Promise<void> {
    if (this.state !== "IDLE") throw new Error(`cannot start link in state ${this.state}`);
    this.connect();
  }

  /** Exponential backoff for the next attempt after `failures` consecutive failures. */
  reconnectDelayMs(failures: number): number {
    const delay = this.opts.reconnectBaseDelayMs * 2 ** failures;
    return Math.min(delay, this.opts.reconnectMaxDelayMs);
  }

  protected override beforeStop(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
    this.stopPing();
    this.connecting?.destroy();
    this.connecting = null;
  }

  protected override onLinkLost(): void {
    this.stopPing();
    this.scheduleReconnect();
  }

  private connect(): void {
    this.setState("CONNECTING");
    const { host, port, connectTimeoutMs } = this.opts;
    this.logger.debug({ host, port, attempt: this.failedAttempts + 1 }, "connecting link");

    const socket = net.createConnection({ host, port });
    this.connecting = socket;

    const timer = setTimeout(() => {
      socket.destroy(new Error(`link connect timed out after ${connectTimeoutMs}ms`));
    }, connectTimeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      if (this.connecting !== socket) return;
      this.connecting = null;
      this.failedAttempts += 1;
      this.logger.warn(
        { host, port, attempt: this.failedAttempts, err: formatOneLineError(err, 256) },
        "link connect failed",
      );
      this.scheduleReconnect();
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      if (this.connecting !== socket) {
        socket.destroy();
        return;
      }
      this.connecting = null;
      this.failedAttempts = 0;
      this.adoptSocket(socket);
      this.startPing();
    });
  }

  private scheduleReconnect(): void {
    if (this.state === "STOPPED" || this.reconnectTimer) return;
    if (this.failedAttempts >= this.opts.reconnectMaxAttempts) {
      this.logger.error({ attempts: this.failedAttempts }, "link gave up reconnecting");
      this.setState("GAVE_UP");
      return;
    }
    if (this.state !== "DOWN") this.setState("DOWN");

    const delayMs = this.reconnectDelayMs(this.failedAttempts);
    this.metrics?.linkReconnect();
    this.logger.info({ delayMs, attempt: this.failedAttempts + 1 }, "link reconnect scheduled");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state === "STOPPED") return;
      this.connect();
    }, delayMs);
  }

  private startPing(): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      const payload = Buffer.allocUnsafe(8);
      payload.writeBigUInt64BE(BigInt(Date.now()), 0);
      this.sendLinkFrame(FrameType.PING, payload);
    }, this.opts.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) clearInterval(this.pingTimer);
    this.pingTimer = null;
  }
}

export type OffshoreLinkSupervisorOptions = LinkSupervisorOptions & {
  host: string;
  port: number;
};

/**
 * Offshore side: listens for the ship. A new ship connection replaces the current Link and the
 * old Link's sessions fail with `LinkLost`.
 */
export class OffshoreLinkSupervisor extends LinkSupervisor {
  private readonly opts: OffshoreLinkSupervisorOptions;
  private server: net.Server | null = null;

  constructor(opts: OffshoreLinkSupervisorOptions) {
    super(opts);
    this.opts = opts;
  }

  async start(): Promise<void> {
    if (this.state !== "IDLE") throw new Error(`cannot start link in state ${this.state}`);
    const server = net.createServer((socket) => this.onConnection(socket));
    this.server = server;
    server.listen({ host: this.opts.host, port: this.opts.port });
    await once(server, "listening");
    this.setState("DOWN");
    this.logger.info({ host: this.opts.host, port: this.port }, "waiting for ship link");
  }

  /** The bound port (useful when listening on port 0). */
  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === "object") return addr.port;
    return this.opts.port;
  }

  protected override async afterStop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private onConnection(socket: net.Socket): void {
    if (this.state === "STOPPED") {
      socket.destroy();
      return;
    }
    if (this.hasSocket()) {
      this.logger.warn({ remoteAddress: socket.remoteAddress }, "new ship connection replaces current link");
      this.failCurrentLink("replaced by a new ship connection");
    }
    this.adoptSocket(socket);
  }
}
