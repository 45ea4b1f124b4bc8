import type net from "node:net";

import type { Logger } from "pino";

import { classifySocketError, type FailureReason } from "../errors.js";
import { ResponseTracker } from "../http/responseTracker.js";
import type { LinkDownReason, LinkHandler, LinkSupervisor } from "../link/linkSupervisor.js";
import type { ProxyMetrics } from "../metrics.js";
import {
  FrameType,
  decodeErrorPayload,
  decodeOpenPayload,
  decodeWindowPayload,
  encodeErrorPayload,
  frameTypeName,
  type Frame,
  type OpenPayload,
} from "../protocol/frame.js";
import { Session, type SessionFailure } from "../session.js";
import { formatOneLineError } from "../util/text.js";
import { dialTarget } from "./dial.js";
import { resolveTarget, systemLookup, type EgressPolicy, type LookupFn } from "./egressPolicy.js";

export type OffshoreDemultiplexerOptions = {
  link: LinkSupervisor;
  logger: Logger;
  metrics?: ProxyMetrics;
  maxFramePayloadBytes: number;
  sessionWindowBytes: number;
  maxSessions: number;
  dnsTimeoutMs: number;
  targetConnectTimeoutMs: number;
  targetIdleTimeoutMs: number;
  maxResponseHeadBytes?: number;
  policy: EgressPolicy;
  lookup?: LookupFn;
};

const TARGET_LINGER_MS = 5_000;

type TargetSession = {
  session: Session;
  open: OpenPayload;
  log: Logger;
  dial: AbortController;
  target: net.Socket | null;
  // Set once we are done with the target socket, so its close is not a failure.
  released: boolean;
  // The target answered 101; the session now relays both ways until each side closes.
  upgraded: boolean;
};

/**
 * Offshore side: turns sessions announced by the ship into outbound connections.
 */
export class OffshoreDemultiplexer implements LinkHandler {
  private readonly opts: OffshoreDemultiplexerOptions;
  private readonly link: LinkSupervisor;
  private readonly logger: Logger;
  private readonly metrics: ProxyMetrics | undefined;
  private readonly lookup: LookupFn;
  private readonly sessions = new Map<number, TargetSession>();

  constructor(opts: OffshoreDemultiplexerOptions) {
    this.opts = opts;
    this.link = opts.link;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.lookup = opts.lookup ?? systemLookup;
    this.link.attach(this);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  getSession(id: number): Session | undefined {
    return this.sessions.get(id)?.session;
  }

  handleFrame(frame: Frame): void {
    if (frame.type === FrameType.OPEN) {
      this.handleOpen(frame);
      return;
    }

    const entry = this.sessions.get(frame.sessionId);
    if (!entry) {
      const fields = { sessionId: frame.sessionId, type: frameTypeName(frame.type) };
      if (frame.type === FrameType.WINDOW) this.logger.debug(fields, "dropping frame for unknown session");
      else this.logger.warn(fields, "dropping frame for unknown session");
      return;
    }

    const session = entry.session;
    try {
      switch (frame.type) {
        case FrameType.DATA:
          this.metrics?.bytes("upstream", frame.payload.length);
          session.acceptData(frame.payload);
          break;
        case FrameType.CLOSE:
          session.acceptClose();
          break;
        case FrameType.ERROR:
          session.acceptError(decodeErrorPayload(frame.payload));
          break;
        case FrameType.WINDOW:
          session.acceptWindow(decodeWindowPayload(frame.payload));
          break;
        default:
          entry.log.warn({ type: frameTypeName(frame.type) }, "unexpected frame type for session");
          break;
      }
    } catch (err) {
      entry.log.warn({ err: formatOneLineError(err, 512), type: frameTypeName(frame.type) }, "protocol violation");
      session.fail("InvalidState", formatOneLineError(err, 512));
    }
  }

  handleLinkDown(reason: LinkDownReason, message: string): void {
    for (const entry of [...this.sessions.values()]) {
      entry.session.fail(reason, message, "link");
    }
  }

  handleDrain(): void {
    for (const entry of [...this.sessions.values()]) {
      entry.session.handleLinkDrain();
    }
  }

  private rejectOpen(sessionId: number, reason: FailureReason, message: string): void {
    this.logger.warn({ sessionId, reason, message }, "rejecting session open");
    this.metrics?.sessionFailed(reason);
    this.link.send({ type: FrameType.ERROR, sessionId, payload: encodeErrorPayload(reason, message) });
  }

  private handleOpen(frame: Frame): void {
    const id = frame.sessionId;
    const existing = this.sessions.get(id);
    if (existing) {
      existing.log.warn("OPEN for a session id that is still in use");
      existing.session.fail("InvalidState", "session id reused while open");
      return;
    }

    let open: OpenPayload;
    try {
      open = decodeOpenPayload(frame.payload);
    } catch (err) {
      this.rejectOpen(id, "InvalidState", `invalid OPEN payload: ${formatOneLineError(err, 256)}`);
      return;
    }

    if (this.sessions.size >= this.opts.maxSessions) {
      this.rejectOpen(id, "SessionLimit", "too many concurrent sessions");
      return;
    }

    const log = this.logger.child({ sessionId: id, mode: open.mode, host: open.host, port: open.port });
    const session = new Session({
      id,
      sender: this.link,
      maxFramePayloadBytes: this.opts.maxFramePayloadBytes,
      windowBytes: this.opts.sessionWindowBytes,
      observer: {
        onRemoteClose: () => this.onRemoteClose(entry),
        onClosed: () => this.onSessionEnded(entry),
        onFailed: (_session, failure) => this.onSessionFailed(entry, failure),
      },
    });
    const entry: TargetSession = {
      session,
      open,
      log,
      dial: new AbortController(),
      target: null,
      released: false,
      upgraded: false,
    };

    session.adopt({ host: open.host, port: open.port }, open.mode);
    this.sessions.set(id, entry);
    this.metrics?.sessionOpened(open.mode);
    log.debug("session open");

    this.connect(entry).catch((err: unknown) => {
      log.error({ err }, "unexpected error while connecting target");
      session.fail("TargetReset", formatOneLineError(err, 512));
    });
  }

  private async connect(entry: TargetSession): Promise<void> {
    const { session, open } = entry;
    let socket: net.Socket;
    try {
      const resolved = await resolveTarget(open.host, open.port, {
        lookup: this.lookup,
        dnsTimeoutMs: this.opts.dnsTimeoutMs,
        policy: this.opts.policy,
      });
      if (session.isTerminal()) return;
      entry.log.debug({ address: resolved.address }, "dialing target");
      socket = await dialTarget(resolved, {
        connectTimeoutMs: this.opts.targetConnectTimeoutMs,
        signal: entry.dial.signal,
      });
    } catch (err) {
      if (session.isTerminal()) return;
      session.fail(classifySocketError(err), formatOneLineError(err, 512));
      return;
    }

    if (session.isTerminal()) {
      socket.destroy();
      return;
    }
    this.onTargetConnected(entry, socket);
  }

  private onTargetConnected(entry: TargetSession, socket: net.Socket): void {
    const { session } = entry;
    entry.target = socket;
    socket.setNoDelay(true);
    socket.setTimeout(this.opts.targetIdleTimeoutMs, () => {
      session.fail("Timeout", `target idle for ${this.opts.targetIdleTimeoutMs}ms`);
    });
    socket.on("error", (err) => {
      if (entry.released) return;
      session.fail(classifySocketError(err), `target socket error: ${formatOneLineError(err, 256)}`);
    });
    socket.on("close", () => {
      if (entry.released) return;
      session.fail("TargetReset", "target connection closed");
    });

    entry.log.debug("target connected");
    // The acknowledgment must precede every DATA frame from the target.
    session.sendAcknowledgment();

    switch (entry.open.mode) {
      case "TUNNEL":
        this.relayTunnel(entry, socket);
        break;
      case "REQUEST_RESPONSE":
        this.relayResponse(entry, socket);
        break;
    }
  }

  private relayTunnel(entry: TargetSession, socket: net.Socket): void {
    const { session } = entry;
    socket.on("data", (chunk: Buffer) => {
      this.metrics?.bytes("downstream", chunk.length);
      session.sendData(chunk);
    });
    socket.on("end", () => session.finishSending());
    session.attachSocket(socket, { endOnRemoteClose: true });
  }

  private relayResponse(entry: TargetSession, socket: net.Socket): void {
    const { session } = entry;
    const tracker = new ResponseTracker(entry.open.method ?? "GET", this.opts.maxResponseHeadBytes);

    socket.on("data", (chunk: Buffer) => {
      if (tracker.complete || session.isTerminal()) return;
      let n: number;
      try {
        n = tracker.push(chunk);
      } catch (err) {
        session.fail("TargetReset", `malformed response from target: ${formatOneLineError(err, 256)}`);
        return;
      }
      if (n > 0) {
        this.metrics?.bytes("downstream", n);
        session.sendData(chunk.subarray(0, n));
      }
      if (tracker.status === 101 && !entry.upgraded) this.switchProtocols(entry, socket);
      if (tracker.complete) this.finishResponse(entry, socket);
    });

    socket.on("end", () => {
      if (entry.upgraded) {
        session.finishSending();
        return;
      }
      if (tracker.complete || session.isTerminal()) return;
      if (tracker.endOfStream()) {
        this.finishResponse(entry, socket);
        return;
      }
      const message =
        tracker.bytesConsumed === 0
          ? "target closed the connection without responding"
          : "target closed the connection before the response was complete";
      session.fail("TargetReset", message);
    });

    // The ship's CLOSE only means the request is complete; the target keeps its write side.
    session.attachSocket(socket, { endOnRemoteClose: false });
  }

  private switchProtocols(entry: TargetSession, socket: net.Socket): void {
    entry.log.debug("target switched protocols");
    entry.upgraded = true;
    if (entry.session.isRemotelyClosed) socket.end();
  }

  private onRemoteClose(entry: TargetSession): void {
    if (entry.upgraded) entry.target?.end();
  }

  private finishResponse(entry: TargetSession, socket: net.Socket): void {
    entry.log.debug("response complete");
    entry.released = true;
    entry.session.finishSending();
    socket.destroy();
  }

  private onSessionEnded(entry: TargetSession): void {
    this.release(entry, true);
    entry.log.debug(
      { bytesSent: entry.session.bytesSent, bytesReceived: entry.session.bytesReceived },
      "session closed",
    );
  }

  private onSessionFailed(entry: TargetSession, failure: SessionFailure): void {
    this.release(entry, false);
    this.metrics?.sessionFailed(failure.reason);
    const fields = { reason: failure.reason, origin: failure.origin, message: failure.message };
    if (failure.reason === "ClientAborted" || failure.reason === "Shutdown") entry.log.info(fields, "session failed");
    else entry.log.warn(fields, "session failed");
  }

  private release(entry: TargetSession, graceful: boolean): void {
    entry.released = true;
    entry.dial.abort();
    const target = entry.target;
    if (target && graceful) {
      // Both sides have half-closed; let queued bytes reach the target before it goes away.
      target.end();
      const timer = setTimeout(() => target.destroy(), TARGET_LINGER_MS);
      timer.unref();
      target.once("close", () => clearTimeout(timer));
    } else {
      target?.destroy();
    }
    if (this.sessions.get(entry.session.id) !== entry) return;
    this.sessions.delete(entry.session.id);
    const mode = entry.session.mode;
    if (mode) this.metrics?.sessionEnded(mode);
  }
}
