import { once } from "node:events";
import net from "node:net";

import type { Logger } from "pino";

import type { FailureReason } from "../errors.js";
import { BodyTracker } from "../http/bodyFraming.js";
import { findHeadEnd } from "../http/head.js";
import type { LinkDownReason, LinkHandler, LinkSupervisor } from "../link/linkSupervisor.js";
import type { ProxyMetrics } from "../metrics.js";
import {
  FrameType,
  decodeErrorPayload,
  decodeWindowPayload,
  frameTypeName,
  type Frame,
  type SessionMode,
} from "../protocol/frame.js";
import { Session, type SessionFailure } from "../session.js";
import { formatOneLineError } from "../util/text.js";
import { CONNECTION_ESTABLISHED, buildErrorResponse, statusForFailure } from "./errorResponse.js";
import { RequestHeadError, parseProxyRequest, type ProxyRequest } from "./requestHead.js";
import { SessionIdAllocator } from "./sessionIds.js";

// How long a client socket we have finished with may linger before it is destroyed.
const CLIENT_LINGER_MS = 5_000;

export type ShipMultiplexerOptions = {
  link: LinkSupervisor;
  logger: Logger;
  metrics?: ProxyMetrics;
  host: string;
  port: number;
  maxFramePayloadBytes: number;
  sessionWindowBytes: number;
  maxSessions: number;
  maxRequestHeadBytes: number;
  clientHeadTimeoutMs: number;
  sessionOpenTimeoutMs: number;
  // Where id allocation starts; ids wrap within u32 either way.
  firstSessionId?: number;
};

/**
 * One client connection bound to a session.
 */
type ClientSession = {
  socket: net.Socket;
  session: Session;
  request: ProxyRequest;
  log: Logger;
  openTimer: NodeJS.Timeout | null;
  acknowledged: boolean;
  // Set once the client can no longer be written to.
  clientGone: boolean;
  // Overrides the status derived from the failure reason.
  localErrorStatus?: number;
};

function lingerThenDestroy(socket: net.Socket): void {
  if (socket.destroyed) return;
  const timer = setTimeout(() => socket.destroy(), CLIENT_LINGER_MS);
  timer.unref();
  socket.once("close", () => clearTimeout(timer));
}

/**
 * Answers a client locally and lets the connection go.
 */
function endWithResponse(socket: net.Socket, response: Buffer): void {
  if (socket.destroyed || socket.writableEnded) return;
  // Keep reading (and discarding) so unread request bytes do not turn the close into a reset.
  socket.removeAllListeners("data");
  socket.resume();
  socket.end(response);
  lingerThenDestroy(socket);
}

/**
 * Ship side: the explicit HTTP proxy clients talk to. Every client connection becomes one
 * session on the Link.
 */
export class ShipMultiplexer implements LinkHandler {
  private readonly opts: ShipMultiplexerOptions;
  private readonly link: LinkSupervisor;
  private readonly logger: Logger;
  private readonly metrics: ProxyMetrics | undefined;

  private readonly sessions = new Map<number, ClientSession>();
  private readonly clients = new Set<net.Socket>();
  private readonly sessionIds: SessionIdAllocator;
  private server: net.Server | null = null;

  constructor(opts: ShipMultiplexerOptions) {
    this.opts = opts;
    this.link = opts.link;
    this.logger = opts.logger;
    this.metrics = opts.metrics;
    this.sessionIds = new SessionIdAllocator({ first: opts.firstSessionId });
    this.link.attach(this);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  getSession(id: number): Session | undefined {
    return this.sessions.get(id)?.session;
  }

  get port(): number {
    const addr = this.server?.address();
    if (addr && typeof addr === "object") return addr.port;
    return this.opts.port;
  }

  async start(): Promise<void> {
    if (this.server) throw new Error("ship multiplexer already started");
    const server = net.createServer({ allowHalfOpen: true }, (socket) => this.handleClient(socket));
    this.server = server;
    server.on("error", (err) => this.logger.error({ err }, "proxy listener error"));
    server.listen({ host: this.opts.host, port: this.opts.port });
    await once(server, "listening");
    this.logger.info({ host: this.opts.host, port: this.port }, "ship proxy listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return;
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    for (const socket of this.clients) socket.destroy();
    await closed;
  }

  /** Next free session id, skipping ids that are still in the table. */
  allocateSessionId(): number {
    return this.sessionIds.allocate((id) => this.sessions.has(id));
  }

  handleFrame(frame: Frame): void {
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
        case FrameType.OPEN:
          if (frame.payload.length !== 0) throw new Error("OPEN acknowledgment must have an empty payload");
          session.acknowledge();
          break;
        case FrameType.DATA:
          this.metrics?.bytes("downstream", frame.payload.length);
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

  private handleClient(socket: net.Socket): void {
    this.clients.add(socket);
    socket.once("close", () => this.clients.delete(socket));
    socket.setNoDelay(true);
    socket.on("error", (err) => {
      this.logger.debug({ err: formatOneLineError(err, 256) }, "client socket error");
    });

    const { maxRequestHeadBytes, clientHeadTimeoutMs } = this.opts;
    let buffered: Buffer = Buffer.alloc(0);

    const cleanup = () => {
      clearTimeout(headTimer);
      socket.off("data", onData);
      socket.off("end", onEnd);
    };

    const headTimer = setTimeout(() => {
      cleanup();
      endWithResponse(socket, buildErrorResponse(408, "request head not received in time"));
    }, clientHeadTimeoutMs);

    const onEnd = () => {
      cleanup();
      socket.destroy();
    };

    const onData = (chunk: Buffer) => {
      buffered = buffered.length === 0 ? chunk : Buffer.concat([buffered, chunk]);
      const end = findHeadEnd(buffered);
      if (end === -1 || end > maxRequestHeadBytes) {
        if (end > maxRequestHeadBytes || buffered.length > maxRequestHeadBytes) {
          cleanup();
          endWithResponse(socket, buildErrorResponse(431, "request head too large"));
        }
        return;
      }

      cleanup();
      socket.pause();
      const head = buffered.subarray(0, end);
      const rest = buffered.subarray(end);

      let request: ProxyRequest;
      try {
        request = parseProxyRequest(head);
      } catch (err) {
        if (err instanceof RequestHeadError) {
          this.logger.debug({ status: err.status, err: err.message }, "rejecting client request");
          endWithResponse(socket, buildErrorResponse(err.status, err.message));
          return;
        }
        throw err;
      }

      this.beginSession(socket, request, head, rest).catch((err: unknown) => {
        this.logger.error({ err }, "failed to start session");
        socket.destroy();
      });
    };

    socket.on("data", onData);
    socket.on("end", onEnd);
    socket.once("close", cleanup);
  }

  private async beginSession(socket: net.Socket, request: ProxyRequest, head: Buffer, rest: Buffer): Promise<void> {
    if (this.link.state === "GAVE_UP") {
      endWithResponse(socket, buildErrorResponse(503, "link to offshore is down"));
      return;
    }
    if (!this.link.isUp()) {
      const up = await this.link.waitForUp(this.opts.sessionOpenTimeoutMs);
      if (socket.destroyed) return;
      if (!up) {
        endWithResponse(socket, buildErrorResponse(503, "link to offshore is down"));
        return;
      }
    }
    if (this.sessions.size >= this.opts.maxSessions) {
      this.metrics?.sessionFailed("SessionLimit");
      endWithResponse(socket, buildErrorResponse(503, "too many concurrent sessions"));
      return;
    }

    const mode: SessionMode = request.kind === "tunnel" ? "TUNNEL" : "REQUEST_RESPONSE";
    const id = this.allocateSessionId();
    const log = this.logger.child({ sessionId: id, mode, host: request.host, port: request.port });

    const session = new Session({
      id,
      sender: this.link,
      maxFramePayloadBytes: this.opts.maxFramePayloadBytes,
      windowBytes: this.opts.sessionWindowBytes,
      observer: {
        onAcknowledged: () => this.onAcknowledged(entry),
        onRemoteClose: () => this.onRemoteClose(entry),
        onClosed: () => this.onSessionEnded(entry),
        onFailed: (_session, failure) => this.onSessionFailed(entry, failure),
      },
    });
    const entry: ClientSession = { socket, session, request, log, openTimer: null, acknowledged: false, clientGone: false };

    // Registered only once the OPEN frame is out.
    try {
      session.open(
        { host: request.host, port: request.port },
        mode,
        request.kind === "forward" ? request.method : undefined,
      );
    } catch (err) {
      log.debug({ err: formatOneLineError(err, 256) }, "request cannot be announced to offshore");
      endWithResponse(socket, buildErrorResponse(400, formatOneLineError(err, 256)));
      return;
    }

    this.sessions.set(id, entry);
    this.metrics?.sessionOpened(mode);
    log.debug("session open");

    entry.openTimer = setTimeout(() => {
      entry.openTimer = null;
      if (session.state !== "OPENING") return;
      session.fail("Timeout", `offshore did not acknowledge within ${this.opts.sessionOpenTimeoutMs}ms`);
    }, this.opts.sessionOpenTimeoutMs);

    socket.once("close", () => {
      if (session.isTerminal()) return;
      entry.clientGone = true;
      session.fail("ClientAborted", "client closed the connection");
    });

    const sendInitial =
      request.kind === "tunnel" ? this.relayTunnel(entry, rest) : this.relayRequest(entry, request, head, rest);

    // Resume before attaching: the session pauses the socket again while it has no credit.
    socket.resume();
    session.attachSocket(socket, { endOnRemoteClose: true });
    sendInitial();
  }

  private relayTunnel(entry: ClientSession, pipelined: Buffer): () => void {
    const { socket, session } = entry;
    socket.on("data", (chunk: Buffer) => {
      this.metrics?.bytes("upstream", chunk.length);
      session.sendData(chunk);
    });
    socket.on("end", () => session.finishSending());

    return () => {
      if (pipelined.length === 0) return;
      this.metrics?.bytes("upstream", pipelined.length);
      session.sendData(pipelined);
    };
  }

  private relayRequest(
    entry: ClientSession,
    request: Extract<ProxyRequest, { kind: "forward" }>,
    head: Buffer,
    rest: Buffer,
  ): () => void {
    const { socket, session } = entry;
    const body = new BodyTracker(request.body);

    const forward = (chunk: Buffer) => {
      if (session.isTerminal()) return;
      let n = chunk.length;
      if (!body.done) {
        try {
          n = body.push(chunk);
        } catch (err) {
          entry.localErrorStatus = 400;
          session.fail("ClientAborted", `malformed request body: ${formatOneLineError(err, 256)}`);
          return;
        }
      } else if (!request.upgrade) {
        return;
      }
      // Once the target may switch protocols, whatever follows the body belongs to the new protocol.
      if (request.upgrade) n = chunk.length;
      if (n > 0) {
        this.metrics?.bytes("upstream", n);
        session.sendData(chunk.subarray(0, n));
      }
      if (body.done && !request.upgrade) session.finishSending();
    };

    socket.on("data", forward);
    socket.on("end", () => {
      if (session.isTerminal()) return;
      if (body.done) {
        if (request.upgrade) session.finishSending();
        return;
      }
      session.fail("ClientAborted", "client ended the request before its body was complete");
    });

    return () => {
      this.metrics?.bytes("upstream", head.length);
      session.sendData(head);
      if (rest.length > 0 && (!body.done || request.upgrade)) forward(rest);
      if (body.done && !request.upgrade) session.finishSending();
    };
  }

  private onAcknowledged(entry: ClientSession): void {
    this.clearOpenTimer(entry);
    entry.acknowledged = true;
    entry.log.debug("session acknowledged");
    if (entry.request.kind === "tunnel" && !entry.socket.destroyed) {
      entry.socket.write(CONNECTION_ESTABLISHED);
    }
  }

  private onRemoteClose(entry: ClientSession): void {
    // The response (or the target's half of the tunnel) is complete. A forwarded request has
    // nothing left to do once its response is delivered.
    if (entry.request.kind === "forward") entry.session.close();
  }

  private responseStarted(entry: ClientSession): boolean {
    // A tunnel's response starts with the 200 written on acknowledgment.
    if (entry.request.kind === "tunnel") return entry.acknowledged;
    return entry.session.bytesReceived > 0;
  }

  private onSessionEnded(entry: ClientSession): void {
    this.release(entry);
    entry.log.debug({ bytesSent: entry.session.bytesSent, bytesReceived: entry.session.bytesReceived }, "session closed");
    lingerThenDestroy(entry.socket);
  }

  private onSessionFailed(entry: ClientSession, failure: SessionFailure): void {
    const started = this.responseStarted(entry);
    this.release(entry);
    this.metrics?.sessionFailed(failure.reason);
    this.logFailure(entry, failure);

    const socket = entry.socket;
    if (entry.clientGone || socket.destroyed) {
      socket.destroy();
      return;
    }
    if (started || (failure.reason === "ClientAborted" && entry.localErrorStatus === undefined)) {
      socket.destroy();
      return;
    }
    const status = entry.localErrorStatus ?? statusForFailure(failure.reason);
    endWithResponse(socket, buildErrorResponse(status, failure.message));
  }

  private logFailure(entry: ClientSession, failure: SessionFailure): void {
    const fields = { reason: failure.reason, origin: failure.origin, message: failure.message };
    if (isQuietFailure(failure.reason)) entry.log.info(fields, "session failed");
    else entry.log.warn(fields, "session failed");
  }

  private clearOpenTimer(entry: ClientSession): void {
    if (entry.openTimer) clearTimeout(entry.openTimer);
    entry.openTimer = null;
  }

  private release(entry: ClientSession): void {
    this.clearOpenTimer(entry);
    if (this.sessions.get(entry.session.id) !== entry) return;
    this.sessions.delete(entry.session.id);
    const mode = entry.session.mode;
    if (mode) this.metrics?.sessionEnded(mode);
  }
}

function isQuietFailure(reason: FailureReason): boolean {
  return reason === "ClientAborted" || reason === "Shutdown";
}
