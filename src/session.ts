import type { Duplex } from "node:stream";

import { InvalidStateError, isLinkFailure, type FailureReason } from "./errors.js";
import {
  FrameType,
  encodeErrorPayload,
  encodeOpenPayload,
  encodeWindowPayload,
  type ErrorPayload,
  type Frame,
  type SessionMode,
} from "./protocol/frame.js";

export type SessionState = "OPENING" | "ACTIVE" | "CLOSING" | "CLOSED" | "FAILED";

export type SessionTarget = {
  host: string;
  port: number;
};

/**
 * Where a failure was decided. Only `local` failures are reported to the peer with an ERROR
 * frame: the peer already knows about its own, and a Link failure has no Link to report on.
 */
export type FailureOrigin = "local" | "peer" | "link";

export type SessionFailure = {
  reason: FailureReason;
  message: string;
  origin: FailureOrigin;
};

export interface FrameSender {
  /** Returns false once the Link is above its high-water mark (or down). */
  send(frame: Frame): boolean;
}

export interface SessionObserver {
  onAcknowledged?(session: Session): void;
  onRemoteClose?(session: Session): void;
  onClosed?(session: Session): void;
  onFailed?(session: Session, failure: SessionFailure): void;
}

export type SessionOptions = {
  id: number;
  sender: FrameSender;
  maxFramePayloadBytes: number;
  windowBytes: number;
  observer?: SessionObserver;
};

export type AttachSocketOptions = {
  // Half-close the socket once the peer has sent CLOSE and every inbound byte is written.
  endOnRemoteClose: boolean;
};

const MAX_WINDOW = 0xffffffff;

/**
 * One proxied transaction multiplexed over the Link.
 *
 * The session owns the per-id protocol state: the OPENING/ACTIVE/CLOSING/CLOSED/FAILED state
 * machine, both flow-control windows, inbound bytes waiting for a socket and outbound bytes
 * waiting for credit. Reading from the local socket stays with the owner, which knows how the
 * bytes are framed; the session only pauses and resumes that socket.
 */
export class Session {
  readonly id: number;

  private readonly sender: FrameSender;
  private readonly maxFramePayloadBytes: number;
  private readonly creditThreshold: number;
  private readonly observer: SessionObserver;

  private _state: SessionState = "OPENING";
  private _mode: SessionMode | undefined;
  private _target: SessionTarget | undefined;
  private _failure: SessionFailure | undefined;
  private opened = false;
  private initiator = false;
  private ackSent = false;

  private socket: Duplex | null = null;
  private endOnRemoteClose = false;
  private sourcePaused = false;

  private pending: Buffer[] = [];
  private pendingLength = 0;
  private outbound: Buffer[] = [];

  private sendWindow: number;
  private recvWindow: number;
  private recvConsumed = 0;
  private linkBlocked = false;

  private localClosed = false;
  private closeAfterFlush = false;
  private remoteClosed = false;

  private _bytesReceived = 0;
  private _bytesSent = 0;

  constructor(opts: SessionOptions) {
    this.id = opts.id;
    this.sender = opts.sender;
    this.maxFramePayloadBytes = opts.maxFramePayloadBytes;
    this.creditThreshold = Math.max(1, Math.floor(opts.windowBytes / 2));
    this.observer = opts.observer ?? {};
    this.sendWindow = opts.windowBytes;
    this.recvWindow = opts.windowBytes;
  }

  get state(): SessionState {
    return this._state;
  }

  get mode(): SessionMode | undefined {
    return this._mode;
  }

  get target(): SessionTarget | undefined {
    return this._target;
  }

  get failure(): SessionFailure | undefined {
    return this._failure;
  }

  get bytesReceived(): number {
    return this._bytesReceived;
  }

  get bytesSent(): number {
    return this._bytesSent;
  }

  /** Inbound bytes held until a socket is attached. */
  get pendingBytes(): number {
    return this.pendingLength;
  }

  get sendWindowAvailable(): number {
    return this.sendWindow;
  }

  get isLocallyClosed(): boolean {
    return this.localClosed;
  }

  get isRemotelyClosed(): boolean {
    return this.remoteClosed;
  }

  isTerminal(): boolean {
    return this._state === "CLOSED" || this._state === "FAILED";
  }

  /** Ship side: announce the session to the peer and wait for its acknowledgment. */
  open(target: SessionTarget, mode: SessionMode, method?: string): void {
    if (this.opened) throw new InvalidStateError(this.id, this._state, "open");
    this.opened = true;
    this.initiator = true;
    this._target = { ...target };
    this._mode = mode;
    const payload = encodeOpenPayload({ host: target.host, port: target.port, mode, method });
    this.emit({ type: FrameType.OPEN, sessionId: this.id, payload });
  }

  /** Offshore side: the peer's OPEN is the acknowledgment, so the session starts ACTIVE. */
  adopt(target: SessionTarget, mode: SessionMode): void {
    if (this.opened) throw new InvalidStateError(this.id, this._state, "adopt");
    this.opened = true;
    this._target = { ...target };
    this._mode = mode;
    this._state = "ACTIVE";
  }

  /** Offshore side: tells the peer the target connection is established. */
  sendAcknowledgment(): void {
    if (!this.opened || this.initiator || this.ackSent || this.isTerminal()) {
      throw new InvalidStateError(this.id, this._state, "send acknowledgment");
    }
    this.ackSent = true;
    this.emit({ type: FrameType.OPEN, sessionId: this.id, payload: Buffer.alloc(0) });
  }

  acknowledge(): void {
    if (!this.opened || this._state !== "OPENING") {
      throw new InvalidStateError(this.id, this._state, "acknowledge");
    }
    this._state = "ACTIVE";
    this.observer.onAcknowledged?.(this);
  }

  attachSocket(socket: Duplex, opts: AttachSocketOptions): void {
    if (this.socket) throw new Error(`session ${this.id}: socket already attached`);
    this.socket = socket;
    this.endOnRemoteClose = opts.endOnRemoteClose;

    const pending = this.pending;
    this.pending = [];
    this.pendingLength = 0;
    for (const chunk of pending) this.writeToSocket(chunk);

    if (this.remoteClosed && this.endOnRemoteClose) socket.end();
    this.updateSourceFlow();
  }

  acceptData(chunk: Buffer): void {
    this.implicitAcknowledge();
    if (this._state !== "ACTIVE") throw new InvalidStateError(this.id, this._state, "accept data");

    if (chunk.length > this.recvWindow) {
      this.fail("FlowControl", `peer sent ${chunk.length} bytes with ${this.recvWindow} bytes of window left`);
      return;
    }
    this.recvWindow -= chunk.length;
    this._bytesReceived += chunk.length;

    if (this.socket) {
      this.writeToSocket(chunk);
    } else {
      this.pending.push(chunk);
      this.pendingLength += chunk.length;
    }
  }

  acceptClose(): void {
    this.implicitAcknowledge();
    if (this._state !== "ACTIVE") throw new InvalidStateError(this.id, this._state, "accept close");

    this.remoteClosed = true;
    if (this.socket && this.endOnRemoteClose) this.socket.end();

    if (this.localClosed) {
      this.observer.onRemoteClose?.(this);
      if (!this.isTerminal()) this.toClosed();
      return;
    }
    this._state = "CLOSING";
    this.observer.onRemoteClose?.(this);
  }

  acceptWindow(increment: number): void {
    if (this.isTerminal()) return;
    if (this.sendWindow + increment > MAX_WINDOW) {
      this.fail("FlowControl", "send window overflow");
      return;
    }
    this.sendWindow += increment;
    this.flushOutbound();
  }

  acceptError(payload: ErrorPayload): void {
    this.fail(payload.reason, payload.message, "peer");
  }

  /**
   * Queue bytes for the peer. They go out as DATA frames no larger than the frame limit and
   * only within the send window; the rest waits here while the source socket is paused.
   */
  sendData(chunk: Buffer): void {
    if (this.isTerminal() || this.localClosed || this.closeAfterFlush) return;
    if (chunk.length === 0) return;
    this.outbound.push(chunk);
    this.flushOutbound();
  }

  /** Half-close: CLOSE goes out after any bytes still waiting for credit. */
  finishSending(): void {
    if (this.isTerminal() || this.localClosed || this.closeAfterFlush) return;
    if (this.outbound.length > 0) {
      this.closeAfterFlush = true;
      return;
    }
    this.sendClose();
  }

  /**
   * Ends the session from this side. At most one CLOSE frame is ever sent; bytes still waiting
   * for credit are dropped. No-op once CLOSED or FAILED.
   */
  close(): void {
    if (this.isTerminal()) return;
    if (!this.localClosed) {
      this.outbound = [];
      this.closeAfterFlush = false;
      this.localClosed = true;
      this.emit({ type: FrameType.CLOSE, sessionId: this.id, payload: Buffer.alloc(0) });
    }
    this.toClosed();
  }

  fail(reason: FailureReason, message: string, origin: FailureOrigin = "local"): void {
    if (this.isTerminal()) return;
    this._state = "FAILED";
    this._failure = { reason, message, origin };
    if (origin === "local" && !isLinkFailure(reason)) {
      this.emit({ type: FrameType.ERROR, sessionId: this.id, payload: encodeErrorPayload(reason, message) });
    }
    this.release();
    this.observer.onFailed?.(this, this._failure);
  }

  /** Called by the owner when the Link has drained below its high-water mark. */
  handleLinkDrain(): void {
    if (!this.linkBlocked) return;
    this.linkBlocked = false;
    this.flushOutbound();
  }

  private implicitAcknowledge(): void {
    if (this._state === "OPENING" && this.opened && this._mode === "REQUEST_RESPONSE") {
      this.acknowledge();
    }
  }

  private emit(frame: Frame): void {
    if (!this.sender.send(frame)) this.linkBlocked = true;
  }

  private flushOutbound(): void {
    while (this.outbound.length > 0 && this.sendWindow > 0 && !this.linkBlocked && !this.isTerminal()) {
      const head = this.outbound[0];
      if (!head) break;
      const n = Math.min(head.length, this.sendWindow, this.maxFramePayloadBytes);
      const piece = head.subarray(0, n);
      if (n === head.length) this.outbound.shift();
      else this.outbound[0] = head.subarray(n);

      this.sendWindow -= n;
      this._bytesSent += n;
      this.emit({ type: FrameType.DATA, sessionId: this.id, payload: piece });
    }

    if (this.outbound.length === 0 && this.closeAfterFlush && !this.isTerminal()) {
      this.closeAfterFlush = false;
      this.sendClose();
    }
    this.updateSourceFlow();
  }

  private sendClose(): void {
    this.localClosed = true;
    this.emit({ type: FrameType.CLOSE, sessionId: this.id, payload: Buffer.alloc(0) });
    if (this.remoteClosed) this.toClosed();
  }

  private writeToSocket(chunk: Buffer): void {
    const socket = this.socket;
    if (!socket || socket.destroyed) return;
    socket.write(chunk, (err) => {
      if (!err) this.returnCredit(chunk.length);
    });
  }

  private returnCredit(consumed: number): void {
    if (this.isTerminal() || this.remoteClosed) return;
    this.recvConsumed += consumed;
    if (this.recvConsumed < this.creditThreshold) return;
    const increment = this.recvConsumed;
    this.recvConsumed = 0;
    this.recvWindow += increment;
    this.emit({ type: FrameType.WINDOW, sessionId: this.id, payload: encodeWindowPayload(increment) });
  }

  private updateSourceFlow(): void {
    const socket = this.socket;
    if (!socket || this.isTerminal()) return;
    const shouldPause = this.outbound.length > 0 || this.linkBlocked;
    if (shouldPause && !this.sourcePaused) {
      this.sourcePaused = true;
      socket.pause();
    } else if (!shouldPause && this.sourcePaused) {
      this.sourcePaused = false;
      socket.resume();
    }
  }

  private toClosed(): void {
    this._state = "CLOSED";
    this.release();
    this.observer.onClosed?.(this);
  }

  private release(): void {
    this.pending = [];
    this.pendingLength = 0;
    this.outbound = [];
    this.closeAfterFlush = false;
  }
}
