import { MalformedFrameError, failureReasonCode, failureReasonFromCode, type FailureReason } from "../errors.js";
import { formatOneLineUtf8, isForbiddenCodePoint } from "../util/text.js";

export const FRAME_HEADER_BYTES = 9;

// Session id 0 never names a session; PING/PONG travel on it.
export const LINK_SESSION_ID = 0;

export const DEFAULT_MAX_FRAME_PAYLOAD_BYTES = 64 * 1024;

// OPEN payload strings come from the remote side and should never be large.
// Hostnames are <=253 chars on the wire; allow some slack for IPv6 literals.
export const MAX_OPEN_HOST_BYTES = 1024;
export const MAX_OPEN_METHOD_BYTES = 32;
export const MAX_ERROR_MESSAGE_BYTES = 1024;
export const MAX_PING_PAYLOAD_BYTES = 64;

export const FrameType = {
  OPEN: 1,
  DATA: 2,
  CLOSE: 3,
  ERROR: 4,
  WINDOW: 5,
  PING: 6,
  PONG: 7,
} as const;
export type FrameType = (typeof FrameType)[keyof typeof FrameType];

export type SessionMode = "REQUEST_RESPONSE" | "TUNNEL";

const MODE_TO_BYTE: Record<SessionMode, number> = {
  REQUEST_RESPONSE: 1,
  TUNNEL: 2,
};

export function isFrameType(value: number): value is FrameType {
  return Number.isInteger(value) && value >= FrameType.OPEN && value <= FrameType.PONG;
}

export function frameTypeName(type: FrameType): keyof typeof FrameType {
  switch (type) {
    case FrameType.OPEN:
      return "OPEN";
    case FrameType.DATA:
      return "DATA";
    case FrameType.CLOSE:
      return "CLOSE";
    case FrameType.ERROR:
      return "ERROR";
    case FrameType.WINDOW:
      return "WINDOW";
    case FrameType.PING:
      return "PING";
    case FrameType.PONG:
      return "PONG";
  }
}

export type Frame = {
  type: FrameType;
  sessionId: number;
  payload: Buffer;
};

export function encodeFrame(frame: Frame): Buffer {
  const payload = frame.payload;
  const buf = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  buf.writeUInt8(frame.type, 0);
  buf.writeUInt32BE(frame.sessionId >>> 0, 1);
  buf.writeUInt32BE(payload.length >>> 0, 5);
  payload.copy(buf, FRAME_HEADER_BYTES);
  return buf;
}

/**
 * Incremental decoder for the Link byte stream. Only complete frames are returned; the
 * remainder is kept for the next `push`.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly maxPayloadBytes: number;

  constructor(maxPayloadBytes = DEFAULT_MAX_FRAME_PAYLOAD_BYTES) {
    if (!Number.isInteger(maxPayloadBytes) || maxPayloadBytes < 1) {
      throw new Error(`Invalid maxPayloadBytes: ${maxPayloadBytes}`);
    }
    this.maxPayloadBytes = maxPayloadBytes;
  }

  push(chunk: Buffer): Frame[] {
    if (chunk.length > 0) {
      this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    }

    const frames: Frame[] = [];

    while (this.buffer.length >= FRAME_HEADER_BYTES) {
      const type = this.buffer.readUInt8(0);
      const sessionId = this.buffer.readUInt32BE(1);
      const length = this.buffer.readUInt32BE(5);

      if (!isFrameType(type)) {
        throw new MalformedFrameError(`unknown frame type ${type}`);
      }
      if (length > this.maxPayloadBytes) {
        throw new MalformedFrameError(`frame payload length ${length} exceeds max ${this.maxPayloadBytes}`);
      }

      const total = FRAME_HEADER_BYTES + length;
      if (this.buffer.length < total) break;

      // Copy so a retained payload does not pin the whole read buffer.
      const payload = Buffer.from(this.buffer.subarray(FRAME_HEADER_BYTES, total));
      frames.push({ type, sessionId, payload });

      this.buffer = total === this.buffer.length ? Buffer.alloc(0) : this.buffer.subarray(total);
    }

    return frames;
  }

  pendingBytes(): number {
    return this.buffer.length;
  }

  finish(): void {
    if (this.buffer.length === 0) return;
    throw new MalformedFrameError(`truncated frame stream (${this.buffer.length} pending bytes)`);
  }
}

const utf8DecoderFatal = new TextDecoder("utf-8", { fatal: true });

function decodeUtf8Exact(bytes: Buffer, context: string): string {
  try {
    return utf8DecoderFatal.decode(bytes);
  } catch {
    throw new Error(`${context} is not valid UTF-8`);
  }
}

function hasControlOrWhitespace(value: string): boolean {
  return Array.from(value).some(isForbiddenCodePoint);
}

const HTTP_TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export type OpenPayload = {
  host: string;
  port: number;
  mode: SessionMode;
  // Request method of a REQUEST_RESPONSE session; the offshore needs it to delimit HEAD responses.
  method?: string;
};

export function encodeOpenPayload(payload: OpenPayload): Buffer {
  const hostBytes = Buffer.from(payload.host, "utf8");
  const methodBytes = payload.method ? Buffer.from(payload.method, "utf8") : Buffer.alloc(0);

  if (hostBytes.length === 0) throw new Error("host is empty");
  if (hostBytes.length > MAX_OPEN_HOST_BYTES) throw new Error("host too long");
  if (methodBytes.length > MAX_OPEN_METHOD_BYTES) throw new Error("method too long");
  if (!Number.isInteger(payload.port) || payload.port < 1 || payload.port > 65535) {
    throw new Error("invalid port");
  }

  const buf = Buffer.allocUnsafe(2 + hostBytes.length + 2 + 1 + 2 + methodBytes.length);
  let offset = 0;
  buf.writeUInt16BE(hostBytes.length, offset);
  offset += 2;
  hostBytes.copy(buf, offset);
  offset += hostBytes.length;
  buf.writeUInt16BE(payload.port, offset);
  offset += 2;
  buf.writeUInt8(MODE_TO_BYTE[payload.mode], offset);
  offset += 1;
  buf.writeUInt16BE(methodBytes.length, offset);
  offset += 2;
  methodBytes.copy(buf, offset);
  return buf;
}

export function decodeOpenPayload(buf: Buffer): OpenPayload {
  if (buf.length < 2 + 2 + 1 + 2) {
    throw new Error("OPEN payload too short");
  }

  let offset = 0;
  const hostLen = buf.readUInt16BE(offset);
  offset += 2;
  if (hostLen > MAX_OPEN_HOST_BYTES) throw new Error("host too long");
  if (buf.length < offset + hostLen + 2 + 1 + 2) {
    throw new Error("OPEN payload truncated (host)");
  }
  const host = decodeUtf8Exact(buf.subarray(offset, offset + hostLen), "host");
  if (!host) throw new Error("host is empty");
  if (hasControlOrWhitespace(host)) throw new Error("invalid host");
  offset += hostLen;

  const port = buf.readUInt16BE(offset);
  offset += 2;
  if (port < 1) throw new Error("invalid port");

  const modeByte = buf.readUInt8(offset);
  offset += 1;
  let mode: SessionMode;
  if (modeByte === MODE_TO_BYTE.REQUEST_RESPONSE) mode = "REQUEST_RESPONSE";
  else if (modeByte === MODE_TO_BYTE.TUNNEL) mode = "TUNNEL";
  else throw new Error(`unknown session mode ${modeByte}`);

  const methodLen = buf.readUInt16BE(offset);
  offset += 2;
  if (methodLen > MAX_OPEN_METHOD_BYTES) throw new Error("method too long");
  if (buf.length !== offset + methodLen) {
    throw new Error("OPEN payload length mismatch");
  }
  if (methodLen === 0) return { host, port, mode };

  const method = decodeUtf8Exact(buf.subarray(offset, offset + methodLen), "method");
  if (!HTTP_TOKEN_RE.test(method)) throw new Error("invalid method");
  return { host, port, mode, method };
}

export type ErrorPayload = {
  code: number;
  reason: FailureReason;
  message: string;
};

export function encodeErrorPayload(reason: FailureReason, message: string): Buffer {
  const safeMessage = formatOneLineUtf8(message, MAX_ERROR_MESSAGE_BYTES);
  const messageBytes = Buffer.from(safeMessage, "utf8");
  const buf = Buffer.allocUnsafe(2 + 2 + messageBytes.length);
  buf.writeUInt16BE(failureReasonCode(reason), 0);
  buf.writeUInt16BE(messageBytes.length, 2);
  messageBytes.copy(buf, 4);
  return buf;
}

export function decodeErrorPayload(buf: Buffer): ErrorPayload {
  if (buf.length < 4) {
    throw new Error("ERROR payload too short");
  }
  const code = buf.readUInt16BE(0);
  const messageLen = buf.readUInt16BE(2);
  if (messageLen > MAX_ERROR_MESSAGE_BYTES) {
    throw new Error("error message too long");
  }
  if (buf.length !== 4 + messageLen) {
    throw new Error("ERROR payload length mismatch");
  }
  const message = formatOneLineUtf8(buf.subarray(4).toString("utf8"), MAX_ERROR_MESSAGE_BYTES);
  return { code, reason: failureReasonFromCode(code), message };
}

export function encodeWindowPayload(increment: number): Buffer {
  if (!Number.isInteger(increment) || increment < 1 || increment > 0xffffffff) {
    throw new Error(`invalid window increment: ${increment}`);
  }
  const buf = Buffer.allocUnsafe(4);
  buf.writeUInt32BE(increment, 0);
  return buf;
}

export function decodeWindowPayload(buf: Buffer): number {
  if (buf.length !== 4) {
    throw new Error("WINDOW payload must be exactly 4 bytes");
  }
  const increment = buf.readUInt32BE(0);
  if (increment === 0) throw new Error("WINDOW increment must be > 0");
  return increment;
}
