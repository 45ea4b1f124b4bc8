import { HttpParseError, getHeader, getHeaderValues, type HttpHeader } from "./head.js";

export type BodyFraming =
  | { kind: "none" }
  | { kind: "length"; length: number }
  | { kind: "chunked" }
  | { kind: "untilClose" };

const MAX_CHUNK_LINE_BYTES = 4096;

function parseContentLength(headers: readonly HttpHeader[]): number | undefined {
  const values = getHeaderValues(headers, "content-length");
  if (values.length === 0) return undefined;

  let length: number | undefined;
  for (const raw of values.flatMap((v) => v.split(","))) {
    const token = raw.trim();
    if (!/^\d+$/.test(token)) throw new HttpParseError("invalid Content-Length");
    const value = Number(token);
    if (!Number.isSafeInteger(value)) throw new HttpParseError("invalid Content-Length");
    if (length !== undefined && length !== value) throw new HttpParseError("conflicting Content-Length");
    length = value;
  }
  return length;
}

function transferCodings(headers: readonly HttpHeader[]): string[] | undefined {
  const te = getHeader(headers, "transfer-encoding");
  if (te === undefined) return undefined;
  return te
    .split(",")
    .map((c) => c.trim().toLowerCase())
    .filter((c) => c.length > 0);
}

export function requestBodyFraming(headers: readonly HttpHeader[]): BodyFraming {
  const codings = transferCodings(headers);
  if (codings !== undefined) {
    // A request body must be self-delimiting; only a final "chunked" coding is.
    if (codings[codings.length - 1] !== "chunked") throw new HttpParseError("unsupported Transfer-Encoding");
    return { kind: "chunked" };
  }
  const length = parseContentLength(headers);
  if (length === undefined || length === 0) return { kind: "none" };
  return { kind: "length", length };
}

export function responseBodyFraming(method: string, status: number, headers: readonly HttpHeader[]): BodyFraming {
  if (method.toUpperCase() === "HEAD") return { kind: "none" };
  if (status < 200 || status === 204 || status === 304) return { kind: "none" };

  const codings = transferCodings(headers);
  if (codings !== undefined) {
    return codings[codings.length - 1] === "chunked" ? { kind: "chunked" } : { kind: "untilClose" };
  }
  const length = parseContentLength(headers);
  if (length === undefined) return { kind: "untilClose" };
  if (length === 0) return { kind: "none" };
  return { kind: "length", length };
}

type ChunkState = "size" | "data" | "dataEnd" | "trailer";

/**
 * Follows one message body through arbitrary read boundaries and reports how many bytes of each
 * read belong to it. Bytes after the end of the body are never consumed.
 */
export class BodyTracker {
  readonly framing: BodyFraming;

  private _done: boolean;
  private remaining = 0;
  private chunkState: ChunkState = "size";
  private line = "";

  constructor(framing: BodyFraming) {
    this.framing = framing;
    this._done = framing.kind === "none";
    if (framing.kind === "length") this.remaining = framing.length;
  }

  get done(): boolean {
    return this._done;
  }

  push(buf: Buffer): number {
    if (this._done) return 0;
    switch (this.framing.kind) {
      case "none":
        return 0;
      case "untilClose":
        return buf.length;
      case "length": {
        const n = Math.min(this.remaining, buf.length);
        this.remaining -= n;
        if (this.remaining === 0) this._done = true;
        return n;
      }
      case "chunked":
        return this.pushChunked(buf);
    }
  }

  private pushChunked(buf: Buffer): number {
    let i = 0;
    while (i < buf.length && !this._done) {
      if (this.chunkState === "data") {
        const n = Math.min(this.remaining, buf.length - i);
        i += n;
        this.remaining -= n;
        if (this.remaining === 0) this.chunkState = "dataEnd";
        continue;
      }

      const nl = buf.indexOf(0x0a, i);
      const end = nl === -1 ? buf.length : nl;
      this.line += buf.toString("latin1", i, end);
      if (this.line.length > MAX_CHUNK_LINE_BYTES) throw new HttpParseError("chunk line too long");
      if (nl === -1) {
        i = buf.length;
        break;
      }
      i = nl + 1;
      const line = this.line.endsWith("\r") ? this.line.slice(0, -1) : this.line;
      this.line = "";
      this.onLine(line);
    }
    return i;
  }

  private onLine(line: string): void {
    switch (this.chunkState) {
      case "size": {
        const semi = line.indexOf(";");
        const hex = (semi === -1 ? line : line.slice(0, semi)).trim();
        if (!/^[0-9a-fA-F]{1,13}$/.test(hex)) throw new HttpParseError("invalid chunk size");
        const size = Number.parseInt(hex, 16);
        if (size === 0) {
          this.chunkState = "trailer";
        } else {
          this.remaining = size;
          this.chunkState = "data";
        }
        return;
      }
      case "dataEnd":
        if (line !== "") throw new HttpParseError("missing CRLF after chunk data");
        this.chunkState = "size";
        return;
      case "trailer":
        if (line === "") this._done = true;
        return;
      case "data":
        return;
    }
  }
}
