import { BodyTracker, responseBodyFraming } from "./bodyFraming.js";
import { HttpParseError, findHeadEnd, parseHead } from "./head.js";

const STATUS_LINE_RE = /^HTTP\/1\.[01] (\d{3})(?: .*)?$/;

export function parseStatusLine(line: string): number {
  const match = STATUS_LINE_RE.exec(line);
  if (!match?.[1]) throw new HttpParseError("malformed status line");
  return Number(match[1]);
}

/**
 * Delimits one HTTP/1.x response (plus any 1xx interim responses before it) in the byte stream
 * read from an upstream server.
 */
export class ResponseTracker {
  private readonly method: string;
  private readonly maxHeadBytes: number;

  private headBuf: Buffer = Buffer.alloc(0);
  private body: BodyTracker | null = null;
  private _complete = false;
  private _status: number | undefined;
  private consumed = 0;

  constructor(method: string, maxHeadBytes = 64 * 1024) {
    this.method = method;
    this.maxHeadBytes = maxHeadBytes;
  }

  get complete(): boolean {
    return this._complete;
  }

  /** Final (non-interim) status code, once its head has been read. */
  get status(): number | undefined {
    return this._status;
  }

  get bytesConsumed(): number {
    return this.consumed;
  }

  /**
   * Returns how many leading bytes of `buf` belong to the response. Anything after the end of
   * the response is left unconsumed.
   */
  push(buf: Buffer): number {
    let offset = 0;
    while (offset < buf.length && !this._complete) {
      if (this.body) {
        offset += this.body.push(buf.subarray(offset));
        if (this.body.done) this._complete = true;
        continue;
      }

      const prevLen = this.headBuf.length;
      this.headBuf = prevLen === 0 ? buf.subarray(offset) : Buffer.concat([this.headBuf, buf.subarray(offset)]);
      const end = findHeadEnd(this.headBuf);
      if (end === -1) {
        if (this.headBuf.length > this.maxHeadBytes) throw new HttpParseError("response head too large");
        // Detach from the caller's buffer before keeping it.
        this.headBuf = Buffer.from(this.headBuf);
        offset = buf.length;
        break;
      }

      offset += end - prevLen;
      const head = parseHead(this.headBuf.subarray(0, end));
      this.headBuf = Buffer.alloc(0);

      const status = parseStatusLine(head.startLine);
      if (status >= 100 && status < 200 && status !== 101) continue;

      this._status = status;
      // After 101 the connection carries another protocol until it closes.
      const framing =
        status === 101 ? { kind: "untilClose" as const } : responseBodyFraming(this.method, status, head.headers);
      this.body = new BodyTracker(framing);
      if (this.body.done) this._complete = true;
    }
    this.consumed += offset;
    return offset;
  }

  /**
   * The upstream closed its side. Returns true when that ends the response properly, false when
   * the response was cut short.
   */
  endOfStream(): boolean {
    if (this._complete) return true;
    if (this.body?.framing.kind === "untilClose") {
      this._complete = true;
      return true;
    }
    return false;
  }
}
