import { requestBodyFraming, type BodyFraming } from "../http/bodyFraming.js";
import { HttpParseError, getHeader, parseHead, type HttpHead, type HttpHeader } from "../http/head.js";
import { MAX_OPEN_HOST_BYTES, MAX_OPEN_METHOD_BYTES } from "../protocol/frame.js";

export const DEFAULT_TUNNEL_PORT = 443;
export const DEFAULT_HTTP_PORT = 80;

export type ProxyRequest =
  | {
      kind: "tunnel";
      host: string;
      port: number;
    }
  | {
      kind: "forward";
      method: string;
      host: string;
      port: number;
      body: BodyFraming;
      // The client asked to switch protocols; bytes after the body are relayed as they come.
      upgrade: boolean;
    };

export type RequestHeadErrorStatus = 400 | 408 | 431;

/**
 * A client request the ship answers locally instead of opening a session.
 */
export class RequestHeadError extends Error {
  override name = "RequestHeadError";
  readonly status: RequestHeadErrorStatus;

  constructor(status: RequestHeadErrorStatus, message: string) {
    super(message);
    this.status = status;
  }
}

const METHOD_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const VERSION_RE = /^HTTP\/1\.[01]$/;

function parsePort(raw: string): number {
  if (!/^\d{1,5}$/.test(raw)) throw new RequestHeadError(400, "invalid port");
  const port = Number(raw);
  if (port < 1 || port > 65535) throw new RequestHeadError(400, "invalid port");
  return port;
}

// Printable ASCII only, so the length is also the encoded size in an OPEN frame.
function isValidHost(host: string): boolean {
  return host.length > 0 && host.length <= MAX_OPEN_HOST_BYTES && /^[\x21-\x7e]+$/.test(host) && !/[/?#@]/.test(host);
}

function isUpgradeRequest(headers: readonly HttpHeader[]): boolean {
  if (getHeader(headers, "upgrade") === undefined) return false;
  const connection = getHeader(headers, "connection") ?? "";
  return connection.split(",").some((token) => token.trim().toLowerCase() === "upgrade");
}

/**
 * Parses `host[:port]` and `[v6]:port` authorities. IPv6 literals come back without brackets.
 */
export function parseAuthority(authority: string, defaultPort: number): { host: string; port: number } {
  let host: string;
  let port = defaultPort;

  if (authority.startsWith("[")) {
    const close = authority.indexOf("]");
    if (close === -1) throw new RequestHeadError(400, "unterminated IPv6 literal");
    host = authority.slice(1, close);
    const rest = authority.slice(close + 1);
    if (rest !== "") {
      if (!rest.startsWith(":")) throw new RequestHeadError(400, "invalid authority");
      port = parsePort(rest.slice(1));
    }
    if (!host.includes(":")) throw new RequestHeadError(400, "invalid IPv6 literal");
  } else {
    const colon = authority.lastIndexOf(":");
    if (colon !== -1) {
      if (authority.indexOf(":") !== colon) throw new RequestHeadError(400, "IPv6 literal must be bracketed");
      host = authority.slice(0, colon);
      port = parsePort(authority.slice(colon + 1));
    } else {
      host = authority;
    }
  }

  if (!isValidHost(host)) throw new RequestHeadError(400, "invalid host");
  return { host, port };
}

function parseAbsoluteTarget(target: string): { host: string; port: number } {
  let url: URL;
  try {
    url = new URL(target);
  } catch {
    throw new RequestHeadError(400, "invalid absolute URI");
  }
  if (url.protocol === "https:") {
    throw new RequestHeadError(400, "https:// targets must use CONNECT");
  }
  if (url.protocol !== "http:") {
    throw new RequestHeadError(400, `unsupported scheme ${url.protocol}`);
  }
  const host = url.hostname.startsWith("[") && url.hostname.endsWith("]") ? url.hostname.slice(1, -1) : url.hostname;
  if (!isValidHost(host)) throw new RequestHeadError(400, "invalid host");
  return { host, port: url.port ? Number(url.port) : DEFAULT_HTTP_PORT };
}

/**
 * Interprets a complete request head (through the blank line) as proxy work: a CONNECT tunnel or
 * a request to forward.
 */
export function parseProxyRequest(rawHead: Buffer): ProxyRequest {
  let head: HttpHead;
  try {
    head = parseHead(rawHead);
  } catch (err) {
    if (err instanceof HttpParseError) throw new RequestHeadError(400, err.message);
    throw err;
  }

  const parts = head.startLine.split(" ");
  if (parts.length !== 3) throw new RequestHeadError(400, "malformed request line");
  const [method = "", target = "", version = ""] = parts;
  if (!METHOD_RE.test(method)) throw new RequestHeadError(400, "invalid method");
  if (method.length > MAX_OPEN_METHOD_BYTES) throw new RequestHeadError(400, "method too long");
  if (!VERSION_RE.test(version)) throw new RequestHeadError(400, "unsupported HTTP version");
  if (target === "") throw new RequestHeadError(400, "missing request target");

  if (method === "CONNECT") {
    const { host, port } = parseAuthority(target, DEFAULT_TUNNEL_PORT);
    return { kind: "tunnel", host, port };
  }

  let host: string;
  let port: number;
  if (/^[A-Za-z][A-Za-z0-9+.-]*:\/\//.test(target)) {
    ({ host, port } = parseAbsoluteTarget(target));
  } else {
    const hostHeader = getHeader(head.headers, "host");
    if (!hostHeader) throw new RequestHeadError(400, "missing Host header");
    ({ host, port } = parseAuthority(hostHeader, DEFAULT_HTTP_PORT));
  }

  let body: BodyFraming;
  try {
    body = requestBodyFraming(head.headers);
  } catch (err) {
    if (err instanceof HttpParseError) throw new RequestHeadError(400, err.message);
    throw err;
  }

  return { kind: "forward", method, host, port, body, upgrade: isUpgradeRequest(head.headers) };
}
