export class HttpParseError extends Error {
  override name = "HttpParseError";
}

export type HttpHeader = {
  name: string;
  value: string;
};

export type HttpHead = {
  startLine: string;
  headers: HttpHeader[];
};

const CRLFCRLF = Buffer.from("\r\n\r\n", "latin1");
const HEADER_NAME_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/**
 * Returns the offset just past the blank line ending the head, or -1 when `buf` does not hold
 * a complete head yet.
 */
export function findHeadEnd(buf: Buffer): number {
  const idx = buf.indexOf(CRLFCRLF);
  return idx === -1 ? -1 : idx + CRLFCRLF.length;
}

export function parseHead(head: Buffer): HttpHead {
  // latin1 keeps a 1:1 byte mapping; header values are opaque to the proxy.
  const text = head.toString("latin1");
  const lines = text.split("\r\n");
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  const startLine = lines.shift();
  if (!startLine) throw new HttpParseError("missing start line");

  const headers: HttpHeader[] = [];
  for (const line of lines) {
    if (line.startsWith(" ") || line.startsWith("\t")) {
      throw new HttpParseError("obsolete header line folding");
    }
    const colon = line.indexOf(":");
    if (colon <= 0) throw new HttpParseError("malformed header line");
    const name = line.slice(0, colon);
    if (!HEADER_NAME_RE.test(name)) throw new HttpParseError("invalid header name");
    headers.push({ name, value: line.slice(colon + 1).trim() });
  }

  return { startLine, headers };
}

export function getHeaderValues(headers: readonly HttpHeader[], name: string): string[] {
  const lower = name.toLowerCase();
  return headers.filter((h) => h.name.toLowerCase() === lower).map((h) => h.value);
}

export function getHeader(headers: readonly HttpHeader[], name: string): string | undefined {
  const values = getHeaderValues(headers, name);
  return values.length > 0 ? values.join(", ") : undefined;
}
