import type { FailureReason } from "../errors.js";

const STATUS_TEXT: Record<number, string> = {
  400: "Bad Request",
  408: "Request Timeout",
  431: "Request Header Fields Too Large",
  502: "Bad Gateway",
  503: "Service Unavailable",
  504: "Gateway Timeout",
};

export const CONNECTION_ESTABLISHED = Buffer.from("HTTP/1.1 200 Connection Established\r\n\r\n", "latin1");

export function statusForFailure(reason: FailureReason): number {
  switch (reason) {
    case "Timeout":
      return 504;
    case "LinkLost":
    case "Shutdown":
    case "SessionLimit":
      return 503;
    default:
      return 502;
  }
}

export function buildErrorResponse(status: number, message: string): Buffer {
  const statusText = STATUS_TEXT[status] ?? "Error";
  const body = Buffer.from(`${status} ${statusText}: ${message}\n`, "utf8");
  const head =
    `HTTP/1.1 ${status} ${statusText}\r\n` +
    "Content-Type: text/plain; charset=utf-8\r\n" +
    `Content-Length: ${body.length}\r\n` +
    "Connection: close\r\n" +
    "\r\n";
  return Buffer.concat([Buffer.from(head, "latin1"), body]);
}
