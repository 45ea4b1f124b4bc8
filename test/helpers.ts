import { once } from "node:events";
import net from "node:net";

import type { LinkDownReason, LinkHandler } from "../src/link/linkSupervisor.js";
import { createLogger, type Logger } from "../src/logger.js";
import { FrameType, type Frame } from "../src/protocol/frame.js";
import type { FrameSender } from "../src/session.js";

export function silentLogger(): Logger {
  return createLogger({ name: "test", level: "silent" });
}

export async function listen(server: net.Server, host = "127.0.0.1"): Promise<number> {
  server.listen(0, host);
  await once(server, "listening");
  const addr = server.address();
  if (addr && typeof addr === "object") return addr.port;
  throw new Error("Expected server to bind to an ephemeral port");
}

export async function closeServer(server: net.Server): Promise<void> {
  if (!server.listening) return;
  const closed = once(server, "close");
  server.close();
  await closed;
}

/** Frame sender that records every frame; `accept` controls the back-pressure signal. */
export class RecordingSender implements FrameSender {
  readonly frames: Frame[] = [];
  accept = true;

  send(frame: Frame): boolean {
    this.frames.push(frame);
    return this.accept;
  }

  ofType(type: FrameType): Frame[] {
    return this.frames.filter((f) => f.type === type);
  }

  dataBytes(): Buffer {
    return Buffer.concat(this.ofType(FrameType.DATA).map((f) => f.payload));
  }

  clear(): void {
    this.frames.length = 0;
  }
}

/** Link handler that records what the supervisor hands it. */
export class RecordingHandler implements LinkHandler {
  readonly frames: Frame[] = [];
  readonly downs: Array<[LinkDownReason, string]> = [];

  handleFrame(frame: Frame): void {
    this.frames.push(frame);
  }

  handleLinkDown(reason: LinkDownReason, message: string): void {
    this.downs.push([reason, message]);
  }

  handleDrain(): void {}
}

export async function waitFor(predicate: () => boolean, timeoutMs = 2_000, what = "condition"): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`timed out waiting for ${what}`);
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

/** Reads from `socket` until it ends and returns everything received. */
export async function readAll(socket: net.Socket): Promise<Buffer> {
  const chunks: Buffer[] = [];
  socket.on("data", (chunk: Buffer) => chunks.push(chunk));
  await new Promise<void>((resolve, reject) => {
    socket.once("end", () => resolve());
    socket.once("close", () => resolve());
    socket.once("error", reject);
  });
  return Buffer.concat(chunks);
}

/** Reads from `socket` until `predicate` holds for the bytes received so far. */
export function readUntil(socket: net.Socket, predicate: (received: Buffer) => boolean, timeoutMs = 2_000): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    let received = Buffer.alloc(0);
    const cleanup = () => {
      clearTimeout(timer);
      socket.off("data", onData);
      socket.off("close", onClose);
    };
    const onData = (chunk: Buffer) => {
      received = Buffer.concat([received, chunk]);
      if (predicate(received)) {
        cleanup();
        resolve(received);
      }
    };
    const onClose = () => {
      cleanup();
      reject(new Error(`socket closed after ${received.length} bytes: ${received.toString("latin1")}`));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`timed out after ${received.length} bytes: ${received.toString("latin1")}`));
    }, timeoutMs);
    socket.on("data", onData);
    socket.once("close", onClose);
  });
}

export async function connect(port: number, host = "127.0.0.1"): Promise<net.Socket> {
  const socket = net.createConnection({ host, port, allowHalfOpen: true });
  await once(socket, "connect");
  return socket;
}
