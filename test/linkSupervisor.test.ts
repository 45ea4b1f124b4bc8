import assert from "node:assert/strict";
import { once } from "node:events";
import net from "node:net";
import { describe, it } from "node:test";

import {
  OffshoreLinkSupervisor,
  ShipLinkSupervisor,
  type LinkDownReason,
  type LinkHandler,
  type LinkSupervisorOptions,
  type ShipLinkSupervisorOptions,
} from "../src/link/linkSupervisor.js";
import { createMetrics } from "../src/metrics.js";
import { FRAME_HEADER_BYTES, FrameDecoder, FrameType, encodeFrame, type Frame } from "../src/protocol/frame.js";
import { Session } from "../src/session.js";
import { RecordingHandler, closeServer, listen, silentLogger, waitFor } from "./helpers.js";

/** Ship-side handler that owns a few sessions, the way the multiplexer does. */
class SessionTable implements LinkHandler {
  readonly sessions: Session[] = [];

  handleFrame(): void {}

  handleLinkDown(reason: LinkDownReason, message: string): void {
    for (const session of this.sessions) session.fail(reason, message, "link");
  }

  handleDrain(): void {}
}

function baseOptions(overrides: Partial<LinkSupervisorOptions> = {}): LinkSupervisorOptions {
  return {
    logger: silentLogger(),
    maxFramePayloadBytes: 1024,
    frameStallTimeoutMs: 5_000,
    highWaterMarkBytes: 64 * 1024,
    idleTimeoutMs: 30_000,
    ...overrides,
  };
}

function shipOptions(port: number, overrides: Partial<ShipLinkSupervisorOptions> = {}): ShipLinkSupervisorOptions {
  return {
    ...baseOptions(),
    host: "127.0.0.1",
    port,
    connectTimeoutMs: 1_000,
    pingIntervalMs: 10_000,
    reconnectBaseDelayMs: 10,
    reconnectMaxDelayMs: 50,
    reconnectMaxAttempts: 50,
    ...overrides,
  };
}

async function startOffshore(overrides: Partial<LinkSupervisorOptions> = {}) {
  const link = new OffshoreLinkSupervisor({ ...baseOptions(overrides), host: "127.0.0.1", port: 0 });
  const handler = new RecordingHandler();
  link.attach(handler);
  await link.start();
  return { link, handler };
}

async function rawConnect(port: number): Promise<net.Socket> {
  const socket = net.createConnection({ host: "127.0.0.1", port });
  // The supervisor may reset the connection on purpose.
  socket.on("error", () => {});
  await once(socket, "connect");
  return socket;
}

function readFrames(socket: net.Socket, count: number): Promise<Frame[]> {
  const decoder = new FrameDecoder();
  const frames: Frame[] = [];
  return new Promise((resolve, reject) => {
    const onData = (chunk: Buffer) => {
      frames.push(...decoder.push(chunk));
      if (frames.length >= count) {
        socket.off("data", onData);
        resolve(frames);
      }
    };
    socket.on("data", onData);
    socket.once("close", () => reject(new Error(`link closed after ${frames.length} frames`)));
  });
}

async function freePort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await closeServer(server);
  return port;
}

describe("LinkSupervisor", () => {
  it("fails every session with LinkLost when the Link drops", async () => {
    const offshore = await startOffshore();
    const table = new SessionTable();
    const ship = new ShipLinkSupervisor(shipOptions(offshore.link.port));
    ship.attach(table);

    try {
      await ship.start();
      assert.equal(await ship.waitForUp(2_000), true);

      for (let id = 1; id <= 3; id += 1) {
        const session = new Session({ id, sender: ship, maxFramePayloadBytes: 1024, windowBytes: 4096 });
        session.open({ host: `origin-${id}.test`, port: 443 }, "TUNNEL");
        table.sessions.push(session);
      }
      await waitFor(() => offshore.handler.frames.length === 3, 2_000, "three OPEN frames");
      assert.deepEqual(
        offshore.handler.frames.map((f) => [f.type, f.sessionId]),
        [
          [FrameType.OPEN, 1],
          [FrameType.OPEN, 2],
          [FrameType.OPEN, 3],
        ],
      );

      await offshore.link.stop();
      await waitFor(() => table.sessions.every((s) => s.state === "FAILED"), 2_000, "sessions to fail");

      assert.deepEqual(
        table.sessions.map((s) => [s.failure?.reason, s.failure?.origin]),
        [
          ["LinkLost", "link"],
          ["LinkLost", "link"],
          ["LinkLost", "link"],
        ],
      );
      assert.deepEqual(offshore.handler.downs, [["Shutdown", "proxy is shutting down"]]);
    } finally {
      await ship.stop();
      await offshore.link.stop();
    }
  });

  it("answers PING with a PONG carrying the same payload", async () => {
    const offshore = await startOffshore();
    const socket = await rawConnect(offshore.link.port);
    try {
      const reply = readFrames(socket, 1);
      socket.write(encodeFrame({ type: FrameType.PING, sessionId: 0, payload: Buffer.from("t=1") }));
      const [pong] = await reply;
      assert.equal(pong?.type, FrameType.PONG);
      assert.equal(pong?.sessionId, 0);
      assert.equal(pong?.payload.toString(), "t=1");
      assert.deepEqual(offshore.handler.frames, []);
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("drops session frames addressed to session 0 and heartbeats on other ids", async () => {
    const offshore = await startOffshore();
    const socket = await rawConnect(offshore.link.port);
    try {
      socket.write(
        Buffer.concat([
          encodeFrame({ type: FrameType.DATA, sessionId: 0, payload: Buffer.from("x") }),
          encodeFrame({ type: FrameType.PING, sessionId: 4, payload: Buffer.alloc(0) }),
          encodeFrame({ type: FrameType.DATA, sessionId: 1, payload: Buffer.from("y") }),
        ]),
      );
      await waitFor(() => offshore.handler.frames.length === 1, 2_000, "DATA frame");
      assert.deepEqual(
        offshore.handler.frames.map((f) => [f.type, f.sessionId, f.payload.toString()]),
        [[FrameType.DATA, 1, "y"]],
      );
      assert.equal(offshore.link.state, "UP");
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("tears the Link down on a malformed frame", async () => {
    const offshore = await startOffshore();
    const socket = await rawConnect(offshore.link.port);
    try {
      await waitFor(() => offshore.link.isUp(), 2_000, "link up");
      const closed = once(socket, "close");
      const header = Buffer.alloc(FRAME_HEADER_BYTES);
      header.writeUInt8(0x7f, 0);
      socket.write(header);
      await closed;

      assert.equal(offshore.link.state, "DOWN");
      assert.deepEqual(offshore.handler.downs, [["LinkLost", "malformed frame: unknown frame type 127"]]);
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("tears the Link down when a partial frame stalls", async () => {
    const offshore = await startOffshore({ frameStallTimeoutMs: 50 });
    const socket = await rawConnect(offshore.link.port);
    try {
      const closed = once(socket, "close");
      socket.write(Buffer.from([FrameType.DATA, 0, 0]));
      await closed;
      assert.deepEqual(offshore.handler.downs, [["LinkLost", "malformed frame: partial frame stalled for 50ms"]]);
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("reports a frame cut short by the peer closing the Link", async () => {
    const offshore = await startOffshore();
    const socket = await rawConnect(offshore.link.port);
    try {
      await waitFor(() => offshore.link.isUp(), 2_000, "link up");
      const closed = once(socket, "close");
      socket.end(Buffer.from([FrameType.DATA, 0, 0, 0, 1]));
      await closed;
      assert.deepEqual(offshore.handler.downs, [["LinkLost", "link closed by peer: truncated frame stream (5 pending bytes)"]]);
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("tears an idle Link down", async () => {
    const offshore = await startOffshore({ idleTimeoutMs: 50 });
    const socket = await rawConnect(offshore.link.port);
    try {
      await once(socket, "close");
      assert.deepEqual(offshore.handler.downs, [["LinkLost", "link idle timeout"]]);
    } finally {
      socket.destroy();
      await offshore.link.stop();
    }
  });

  it("replaces the current Link when the ship connects again", async () => {
    const offshore = await startOffshore();
    const first = await rawConnect(offshore.link.port);
    let second: net.Socket | null = null;
    try {
      await waitFor(() => offshore.link.isUp(), 2_000, "first link up");
      const firstClosed = once(first, "close");
      second = await rawConnect(offshore.link.port);
      await firstClosed;

      assert.deepEqual(offshore.handler.downs, [["LinkLost", "replaced by a new ship connection"]]);
      assert.equal(offshore.link.state, "UP");

      const reply = readFrames(second, 1);
      second.write(encodeFrame({ type: FrameType.PING, sessionId: 0, payload: Buffer.alloc(0) }));
      const [pong] = await reply;
      assert.equal(pong?.type, FrameType.PONG);
    } finally {
      first.destroy();
      second?.destroy();
      await offshore.link.stop();
    }
  });
});

describe("ShipLinkSupervisor", () => {
  it("backs off exponentially up to the max delay", () => {
    const ship = new ShipLinkSupervisor(
      shipOptions(9, { reconnectBaseDelayMs: 250, reconnectMaxDelayMs: 10_000 }),
    );
    assert.deepEqual(
      [0, 1, 2, 5, 6, 10].map((n) => ship.reconnectDelayMs(n)),
      [250, 500, 1000, 8000, 10_000, 10_000],
    );
  });

  it("refuses to send while the Link is down", () => {
    const ship = new ShipLinkSupervisor(shipOptions(9));
    assert.equal(ship.send({ type: FrameType.PING, sessionId: 0, payload: Buffer.alloc(0) }), false);
  });

  it("reconnects after the Link drops", async () => {
    let connections = 0;
    const server = net.createServer((socket) => {
      connections += 1;
      if (connections === 1) socket.destroy();
    });
    const port = await listen(server);
    const metrics = createMetrics({ side: "ship", collectDefaults: false });
    const ship = new ShipLinkSupervisor({ ...shipOptions(port), metrics });
    ship.attach(new RecordingHandler());

    try {
      await ship.start();
      await waitFor(() => connections === 2 && ship.isUp(), 2_000, "second link");
      const reconnects = await metrics.registry.getSingleMetricAsString("proxy_link_reconnects_total");
      assert.ok(reconnects.split("\n").includes("proxy_link_reconnects_total 1"));
    } finally {
      await ship.stop();
      server.close();
    }
  });

  it("gives up after the configured number of failed attempts", async () => {
    const port = await freePort();
    const ship = new ShipLinkSupervisor(
      shipOptions(port, { reconnectBaseDelayMs: 5, reconnectMaxDelayMs: 20, reconnectMaxAttempts: 3 }),
    );
    ship.attach(new RecordingHandler());
    const states: string[] = [];
    ship.onStateChange((state) => states.push(state));

    try {
      await ship.start();
      assert.equal(await ship.waitForUp(2_000), false);
      assert.equal(ship.state, "GAVE_UP");
      assert.deepEqual(states, ["CONNECTING", "DOWN", "CONNECTING", "DOWN", "CONNECTING", "GAVE_UP"]);
    } finally {
      await ship.stop();
    }
  });
});
