import assert from "node:assert/strict";
import type { LookupAddress } from "node:dns";
import http from "node:http";
import net from "node:net";
import { describe, it } from "node:test";

import type { OffshoreConfig, ShipConfig } from "../src/config.js";
import type { LookupFn } from "../src/offshore/egressPolicy.js";
import { createOffshoreProxy, type OffshoreProxy } from "../src/offshore/proxy.js";
import { buildErrorResponse } from "../src/ship/errorResponse.js";
import { createShipProxy, type ShipProxy } from "../src/ship/proxy.js";
import { closeServer, connect, listen, readAll, readUntil, silentLogger, waitFor } from "./helpers.js";
import { makeOffshoreTestConfig, makeShipTestConfig } from "./testConfig.js";

const ESTABLISHED = "HTTP/1.1 200 Connection Established\r\n\r\n";

const testLookup: LookupFn = async (hostname) => {
  if (hostname.endsWith(".test")) {
    const answer: LookupAddress[] = [{ address: "127.0.0.1", family: 4 }];
    return answer;
  }
  const err: NodeJS.ErrnoException = new Error(`getaddrinfo ENOTFOUND ${hostname}`);
  err.code = "ENOTFOUND";
  throw err;
};

type ProxyPair = {
  ship: ShipProxy;
  offshore: OffshoreProxy;
  stop(): Promise<void>;
};

async function startProxyPair(
  opts: { ship?: Partial<ShipConfig>; offshore?: Partial<OffshoreConfig> } = {},
): Promise<ProxyPair> {
  const offshore = createOffshoreProxy(makeOffshoreTestConfig(opts.offshore), silentLogger(), { lookup: testLookup });
  await offshore.start();
  const ship = createShipProxy(
    makeShipTestConfig({ OFFSHORE_PORT: offshore.link.port, ...opts.ship }),
    silentLogger(),
  );
  await ship.start();
  assert.equal(await ship.link.waitForUp(2_000), true);
  await waitFor(() => offshore.link.isUp(), 2_000, "offshore link up");

  return {
    ship,
    offshore,
    async stop() {
      await ship.stop();
      await offshore.stop();
    },
  };
}

type TestServer = {
  port: number;
  close(): Promise<void>;
};

async function startEchoServer(): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
    socket.on("error", () => {});
    socket.on("data", (chunk: Buffer) => socket.write(chunk));
  });
  const port = await listen(server);
  return {
    port,
    async close() {
      for (const socket of sockets) socket.destroy();
      await closeServer(server);
    },
  };
}

async function startOrigin(handler: http.RequestListener): Promise<TestServer> {
  const server = http.createServer(handler);
  const port = await listen(server);
  return {
    port,
    async close() {
      server.closeAllConnections();
      await closeServer(server);
    },
  };
}

const SWITCHING_PROTOCOLS = "HTTP/1.1 101 Switching Protocols\r\nConnection: Upgrade\r\nUpgrade: echo\r\n\r\n";

// Answers the first request head with 101 and echoes every byte after it.
async function startUpgradeOrigin(): Promise<TestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.once("close", () => sockets.delete(socket));
    socket.on("error", () => {});
    let head = Buffer.alloc(0);
    let switched = false;
    socket.on("data", (chunk: Buffer) => {
      if (switched) {
        socket.write(chunk);
        return;
      }
      head = Buffer.concat([head, chunk]);
      const end = head.indexOf("\r\n\r\n");
      if (end === -1) return;
      switched = true;
      socket.write(SWITCHING_PROTOCOLS);
      const extra = head.subarray(end + 4);
      if (extra.length > 0) socket.write(extra);
    });
  });
  const port = await listen(server);
  return {
    port,
    async close() {
      for (const socket of sockets) socket.destroy();
      await closeServer(server);
    },
  };
}

function splitResponse(raw: Buffer): { head: string; body: string } {
  const text = raw.toString("latin1");
  const end = text.indexOf("\r\n\r\n");
  assert.notEqual(end, -1, `no response head in ${JSON.stringify(text.slice(0, 200))}`);
  return { head: text.slice(0, end), body: text.slice(end + 4) };
}

async function freePort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await closeServer(server);
  return port;
}

describe("ship/offshore proxy", () => {
  it("relays a CONNECT tunnel byte for byte in both directions", async () => {
    const echo = await startEchoServer();
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write(`CONNECT 127.0.0.1:${echo.port} HTTP/1.1\r\nHost: 127.0.0.1:${echo.port}\r\n\r\n`);
      const established = await readUntil(client, (buf) => buf.length >= ESTABLISHED.length);
      assert.equal(established.toString("latin1"), ESTABLISHED);

      const payload = Buffer.from([0x16, 0x03, 0x01, 0x00, 0xff, 0x0d, 0x0a, 0x00]);
      client.write(payload);
      const echoed = await readUntil(client, (buf) => buf.length >= payload.length);
      assert.deepEqual(echoed, payload);

      const rest = readAll(client);
      client.end();
      assert.equal((await rest).length, 0);

      await waitFor(
        () => pair.ship.multiplexer.sessionCount === 0 && pair.offshore.demultiplexer.sessionCount === 0,
        2_000,
        "sessions to close",
      );
    } finally {
      client.destroy();
      await pair.stop();
      await echo.close();
    }
  });

  it("sends pipelined tunnel bytes after the acknowledgment", async () => {
    const echo = await startEchoServer();
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write(`CONNECT 127.0.0.1:${echo.port} HTTP/1.1\r\n\r\nearly-bytes`);
      const expected = ESTABLISHED + "early-bytes";
      const received = await readUntil(client, (buf) => buf.length >= expected.length);
      assert.equal(received.toString("latin1"), expected);
    } finally {
      client.destroy();
      await pair.stop();
      await echo.close();
    }
  });

  it("answers 502 for a name that does not resolve and leaves no session behind", async () => {
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write("GET http://nonexistent.invalid/ HTTP/1.1\r\nHost: nonexistent.invalid\r\n\r\n");
      const response = await readAll(client);
      assert.equal(
        response.toString("utf8"),
        buildErrorResponse(502, "DNS lookup failed for nonexistent.invalid: ENOTFOUND").toString("utf8"),
      );
      await waitFor(
        () => pair.ship.multiplexer.sessionCount === 0 && pair.offshore.demultiplexer.sessionCount === 0,
        2_000,
        "sessions to be released",
      );
    } finally {
      client.destroy();
      await pair.stop();
    }
  });

  it("answers 502 when the target refuses the connection", async () => {
    const port = await freePort();
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write(`CONNECT 127.0.0.1:${port} HTTP/1.1\r\n\r\n`);
      const response = await readAll(client);
      assert.equal(
        response.toString("utf8"),
        buildErrorResponse(502, `connect to 127.0.0.1:${port} failed: ECONNREFUSED`).toString("utf8"),
      );
    } finally {
      client.destroy();
      await pair.stop();
    }
  });

  it("answers 502 for a target the egress policy denies", async () => {
    const pair = await startProxyPair({ offshore: { OFFSHORE_ALLOWED_PORTS: new Set([443]) } });
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write("GET http://origin.test:8080/ HTTP/1.1\r\nHost: origin.test:8080\r\n\r\n");
      const response = await readAll(client);
      assert.equal(response.toString("utf8"), buildErrorResponse(502, "port 8080 is not allowed").toString("utf8"));
    } finally {
      client.destroy();
      await pair.stop();
    }
  });

  it("completes two concurrent GETs to different hosts with their own bodies", async () => {
    const alphaBody = "a".repeat(150_000);
    const betaBody = "b".repeat(120_000);
    const alpha = await startOrigin((_req, res) => res.end(alphaBody));
    const beta = await startOrigin((_req, res) => res.end(betaBody));
    const pair = await startProxyPair();
    const clientA = await connect(pair.ship.multiplexer.port);
    const clientB = await connect(pair.ship.multiplexer.port);

    try {
      clientA.write(`GET http://alpha.test:${alpha.port}/ HTTP/1.1\r\nHost: alpha.test:${alpha.port}\r\n\r\n`);
      clientB.write(`GET /b HTTP/1.1\r\nHost: beta.test:${beta.port}\r\n\r\n`);
      const [rawA, rawB] = await Promise.all([readAll(clientA), readAll(clientB)]);

      const a = splitResponse(rawA);
      const b = splitResponse(rawB);
      assert.ok(a.head.startsWith("HTTP/1.1 200 OK\r\n"));
      assert.ok(b.head.startsWith("HTTP/1.1 200 OK\r\n"));
      assert.ok(a.body === alphaBody, `alpha body has ${a.body.length} bytes`);
      assert.ok(b.body === betaBody, `beta body has ${b.body.length} bytes`);

      await waitFor(
        () => pair.ship.multiplexer.sessionCount === 0 && pair.offshore.demultiplexer.sessionCount === 0,
        2_000,
        "sessions to close",
      );
    } finally {
      clientA.destroy();
      clientB.destroy();
      await pair.stop();
      await alpha.close();
      await beta.close();
    }
  });

  it("forwards request bodies framed by Content-Length and chunked coding", async () => {
    const origin = await startOrigin((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => res.end(`${req.method} ${req.url} ${Buffer.concat(chunks).toString()}`));
    });
    const pair = await startProxyPair();
    const fixed = await connect(pair.ship.multiplexer.port);
    const chunked = await connect(pair.ship.multiplexer.port);

    try {
      fixed.write(
        `POST http://origin.test:${origin.port}/fixed HTTP/1.1\r\nHost: origin.test\r\nContent-Length: 11\r\n\r\nhello world`,
      );
      chunked.write(
        `PUT http://origin.test:${origin.port}/chunked HTTP/1.1\r\nHost: origin.test\r\n` +
          "Transfer-Encoding: chunked\r\n\r\n5\r\nhello\r\n6\r\n there\r\n0\r\n\r\n",
      );

      const [fixedRes, chunkedRes] = await Promise.all([readAll(fixed), readAll(chunked)]);
      assert.equal(splitResponse(fixedRes).body, "POST /fixed hello world");
      assert.equal(splitResponse(chunkedRes).body, "PUT /chunked hello there");
    } finally {
      fixed.destroy();
      chunked.destroy();
      await pair.stop();
      await origin.close();
    }
  });

  it("relays both directions once the target switches protocols", async () => {
    const origin = await startUpgradeOrigin();
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write(
        `GET http://upgrade.test:${origin.port}/ HTTP/1.1\r\nHost: upgrade.test:${origin.port}\r\n` +
          "Connection: Upgrade\r\nUpgrade: echo\r\n\r\n",
      );
      const switched = await readUntil(client, (buf) => buf.length >= SWITCHING_PROTOCOLS.length);
      assert.equal(switched.toString("latin1"), SWITCHING_PROTOCOLS);

      client.write("after-upgrade");
      const echoed = await readUntil(client, (buf) => buf.length >= "after-upgrade".length);
      assert.equal(echoed.toString(), "after-upgrade");

      const rest = readAll(client);
      client.end();
      assert.equal((await rest).length, 0);
      await waitFor(
        () => pair.ship.multiplexer.sessionCount === 0 && pair.offshore.demultiplexer.sessionCount === 0,
        2_000,
        "sessions to close",
      );
    } finally {
      client.destroy();
      await pair.stop();
      await origin.close();
    }
  });

  it("keeps other sessions flowing when one client aborts", async () => {
    const echo = await startEchoServer();
    const pair = await startProxyPair();
    const clientA = await connect(pair.ship.multiplexer.port);
    const clientB = await connect(pair.ship.multiplexer.port);

    try {
      for (const client of [clientA, clientB]) {
        client.write(`CONNECT 127.0.0.1:${echo.port} HTTP/1.1\r\n\r\n`);
        await readUntil(client, (buf) => buf.length >= ESTABLISHED.length);
      }
      await waitFor(() => pair.offshore.demultiplexer.sessionCount === 2, 2_000, "two offshore sessions");

      clientA.write("partial");
      clientA.destroy();
      await waitFor(
        () => pair.ship.multiplexer.sessionCount === 1 && pair.offshore.demultiplexer.sessionCount === 1,
        2_000,
        "client A's session to go away",
      );

      clientB.write("still-alive");
      const echoed = await readUntil(clientB, (buf) => buf.length >= "still-alive".length);
      assert.equal(echoed.toString(), "still-alive");
    } finally {
      clientA.destroy();
      clientB.destroy();
      await pair.stop();
      await echo.close();
    }
  });

  it("fails open tunnels when the Link is lost", async () => {
    const echo = await startEchoServer();
    const pair = await startProxyPair();
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write(`CONNECT 127.0.0.1:${echo.port} HTTP/1.1\r\n\r\n`);
      await readUntil(client, (buf) => buf.length >= ESTABLISHED.length);
      const session = pair.ship.multiplexer.getSession(1);
      assert.equal(session?.state, "ACTIVE");

      const rest = readAll(client);
      await pair.offshore.stop();
      assert.equal((await rest).length, 0);

      assert.equal(session?.state, "FAILED");
      assert.equal(session?.failure?.reason, "LinkLost");
      assert.equal(pair.ship.multiplexer.sessionCount, 0);
    } finally {
      client.destroy();
      await pair.stop();
      await echo.close();
    }
  });

  it("answers malformed and oversized request heads locally", async () => {
    const pair = await startProxyPair();
    const malformed = await connect(pair.ship.multiplexer.port);
    const oversized = await connect(pair.ship.multiplexer.port);

    try {
      malformed.write("GARBAGE\r\n\r\n");
      const badResponse = await readAll(malformed);
      assert.equal(badResponse.toString("utf8"), buildErrorResponse(400, "malformed request line").toString("utf8"));

      oversized.write(`GET http://origin.test/ HTTP/1.1\r\nX-Fill: ${"x".repeat(20_000)}`);
      const bigResponse = await readAll(oversized);
      assert.equal(bigResponse.toString("utf8"), buildErrorResponse(431, "request head too large").toString("utf8"));

      assert.equal(pair.ship.multiplexer.sessionCount, 0);
    } finally {
      malformed.destroy();
      oversized.destroy();
      await pair.stop();
    }
  });

  it("answers 408 when the request head does not arrive in time", async () => {
    const pair = await startProxyPair({ ship: { CLIENT_HEAD_TIMEOUT_MS: 50 } });
    const client = await connect(pair.ship.multiplexer.port);

    try {
      client.write("GET / HTTP/1.1\r\n");
      const response = await readAll(client);
      assert.equal(
        response.toString("utf8"),
        buildErrorResponse(408, "request head not received in time").toString("utf8"),
      );
    } finally {
      client.destroy();
      await pair.stop();
    }
  });

  it("answers 503 once the Link has given up", async () => {
    const port = await freePort();
    const ship = createShipProxy(
      makeShipTestConfig({ OFFSHORE_PORT: port, LINK_RECONNECT_MAX_ATTEMPTS: 1 }),
      silentLogger(),
    );
    await ship.start();
    await waitFor(() => ship.link.state === "GAVE_UP", 2_000, "link to give up");
    const client = await connect(ship.multiplexer.port);

    try {
      client.write("GET http://origin.test/ HTTP/1.1\r\nHost: origin.test\r\n\r\n");
      const response = await readAll(client);
      assert.equal(response.toString("utf8"), buildErrorResponse(503, "link to offshore is down").toString("utf8"));
    } finally {
      client.destroy();
      await ship.stop();
    }
  });
});
