import { z } from "zod";

import type { LogLevel } from "./logger.js";
import { MIN_HIGH_WATER_MARK_BYTES } from "./link/linkSupervisor.js";
import { parseAllowedPorts } from "./offshore/egressPolicy.js";
import { DEFAULT_MAX_FRAME_PAYLOAD_BYTES } from "./protocol/frame.js";

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LogLevel[];

type Env = Record<string, string | undefined>;

const port = () => z.coerce.number().int().min(1).max(65535);
const positiveMs = () => z.coerce.number().int().min(1).max(2_147_483_647);

const sharedSchema = z.object({
  LOG_LEVEL: z.enum(logLevels).default("info"),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5_000),

  MAX_FRAME_PAYLOAD_BYTES: z.coerce
    .number()
    .int()
    .min(1024)
    .max(16 * 1024 * 1024)
    .default(DEFAULT_MAX_FRAME_PAYLOAD_BYTES),
  FRAME_STALL_TIMEOUT_MS: positiveMs().default(30_000),
  SESSION_WINDOW_BYTES: z.coerce.number().int().min(1024).max(0xffffffff).default(256 * 1024),
  MAX_SESSIONS: z.coerce.number().int().min(1).default(1024),
  LINK_HIGH_WATER_MARK_BYTES: z.coerce.number().int().min(MIN_HIGH_WATER_MARK_BYTES).default(1024 * 1024),
  LINK_IDLE_TIMEOUT_MS: positiveMs().default(45_000),

  ADMIN_HOST: z.string().min(1).default("127.0.0.1"),
  // Empty or unset disables the admin server.
  ADMIN_PORT: z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()))
    .pipe(z.coerce.number().int().min(0).max(65535).optional()),
});

const shipSchema = sharedSchema.extend({
  SHIP_LISTEN_HOST: z.string().min(1).default("0.0.0.0"),
  SHIP_LISTEN_PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  OFFSHORE_HOST: z.string().min(1).default("127.0.0.1"),
  OFFSHORE_PORT: port().default(9000),
  LINK_CONNECT_TIMEOUT_MS: positiveMs().default(10_000),
  LINK_PING_INTERVAL_MS: positiveMs().default(15_000),
  LINK_RECONNECT_BASE_DELAY_MS: positiveMs().default(250),
  LINK_RECONNECT_MAX_DELAY_MS: positiveMs().default(10_000),
  LINK_RECONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(10),
  MAX_REQUEST_HEAD_BYTES: z.coerce.number().int().min(1024).max(1024 * 1024).default(64 * 1024),
  CLIENT_HEAD_TIMEOUT_MS: positiveMs().default(30_000),
  SESSION_OPEN_TIMEOUT_MS: positiveMs().default(30_000),
});

const offshoreSchema = sharedSchema.extend({
  OFFSHORE_LISTEN_HOST: z.string().min(1).default("0.0.0.0"),
  OFFSHORE_LISTEN_PORT: z.coerce.number().int().min(0).max(65535).default(9000),
  TARGET_CONNECT_TIMEOUT_MS: positiveMs().default(10_000),
  DNS_TIMEOUT_MS: positiveMs().default(5_000),
  TARGET_IDLE_TIMEOUT_MS: positiveMs().default(300_000),
  OFFSHORE_ALLOW_PRIVATE_TARGETS: z.enum(["0", "1"]).optional().default("1"),
  OFFSHORE_ALLOWED_PORTS: z.string().optional().default(""),
});

export type SharedConfig = Readonly<{
  LOG_LEVEL: LogLevel;
  SHUTDOWN_GRACE_MS: number;
  MAX_FRAME_PAYLOAD_BYTES: number;
  FRAME_STALL_TIMEOUT_MS: number;
  SESSION_WINDOW_BYTES: number;
  MAX_SESSIONS: number;
  LINK_HIGH_WATER_MARK_BYTES: number;
  LINK_IDLE_TIMEOUT_MS: number;
  ADMIN_HOST: string;
  ADMIN_PORT?: number | undefined;
}>;

export type ShipConfig = SharedConfig &
  Readonly<{
    SHIP_LISTEN_HOST: string;
    SHIP_LISTEN_PORT: number;
    OFFSHORE_HOST: string;
    OFFSHORE_PORT: number;
    LINK_CONNECT_TIMEOUT_MS: number;
    LINK_PING_INTERVAL_MS: number;
    LINK_RECONNECT_BASE_DELAY_MS: number;
    LINK_RECONNECT_MAX_DELAY_MS: number;
    LINK_RECONNECT_MAX_ATTEMPTS: number;
    MAX_REQUEST_HEAD_BYTES: number;
    CLIENT_HEAD_TIMEOUT_MS: number;
    SESSION_OPEN_TIMEOUT_MS: number;
  }>;

export type OffshoreConfig = SharedConfig &
  Readonly<{
    OFFSHORE_LISTEN_HOST: string;
    OFFSHORE_LISTEN_PORT: number;
    TARGET_CONNECT_TIMEOUT_MS: number;
    DNS_TIMEOUT_MS: number;
    TARGET_IDLE_TIMEOUT_MS: number;
    OFFSHORE_ALLOW_PRIVATE_TARGETS: boolean;
    OFFSHORE_ALLOWED_PORTS: ReadonlySet<number>;
  }>;

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }
  return parsed.data;
}

export function loadShipConfig(env: Env = process.env): ShipConfig {
  const raw = parseEnv(shipSchema, env);
  if (raw.LINK_RECONNECT_MAX_DELAY_MS < raw.LINK_RECONNECT_BASE_DELAY_MS) {
    throw new Error("Invalid configuration:\nLINK_RECONNECT_MAX_DELAY_MS must not be below LINK_RECONNECT_BASE_DELAY_MS");
  }
  // Heartbeats are what keep an otherwise quiet Link from tripping its idle timeout.
  if (raw.LINK_PING_INTERVAL_MS >= raw.LINK_IDLE_TIMEOUT_MS) {
    throw new Error("Invalid configuration:\nLINK_PING_INTERVAL_MS must be below LINK_IDLE_TIMEOUT_MS");
  }
  return raw;
}

export function loadOffshoreConfig(env: Env = process.env): OffshoreConfig {
  const raw = parseEnv(offshoreSchema, env);

  let allowedPorts: Set<number>;
  try {
    allowedPorts = parseAllowedPorts(raw.OFFSHORE_ALLOWED_PORTS);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration:\nOFFSHORE_ALLOWED_PORTS: ${message}`);
  }

  return {
    ...raw,
    OFFSHORE_ALLOW_PRIVATE_TARGETS: raw.OFFSHORE_ALLOW_PRIVATE_TARGETS === "1",
    OFFSHORE_ALLOWED_PORTS: allowedPorts,
  };
}
