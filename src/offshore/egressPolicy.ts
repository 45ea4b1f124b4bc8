import type { LookupAddress } from "node:dns";
import dns from "node:dns/promises";
import net from "node:net";

import ipaddr from "ipaddr.js";

import { TargetDialError } from "../errors.js";
import { splitCommaSeparatedList } from "../util/csv.js";
import { formatOneLineError, tryGetErrorCode } from "../util/text.js";

export type LookupFn = (hostname: string) => Promise<LookupAddress[]>;

export const systemLookup: LookupFn = (hostname) => dns.lookup(hostname, { all: true, verbatim: true });

export type EgressPolicy = {
  allowPrivateTargets: boolean;
  // Empty means every port.
  allowedPorts: ReadonlySet<number>;
};

export type ResolvedTarget = {
  host: string;
  port: number;
  address: string;
  family: 4 | 6;
};

export type ResolveTargetOptions = {
  lookup: LookupFn;
  dnsTimeoutMs: number;
  policy: EgressPolicy;
};

export function parseAllowedPorts(raw: string): Set<number> {
  const ports = new Set<number>();
  for (const entry of splitCommaSeparatedList(raw, { maxItems: 65535 })) {
    const port = Number(entry);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new Error(`Invalid port: ${entry}`);
    }
    ports.add(port);
  }
  return ports;
}

function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.+$/, "");
}

/**
 * True for globally routable unicast addresses. IPv4-mapped IPv6 addresses are judged by the
 * IPv4 address they carry.
 */
export function isPublicUnicast(address: string): boolean {
  if (!ipaddr.isValid(address)) return false;
  let parsed: ipaddr.IPv4 | ipaddr.IPv6 = ipaddr.parse(address);
  if (parsed instanceof ipaddr.IPv6 && parsed.isIPv4MappedAddress()) {
    parsed = parsed.toIPv4Address();
  }
  return parsed.range() === "unicast";
}

async function lookupWithTimeout(lookup: LookupFn, hostname: string, timeoutMs: number): Promise<LookupAddress[]> {
  let handle: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    handle = setTimeout(() => {
      reject(new TargetDialError("DNSFailure", `DNS lookup timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([lookup(hostname), timeout]);
  } catch (err) {
    if (err instanceof TargetDialError) throw err;
    const code = tryGetErrorCode(err);
    throw new TargetDialError("DNSFailure", `DNS lookup failed for ${hostname}: ${code ?? formatOneLineError(err, 256)}`);
  } finally {
    clearTimeout(handle);
  }
}

function asFamily(family: number): 4 | 6 {
  return family === 6 ? 6 : 4;
}

/**
 * Resolves a target and applies the egress policy. Throws `TargetDialError` with `DNSFailure` or
 * `PolicyDenied`.
 */
export async function resolveTarget(host: string, port: number, opts: ResolveTargetOptions): Promise<ResolvedTarget> {
  const { policy } = opts;
  if (policy.allowedPorts.size > 0 && !policy.allowedPorts.has(port)) {
    throw new TargetDialError("PolicyDenied", `port ${port} is not allowed`);
  }

  const requestedHost = normalizeHostname(host);
  const ipKind = net.isIP(requestedHost);
  const resolved: LookupAddress[] =
    ipKind !== 0
      ? [{ address: requestedHost, family: ipKind }]
      : await lookupWithTimeout(opts.lookup, requestedHost, opts.dnsTimeoutMs);
  if (resolved.length === 0) {
    throw new TargetDialError("DNSFailure", `DNS lookup returned no addresses for ${requestedHost}`);
  }

  if (!policy.allowPrivateTargets) {
    // Every resolved address must be public, not just the one dialled.
    const denied = resolved.find((r) => !isPublicUnicast(r.address));
    if (denied) {
      throw new TargetDialError("PolicyDenied", `target ${requestedHost} resolves to non-public address ${denied.address}`);
    }
  }

  const first = resolved[0];
  if (!first) throw new TargetDialError("DNSFailure", `DNS lookup returned no addresses for ${requestedHost}`);
  return { host: requestedHost, port, address: first.address, family: asFamily(first.family) };
}
