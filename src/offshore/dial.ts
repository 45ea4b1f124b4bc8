import net from "node:net";

import { TargetDialError, classifySocketError } from "../errors.js";
import { formatOneLineError, tryGetErrorCode } from "../util/text.js";
import type { ResolvedTarget } from "./egressPolicy.js";

export type DialOptions = {
  connectTimeoutMs: number;
  signal?: AbortSignal;
};

function describe(target: ResolvedTarget): string {
  return target.family === 6 ? `[${target.address}]:${target.port}` : `${target.address}:${target.port}`;
}

/**
 * Connects to a resolved target. Rejects with `TargetDialError` carrying the mapped reason.
 */
export function dialTarget(target: ResolvedTarget, opts: DialOptions): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    if (opts.signal?.aborted) {
      reject(new TargetDialError("ClientAborted", "dial aborted"));
      return;
    }

    const socket = net.createConnection({
      host: target.address,
      port: target.port,
      family: target.family,
      allowHalfOpen: true,
    });

    const finish = () => {
      clearTimeout(timer);
      socket.off("error", onError);
      socket.off("connect", onConnect);
      opts.signal?.removeEventListener("abort", onAbort);
    };

    const onConnect = () => {
      finish();
      resolve(socket);
    };

    const onError = (err: Error) => {
      finish();
      socket.destroy();
      const detail = tryGetErrorCode(err) ?? formatOneLineError(err, 256);
      reject(new TargetDialError(classifySocketError(err), `connect to ${describe(target)} failed: ${detail}`));
    };

    const onAbort = () => {
      finish();
      socket.destroy();
      reject(new TargetDialError("ClientAborted", "dial aborted"));
    };

    const timer = setTimeout(() => {
      finish();
      socket.destroy();
      reject(new TargetDialError("Timeout", `connect to ${describe(target)} timed out after ${opts.connectTimeoutMs}ms`));
    }, opts.connectTimeoutMs);

    socket.once("connect", onConnect);
    socket.once("error", onError);
    opts.signal?.addEventListener("abort", onAbort, { once: true });
  });
}
