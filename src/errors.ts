import { tryGetErrorCode } from "./util/text.js";

// Wire codes carried in ERROR frames. `LinkLost` and `Shutdown` are applied locally to every
// session when the Link goes away; they have codes so logs and metrics stay uniform.
export const FAILURE_REASON_CODES = {
  DNSFailure: 1,
  ConnectionRefused: 2,
  Timeout: 3,
  ClientAborted: 4,
  TargetReset: 5,
  InvalidState: 6,
  TargetUnreachable: 7,
  PolicyDenied: 8,
  SessionLimit: 9,
  FlowControl: 10,
  LinkLost: 11,
  Shutdown: 12,
} as const;

export type FailureReason = keyof typeof FAILURE_REASON_CODES;

const REASONS_BY_CODE = new Map<number, FailureReason>();
for (const [reason, code] of Object.entries(FAILURE_REASON_CODES)) {
  if (isFailureReason(reason)) REASONS_BY_CODE.set(code, reason);
}

function isFailureReason(value: string): value is FailureReason {
  return Object.hasOwn(FAILURE_REASON_CODES, value);
}

export function failureReasonCode(reason: FailureReason): number {
  return FAILURE_REASON_CODES[reason];
}

export function failureReasonFromCode(code: number): FailureReason {
  return REASONS_BY_CODE.get(code) ?? "TargetReset";
}

export function isLinkFailure(reason: FailureReason): boolean {
  return reason === "LinkLost" || reason === "Shutdown";
}

/**
 * The byte stream on the Link can no longer be trusted. Always fatal to the Link.
 */
export class MalformedFrameError extends Error {
  override name = "MalformedFrameError";
}

export class InvalidStateError extends Error {
  override name = "InvalidStateError";
  readonly sessionId: number;
  readonly state: string;

  constructor(sessionId: number, state: string, action: string) {
    super(`session ${sessionId}: cannot ${action} in state ${state}`);
    this.sessionId = sessionId;
    this.state = state;
  }
}

export class TargetDialError extends Error {
  override name = "TargetDialError";
  readonly reason: FailureReason;

  constructor(reason: FailureReason, message: string) {
    super(message);
    this.reason = reason;
  }
}

export function classifySocketError(err: unknown): FailureReason {
  if (err instanceof TargetDialError) return err.reason;
  switch (tryGetErrorCode(err)) {
    case "ENOTFOUND":
    case "EAI_AGAIN":
    case "EAI_FAIL":
    case "EAI_NODATA":
    case "EAI_NONAME":
      return "DNSFailure";
    case "ECONNREFUSED":
      return "ConnectionRefused";
    case "ETIMEDOUT":
      return "Timeout";
    case "EHOSTUNREACH":
    case "ENETUNREACH":
    case "EADDRNOTAVAIL":
      return "TargetUnreachable";
    default:
      return "TargetReset";
  }
}
