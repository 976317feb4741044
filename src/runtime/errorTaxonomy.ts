import type { KeyguardState } from "../keyguard/types";

export type KeyguardErrorDomain = "transition" | "config" | "system";

export type KeyguardErrorCode =
  | "TRANSITION_STALE_ORIGIN"
  | "TRANSITION_INVALID_REQUEST"
  | "TRANSITION_INVALID_VALUE"
  | "CONFIG_INVALID"
  | "UNKNOWN";

export type KeyguardErrorDetails = Record<string, unknown>;

export class KeyguardError extends Error {
  domain: KeyguardErrorDomain;
  code: KeyguardErrorCode;
  retryable: boolean;
  details?: KeyguardErrorDetails;
  cause?: unknown;

  constructor(params: {
    message: string;
    domain: KeyguardErrorDomain;
    code: KeyguardErrorCode;
    retryable?: boolean;
    details?: KeyguardErrorDetails;
    cause?: unknown;
  }) {
    super(params.message);
    this.name = "KeyguardError";
    this.domain = params.domain;
    this.code = params.code;
    this.retryable = Boolean(params.retryable);
    this.details = params.details;
    this.cause = params.cause;
  }
}

/**
 * A transition was requested from a state the repository is not in.
 * Two producers disagreed about the current state; this is a logic bug and is
 * never corrected or retried.
 */
export class StaleOriginError extends KeyguardError {
  readonly requestedFrom: KeyguardState;
  readonly requestedTo: KeyguardState;
  readonly confirmedState: KeyguardState;
  readonly inFlightTo: KeyguardState | null;
  readonly ownerName: string;

  constructor(params: {
    ownerName: string;
    requestedFrom: KeyguardState;
    requestedTo: KeyguardState;
    confirmedState: KeyguardState;
    inFlightTo: KeyguardState | null;
  }) {
    const expected = params.inFlightTo
      ? `${params.confirmedState} or ${params.inFlightTo}`
      : params.confirmedState;
    super({
      message: `${params.ownerName} requested ${params.requestedFrom} → ${params.requestedTo} but the keyguard is in ${expected}`,
      domain: "transition",
      code: "TRANSITION_STALE_ORIGIN",
      retryable: false,
      details: { ...params },
    });
    this.name = "StaleOriginError";
    this.requestedFrom = params.requestedFrom;
    this.requestedTo = params.requestedTo;
    this.confirmedState = params.confirmedState;
    this.inFlightTo = params.inFlightTo;
    this.ownerName = params.ownerName;
  }
}

export function isKeyguardError(err: unknown): err is KeyguardError {
  return err instanceof KeyguardError;
}

export function isStaleOriginError(err: unknown): err is StaleOriginError {
  return err instanceof StaleOriginError;
}

function inferCode(domain: KeyguardErrorDomain, message: string): KeyguardErrorCode {
  const msg = String(message || "").toLowerCase();
  if (domain === "transition") {
    if (/stale|origin/.test(msg)) return "TRANSITION_STALE_ORIGIN";
    if (/value|range|progress/.test(msg)) return "TRANSITION_INVALID_VALUE";
    return "TRANSITION_INVALID_REQUEST";
  }
  if (domain === "config") return "CONFIG_INVALID";
  return "UNKNOWN";
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return "";
}

export function normalizeError(err: unknown, fallback: {
  domain?: KeyguardErrorDomain;
  code?: KeyguardErrorCode;
  message?: string;
  retryable?: boolean;
  details?: KeyguardErrorDetails;
} = {}) {
  if (isKeyguardError(err)) return err;

  const rawMessage = messageOf(err) || fallback.message || "Unknown error";
  const domain = fallback.domain || "system";
  const code = fallback.code || inferCode(domain, rawMessage);

  return new KeyguardError({
    message: rawMessage,
    domain,
    code,
    retryable: Boolean(fallback.retryable),
    details: fallback.details,
    cause: err,
  });
}

export function formatKeyguardError(err: unknown) {
  const kx = normalizeError(err);
  return `${kx.code}: ${kx.message}`;
}

export function transitionError(err: unknown, details?: KeyguardErrorDetails, code?: KeyguardErrorCode) {
  return normalizeError(err, { domain: "transition", code, details });
}

export function configError(err: unknown, details?: KeyguardErrorDetails) {
  return normalizeError(err, { domain: "config", details });
}
