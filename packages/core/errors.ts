import type { LocatorStrategy } from "./types";

export type LocatorErrorReason =
  | "element-not-found"
  | "ambiguous-match"
  | "invalid-anchor"
  | "heal-failed"
  | "cdp-error"
  | "timeout"
  | "strategy-failed"
  | "internal";

const REASON_LABELS: Readonly<Record<LocatorErrorReason, string>> = {
  "element-not-found": "Element not found",
  "ambiguous-match": "Ambiguous match",
  "invalid-anchor": "Invalid anchor",
  "heal-failed": "Heal failed",
  "cdp-error": "CDP error",
  timeout: "Timeout",
  "strategy-failed": "Strategy failed",
  internal: "Internal error"
};

const RETRYABLE_REASONS = new Set<LocatorErrorReason>(["cdp-error", "timeout", "strategy-failed"]);

export interface LocatorErrorPayload {
  reason: LocatorErrorReason;
  message: string;
  detail: string;
  strategy?: LocatorStrategy;
}

export class LocatorError extends Error {
  readonly reason: LocatorErrorReason;
  /** Raw reason text without the label prefix carried by `message`. */
  readonly detail: string;
  readonly strategy?: LocatorStrategy;

  constructor(reason: LocatorErrorReason, detail: string, options: { strategy?: LocatorStrategy; cause?: unknown } = {}) {
    super(formatMessage(reason, detail, options.strategy), { cause: options.cause });
    this.name = "LocatorError";
    this.reason = reason;
    this.detail = detail;
    this.strategy = options.strategy;
  }

  static fromUnknown(error: unknown, reason: LocatorErrorReason = "internal"): LocatorError {
    if (error instanceof LocatorError) {
      return error;
    }

    return new LocatorError(reason, error instanceof Error ? error.message : String(error), { cause: error });
  }

  isRetryable(): boolean {
    return RETRYABLE_REASONS.has(this.reason);
  }

  toPayload(): LocatorErrorPayload {
    return {
      reason: this.reason,
      message: this.message,
      detail: this.detail,
      strategy: this.strategy
    };
  }
}

function formatMessage(reason: LocatorErrorReason, detail: string, strategy?: LocatorStrategy): string {
  if (reason === "strategy-failed" && strategy) {
    return `Strategy ${strategy} failed: ${detail}`;
  }

  return `${REASON_LABELS[reason]}: ${detail}`;
}

export function buildElementNotFoundError(detail: string): LocatorError {
  return new LocatorError("element-not-found", detail);
}

export function buildInvalidAnchorError(detail: string): LocatorError {
  return new LocatorError("invalid-anchor", detail);
}

export function buildStrategyFailedError(strategy: LocatorStrategy, reason: string, cause?: unknown): LocatorError {
  return new LocatorError("strategy-failed", reason, { strategy, cause });
}

export function buildInternalError(detail: string): LocatorError {
  return new LocatorError("internal", detail);
}
