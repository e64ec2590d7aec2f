import { LocatorError } from "../../../core/errors";

export type ActionErrorReason =
  | "nav-timeout"
  | "wait-timeout"
  | "interrupted"
  | "not-clickable"
  | "not-enabled"
  | "option-not-found"
  | "anchor-not-found"
  | "scroll-target-invalid"
  | "stale-route"
  | "cdp-io"
  | "policy-denied"
  | "internal";

const REASON_LABELS: Readonly<Record<ActionErrorReason, string>> = {
  "nav-timeout": "Navigation timeout",
  "wait-timeout": "Wait timeout",
  interrupted: "Operation interrupted",
  "not-clickable": "Element not clickable",
  "not-enabled": "Element not enabled",
  "option-not-found": "Option not found in dropdown",
  "anchor-not-found": "Anchor not found",
  "scroll-target-invalid": "Scroll target invalid",
  "stale-route": "Stale route",
  "cdp-io": "CDP I/O error",
  "policy-denied": "Policy denied",
  internal: "Internal error"
};

const RETRYABLE_REASONS = new Set<ActionErrorReason>(["wait-timeout", "not-clickable", "cdp-io"]);

export type ActionErrorSeverity = 0 | 1 | 2 | 3;

export interface ActionErrorPayload {
  reason: ActionErrorReason;
  message: string;
  detail: string;
  actionId?: string;
  severity: ActionErrorSeverity;
}

export class ActionError extends Error {
  readonly reason: ActionErrorReason;
  readonly detail: string;
  readonly actionId?: string;

  constructor(reason: ActionErrorReason, detail: string, options: { actionId?: string; cause?: unknown } = {}) {
    super(`${REASON_LABELS[reason]}: ${detail}`, { cause: options.cause });
    this.name = "ActionError";
    this.reason = reason;
    this.detail = detail;
    this.actionId = options.actionId;
  }

  static fromUnknown(error: unknown, reason: ActionErrorReason = "internal"): ActionError {
    if (error instanceof ActionError) {
      return error;
    }

    if (error instanceof LocatorError) {
      return mapLocatorError(error);
    }

    return new ActionError(reason, error instanceof Error ? error.message : String(error), { cause: error });
  }

  isRetryable(): boolean {
    return RETRYABLE_REASONS.has(this.reason);
  }

  severity(): ActionErrorSeverity {
    switch (this.reason) {
      case "internal":
      case "stale-route":
        return 3;
      case "nav-timeout":
      case "policy-denied":
      case "cdp-io":
        return 2;
      case "wait-timeout":
      case "anchor-not-found":
      case "not-enabled":
        return 1;
      default:
        return 0;
    }
  }

  toPayload(): ActionErrorPayload {
    return {
      reason: this.reason,
      message: this.message,
      detail: this.detail,
      actionId: this.actionId,
      severity: this.severity()
    };
  }
}

export function mapLocatorError(error: LocatorError): ActionError {
  switch (error.reason) {
    case "element-not-found":
    case "ambiguous-match":
    case "invalid-anchor":
    case "heal-failed":
      return new ActionError("anchor-not-found", error.detail, { cause: error });
    case "cdp-error":
      return new ActionError("cdp-io", error.detail, { cause: error });
    case "timeout":
      return new ActionError("wait-timeout", error.detail, { cause: error });
    case "strategy-failed":
    case "internal":
      return new ActionError("internal", error.detail, { cause: error });
  }
}

export function buildAnchorNotFoundError(detail: string): ActionError {
  return new ActionError("anchor-not-found", detail);
}

export function buildInterruptedError(actionId: string): ActionError {
  return new ActionError("interrupted", `Action '${actionId}' cancelled before anchor resolution`, { actionId });
}
