import { consoleLogger, type LocatorLogger } from "./debug";
import type { HealOutcomeStatus, LocatorStrategy } from "./types";

export type LocatorTelemetrySource = "resolver" | "healer" | "action-bridge" | string;

export type LocatorAttemptEvent = {
  anchorKey: string;
  attemptIndex: number;
  strategy: LocatorStrategy;
  candidateCount: number;
  success: boolean;
  error?: string;
  source?: LocatorTelemetrySource;
};

export type LocatorSuccessEvent = {
  anchorKey: string;
  attemptIndex: number;
  strategy: LocatorStrategy;
  elementId: string;
  confidence: number;
  ambiguous: boolean;
  source?: LocatorTelemetrySource;
};

export type LocatorMissEvent = {
  anchorKey: string;
  attemptCount: number;
  attempts: ReadonlyArray<LocatorAttemptSummary>;
  source?: LocatorTelemetrySource;
};

export type LocatorHealEvent = {
  anchorKey: string;
  status: HealOutcomeStatus;
  usedAnchorKey?: string;
  strategy?: LocatorStrategy;
  confidence?: number;
  candidatesTried: number;
  reason?: string;
  source?: LocatorTelemetrySource;
};

export type LocatorAttemptSummary = {
  attemptIndex: number;
  strategy: LocatorStrategy;
  candidateCount: number;
  success: boolean;
  error?: string;
};

export type LocatorTelemetryCallbacks = {
  onAttempt?: (event: LocatorAttemptEvent) => void;
  onSuccess?: (event: LocatorSuccessEvent) => void;
  onMiss?: (event: LocatorMissEvent) => void;
  onHeal?: (event: LocatorHealEvent) => void;
};

export interface LocatorTelemetry {
  logAttempt(event: LocatorAttemptEvent): void;
  logSuccess(event: LocatorSuccessEvent): void;
  logMiss(event: LocatorMissEvent): void;
  logHeal(event: LocatorHealEvent): void;
}

export type LocatorTelemetryOptions = {
  source?: LocatorTelemetrySource;
  callbacks?: LocatorTelemetryCallbacks;
  logger?: LocatorLogger;
};

const DEFAULT_SOURCE: LocatorTelemetrySource = "resolver";

export function summarizeAttempt(
  strategy: LocatorStrategy,
  index: number,
  candidateCount: number,
  error?: unknown
): LocatorAttemptSummary {
  return {
    attemptIndex: index,
    strategy,
    candidateCount,
    success: candidateCount > 0,
    error: typeof error === "undefined" ? undefined : error instanceof Error ? error.message : String(error)
  };
}

function healLevel(status: HealOutcomeStatus): "info" | "warn" {
  return status === "healed" ? "info" : "warn";
}

export function createLocatorTelemetry(options: LocatorTelemetryOptions = {}): LocatorTelemetry {
  const source = options.source ?? DEFAULT_SOURCE;
  const logger = options.logger ?? consoleLogger;

  return {
    logAttempt(event) {
      const payload = { ...event, source };
      logger.debug?.("Locator attempt", payload);
      options.callbacks?.onAttempt?.(payload);
    },
    logSuccess(event) {
      const payload = { ...event, source };
      logger.info?.("Locator success", payload);
      options.callbacks?.onSuccess?.(payload);
    },
    logMiss(event) {
      const payload = { ...event, source };
      logger.warn?.("Locator miss", {
        ...payload,
        strategies: event.attempts.map((attempt) => attempt.strategy).join(" → ")
      });
      options.callbacks?.onMiss?.(payload);
    },
    logHeal(event) {
      const payload = { ...event, source };
      logger[healLevel(event.status)]?.("Locator heal", payload);
      options.callbacks?.onHeal?.(payload);
    }
  };
}

export function buildAttemptEvent(anchorKey: string, summary: LocatorAttemptSummary): LocatorAttemptEvent {
  return {
    anchorKey,
    attemptIndex: summary.attemptIndex,
    strategy: summary.strategy,
    candidateCount: summary.candidateCount,
    success: summary.success,
    error: summary.error
  };
}

export function buildMissEvent(anchorKey: string, summaries: LocatorAttemptSummary[]): LocatorMissEvent {
  return {
    anchorKey,
    attemptCount: summaries.length,
    attempts: summaries
  };
}
