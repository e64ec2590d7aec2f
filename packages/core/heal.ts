import { anchorKey, type AnchorDescriptor } from "../anchors/types";
import { consoleLogger, type LocatorLogger } from "./debug";
import { LocatorError } from "./errors";
import type { ElementResolver } from "./resolve";
import type { LocatorTelemetry } from "./resolve-telemetry";
import { compareByConfidenceDesc, type HealOutcome, type HealRequest } from "./types";
import { describeAnchor } from "./utils/sanitize";

export interface SelfHealer {
  /**
   * Searches for a replacement anchor. Policy rejections resolve to a
   * `skipped` outcome; only plan-generation failures reject.
   */
  heal(request: HealRequest): Promise<HealOutcome>;
  isHealAvailable(anchor: AnchorDescriptor): boolean;
  /** Consumes the anchor's heal. Irreversible until `reset()`. */
  markHealed(anchor: AnchorDescriptor): void;
  reset(): void;
}

export type SelfHealerOptions = {
  resolver: ElementResolver;
  logger?: LocatorLogger;
  telemetry?: LocatorTelemetry | null;
  sanitizeAnchors?: boolean;
};

/**
 * One heal per anchor, keyed by the anchor's canonical string. Both sets are
 * only touched synchronously, so the availability check and the reservation
 * never straddle an await.
 */
export class DefaultSelfHealer implements SelfHealer {
  #resolver: ElementResolver;
  #logger: LocatorLogger;
  #telemetry: LocatorTelemetry | null;
  #sanitize: boolean;
  #healed = new Set<string>();
  #inFlight = new Set<string>();

  constructor(options: SelfHealerOptions) {
    this.#resolver = options.resolver;
    this.#logger = options.logger ?? consoleLogger;
    this.#telemetry = options.telemetry ?? null;
    this.#sanitize = options.sanitizeAnchors ?? false;
  }

  async heal(request: HealRequest): Promise<HealOutcome> {
    const key = describeAnchor(request.originalAnchor, this.#sanitize);

    this.#logger.info?.("Attempting self-heal", { anchor: key });

    const rejection = this.validateRequest(request);
    if (rejection) {
      this.#logger.warn?.("Heal validation failed", { anchor: key, reason: rejection });
      return this.#finish(key, { status: "skipped", reason: rejection }, 0);
    }

    // Reserved before the first await; overlapping requests for the anchor are skipped.
    const reservation = anchorKey(request.originalAnchor);
    this.#inFlight.add(reservation);
    try {
      return await this.#attempt(request, key);
    } finally {
      this.#inFlight.delete(reservation);
    }
  }

  async #attempt(request: HealRequest, key: string): Promise<HealOutcome> {
    this.#logger.debug?.("Generating fallback plan", { anchor: key });
    const plan = await this.#resolver.generateFallbackPlan(request.originalAnchor, request.route);

    // From here on the attempt counts against the anchor whatever its outcome.
    if (!plan.hasFallbacks) {
      this.#logger.warn?.("No fallback candidates found", { anchor: key });
      this.markHealed(request.originalAnchor);
      return this.#finish(key, { status: "exhausted", candidates: [] }, 0);
    }

    const acceptable = plan.fallbacks
      .filter((candidate) => candidate.confidence >= request.minConfidence)
      .sort(compareByConfidenceDesc)
      .slice(0, request.maxCandidates);

    if (acceptable.length === 0) {
      this.#logger.warn?.("No candidates meet confidence threshold", {
        anchor: key,
        minConfidence: request.minConfidence,
        planned: plan.fallbacks.length
      });
      this.markHealed(request.originalAnchor);
      return this.#finish(key, { status: "exhausted", candidates: [] }, 0);
    }

    for (const [index, candidate] of acceptable.entries()) {
      this.#logger.debug?.("Trying heal candidate", {
        anchor: key,
        elementId: candidate.elementId,
        confidence: candidate.confidence,
        strategy: candidate.strategy
      });

      try {
        const result = await this.#resolver.resolve(candidate.anchor, request.route);

        this.markHealed(request.originalAnchor);

        this.#logger.info?.("Heal successful", {
          anchor: key,
          usedAnchor: describeAnchor(candidate.anchor, this.#sanitize),
          strategy: result.strategy,
          confidence: result.confidence
        });

        return this.#finish(
          key,
          {
            status: "healed",
            usedAnchor: candidate.anchor,
            confidence: result.confidence,
            strategy: result.strategy
          },
          index + 1
        );
      } catch (error) {
        this.#logger.debug?.("Heal candidate failed", {
          anchor: key,
          elementId: candidate.elementId,
          error: error instanceof LocatorError ? error.detail : String(error)
        });
      }
    }

    this.#logger.warn?.("Heal candidates exhausted", { anchor: key, tried: acceptable.length });
    this.markHealed(request.originalAnchor);
    return this.#finish(key, { status: "exhausted", candidates: acceptable }, acceptable.length);
  }

  /** Returns the rejection reason, or `null` when the request may proceed. */
  validateRequest(request: HealRequest): string | null {
    if (!this.isHealAvailable(request.originalAnchor)) {
      return "Heal already used for this anchor";
    }

    const { minConfidence, maxCandidates } = request;
    if (!(minConfidence >= 0 && minConfidence <= 1)) {
      return `Invalid confidence threshold: ${minConfidence}`;
    }

    if (maxCandidates === 0) {
      return "max_candidates must be > 0";
    }

    if (!Number.isInteger(maxCandidates) || maxCandidates < 0) {
      return "maxCandidates must be a positive integer";
    }

    return null;
  }

  /** False once the anchor has consumed its heal or while a heal for it is running. */
  isHealAvailable(anchor: AnchorDescriptor): boolean {
    const key = anchorKey(anchor);
    return !this.#healed.has(key) && !this.#inFlight.has(key);
  }

  markHealed(anchor: AnchorDescriptor): void {
    this.#healed.add(anchorKey(anchor));
  }

  reset(): void {
    this.#healed.clear();
  }

  healedCount(): number {
    return this.#healed.size;
  }

  #finish(key: string, outcome: HealOutcome, candidatesTried: number): HealOutcome {
    this.#telemetry?.logHeal({
      anchorKey: key,
      status: outcome.status,
      usedAnchorKey: outcome.status === "healed" ? describeAnchor(outcome.usedAnchor, this.#sanitize) : undefined,
      strategy: outcome.status === "healed" ? outcome.strategy : undefined,
      confidence: outcome.status === "healed" ? outcome.confidence : undefined,
      candidatesTried,
      reason: outcome.status === "skipped" || outcome.status === "aborted" ? outcome.reason : undefined
    });

    return outcome;
  }
}

export function createSelfHealer(options: SelfHealerOptions): SelfHealer {
  return new DefaultSelfHealer(options);
}
