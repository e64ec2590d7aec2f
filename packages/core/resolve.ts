import { anchorKey, type AnchorDescriptor } from "../anchors/types";
import type { ExecRoute } from "../anchors/route";
import { consoleLogger, type LocatorLogger } from "./debug";
import { buildElementNotFoundError, LocatorError } from "./errors";
import type { LocatorTelemetry } from "./resolve-telemetry";
import {
  buildAttemptEvent,
  buildMissEvent,
  summarizeAttempt,
  type LocatorAttemptSummary
} from "./resolve-telemetry";
import type { StrategyRegistry } from "./strategies";
import {
  addFallback,
  compareByConfidenceDesc,
  createFallbackPlan,
  createResolutionResult,
  fallbackChain,
  isAcceptable,
  isHighConfidence,
  type Candidate,
  type FallbackPlan,
  type LocatorStrategy,
  type ResolutionResult
} from "./types";
import { describeAnchor } from "./utils/sanitize";

export interface ElementResolver {
  /** Walks the fallback chain and stops at the first strategy that returns candidates. */
  resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<ResolutionResult>;
  /** Queries every strategy, ignoring individual failures. Never rejects for a strategy error. */
  generateFallbackPlan(anchor: AnchorDescriptor, route: ExecRoute): Promise<FallbackPlan>;
  resolveWithStrategy(anchor: AnchorDescriptor, route: ExecRoute, strategy: LocatorStrategy): Promise<Candidate[]>;
}

export type ElementResolverOptions = {
  strategies: StrategyRegistry;
  logger?: LocatorLogger;
  telemetry?: LocatorTelemetry | null;
  sanitizeAnchors?: boolean;
};

/**
 * Picks the first candidate with the highest confidence, ignoring candidates
 * whose confidence is not a finite number. More than one high-confidence
 * candidate is reported as ambiguous but does not fail.
 */
export function selectBestCandidate(candidates: readonly Candidate[], logger?: LocatorLogger): Candidate {
  if (candidates.length === 0) {
    throw buildElementNotFoundError("No candidates provided");
  }

  const [first, ...rest] = candidates.filter((candidate) => Number.isFinite(candidate.confidence));

  if (!first) {
    throw buildElementNotFoundError("No candidate has a finite confidence");
  }

  const best = rest.reduce((current, candidate) => (candidate.confidence > current.confidence ? candidate : current), first);

  const highConfidenceCount = candidates.filter((candidate) => isHighConfidence(candidate)).length;
  if (highConfidenceCount > 1) {
    logger?.warn?.("Ambiguous match", {
      highConfidenceCount,
      elementId: best.elementId,
      confidence: best.confidence
    });
  }

  if (!isAcceptable(best)) {
    throw buildElementNotFoundError(`Best candidate has low confidence: ${best.confidence.toFixed(2)}`);
  }

  return best;
}

export class DefaultElementResolver implements ElementResolver {
  #strategies: StrategyRegistry;
  #logger: LocatorLogger;
  #telemetry: LocatorTelemetry | null;
  #sanitize: boolean;

  constructor(options: ElementResolverOptions) {
    this.#strategies = options.strategies;
    this.#logger = options.logger ?? consoleLogger;
    this.#telemetry = options.telemetry ?? null;
    this.#sanitize = options.sanitizeAnchors ?? false;
  }

  async resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<ResolutionResult> {
    const key = describeAnchor(anchor, this.#sanitize);
    const summaries: LocatorAttemptSummary[] = [];

    this.#logger.info?.("Resolving element", { anchor: key });

    for (const [index, type] of fallbackChain().entries()) {
      this.#logger.debug?.("Trying strategy", { anchor: key, strategy: type });

      let candidates: Candidate[];
      try {
        candidates = await this.#strategies.get(type).resolve(anchor, route);
      } catch (error) {
        this.#logger.warn?.("Strategy failed", {
          anchor: key,
          strategy: type,
          error: error instanceof Error ? error.message : String(error)
        });
        this.#recordAttempt(key, summaries, summarizeAttempt(type, index, 0, error));
        continue;
      }

      this.#recordAttempt(key, summaries, summarizeAttempt(type, index, candidates.length));

      if (candidates.length === 0) {
        this.#logger.debug?.("Strategy returned no candidates", { anchor: key, strategy: type });
        continue;
      }

      let best: Candidate;
      try {
        best = selectBestCandidate(candidates, this.#logger);
      } catch (error) {
        this.#telemetry?.logMiss(buildMissEvent(key, summaries));
        throw error;
      }

      this.#logger.info?.("Resolver success", {
        anchor: key,
        strategy: type,
        elementId: best.elementId,
        confidence: best.confidence
      });

      this.#telemetry?.logSuccess({
        anchorKey: key,
        attemptIndex: index,
        strategy: type,
        elementId: best.elementId,
        confidence: best.confidence,
        ambiguous: candidates.filter((candidate) => isHighConfidence(candidate)).length > 1
      });

      return createResolutionResult(best.elementId, type, best.confidence, best.anchor);
    }

    this.#logger.warn?.("Resolver miss", { anchor: key, strategiesTried: summaries.length });
    this.#telemetry?.logMiss(buildMissEvent(key, summaries));

    throw buildElementNotFoundError(`All strategies exhausted for anchor: ${anchorKey(anchor)}`);
  }

  async generateFallbackPlan(anchor: AnchorDescriptor, route: ExecRoute): Promise<FallbackPlan> {
    const plan = createFallbackPlan(anchor);

    for (const type of fallbackChain()) {
      try {
        const candidates = await this.#strategies.get(type).resolve(anchor, route);
        candidates.forEach((candidate) => addFallback(plan, candidate));
      } catch (error) {
        this.#logger.debug?.("Strategy failed during plan generation", {
          anchor: describeAnchor(anchor, this.#sanitize),
          strategy: type,
          error: error instanceof LocatorError ? error.detail : String(error)
        });
      }
    }

    // Array.prototype.sort is stable, so equal scores keep chain order.
    plan.fallbacks.sort(compareByConfidenceDesc);

    return plan;
  }

  async resolveWithStrategy(
    anchor: AnchorDescriptor,
    route: ExecRoute,
    strategy: LocatorStrategy
  ): Promise<Candidate[]> {
    return this.#strategies.get(strategy).resolve(anchor, route);
  }

  #recordAttempt(key: string, summaries: LocatorAttemptSummary[], summary: LocatorAttemptSummary): void {
    summaries.push(summary);
    this.#telemetry?.logAttempt(buildAttemptEvent(key, summary));
  }
}

export function createElementResolver(options: ElementResolverOptions): ElementResolver {
  return new DefaultElementResolver(options);
}
