import type { AnchorDescriptor } from "../anchors/types";
import type { ExecRoute } from "../anchors/route";
import {
  ACCEPTABLE_CONFIDENCE_THRESHOLD,
  DEFAULT_LOCATOR_CONFIG,
  HIGH_CONFIDENCE_THRESHOLD
} from "./config";

const FALLBACK_CHAIN = Object.freeze(["css", "aria-ax", "text"] as const);

export type LocatorStrategy = typeof FALLBACK_CHAIN[number];

/**
 * Fixed try-order: css is fast and precise, text is the weakest and most
 * ambiguous. Not configurable per call.
 */
export function fallbackChain(): readonly LocatorStrategy[] {
  return FALLBACK_CHAIN;
}

export function isLocatorStrategy(value: unknown): value is LocatorStrategy {
  return FALLBACK_CHAIN.some((strategy) => strategy === value);
}

export function strategyName(strategy: LocatorStrategy): string {
  return strategy;
}

export interface CandidateMetadata {
  tagName?: string;
  visibleText?: string;
  ariaRole?: string;
  ariaLabel?: string;
  /** Position in document order, used when two candidates look alike. */
  domIndex?: number;
  isVisible: boolean;
  isEnabled: boolean;
}

export interface Candidate {
  elementId: string;
  strategy: LocatorStrategy;
  /** Match quality in [0, 1]. */
  confidence: number;
  anchor: AnchorDescriptor;
  metadata: CandidateMetadata;
}

export function createCandidate(
  elementId: string,
  strategy: LocatorStrategy,
  confidence: number,
  anchor: AnchorDescriptor,
  metadata: Partial<CandidateMetadata> = {}
): Candidate {
  return {
    elementId,
    strategy,
    confidence,
    anchor,
    metadata: {
      isVisible: false,
      isEnabled: false,
      ...metadata
    }
  };
}

export function isHighConfidence(candidate: Pick<Candidate, "confidence">): boolean {
  return candidate.confidence >= HIGH_CONFIDENCE_THRESHOLD;
}

export function isAcceptable(candidate: Pick<Candidate, "confidence">): boolean {
  return candidate.confidence >= ACCEPTABLE_CONFIDENCE_THRESHOLD;
}

export function compareByConfidenceDesc(left: Candidate, right: Candidate): number {
  return right.confidence - left.confidence;
}

export interface FallbackPlan {
  primary: AnchorDescriptor;
  /** Sorted non-increasing by confidence. */
  fallbacks: Candidate[];
  hasFallbacks: boolean;
}

export function createFallbackPlan(primary: AnchorDescriptor): FallbackPlan {
  return {
    primary,
    fallbacks: [],
    hasFallbacks: false
  };
}

export function addFallback(plan: FallbackPlan, candidate: Candidate): void {
  plan.fallbacks.push(candidate);
  plan.hasFallbacks = true;
}

export function bestFallback(plan: FallbackPlan): Candidate | undefined {
  return plan.fallbacks.reduce<Candidate | undefined>(
    (best, candidate) => (!best || candidate.confidence > best.confidence ? candidate : best),
    undefined
  );
}

export function acceptableFallbacks(plan: FallbackPlan): Candidate[] {
  return plan.fallbacks.filter((candidate) => isAcceptable(candidate));
}

export interface ResolutionResult {
  elementId: string;
  strategy: LocatorStrategy;
  confidence: number;
  fromHeal: boolean;
  anchor: AnchorDescriptor;
}

export function createResolutionResult(
  elementId: string,
  strategy: LocatorStrategy,
  confidence: number,
  anchor: AnchorDescriptor
): ResolutionResult {
  return {
    elementId,
    strategy,
    confidence,
    fromHeal: false,
    anchor
  };
}

export function markFromHeal(result: ResolutionResult): ResolutionResult {
  return { ...result, fromHeal: true };
}

export interface HealRequest {
  originalAnchor: AnchorDescriptor;
  route: ExecRoute;
  maxCandidates: number;
  minConfidence: number;
}

export interface HealRequestOptions {
  maxCandidates?: number;
  minConfidence?: number;
}

export function createHealRequest(
  originalAnchor: AnchorDescriptor,
  route: ExecRoute,
  options: HealRequestOptions = {}
): HealRequest {
  return {
    originalAnchor,
    route,
    maxCandidates: options.maxCandidates ?? DEFAULT_LOCATOR_CONFIG.healMaxCandidates,
    minConfidence: options.minConfidence ?? DEFAULT_LOCATOR_CONFIG.healMinConfidence
  };
}

export type HealOutcome =
  | { status: "healed"; usedAnchor: AnchorDescriptor; confidence: number; strategy: LocatorStrategy }
  | { status: "skipped"; reason: string }
  | { status: "exhausted"; candidates: Candidate[] }
  | { status: "aborted"; reason: string };

export type HealOutcomeStatus = HealOutcome["status"];

export function isHealSuccess(
  outcome: HealOutcome
): outcome is Extract<HealOutcome, { status: "healed" }> {
  return outcome.status === "healed";
}

export function healedAnchor(outcome: HealOutcome): AnchorDescriptor | undefined {
  return isHealSuccess(outcome) ? outcome.usedAnchor : undefined;
}

export function healConfidence(outcome: HealOutcome): number | undefined {
  return isHealSuccess(outcome) ? outcome.confidence : undefined;
}
