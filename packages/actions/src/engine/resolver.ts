import { anchorKey, type AnchorDescriptor } from "../../../anchors/types";
import { consoleLogger, type LocatorLogger } from "../../../core/debug";
import { LocatorError } from "../../../core/errors";
import { DefaultSelfHealer, type SelfHealer } from "../../../core/heal";
import { DefaultElementResolver, type ElementResolver } from "../../../core/resolve";
import type { LocatorTelemetry } from "../../../core/resolve-telemetry";
import { createPerceiverStrategies, type StructuralPerceiver } from "../../../core/strategies";
import { mergeLocatorConfig, type LocatorConfigOverrides } from "../../../core/config";
import {
  createHealRequest,
  markFromHeal,
  strategyName,
  type HealOutcome,
  type ResolutionResult
} from "../../../core/types";
import type {
  ActionPrimitives,
  AnchorResolver,
  ExecCtx,
  ResolvedSelector,
  SelfHealInfo
} from "../types";
import { ActionError, buildAnchorNotFoundError, buildInterruptedError, mapLocatorError } from "./errors";
import { ScriptAnchorResolver } from "./script-resolver";

export interface LocatorBackedResolverOptions {
  resolver: ElementResolver;
  healer?: SelfHealer | null;
  script?: AnchorResolver;
  logger?: LocatorLogger;
  healRequest?: { maxCandidates?: number; minConfidence?: number };
}

/**
 * Adapts the element resolver and self-healer to the action layer's
 * `AnchorResolver` contract.
 */
export class LocatorBackedResolver implements AnchorResolver {
  #resolver: ElementResolver;
  #healer: SelfHealer | null;
  #script: AnchorResolver;
  #logger: LocatorLogger;
  #healRequest: NonNullable<LocatorBackedResolverOptions["healRequest"]>;

  constructor(options: LocatorBackedResolverOptions) {
    this.#resolver = options.resolver;
    this.#healer = options.healer ?? null;
    this.#script = options.script ?? new ScriptAnchorResolver();
    this.#logger = options.logger ?? consoleLogger;
    this.#healRequest = options.healRequest ?? {};
  }

  async resolve(primitives: ActionPrimitives, ctx: ExecCtx, anchor: AnchorDescriptor): Promise<ResolvedSelector> {
    ensureActive(ctx);

    let result: ResolutionResult;
    try {
      result = await this.#resolver.resolve(anchor, ctx.route);
    } catch (error) {
      if (error instanceof LocatorError && error.isRetryable()) {
        this.#logger.warn?.("Locator error", {
          actionId: ctx.actionId,
          anchor: anchorKey(anchor),
          reason: error.reason,
          error: error.message
        });
      }

      return this.#attemptHeal(primitives, ctx, anchor);
    }

    return this.#resolveWithResult(primitives, ctx, result);
  }

  async #resolveWithResult(
    primitives: ActionPrimitives,
    ctx: ExecCtx,
    result: ResolutionResult,
    healInfo?: SelfHealInfo
  ): Promise<ResolvedSelector> {
    const resolved = await this.#script.resolve(primitives, ctx, result.anchor);

    return {
      ...resolved,
      strategy: strategyName(result.strategy),
      confidence: result.confidence,
      fromHeal: result.fromHeal,
      healInfo
    };
  }

  async #attemptHeal(primitives: ActionPrimitives, ctx: ExecCtx, anchor: AnchorDescriptor): Promise<ResolvedSelector> {
    if (!this.#healer) {
      return this.#script.resolve(primitives, ctx, anchor);
    }

    const request = createHealRequest(anchor, ctx.route, this.#healRequest);

    let outcome: HealOutcome;
    try {
      outcome = await this.#healer.heal(request);
    } catch (error) {
      throw wrapLocatorError(error);
    }

    switch (outcome.status) {
      case "healed": {
        const healInfo: SelfHealInfo = {
          originalAnchor: anchorKey(anchor),
          healedAnchor: anchorKey(outcome.usedAnchor),
          strategy: strategyName(outcome.strategy),
          confidence: outcome.confidence
        };

        let result: ResolutionResult;
        try {
          result = markFromHeal(await this.#resolver.resolve(outcome.usedAnchor, ctx.route));
        } catch (error) {
          throw wrapLocatorError(error);
        }

        this.#logger.info?.("Anchor healed", {
          actionId: ctx.actionId,
          ...healInfo
        });

        return this.#resolveWithResult(primitives, ctx, result, healInfo);
      }
      case "skipped":
        throw buildAnchorNotFoundError(outcome.reason);
      case "exhausted":
        throw buildAnchorNotFoundError("All healer candidates exhausted");
      case "aborted":
        throw new ActionError("internal", outcome.reason);
    }
  }
}

function ensureActive(ctx: ExecCtx): void {
  if (!ctx.signal.aborted) {
    return;
  }

  throw buildInterruptedError(ctx.actionId);
}

function wrapLocatorError(error: unknown): ActionError {
  if (error instanceof LocatorError) {
    return mapLocatorError(error);
  }

  return ActionError.fromUnknown(error);
}

export function createLocatorBackedResolver(options: LocatorBackedResolverOptions): LocatorBackedResolver {
  return new LocatorBackedResolver(options);
}

export interface DefaultLocatorResolverOptions extends LocatorConfigOverrides {
  logger?: LocatorLogger;
  telemetry?: LocatorTelemetry | null;
  script?: AnchorResolver;
}

/** Wires perceiver-backed strategies, the default resolver and a self-healer. */
export function createDefaultLocatorResolver(
  perceiver: StructuralPerceiver,
  options: DefaultLocatorResolverOptions = {}
): LocatorBackedResolver {
  const config = mergeLocatorConfig(options);
  const logger = options.logger ?? consoleLogger;
  const strategies = createPerceiverStrategies(perceiver, {
    logger,
    maxCandidates: config.perceiverMaxCandidates
  });
  const resolver = new DefaultElementResolver({
    strategies,
    logger,
    telemetry: options.telemetry,
    sanitizeAnchors: config.sanitizeAnchors
  });
  const healer = new DefaultSelfHealer({
    resolver,
    logger,
    telemetry: options.telemetry,
    sanitizeAnchors: config.sanitizeAnchors
  });

  return new LocatorBackedResolver({
    resolver,
    healer,
    script: options.script,
    logger,
    healRequest: {
      maxCandidates: config.healMaxCandidates,
      minConfidence: config.healMinConfidence
    }
  });
}
