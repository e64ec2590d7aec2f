import { randomUUID } from "node:crypto";

import type { AnchorDescriptor } from "../../anchors/types";
import type { ExecRoute } from "../../anchors/route";

export const ACTION_DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Per-action execution context. Deadline and cancellation belong to the
 * caller; resolvers only check the signal before starting work.
 */
export interface ExecCtx {
  route: ExecRoute;
  /** Epoch milliseconds after which the caller abandons the action. */
  deadline: number;
  signal: AbortSignal;
  actionId: string;
}

export interface ExecCtxOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  actionId?: string;
  now?: () => number;
}

export function createExecCtx(route: ExecRoute, options: ExecCtxOptions = {}): ExecCtx {
  const now = options.now ?? Date.now;

  return {
    route,
    deadline: now() + (options.timeoutMs ?? ACTION_DEFAULT_TIMEOUT_MS),
    signal: options.signal ?? new AbortController().signal,
    actionId: options.actionId ?? randomUUID()
  };
}

/** Evaluation target for a route, as returned by the browser layer. */
export interface ExecutionContextRef {
  page: string;
  frameSelector?: string;
  contextId?: number;
}

/**
 * Browser-side operations the resolvers rely on. Implemented by the action
 * primitives on top of the page transport.
 */
export interface ActionPrimitives {
  ensureReady(): Promise<void>;
  resolveRouteContext(route: ExecRoute): Promise<ExecutionContextRef>;
  evaluate(context: ExecutionContextRef, expression: string): Promise<unknown>;
}

export interface SelfHealInfo {
  originalAnchor: string;
  healedAnchor: string;
  strategy: string;
  confidence: number;
}

export interface ResolvedSelector {
  selector: string;
  context: ExecutionContextRef;
  strategy?: string;
  confidence?: number;
  /** Set when the locator produced the selector; true when it came from a healed anchor. */
  fromHeal?: boolean;
  healInfo?: SelfHealInfo;
}

export function createResolvedSelector(selector: string, context: ExecutionContextRef): ResolvedSelector {
  return { selector, context };
}

/** Turns an anchor into a selector that page commands can operate on. */
export interface AnchorResolver {
  resolve(primitives: ActionPrimitives, ctx: ExecCtx, anchor: AnchorDescriptor): Promise<ResolvedSelector>;
}
