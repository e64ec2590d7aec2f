import { randomUUID } from "node:crypto";

import type { AnchorDescriptor } from "../../../anchors/types";
import type {
  ActionPrimitives,
  AnchorResolver,
  ExecCtx,
  ExecutionContextRef,
  ResolvedSelector
} from "../types";
import { createResolvedSelector } from "../types";
import { ActionError, buildAnchorNotFoundError } from "./errors";

export const ANCHOR_TOKEN_ATTRIBUTE = "data-anchor-token";

type SelectorScriptResult = { status: "ok"; selector: string };

function isSelectorScriptResult(value: unknown): value is SelectorScriptResult {
  if (typeof value !== "object" || value === null) {
    return false;
  }

  return "status" in value && value.status === "ok" && "selector" in value && typeof value.selector === "string";
}

function createToken(prefix: string): string {
  return `${prefix}-${randomUUID().replace(/-/g, "")}`;
}

export function buildAriaSelectorScript(role: string, name: string, token: string): string {
  return `(() => {
  const role = ${JSON.stringify(role)};
  const targetName = ${JSON.stringify(name)};
  const attr = ${JSON.stringify(ANCHOR_TOKEN_ATTRIBUTE)};
  const token = ${JSON.stringify(token)};
  const normalize = (input) => (input || "").trim().toLowerCase();
  const computeName = (el) => {
    const label = el.getAttribute("aria-label");
    if (label) return label.trim();
    const labelledby = el.getAttribute("aria-labelledby");
    if (labelledby) {
      return labelledby.split(/\\s+/)
        .map((id) => document.getElementById(id))
        .map((node) => (node ? node.textContent || "" : ""))
        .join(" ")
        .trim();
    }
    if (el.title) return el.title.trim();
    return (el.innerText || el.textContent || "").trim();
  };
  const matches = Array.from(document.querySelectorAll('[role="' + role + '"]'));
  const match = matches.find((el) => normalize(computeName(el)) === normalize(targetName));
  if (!match) return { status: "not-found" };
  match.setAttribute(attr, token);
  return { status: "ok", selector: "[" + attr + '="' + token + '"]' };
})()`;
}

export function buildTextSelectorScript(text: string, exact: boolean, token: string): string {
  return `(() => {
  const target = ${JSON.stringify(text)};
  const attr = ${JSON.stringify(ANCHOR_TOKEN_ATTRIBUTE)};
  const token = ${JSON.stringify(token)};
  const exact = ${exact ? "true" : "false"};
  const lower = (input) => (input || "").trim().toLowerCase();
  const isVisible = (el) => {
    const style = window.getComputedStyle(el);
    if (style.visibility === "hidden" || style.display === "none") return false;
    const rect = el.getBoundingClientRect();
    return rect.width > 0 || rect.height > 0 || el.getClientRects().length > 0;
  };
  const nodes = Array.from(document.querySelectorAll("body *"));
  const match = nodes.find((el) => {
    if (!isVisible(el)) return false;
    const value = lower(el.innerText || el.textContent || "");
    if (!value) return false;
    return exact ? value === lower(target) : value.includes(lower(target));
  });
  if (!match) return { status: "not-found" };
  match.setAttribute(attr, token);
  return { status: "ok", selector: "[" + attr + '="' + token + '"]' };
})()`;
}

/**
 * Last-resort resolver that evaluates the anchor directly in the page. CSS
 * anchors pass through; ARIA and text anchors are located by script and
 * stamped with a one-off token attribute.
 */
export class ScriptAnchorResolver implements AnchorResolver {
  #createToken: (prefix: string) => string;

  constructor(options: { createToken?: (prefix: string) => string } = {}) {
    this.#createToken = options.createToken ?? createToken;
  }

  async resolve(primitives: ActionPrimitives, ctx: ExecCtx, anchor: AnchorDescriptor): Promise<ResolvedSelector> {
    await primitives.ensureReady();
    const context = await primitives.resolveRouteContext(ctx.route);
    const selector = await this.#selectorFor(primitives, context, anchor);
    return createResolvedSelector(selector, context);
  }

  async #selectorFor(
    primitives: ActionPrimitives,
    context: ExecutionContextRef,
    anchor: AnchorDescriptor
  ): Promise<string> {
    switch (anchor.type) {
      case "css": {
        const trimmed = anchor.selector.trim();
        if (trimmed.length === 0) {
          throw buildAnchorNotFoundError("Empty CSS selector");
        }
        return trimmed;
      }
      case "aria": {
        if (anchor.role.trim().length === 0 || anchor.name.trim().length === 0) {
          throw buildAnchorNotFoundError("ARIA role and name must be provided");
        }
        const script = buildAriaSelectorScript(anchor.role, anchor.name, this.#createToken("aria"));
        return evaluateSelectorScript(primitives, context, script, "ARIA descriptor");
      }
      case "text": {
        if (anchor.content.trim().length === 0) {
          throw buildAnchorNotFoundError("Text content cannot be empty");
        }
        const script = buildTextSelectorScript(anchor.content, anchor.exact, this.#createToken("text"));
        return evaluateSelectorScript(primitives, context, script, "text anchor");
      }
    }
  }
}

async function evaluateSelectorScript(
  primitives: ActionPrimitives,
  context: ExecutionContextRef,
  expression: string,
  label: string
): Promise<string> {
  let value: unknown;

  try {
    value = await primitives.evaluate(context, expression);
  } catch (error) {
    throw new ActionError("cdp-io", error instanceof Error ? error.message : String(error), { cause: error });
  }

  if (!isSelectorScriptResult(value)) {
    throw buildAnchorNotFoundError(`${label} did not resolve to a visible element`);
  }

  return value.selector;
}
