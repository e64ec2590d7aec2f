import { test } from "node:test";
import assert from "node:assert/strict";

import { createExecRoute } from "../../../anchors/route";
import { LocatorError, type LocatorErrorReason } from "../../../core/errors";
import { ActionError, buildInterruptedError, mapLocatorError, type ActionErrorReason } from "../engine/errors";
import { ACTION_DEFAULT_TIMEOUT_MS, createExecCtx } from "../types";

test("mapLocatorError follows the action error table", () => {
  const expected: Array<[LocatorErrorReason, ActionErrorReason]> = [
    ["element-not-found", "anchor-not-found"],
    ["ambiguous-match", "anchor-not-found"],
    ["invalid-anchor", "anchor-not-found"],
    ["heal-failed", "anchor-not-found"],
    ["cdp-error", "cdp-io"],
    ["timeout", "wait-timeout"],
    ["strategy-failed", "internal"],
    ["internal", "internal"]
  ];

  for (const [locatorReason, actionReason] of expected) {
    const source = new LocatorError(locatorReason, "detail text");
    const mapped = mapLocatorError(source);

    assert.equal(mapped.reason, actionReason, locatorReason);
    assert.equal(mapped.detail, "detail text");
    assert.equal(mapped.cause, source);
  }
});

test("ActionError.fromUnknown keeps action errors and maps locator errors", () => {
  const existing = new ActionError("not-enabled", "button disabled");
  const locator = new LocatorError("timeout", "AX tree did not settle");

  assert.equal(ActionError.fromUnknown(existing), existing);
  assert.equal(ActionError.fromUnknown(locator).reason, "wait-timeout");
  assert.equal(ActionError.fromUnknown(new Error("boom")).message, "Internal error: boom");
  assert.equal(ActionError.fromUnknown("socket hang up", "cdp-io").message, "CDP I/O error: socket hang up");
});

test("ActionError reports retryability and severity", () => {
  const timeout = new ActionError("wait-timeout", "element never appeared", { actionId: "action-7" });

  assert.equal(timeout.isRetryable(), true);
  assert.equal(new ActionError("anchor-not-found", "x").isRetryable(), false);
  assert.deepEqual(timeout.toPayload(), {
    reason: "wait-timeout",
    message: "Wait timeout: element never appeared",
    detail: "element never appeared",
    actionId: "action-7",
    severity: 1
  });
  assert.equal(new ActionError("stale-route", "x").severity(), 3);
  assert.equal(new ActionError("cdp-io", "x").severity(), 2);
  assert.equal(new ActionError("option-not-found", "x").severity(), 0);
});

test("buildInterruptedError names the cancelled action", () => {
  const error = buildInterruptedError("action-3");

  assert.equal(error.reason, "interrupted");
  assert.equal(error.message, "Operation interrupted: Action 'action-3' cancelled before anchor resolution");
});

test("createExecCtx derives the deadline from the timeout", () => {
  const route = createExecRoute("session-1", "page-1", "frame-main");

  const ctx = createExecCtx(route, { now: () => 1_000, timeoutMs: 500, actionId: "action-1" });
  const defaults = createExecCtx(route, { now: () => 0 });

  assert.equal(ctx.deadline, 1_500);
  assert.equal(ctx.actionId, "action-1");
  assert.equal(ctx.signal.aborted, false);
  assert.equal(defaults.deadline, ACTION_DEFAULT_TIMEOUT_MS);
  assert.match(defaults.actionId, /^[0-9a-f-]{36}$/);
});
