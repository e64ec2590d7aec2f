import { test } from "node:test";
import assert from "node:assert/strict";

import { ariaAnchor, cssAnchor, textAnchor, type AnchorDescriptor } from "../../anchors/types";
import { createExecRoute } from "../../anchors/route";
import { buildStrategyFailedError, LocatorError } from "../errors";
import { createElementResolver, selectBestCandidate } from "../resolve";
import type {
  LocatorAttemptEvent,
  LocatorMissEvent,
  LocatorSuccessEvent,
  LocatorTelemetry
} from "../resolve-telemetry";
import { createStrategyRegistry, type Strategy } from "../strategies";
import { createCandidate, type Candidate, type LocatorStrategy } from "../types";

type LogEntry = {
  level: string;
  message: string;
  data?: Record<string, unknown>;
};

function createLogger(entries: LogEntry[]) {
  return {
    debug(message: string, data?: Record<string, unknown>) {
      entries.push({ level: "debug", message, data });
    },
    info(message: string, data?: Record<string, unknown>) {
      entries.push({ level: "info", message, data });
    },
    warn(message: string, data?: Record<string, unknown>) {
      entries.push({ level: "warn", message, data });
    },
    error(message: string, data?: Record<string, unknown>) {
      entries.push({ level: "error", message, data });
    }
  };
}

type StrategyResponse = Candidate[] | Error;

type FakeStrategy = Strategy & { calls: AnchorDescriptor[] };

function createFakeStrategy(type: LocatorStrategy, respond: (anchor: AnchorDescriptor) => StrategyResponse): FakeStrategy {
  const calls: AnchorDescriptor[] = [];

  return {
    type,
    calls,
    async resolve(anchor) {
      calls.push(anchor);
      const response = respond(anchor);
      if (response instanceof Error) {
        throw response;
      }
      return response;
    }
  };
}

function createResolver(
  responses: Partial<Record<LocatorStrategy, (anchor: AnchorDescriptor) => StrategyResponse>>,
  options: { logs?: LogEntry[]; telemetry?: LocatorTelemetry } = {}
) {
  const css = createFakeStrategy("css", responses.css ?? (() => []));
  const aria = createFakeStrategy("aria-ax", responses["aria-ax"] ?? (() => []));
  const text = createFakeStrategy("text", responses.text ?? (() => []));

  const resolver = createElementResolver({
    strategies: createStrategyRegistry([css, aria, text]),
    logger: createLogger(options.logs ?? []),
    telemetry: options.telemetry
  });

  return { resolver, css, aria, text };
}

function createTelemetryTracker() {
  const attempts: LocatorAttemptEvent[] = [];
  const successes: LocatorSuccessEvent[] = [];
  const misses: LocatorMissEvent[] = [];

  const telemetry: LocatorTelemetry = {
    logAttempt(event) {
      attempts.push(event);
    },
    logSuccess(event) {
      successes.push(event);
    },
    logMiss(event) {
      misses.push(event);
    },
    logHeal() {}
  };

  return { telemetry, attempts, successes, misses };
}

const route = createExecRoute("session-1", "page-1", "frame-main");
const submit = cssAnchor("#submit");

test("selectBestCandidate rejects an empty list", () => {
  assert.throws(
    () => selectBestCandidate([]),
    (error) => {
      assert.ok(error instanceof LocatorError);
      assert.equal(error.reason, "element-not-found");
      assert.equal(error.detail, "No candidates provided");
      return true;
    }
  );
});

test("selectBestCandidate rejects a best candidate below the acceptance threshold", () => {
  const candidates = [createCandidate("elem1", "css", 0.3, submit)];

  assert.throws(
    () => selectBestCandidate(candidates),
    (error) => {
      assert.ok(error instanceof LocatorError);
      assert.equal(error.reason, "element-not-found");
      assert.equal(error.detail, "Best candidate has low confidence: 0.30");
      return true;
    }
  );
});

test("selectBestCandidate returns the highest confidence candidate", () => {
  const candidates = [
    createCandidate("a", "css", 0.9, submit),
    createCandidate("b", "aria-ax", 0.7, ariaAnchor("button", "Submit"))
  ];

  const best = selectBestCandidate(candidates);

  assert.equal(best.elementId, "a");
  assert.equal(best.confidence, 0.9);
});

test("selectBestCandidate keeps the first of equally scored candidates and warns on ambiguity", () => {
  const logs: LogEntry[] = [];
  const candidates = [
    createCandidate("first", "css", 0.9, submit),
    createCandidate("second", "css", 0.9, submit),
    createCandidate("third", "css", 0.6, submit)
  ];

  const best = selectBestCandidate(candidates, createLogger(logs));

  assert.equal(best.elementId, "first");
  const warning = logs.find((entry) => entry.level === "warn" && entry.message === "Ambiguous match");
  assert.ok(warning);
  assert.equal(warning.data?.highConfidenceCount, 2);
});

test("selectBestCandidate skips candidates without a finite confidence", () => {
  const candidates = [
    createCandidate("unscored", "css", Number.NaN, submit),
    createCandidate("good", "css", 0.9, submit)
  ];

  assert.equal(selectBestCandidate(candidates).elementId, "good");
  assert.throws(
    () => selectBestCandidate([createCandidate("unscored", "css", Number.NaN, submit)]),
    (error) => {
      assert.ok(error instanceof LocatorError);
      assert.equal(error.reason, "element-not-found");
      assert.equal(error.detail, "No candidate has a finite confidence");
      return true;
    }
  );
});

test("resolve falls through to the ARIA strategy and never invokes text", async () => {
  const { resolver, css, aria, text } = createResolver({
    "aria-ax": (anchor) => [createCandidate("backend-node-42", "aria-ax", 0.82, anchor)],
    text: () => new Error("text strategy should not run")
  });

  const result = await resolver.resolve(submit, route);

  assert.equal(result.strategy, "aria-ax");
  assert.equal(result.confidence, 0.82);
  assert.equal(result.elementId, "backend-node-42");
  assert.equal(result.fromHeal, false);
  assert.deepEqual(result.anchor, submit);
  assert.equal(css.calls.length, 1);
  assert.equal(aria.calls.length, 1);
  assert.equal(text.calls.length, 0);
});

test("resolve logs strategy errors and continues down the chain", async () => {
  const logs: LogEntry[] = [];
  const { resolver } = createResolver(
    {
      css: () => buildStrategyFailedError("css", "perceiver offline"),
      "aria-ax": (anchor) => [createCandidate("node-7", "aria-ax", 0.95, anchor)]
    },
    { logs }
  );

  const result = await resolver.resolve(submit, route);

  assert.equal(result.strategy, "aria-ax");
  const failure = logs.find((entry) => entry.message === "Strategy failed");
  assert.ok(failure);
  assert.equal(failure.level, "warn");
  assert.equal(failure.data?.strategy, "css");
  assert.equal(failure.data?.error, "Strategy css failed: perceiver offline");
});

test("resolve stops at the first strategy with candidates even when it is ambiguous", async () => {
  const { resolver, aria } = createResolver({
    css: (anchor) => [createCandidate("one", "css", 0.85, anchor), createCandidate("two", "css", 0.8, anchor)],
    "aria-ax": (anchor) => [createCandidate("aria", "aria-ax", 1, anchor)]
  });

  const result = await resolver.resolve(submit, route);

  assert.equal(result.elementId, "one");
  assert.equal(result.strategy, "css");
  assert.equal(aria.calls.length, 0);
});

test("resolve fails when the deciding strategy only offers weak candidates", async () => {
  const { resolver, aria, text } = createResolver({
    css: (anchor) => [createCandidate("weak", "css", 0.4, anchor)],
    "aria-ax": (anchor) => [createCandidate("strong", "aria-ax", 0.9, anchor)]
  });

  await assert.rejects(resolver.resolve(submit, route), (error) => {
    assert.ok(error instanceof LocatorError);
    assert.equal(error.reason, "element-not-found");
    assert.equal(error.detail, "Best candidate has low confidence: 0.40");
    return true;
  });

  assert.equal(aria.calls.length, 0);
  assert.equal(text.calls.length, 0);
});

test("resolve reports element-not-found when every strategy comes back empty", async () => {
  const { resolver, css, aria, text } = createResolver({});

  await assert.rejects(resolver.resolve(submit, route), (error) => {
    assert.ok(error instanceof LocatorError);
    assert.equal(error.reason, "element-not-found");
    assert.equal(error.detail, "All strategies exhausted for anchor: css:#submit");
    assert.equal(error.message, "Element not found: All strategies exhausted for anchor: css:#submit");
    return true;
  });

  assert.equal(css.calls.length, 1);
  assert.equal(aria.calls.length, 1);
  assert.equal(text.calls.length, 1);
});

test("resolve emits attempt and success telemetry", async () => {
  const tracker = createTelemetryTracker();
  const { resolver } = createResolver(
    {
      "aria-ax": (anchor) => [createCandidate("node-3", "aria-ax", 0.82, anchor)]
    },
    { telemetry: tracker.telemetry }
  );

  await resolver.resolve(submit, route);

  assert.deepEqual(
    tracker.attempts.map((event) => [event.strategy, event.candidateCount, event.success]),
    [
      ["css", 0, false],
      ["aria-ax", 1, true]
    ]
  );
  assert.equal(tracker.successes.length, 1);
  assert.equal(tracker.successes[0].attemptIndex, 1);
  assert.equal(tracker.successes[0].anchorKey, "css:#submit");
  assert.equal(tracker.successes[0].ambiguous, false);
  assert.equal(tracker.misses.length, 0);
});

test("resolve emits a miss with every attempt summary", async () => {
  const tracker = createTelemetryTracker();
  const { resolver } = createResolver(
    {
      "aria-ax": () => new Error("ax tree unavailable")
    },
    { telemetry: tracker.telemetry }
  );

  await assert.rejects(resolver.resolve(submit, route), LocatorError);

  assert.equal(tracker.misses.length, 1);
  assert.equal(tracker.misses[0].attemptCount, 3);
  assert.equal(tracker.misses[0].attempts[1].error, "ax tree unavailable");
});

test("generateFallbackPlan unions every strategy and sorts by confidence", async () => {
  const { resolver, css, aria, text } = createResolver({
    css: (anchor) => [createCandidate("c1", "css", 0.6, anchor)],
    "aria-ax": () => buildStrategyFailedError("aria-ax", "ax tree unavailable"),
    text: (anchor) => [createCandidate("t1", "text", 0.9, anchor), createCandidate("t2", "text", 0.6, anchor)]
  });

  const plan = await resolver.generateFallbackPlan(submit, route);

  assert.equal(plan.hasFallbacks, true);
  assert.deepEqual(plan.primary, submit);
  assert.deepEqual(
    plan.fallbacks.map((candidate) => candidate.elementId),
    ["t1", "c1", "t2"]
  );
  assert.equal(css.calls.length, 1);
  assert.equal(aria.calls.length, 1);
  assert.equal(text.calls.length, 1);
});

test("generateFallbackPlan contains every single-strategy candidate", async () => {
  const anchor = textAnchor("Continue");
  const { resolver } = createResolver({
    css: () => [],
    "aria-ax": (value) => [createCandidate("a1", "aria-ax", 0.7, value), createCandidate("a2", "aria-ax", 0.2, value)],
    text: (value) => [createCandidate("t1", "text", 0.75, value)]
  });

  const plan = await resolver.generateFallbackPlan(anchor, route);
  const planIds = plan.fallbacks.map((candidate) => candidate.elementId);

  for (const strategy of ["css", "aria-ax", "text"] as const) {
    const direct = await resolver.resolveWithStrategy(anchor, route, strategy);
    direct.forEach((candidate) => assert.ok(planIds.includes(candidate.elementId)));
  }

  for (let index = 1; index < plan.fallbacks.length; index += 1) {
    assert.ok(plan.fallbacks[index - 1].confidence >= plan.fallbacks[index].confidence);
  }
});

test("generateFallbackPlan returns an empty plan when nothing matches", async () => {
  const { resolver } = createResolver({
    css: () => new Error("boom")
  });

  const plan = await resolver.generateFallbackPlan(submit, route);

  assert.equal(plan.hasFallbacks, false);
  assert.deepEqual(plan.fallbacks, []);
});

test("resolveWithStrategy propagates strategy errors", async () => {
  const { resolver } = createResolver({
    text: () => buildStrategyFailedError("text", "timed out")
  });

  await assert.rejects(resolver.resolveWithStrategy(submit, route, "text"), (error) => {
    assert.ok(error instanceof LocatorError);
    assert.equal(error.reason, "strategy-failed");
    assert.equal(error.strategy, "text");
    return true;
  });
});
