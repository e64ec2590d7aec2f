export interface LocatorConfigOverrides {
  healMaxCandidates?: number;
  healMinConfidence?: number;
  perceiverMaxCandidates?: number;
  sanitizeAnchors?: boolean;
}

export interface LocatorConfig {
  healMaxCandidates: number;
  healMinConfidence: number;
  perceiverMaxCandidates: number;
  sanitizeAnchors: boolean;
}

export const HIGH_CONFIDENCE_THRESHOLD = 0.8;
export const ACCEPTABLE_CONFIDENCE_THRESHOLD = 0.5;

export const DEFAULT_LOCATOR_CONFIG: LocatorConfig = {
  healMaxCandidates: 10,
  healMinConfidence: ACCEPTABLE_CONFIDENCE_THRESHOLD,
  perceiverMaxCandidates: 5,
  sanitizeAnchors: false
};

export function mergeLocatorConfig(overrides?: LocatorConfigOverrides): LocatorConfig {
  const runtime = overrides ?? {};

  return {
    healMaxCandidates: coalesceNumber(runtime.healMaxCandidates, DEFAULT_LOCATOR_CONFIG.healMaxCandidates),
    healMinConfidence: coalesceNumber(runtime.healMinConfidence, DEFAULT_LOCATOR_CONFIG.healMinConfidence),
    perceiverMaxCandidates: coalesceNumber(
      runtime.perceiverMaxCandidates,
      DEFAULT_LOCATOR_CONFIG.perceiverMaxCandidates
    ),
    sanitizeAnchors: runtime.sanitizeAnchors ?? DEFAULT_LOCATOR_CONFIG.sanitizeAnchors
  };
}

function coalesceNumber(...values: Array<number | undefined>): number {
  if (values.length === 0) {
    return 0;
  }

  const fallback = values.pop();

  for (const value of values) {
    if (typeof value === "number" && Number.isFinite(value)) {
      return value;
    }
  }

  if (typeof fallback === "number" && Number.isFinite(fallback)) {
    return fallback;
  }

  return 0;
}
