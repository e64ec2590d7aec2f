import type { AnchorDescriptor } from "../anchors/types";
import type { ExecRoute } from "../anchors/route";
import { consoleLogger, type LocatorLogger } from "./debug";
import {
  buildInternalError,
  buildInvalidAnchorError,
  buildStrategyFailedError,
  LocatorError
} from "./errors";
import {
  createCandidate,
  fallbackChain,
  type Candidate,
  type CandidateMetadata,
  type LocatorStrategy
} from "./types";
import { DEFAULT_LOCATOR_CONFIG } from "./config";

/**
 * One matching technique. Implementations perform the page I/O and return
 * every scored candidate they see; selection happens in the resolver.
 */
export interface Strategy {
  readonly type: LocatorStrategy;
  resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<Candidate[]>;
}

export interface StrategyRegistry {
  get(type: LocatorStrategy): Strategy;
}

export function createStrategyRegistry(strategies: Iterable<Strategy>): StrategyRegistry {
  const byType = new Map<LocatorStrategy, Strategy>();

  for (const strategy of strategies) {
    if (byType.has(strategy.type)) {
      throw buildInternalError(`Duplicate strategy registered: ${strategy.type}`);
    }
    byType.set(strategy.type, strategy);
  }

  const missing = fallbackChain().filter((type) => !byType.has(type));
  if (missing.length > 0) {
    throw buildInternalError(`Missing strategies: ${missing.join(", ")}`);
  }

  return {
    get(type) {
      const strategy = byType.get(type);
      if (!strategy) {
        throw buildInternalError(`Missing strategies: ${type}`);
      }
      return strategy;
    }
  };
}

export type PerceiverHint =
  | { kind: "css"; selector: string }
  | { kind: "aria"; role: string; name: string }
  | { kind: "text"; pattern: string };

export interface PerceiverOptions {
  maxCandidates: number;
}

export interface PerceivedGeometry {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PerceivedElement {
  /** Label of the structural lookup that produced this element. */
  strategy: string;
  confidence: number;
  backendNodeId?: number;
  nodeId?: number;
  selector?: string;
  geometry?: PerceivedGeometry;
  tagName?: string;
  text?: string;
  ariaRole?: string;
  ariaLabel?: string;
  domIndex?: number;
  visible?: boolean;
  enabled?: boolean;
}

export interface AnchorResolution {
  primary: PerceivedElement;
  candidates: PerceivedElement[];
}

/**
 * Structural view of a live page (DOM, accessibility tree, text). This is the
 * boundary where strategies hand off to the browser transport.
 */
export interface StructuralPerceiver {
  resolveAnchor(route: ExecRoute, hint: PerceiverHint, options: PerceiverOptions): Promise<AnchorResolution>;
}

export interface PerceiverStrategyOptions {
  logger?: LocatorLogger;
  maxCandidates?: number;
}

const COMMON_HTML_TAGS = new Set(["div", "span", "button", "input", "a", "p", "h1", "h2", "h3", "ul", "li", "form"]);

const TEXT_FALLBACK_ROLES = ["button", "link", "menuitem", "textbox"] as const;

export function isHtmlTag(value: string): boolean {
  return COMMON_HTML_TAGS.has(value.toLowerCase());
}

export function extractSelectorKeywords(selector: string): string[] {
  return selector
    .replace(/[#.>+~[\]_-]/g, " ")
    .split(/\s+/)
    .filter((word) => word.length > 2 && !isHtmlTag(word))
    .map((word) => word.toLowerCase());
}

export function inferRoleFromSelector(selector: string): string | undefined {
  const lower = selector.toLowerCase();

  if (lower.includes("btn") || lower.includes("button")) {
    return "button";
  }
  if (lower.includes("link")) {
    return "link";
  }
  if (lower.includes("menu")) {
    return "menuitem";
  }
  if (lower.includes("input") || lower.includes("field")) {
    return "textbox";
  }

  return undefined;
}

function describeElementId(element: PerceivedElement): string {
  if (typeof element.backendNodeId === "number") {
    return `backend-node-${element.backendNodeId}`;
  }

  if (element.geometry) {
    const { x, y, width, height } = element.geometry;
    return `geom-${x}-${y}-${width}-${height}`;
  }

  if (typeof element.nodeId === "number") {
    return `node-${element.nodeId}`;
  }

  return element.selector ?? element.strategy;
}

function metadataFromElement(element: PerceivedElement): Partial<CandidateMetadata> {
  const visibleText = element.text?.trim();

  return {
    tagName: element.tagName,
    visibleText: visibleText ? visibleText : undefined,
    ariaRole: element.ariaRole,
    ariaLabel: element.ariaLabel,
    domIndex: element.domIndex,
    isVisible: element.visible ?? false,
    isEnabled: element.enabled ?? false
  };
}

/** Perceived elements without a finite confidence are dropped; the rest are clamped to [0, 1]. */
export function convertResolution(
  resolution: AnchorResolution,
  strategy: LocatorStrategy,
  anchor: AnchorDescriptor
): Candidate[] {
  return [resolution.primary, ...resolution.candidates]
    .filter((element) => Number.isFinite(element.confidence))
    .map((element) =>
      createCandidate(
        describeElementId(element),
        strategy,
        Math.min(1, Math.max(0, element.confidence)),
        anchor,
        metadataFromElement(element)
      )
    );
}

abstract class PerceiverStrategy implements Strategy {
  abstract readonly type: LocatorStrategy;

  protected readonly logger: LocatorLogger;
  readonly #perceiver: StructuralPerceiver;
  readonly #maxCandidates: number;

  constructor(perceiver: StructuralPerceiver, options: PerceiverStrategyOptions = {}) {
    this.#perceiver = perceiver;
    this.logger = options.logger ?? consoleLogger;
    this.#maxCandidates = options.maxCandidates ?? DEFAULT_LOCATOR_CONFIG.perceiverMaxCandidates;
  }

  abstract resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<Candidate[]>;

  protected async query(route: ExecRoute, hint: PerceiverHint, anchor: AnchorDescriptor): Promise<Candidate[]> {
    let resolution: AnchorResolution;

    try {
      resolution = await this.#perceiver.resolveAnchor(route, hint, { maxCandidates: this.#maxCandidates });
    } catch (error) {
      throw buildStrategyFailedError(
        this.type,
        error instanceof Error ? error.message : String(error),
        error
      );
    }

    return convertResolution(resolution, this.type, anchor);
  }

  /** Runs each fallback lookup in turn; a failing lookup does not stop the rest. */
  protected async collect(
    lookups: ReadonlyArray<() => Promise<Candidate[]>>,
    label: string
  ): Promise<Candidate[]> {
    const candidates: Candidate[] = [];

    for (const lookup of lookups) {
      try {
        candidates.push(...(await lookup()));
      } catch (error) {
        this.logger.debug?.(`${label} failed`, {
          strategy: this.type,
          error: error instanceof LocatorError ? error.detail : String(error)
        });
      }
    }

    return candidates;
  }
}

export class CssStrategy extends PerceiverStrategy {
  readonly type = "css";

  async resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<Candidate[]> {
    if (anchor.type !== "css") {
      return [];
    }

    if (anchor.selector.length === 0) {
      throw buildInvalidAnchorError("Empty CSS selector");
    }

    this.logger.debug?.("CSS resolution", { selector: anchor.selector });
    return this.query(route, { kind: "css", selector: anchor.selector }, anchor);
  }
}

export class AriaAxStrategy extends PerceiverStrategy {
  readonly type = "aria-ax";

  async resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<Candidate[]> {
    switch (anchor.type) {
      case "aria":
        return this.resolveAria(anchor.role, anchor.name, anchor, route);
      case "css": {
        const { selector } = anchor;
        const role = inferRoleFromSelector(selector);
        if (!role) {
          return [];
        }
        this.logger.debug?.("ARIA fallback for CSS selector", { selector, role });
        return this.collect(
          extractSelectorKeywords(selector).map((keyword) => () => this.resolveAria(role, keyword, anchor, route)),
          "ARIA fallback"
        );
      }
      case "text": {
        const { content } = anchor;
        return this.collect(
          TEXT_FALLBACK_ROLES.map((role) => () => this.resolveAria(role, content, anchor, route)),
          "ARIA fallback"
        );
      }
    }
  }

  private async resolveAria(
    role: string,
    name: string,
    anchor: AnchorDescriptor,
    route: ExecRoute
  ): Promise<Candidate[]> {
    if (role.length === 0) {
      throw buildInvalidAnchorError("Empty ARIA role");
    }

    const trimmedName = name.trim();
    if (trimmedName.length === 0) {
      throw buildInvalidAnchorError("Empty ARIA accessible name");
    }

    return this.query(route, { kind: "aria", role, name: trimmedName }, anchor);
  }
}

export class TextStrategy extends PerceiverStrategy {
  readonly type = "text";

  async resolve(anchor: AnchorDescriptor, route: ExecRoute): Promise<Candidate[]> {
    switch (anchor.type) {
      case "text":
        return this.resolveText(anchor.content, anchor.exact, anchor, route);
      case "css": {
        const { selector } = anchor;
        this.logger.debug?.("Text fallback for CSS selector", { selector });
        return this.collect(
          extractSelectorKeywords(selector).map((keyword) => () => this.resolveText(keyword, false, anchor, route)),
          "Text fallback"
        );
      }
      case "aria":
        return this.resolveText(anchor.name, false, anchor, route);
    }
  }

  private async resolveText(
    content: string,
    exact: boolean,
    anchor: AnchorDescriptor,
    route: ExecRoute
  ): Promise<Candidate[]> {
    if (content.length === 0) {
      throw buildInvalidAnchorError("Empty text content");
    }

    return this.query(route, { kind: "text", pattern: exact ? content.trim() : content }, anchor);
  }
}

export function createPerceiverStrategies(
  perceiver: StructuralPerceiver,
  options: PerceiverStrategyOptions = {}
): StrategyRegistry {
  return createStrategyRegistry([
    new CssStrategy(perceiver, options),
    new AriaAxStrategy(perceiver, options),
    new TextStrategy(perceiver, options)
  ]);
}
