/**
 * Action-layer entry point: execution context types, the script resolver and
 * the locator-backed bridge used by action primitives.
 */
export * from "./types";
export {
  ActionError,
  mapLocatorError,
  buildAnchorNotFoundError,
  buildInterruptedError,
  type ActionErrorReason,
  type ActionErrorPayload,
  type ActionErrorSeverity
} from "./engine/errors";
export {
  ScriptAnchorResolver,
  ANCHOR_TOKEN_ATTRIBUTE,
  buildAriaSelectorScript,
  buildTextSelectorScript
} from "./engine/script-resolver";
export {
  LocatorBackedResolver,
  createLocatorBackedResolver,
  createDefaultLocatorResolver,
  type LocatorBackedResolverOptions,
  type DefaultLocatorResolverOptions
} from "./engine/resolver";
