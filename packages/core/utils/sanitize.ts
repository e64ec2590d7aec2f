import { anchorKey, type AnchorDescriptor } from "../../anchors/types";

const MASK_PLACEHOLDER = "[***masked***]";

function normalizeString(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function maskText(value: string | null | undefined): string | null {
  if (value === null || typeof value === "undefined") {
    return null;
  }

  if (normalizeString(value).length === 0) {
    return "";
  }

  return MASK_PLACEHOLDER;
}

export function sanitizeText(value: string | null | undefined, sanitize?: boolean): string | null {
  if (!sanitize) {
    return value ?? null;
  }

  return maskText(value);
}

/**
 * Key used in log payloads. Text anchors can carry user-typed content, so
 * their content is masked when sanitizing; the healer always tracks the
 * unmasked key.
 */
export function describeAnchor(anchor: AnchorDescriptor, sanitize?: boolean): string {
  if (!sanitize || anchor.type !== "text") {
    return anchorKey(anchor);
  }

  return anchorKey({ ...anchor, content: sanitizeText(anchor.content, true) ?? "" });
}

export { MASK_PLACEHOLDER };
