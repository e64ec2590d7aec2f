export const ANCHOR_TYPES = ["css", "aria", "text"] as const;

export type AnchorType = typeof ANCHOR_TYPES[number];

export function isAnchorType(value: unknown): value is AnchorType {
  return ANCHOR_TYPES.some((type) => type === value);
}

export type CssAnchor = {
  type: "css";
  selector: string;
};

export type AriaAnchor = {
  type: "aria";
  role: string;
  name: string;
};

export type TextAnchor = {
  type: "text";
  content: string;
  exact: boolean;
};

/**
 * Logical description of a target element. Whether it currently matches
 * anything on the page is decided by the locator, not by the descriptor.
 */
export type AnchorDescriptor = CssAnchor | AriaAnchor | TextAnchor;

export function cssAnchor(selector: string): CssAnchor {
  return { type: "css", selector };
}

export function ariaAnchor(role: string, name: string): AriaAnchor {
  return { type: "aria", role, name };
}

export function textAnchor(content: string, exact = false): TextAnchor {
  return { type: "text", content, exact };
}

/**
 * Canonical string rendering. Anchors that are structurally identical render
 * to the same key, so the key doubles as the identity used by the healer.
 */
export function anchorKey(anchor: AnchorDescriptor): string {
  switch (anchor.type) {
    case "css":
      return `css:${anchor.selector}`;
    case "aria":
      return `aria:${anchor.role}[name='${anchor.name}']`;
    case "text":
      return anchor.exact ? `text:exact:'${anchor.content}'` : `text:partial:'${anchor.content}'`;
  }
}

export function anchorsEqual(left: AnchorDescriptor, right: AnchorDescriptor): boolean {
  return anchorKey(left) === anchorKey(right);
}
