import {
  type AnchorDescriptor,
  ariaAnchor,
  cssAnchor,
  isAnchorType,
  textAnchor
} from "./types";

export type ValidationError = {
  path: string;
  message: string;
};

type ValidationContext = {
  errors: ValidationError[];
};

export class AnchorSchemaError extends Error {
  readonly issues: readonly ValidationError[];

  constructor(message: string, issues: readonly ValidationError[]) {
    super(message);
    this.name = "AnchorSchemaError";
    this.issues = issues;
  }
}

function pushError(ctx: ValidationContext, path: string, message: string): void {
  ctx.errors.push({ path, message });
}

function assertRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function readAnchor(value: unknown, ctx: ValidationContext, path: string): AnchorDescriptor | null {
  if (!assertRecord(value)) {
    pushError(ctx, path, "Anchor must be an object");
    return null;
  }

  const typeValue = value.type;
  if (!isAnchorType(typeValue)) {
    pushError(ctx, `${path}.type`, `Invalid anchor type: ${String(typeValue)}`);
    return null;
  }

  const anchorPath = `${path}<${typeValue}>`;
  switch (typeValue) {
    case "css": {
      if (!isNonEmptyString(value.selector)) {
        pushError(ctx, `${anchorPath}.selector`, "CSS anchor requires selector");
        return null;
      }
      return cssAnchor(value.selector);
    }
    case "aria": {
      const { role, name } = value;
      if (!isNonEmptyString(role)) {
        pushError(ctx, `${anchorPath}.role`, "ARIA anchor requires role");
      }
      if (!isNonEmptyString(name)) {
        pushError(ctx, `${anchorPath}.name`, "ARIA anchor requires name");
      }
      if (!isNonEmptyString(role) || !isNonEmptyString(name)) {
        return null;
      }
      return ariaAnchor(role, name);
    }
    case "text": {
      const { content, exact } = value;
      if (!isNonEmptyString(content)) {
        pushError(ctx, `${anchorPath}.content`, "Text anchor requires content");
      }
      if (typeof exact !== "undefined" && typeof exact !== "boolean") {
        pushError(ctx, `${anchorPath}.exact`, "exact must be a boolean");
      }
      if (!isNonEmptyString(content) || (typeof exact !== "undefined" && typeof exact !== "boolean")) {
        return null;
      }
      return textAnchor(content, exact === true);
    }
  }
}

export function validateAnchor(value: unknown, path = "anchor"): ValidationError[] {
  const ctx: ValidationContext = { errors: [] };
  readAnchor(value, ctx, path);
  return ctx.errors;
}

export function parseAnchor(value: unknown): AnchorDescriptor {
  const ctx: ValidationContext = { errors: [] };
  const anchor = readAnchor(value, ctx, "anchor");

  if (!anchor || ctx.errors.length > 0) {
    throw new AnchorSchemaError("Anchor validation failed", ctx.errors);
  }

  return anchor;
}

export function loadAnchor(jsonText: string): AnchorDescriptor {
  try {
    const parsed: unknown = JSON.parse(jsonText);
    return parseAnchor(parsed);
  } catch (error) {
    if (error instanceof AnchorSchemaError) {
      throw error;
    }

    throw new AnchorSchemaError("Failed to parse anchor JSON", [
      { path: "<root>", message: error instanceof Error ? error.message : String(error) }
    ]);
  }
}

export function isAnchorDescriptor(value: unknown): value is AnchorDescriptor {
  return validateAnchor(value).length === 0;
}
