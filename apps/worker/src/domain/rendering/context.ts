/**
 * Render context preparation: defaults and storability.
 *
 * The context is stored on the delivery log as JSON, so anything that
 * would not survive JSON.stringify unchanged is rejected up front.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export interface DefaultContext {
  site_name: string;
  site_url: string;
}

export class ContextValidationError extends Error {
  constructor(readonly path: string, reason: string) {
    super(`Context is not JSON-serializable at ${path}: ${reason}`);
    this.name = "ContextValidationError";
  }
}

/**
 * Caller keys win over defaults.
 */
export function mergeContext(defaults: DefaultContext, context: Record<string, unknown> = {}): Record<string, unknown> {
  return { ...defaults, ...context };
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toJson(value: unknown, path: string, seen: Set<object>): JsonValue {
  if (value === null) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      if (!Number.isFinite(value)) {
        throw new ContextValidationError(path, `non-finite number ${value}`);
      }
      return value;
    case "undefined":
      throw new ContextValidationError(path, "undefined value");
    case "bigint":
    case "symbol":
    case "function":
      throw new ContextValidationError(path, `${typeof value} value`);
  }

  if (typeof value !== "object") {
    throw new ContextValidationError(path, "unsupported value");
  }

  if (seen.has(value)) {
    throw new ContextValidationError(path, "circular reference");
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ContextValidationError(path, "invalid date");
    }
    return value.toISOString();
  }

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item, index) => toJson(item, `${path}[${index}]`, seen));
    }

    if (!isPlainObject(value)) {
      throw new ContextValidationError(path, `instance of ${value.constructor.name}`);
    }

    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJson(entry, `${path}.${key}`, seen);
    }
    return result;
  } finally {
    seen.delete(value);
  }
}

/**
 * Returns a JSON-safe copy of the context (dates become ISO strings) or
 * throws ContextValidationError naming the first offending path.
 */
export function toStorableContext(context: Record<string, unknown>): JsonObject {
  const result: JsonObject = {};
  const seen = new Set<object>([context]);
  for (const [key, value] of Object.entries(context)) {
    result[key] = toJson(value, key, seen);
  }
  return result;
}
