/**
 * Errors raised while building or serializing markup.
 */

export type ConstructionErrorCode = "missing_tag" | "expected_tag" | "invalid_tag_name";

/**
 * An element or tag could not be built from the given arguments.
 * Always thrown synchronously by the constructor that received them.
 */
export class ConstructionError extends Error {
  constructor(
    public readonly code: ConstructionErrorCode,
    message: string
  ) {
    super(message);
    this.name = "ConstructionError";
  }
}

/**
 * A child value could not be turned into output.
 * Thrown lazily, when the offending child is pulled from the fragment
 * sequence; fragments emitted before it remain valid.
 */
export class RenderError extends Error {
  constructor(
    public readonly code: "unsupported_child",
    public readonly valueType: string,
    message?: string
  ) {
    super(message ?? `Cannot render child of type ${valueType}`);
    this.name = "RenderError";
  }
}

/**
 * Short type name for error messages ("string", "null", "Array", "Map").
 */
export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "function") {
    return "function";
  }
  if (typeof value !== "object") {
    return typeof value;
  }
  const ctor: unknown = Reflect.get(value, "constructor");
  if (typeof ctor === "function" && ctor.name !== "") {
    return ctor.name;
  }
  return "Object";
}
