/**
 * Raised when a config or argument is invalid: negative sizes, an empty point
 * list, malformed colors, non-finite numbers. Construction never yields a
 * partially valid component.
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export interface IndeterminateGeometry {
  code: "indeterminate-geometry";
  message: string;
}

/**
 * Outcome of a derived-geometry query. The input was valid in both branches;
 * the failure branch means the answer depends on rendering context
 * (font metrics, for text).
 */
export type GeometryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: IndeterminateGeometry };

export function determinate<T>(value: T): GeometryResult<T> {
  return { ok: true, value };
}

export function indeterminate<T>(message: string): GeometryResult<T> {
  return { ok: false, error: { code: "indeterminate-geometry", message } };
}

/** Thrown where a chainable operation needs geometry that cannot be known. */
export class IndeterminateGeometryError extends Error {
  readonly code = "indeterminate-geometry";

  constructor(message: string) {
    super(message);
    this.name = "IndeterminateGeometryError";
  }
}

/** Return the value of a determinate result, or throw IndeterminateGeometryError. */
export function unwrapGeometry<T>(result: GeometryResult<T>): T {
  if (!result.ok) {
    throw new IndeterminateGeometryError(result.error.message);
  }
  return result.value;
}
