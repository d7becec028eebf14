/**
 * Error taxonomy for the layout engine.
 *
 * Overflow (long titles, long words, values past their total) is a
 * rendering policy and never shows up here.
 */

export type LayoutErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_INPUT"
  | "UNKNOWN_DISPLAY_KIND";

/** Base class for every error a renderer or the dispatcher raises. */
export abstract class LayoutError extends Error {
  abstract readonly code: LayoutErrorCode;
}

/** A non-positive width (or other layout parameter) was supplied. */
export class InvalidConfigError extends LayoutError {
  readonly code = "INVALID_CONFIG";

  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

/** Data is structurally invalid for the requested display kind. */
export class InvalidInputError extends LayoutError {
  readonly code = "INVALID_INPUT";
  /** Dotted path of the offending field, when known */
  readonly path: string | undefined;

  constructor(message: string, options: { path?: string } = {}) {
    super(message);
    this.name = "InvalidInputError";
    this.path = options.path;
  }
}

/** No renderer is registered for the requested kind. */
export class UnknownDisplayKindError extends LayoutError {
  readonly code = "UNKNOWN_DISPLAY_KIND";
  readonly kind: string;
  readonly available: readonly string[];

  constructor(kind: string, available: readonly string[]) {
    const known = available.length > 0 ? available.join(", ") : "none";
    super(`Unknown display kind: ${kind} (registered: ${known})`);
    this.name = "UnknownDisplayKindError";
    this.kind = kind;
    this.available = available;
  }
}

export function isLayoutError(value: unknown): value is LayoutError {
  return value instanceof LayoutError;
}

/** Throw InvalidConfigError unless `width` is a positive integer. */
export function assertWidth(width: number, what = "width"): void {
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidConfigError(
      `${what} must be a positive integer, got ${String(width)}`
    );
  }
}
