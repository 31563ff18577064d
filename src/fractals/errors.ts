export type FractalErrorCode =
  | "OUT_OF_BOUNDS"
  | "DEGENERATE_SELECTION"
  | "INVALID_REQUEST"
  | "INVALID_FAVORITE"
  | "RENDER_CANCELLED"
  | "INVALID_JOB_TRANSITION";

/**
 * Base class for every error the engine raises.
 * The `code` property identifies the failure without string matching on messages.
 */
export class FractalError extends Error {
  override readonly name: string = "FractalError";
  readonly code: FractalErrorCode;

  constructor(code: FractalErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A pixel coordinate outside the addressed grid. */
export class OutOfBoundsError extends FractalError {
  override readonly name = "OutOfBoundsError";

  constructor(
    readonly x: number,
    readonly y: number,
    readonly gridWidth: number,
    readonly gridHeight: number
  ) {
    super("OUT_OF_BOUNDS", `Pixel (${x}, ${y}) is outside the ${gridWidth}x${gridHeight} grid`);
  }
}

/** A zoom selection with zero width or zero height. The viewport stays as it was. */
export class DegenerateSelectionError extends FractalError {
  override readonly name = "DegenerateSelectionError";

  constructor(message = "Zoom selection has zero width or height") {
    super("DEGENERATE_SELECTION", message);
  }
}

/** A render request rejected before any computation starts. */
export class InvalidRequestError extends FractalError {
  override readonly name = "InvalidRequestError";

  constructor(message: string) {
    super("INVALID_REQUEST", message);
  }
}

export class InvalidFavoriteError extends FractalError {
  override readonly name = "InvalidFavoriteError";

  constructor(message: string) {
    super("INVALID_FAVORITE", message);
  }
}

export class RenderCancelledError extends FractalError {
  override readonly name = "RenderCancelledError";

  constructor(message = "Render cancelled") {
    super("RENDER_CANCELLED", message);
  }
}

export class InvalidJobTransitionError extends FractalError {
  override readonly name = "InvalidJobTransitionError";

  constructor(from: string, to: string) {
    super("INVALID_JOB_TRANSITION", `Render job cannot move from ${from} to ${to}`);
  }
}
