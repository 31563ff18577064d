// ABOUTME: The persisted "favorite view" record and its validation
// ABOUTME: Holds enough to rebuild every non-resolution field of a RenderRequest

import { isBuiltInPaletteId, isRgb } from "../fractals/algorithms/coloring";
import { InvalidFavoriteError } from "../fractals/errors";
import type { ComplexPoint, FractalKind, Palette, RenderRequest, Resolution, Viewport } from "../fractals/types";

export const FAVORITE_VERSION = 1;

/**
 * A saved view. Plain JSON-safe data: numbers, strings and arrays only, so it
 * survives JSON.stringify / JSON.parse without loss.
 */
export interface FavoriteView {
  version: typeof FAVORITE_VERSION;
  viewport: {
    center: ComplexPoint;
    halfWidth: number;
    halfHeight: number;
    pixelWidth: number;
    pixelHeight: number;
  };
  fractal: FractalKind;
  palette: Palette;
}

export function toFavorite(view: { viewport: Viewport; fractal: FractalKind; palette: Palette }): FavoriteView {
  const { viewport, fractal, palette } = view;
  return {
    version: FAVORITE_VERSION,
    viewport: {
      center: { re: viewport.center.re, im: viewport.center.im },
      halfWidth: viewport.halfWidth,
      halfHeight: viewport.halfHeight,
      pixelWidth: viewport.pixelWidth,
      pixelHeight: viewport.pixelHeight,
    },
    fractal:
      fractal.type === "julia" ? { type: "julia", c: { re: fractal.c.re, im: fractal.c.im } } : { type: "mandelbrot" },
    palette:
      palette.type === "gradient"
        ? { type: "gradient", from: [...palette.from], to: [...palette.to] }
        : { type: "builtin", id: palette.id },
  };
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);

function parseComplex(value: unknown, field: string): ComplexPoint {
  if (!isRecord(value) || !isFiniteNumber(value.re) || !isFiniteNumber(value.im)) {
    throw new InvalidFavoriteError(`${field} must be a complex point { re, im }`);
  }
  return { re: value.re, im: value.im };
}

function parseViewport(value: unknown): FavoriteView["viewport"] {
  if (!isRecord(value)) {
    throw new InvalidFavoriteError("viewport is missing");
  }
  const { halfWidth, halfHeight, pixelWidth, pixelHeight } = value;
  if (!isFiniteNumber(halfWidth) || !isFiniteNumber(halfHeight) || halfWidth <= 0 || halfHeight <= 0) {
    throw new InvalidFavoriteError("viewport half extents must be positive numbers");
  }
  if (
    typeof pixelWidth !== "number" ||
    typeof pixelHeight !== "number" ||
    !Number.isInteger(pixelWidth) ||
    !Number.isInteger(pixelHeight) ||
    pixelWidth <= 0 ||
    pixelHeight <= 0
  ) {
    throw new InvalidFavoriteError("viewport pixel dimensions must be positive integers");
  }
  return { center: parseComplex(value.center, "viewport.center"), halfWidth, halfHeight, pixelWidth, pixelHeight };
}

function parseFractal(value: unknown): FractalKind {
  if (isRecord(value) && value.type === "mandelbrot") {
    return { type: "mandelbrot" };
  }
  if (isRecord(value) && value.type === "julia") {
    return { type: "julia", c: parseComplex(value.c, "fractal.c") };
  }
  throw new InvalidFavoriteError("fractal must be { type: \"mandelbrot\" } or { type: \"julia\", c }");
}

function parsePalette(value: unknown): Palette {
  if (isRecord(value) && value.type === "builtin") {
    if (!isBuiltInPaletteId(value.id)) {
      throw new InvalidFavoriteError(`Unknown palette ${String(value.id)}`);
    }
    return { type: "builtin", id: value.id };
  }
  if (isRecord(value) && value.type === "gradient") {
    if (!isRgb(value.from) || !isRgb(value.to)) {
      throw new InvalidFavoriteError("gradient colors must be 8-bit RGB triples");
    }
    return { type: "gradient", from: [...value.from], to: [...value.to] };
  }
  throw new InvalidFavoriteError("palette must be a built-in palette or a gradient");
}

/**
 * Validates an already-decoded JSON value as a favorite view.
 *
 * @throws InvalidFavoriteError naming the first field that does not fit
 */
export function parseFavorite(value: unknown): FavoriteView {
  if (!isRecord(value)) {
    throw new InvalidFavoriteError("Favorite must be an object");
  }
  if (value.version !== FAVORITE_VERSION) {
    throw new InvalidFavoriteError(`Unsupported favorite version ${String(value.version)}`);
  }
  return {
    version: FAVORITE_VERSION,
    viewport: parseViewport(value.viewport),
    fractal: parseFractal(value.fractal),
    palette: parsePalette(value.palette),
  };
}

/** Rebuilds a render request from a favorite plus the fields a favorite does not store. */
export function requestFromFavorite(
  favorite: FavoriteView,
  settings: { maxIterations: number; resolution?: Resolution }
): RenderRequest {
  const viewport: Viewport = { ...favorite.viewport, center: { ...favorite.viewport.center } };
  return {
    viewport,
    fractal: favorite.fractal,
    palette: favorite.palette,
    maxIterations: settings.maxIterations,
    resolution: settings.resolution ?? { width: viewport.pixelWidth, height: viewport.pixelHeight },
  };
}
