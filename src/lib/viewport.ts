// ABOUTME: Pixel <-> complex-plane mapping and zoom navigation for a viewport
// ABOUTME: Every operation returns a new Viewport; nothing is mutated in place

import { DegenerateSelectionError, InvalidRequestError, OutOfBoundsError } from "../fractals/errors";
import type { ComplexPoint, PixelPoint, Viewport, ViewportBounds } from "../fractals/types";

export const DEFAULT_CENTER: ComplexPoint = { re: -0.5, im: 0 };

// The classic framing: at least [-2.5, 1.5] x [-1.5, 1.5] is always visible.
const DEFAULT_HALF_WIDTH = 2;
const DEFAULT_HALF_HEIGHT = 1.5;

export const DEFAULT_PIXEL_WIDTH = 800;
export const DEFAULT_PIXEL_HEIGHT = 600;

const assertGrid = (width: number, height: number) => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new InvalidRequestError(`Pixel grid must have positive integer dimensions, got ${width}x${height}`);
  }
};

export const createViewport = (
  center: ComplexPoint,
  halfWidth: number,
  halfHeight: number,
  pixelWidth: number,
  pixelHeight: number
): Viewport => {
  assertGrid(pixelWidth, pixelHeight);
  if (!(halfWidth > 0) || !(halfHeight > 0) || !Number.isFinite(halfWidth) || !Number.isFinite(halfHeight)) {
    throw new InvalidRequestError(`Viewport half extents must be positive, got ${halfWidth} x ${halfHeight}`);
  }
  return {
    center: { re: center.re, im: center.im },
    halfWidth,
    halfHeight,
    pixelWidth,
    pixelHeight,
  };
};

/**
 * The default view for a pixel grid. The shorter complex-plane extent is widened
 * to match the grid's aspect ratio, so the classic framing is never cropped.
 */
export const defaultViewport = (pixelWidth = DEFAULT_PIXEL_WIDTH, pixelHeight = DEFAULT_PIXEL_HEIGHT): Viewport => {
  assertGrid(pixelWidth, pixelHeight);
  const halfWidth = Math.max(DEFAULT_HALF_WIDTH, (DEFAULT_HALF_HEIGHT * pixelWidth) / pixelHeight);
  const halfHeight = Math.max(DEFAULT_HALF_HEIGHT, (DEFAULT_HALF_WIDTH * pixelHeight) / pixelWidth);
  return createViewport(DEFAULT_CENTER, halfWidth, halfHeight, pixelWidth, pixelHeight);
};

export const DEFAULT_VIEWPORT: Viewport = defaultViewport();

/**
 * Maps a pixel to its point in the complex plane.
 * The imaginary axis is flipped: pixel row 0 is the top (largest imaginary part).
 *
 * @throws OutOfBoundsError unless 0 <= px < pixelWidth and 0 <= py < pixelHeight
 */
export const pixelToComplex = (viewport: Viewport, px: number, py: number): ComplexPoint => {
  const { center, halfWidth, halfHeight, pixelWidth, pixelHeight } = viewport;
  if (!(px >= 0 && px < pixelWidth && py >= 0 && py < pixelHeight)) {
    throw new OutOfBoundsError(px, py, pixelWidth, pixelHeight);
  }

  const re = center.re + (px / pixelWidth - 0.5) * 2 * halfWidth;
  const im = center.im - (py / pixelHeight - 0.5) * 2 * halfHeight;
  return { re, im };
};

/** Inverse of pixelToComplex. Points outside the view map to pixels outside the grid. */
export const complexToPixel = (viewport: Viewport, point: ComplexPoint): PixelPoint => {
  const { center, halfWidth, halfHeight, pixelWidth, pixelHeight } = viewport;
  const x = ((point.re - center.re) / (2 * halfWidth) + 0.5) * pixelWidth;
  const y = (0.5 - (point.im - center.im) / (2 * halfHeight)) * pixelHeight;
  return { x, y };
};

/**
 * Zooms into the rectangle spanned by two pixel corners (a drag selection).
 *
 * The new view is centered on the selection. Its shorter complex-plane dimension
 * is expanded to the grid's aspect ratio, so the whole selection stays visible.
 *
 * @throws OutOfBoundsError if a corner is off the grid
 * @throws DegenerateSelectionError if the selection has zero width or height
 */
export const zoomToRect = (viewport: Viewport, p0: PixelPoint, p1: PixelPoint): Viewport => {
  const a = pixelToComplex(viewport, p0.x, p0.y);
  const b = pixelToComplex(viewport, p1.x, p1.y);

  if (p0.x === p1.x || p0.y === p1.y) {
    throw new DegenerateSelectionError(
      `Zoom selection (${p0.x}, ${p0.y}) -> (${p1.x}, ${p1.y}) has zero width or height`
    );
  }

  const center = { re: (a.re + b.re) / 2, im: (a.im + b.im) / 2 };
  let halfWidth = Math.abs(b.re - a.re) / 2;
  let halfHeight = Math.abs(b.im - a.im) / 2;

  const aspect = viewport.pixelWidth / viewport.pixelHeight;
  if (halfWidth / halfHeight < aspect) {
    halfWidth = halfHeight * aspect;
  } else {
    halfHeight = halfWidth / aspect;
  }

  return createViewport(center, halfWidth, halfHeight, viewport.pixelWidth, viewport.pixelHeight);
};

/** Doubles both half extents around the unchanged center. */
export const zoomOut = (viewport: Viewport): Viewport => ({
  ...viewport,
  halfWidth: viewport.halfWidth * 2,
  halfHeight: viewport.halfHeight * 2,
});

/** Returns the default view for the viewport's grid. There is no navigation history. */
export const resetViewport = (viewport: Viewport): Viewport =>
  defaultViewport(viewport.pixelWidth, viewport.pixelHeight);

/** Same complex-plane bounds on a different pixel grid (e.g. a high-resolution export). */
export const withResolution = (viewport: Viewport, pixelWidth: number, pixelHeight: number): Viewport => {
  if (viewport.pixelWidth === pixelWidth && viewport.pixelHeight === pixelHeight) {
    return viewport;
  }
  assertGrid(pixelWidth, pixelHeight);
  return { ...viewport, pixelWidth, pixelHeight };
};

export const viewportBounds = (viewport: Viewport): ViewportBounds => ({
  minRe: viewport.center.re - viewport.halfWidth,
  maxRe: viewport.center.re + viewport.halfWidth,
  minIm: viewport.center.im - viewport.halfHeight,
  maxIm: viewport.center.im + viewport.halfHeight,
});
