// ABOUTME: Per-pixel fractal computation: pixel -> complex point -> escape result -> color
// ABOUTME: Pure functions, safe to call from any number of workers at once

import { pixelToComplex, withResolution } from "../lib/viewport";
import { colorForResult } from "./algorithms/coloring";
import { computeIteration } from "./algorithms/escape-time";
import { InvalidRequestError } from "./errors";
import type { IterationResult, RenderRequest, Rgb, Viewport } from "./types";

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

/**
 * Rejects requests that cannot produce an image.
 *
 * @throws InvalidRequestError for zero (or non-integer) iterations or a zero-sized resolution
 */
export function validateRenderRequest(request: RenderRequest): void {
  const { maxIterations, resolution, viewport } = request;

  if (!isPositiveInteger(maxIterations)) {
    throw new InvalidRequestError(`maxIterations must be a positive integer, got ${maxIterations}`);
  }
  if (!isPositiveInteger(resolution.width) || !isPositiveInteger(resolution.height)) {
    throw new InvalidRequestError(
      `Resolution must have positive integer dimensions, got ${resolution.width}x${resolution.height}`
    );
  }
  if (!(viewport.halfWidth > 0) || !(viewport.halfHeight > 0)) {
    throw new InvalidRequestError(
      `Viewport half extents must be positive, got ${viewport.halfWidth} x ${viewport.halfHeight}`
    );
  }
}

/** The request's viewport resampled onto its output resolution. */
export const renderGrid = (request: RenderRequest): Viewport =>
  withResolution(request.viewport, request.resolution.width, request.resolution.height);

/** Escape result for pixel (px, py) of a grid. */
export function computePixelIteration(
  grid: Viewport,
  px: number,
  py: number,
  request: RenderRequest
): IterationResult {
  const point = pixelToComplex(grid, px, py);
  return computeIteration(request.fractal, point, request.maxIterations);
}

/**
 * Computes the color of one pixel of the request's output image.
 * Identical inputs always give identical output.
 *
 * @throws OutOfBoundsError if (px, py) is outside the request's resolution
 */
export function computePixel(px: number, py: number, request: RenderRequest): Rgb {
  const grid = renderGrid(request);
  const result = computePixelIteration(grid, px, py, request);
  return colorForResult(result, request.palette, request.maxIterations);
}
