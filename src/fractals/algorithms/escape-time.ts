// ABOUTME: Escape-time iteration shared by the Mandelbrot and Julia sets
// ABOUTME: The fractal kind only decides where z0 and c come from

import type { ComplexPoint, FractalKind, IterationResult } from "../types";

/** |z|² above which a point has escaped (|z| > 2). */
export const ESCAPE_RADIUS_SQUARED = 4;

/** A Julia parameter that renders a detailed, nearly connected set. */
export const DEFAULT_JULIA_PARAMETER: ComplexPoint = { re: -0.8, im: 0.156 };

/**
 * Iterates z → z² + c from z0 until |z|² > 4 or maxIterations is reached.
 *
 * The escape test runs before each step, so a z0 already outside the radius
 * escapes at iteration 0. On escape the smoothed value
 * n + 1 - log2(log2(|z_n|)) removes banding between integer counts.
 */
export function iterate(z0: ComplexPoint, c: ComplexPoint, maxIterations: number): IterationResult {
  let zr = z0.re;
  let zi = z0.im;
  const cr = c.re;
  const ci = c.im;

  for (let n = 0; ; n++) {
    const zr2 = zr * zr;
    const zi2 = zi * zi;
    const magnitudeSquared = zr2 + zi2;

    if (magnitudeSquared > ESCAPE_RADIUS_SQUARED) {
      return {
        escaped: true,
        iterations: n,
        smoothed: n + 1 - Math.log2(Math.log2(Math.sqrt(magnitudeSquared))),
        zr,
        zi,
      };
    }

    if (n >= maxIterations) {
      return { escaped: false, iterations: maxIterations, zr, zi };
    }

    // (zr + zi·i)² = zr² - zi² + 2·zr·zi·i
    const nextZr = zr2 - zi2 + cr;
    zi = 2 * zr * zi + ci;
    zr = nextZr;
  }
}

/**
 * Computes the escape result of one complex-plane point for a fractal kind.
 *
 * Mandelbrot: z0 = 0, c = point. Julia: z0 = point, c fixed by the kind.
 */
export function computeIteration(kind: FractalKind, point: ComplexPoint, maxIterations: number): IterationResult {
  switch (kind.type) {
    case "mandelbrot":
      return iterate({ re: 0, im: 0 }, point, maxIterations);
    case "julia":
      return iterate(point, kind.c, maxIterations);
  }
}
