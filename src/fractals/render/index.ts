import type { PixelBuffer, RenderRequest, Rgb } from "../types";
import { ParallelRenderer, type FractalRenderer, type RenderOptions } from "./parallel-renderer";
import { requestForProfile } from "./profiles";
import { RenderJob } from "./render-job";

/**
 * Renders a request with a one-off renderer.
 *
 * @param request - The render snapshot (viewport, fractal, palette, iterations, resolution)
 * @param options - Render options (progress callback, abort signal, partitioning)
 */
export async function renderFractal(request: RenderRequest, options?: RenderOptions): Promise<PixelBuffer> {
  const renderer = new ParallelRenderer();
  return renderer.render(request, options);
}

/**
 * Creates a job rendering the request at the high-resolution profile. The
 * viewport's complex bounds are reused; only the pixel density changes.
 * Call `start()` on the returned job to run it.
 */
export function createHighResolutionJob(
  renderer: FractalRenderer,
  request: RenderRequest,
  options?: Omit<RenderOptions, "onProgress">
): RenderJob {
  return new RenderJob(renderer, requestForProfile(request, "highResolution"), options);
}

/** Reads pixel (x, y) of a rendered buffer. */
export function pixelAt(buffer: PixelBuffer, x: number, y: number): Rgb {
  const index = (y * buffer.width + x) * 3;
  return [buffer.data[index], buffer.data[index + 1], buffer.data[index + 2]];
}
