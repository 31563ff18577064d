import { describe, expect, it, vi } from "vitest";

import { DEFAULT_VIEWPORT, defaultViewport } from "../../lib/viewport";
import { builtInPalette } from "../algorithms/coloring";
import type { PixelBuffer, RenderRequest } from "../types";
import { createHighResolutionJob, pixelAt } from "./index";
import type { FractalRenderer } from "./parallel-renderer";
import { RENDER_PROFILES, profileResolution, requestForProfile } from "./profiles";

const request: RenderRequest = {
  viewport: DEFAULT_VIEWPORT,
  fractal: { type: "julia", c: { re: -0.8, im: 0.156 } },
  palette: builtInPalette("sunset"),
  maxIterations: 300,
  resolution: { width: 800, height: 600 },
};

describe("render profiles", () => {
  it("should render interactive previews at the viewport grid", () => {
    expect(profileResolution(DEFAULT_VIEWPORT, "interactive")).toEqual({ width: 800, height: 600 });
  });

  it("should render high-resolution exports at four times the grid", () => {
    expect(RENDER_PROFILES.highResolution.scale).toBe(4);
    expect(profileResolution(DEFAULT_VIEWPORT, "highResolution")).toEqual({ width: 3200, height: 2400 });
    expect(profileResolution(defaultViewport(300, 200), "highResolution")).toEqual({ width: 1200, height: 800 });
  });

  it("should change only the resolution of a request", () => {
    const high = requestForProfile(request, "highResolution");
    expect(high).toEqual({ ...request, resolution: { width: 3200, height: 2400 } });
    expect(high.viewport).toBe(request.viewport);
    expect(request.resolution).toEqual({ width: 800, height: 600 });
  });
});

describe("createHighResolutionJob", () => {
  it("should create a pending job for the high-resolution request", async () => {
    const buffer: PixelBuffer = { width: 3200, height: 2400, data: new Uint8ClampedArray(0) };
    const renderer: FractalRenderer = { render: vi.fn().mockResolvedValue(buffer) };

    const job = createHighResolutionJob(renderer, request);

    expect(job.status).toBe("pending");
    expect(job.request.resolution).toEqual({ width: 3200, height: 2400 });
    expect(renderer.render).not.toHaveBeenCalled();

    await expect(job.start()).resolves.toBe(buffer);
    expect(renderer.render).toHaveBeenCalledWith(job.request, expect.any(Object));
  });
});

describe("pixelAt", () => {
  it("should read the RGB triple of a pixel", () => {
    const buffer: PixelBuffer = {
      width: 2,
      height: 2,
      data: new Uint8ClampedArray([0, 0, 0, 1, 2, 3, 4, 5, 6, 7, 8, 9]),
    };
    expect(pixelAt(buffer, 1, 0)).toEqual([1, 2, 3]);
    expect(pixelAt(buffer, 1, 1)).toEqual([7, 8, 9]);
  });
});
