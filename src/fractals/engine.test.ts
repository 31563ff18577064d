import { describe, expect, it } from "vitest";

import { defaultViewport } from "../lib/viewport";
import { builtInPalette } from "./algorithms/coloring";
import { computePixel, validateRenderRequest } from "./engine";
import { InvalidRequestError, OutOfBoundsError } from "./errors";
import type { RenderRequest } from "./types";

const request: RenderRequest = {
  viewport: defaultViewport(4, 3),
  fractal: { type: "mandelbrot" },
  palette: builtInPalette("classic"),
  maxIterations: 50,
  resolution: { width: 4, height: 3 },
};

describe("engine", () => {
  describe("computePixel", () => {
    it("should color the cardioid interior black", () => {
      // Pixel (2, 1) maps to -0.5 + 0.5i
      expect(computePixel(2, 1, request)).toEqual([0, 0, 0]);
    });

    it("should color escaping pixels from the palette", () => {
      // Pixel (0, 0) maps to -2.5 + 1.5i and escapes at iteration 1
      expect(computePixel(0, 0, request)).toEqual([7, 0, 248]);
      // Pixel (3, 1) maps to 0.5 + 0.5i and escapes at iteration 5
      expect(computePixel(3, 1, request)).toEqual([26, 0, 229]);
    });

    it("should return identical colors for identical inputs", () => {
      const first = computePixel(1, 1, request);
      const second = computePixel(1, 1, structuredClone(request));
      expect(second).toEqual(first);
    });

    it("should sample the viewport at the request resolution", () => {
      const doubled: RenderRequest = { ...request, resolution: { width: 8, height: 6 } };
      expect(computePixel(4, 2, doubled)).toEqual(computePixel(2, 1, request));
    });

    it("should reject pixels outside the output resolution", () => {
      expect(() => computePixel(4, 0, request)).toThrow(OutOfBoundsError);
    });
  });

  describe("validateRenderRequest", () => {
    it("should accept a well-formed request", () => {
      expect(() => validateRenderRequest(request)).not.toThrow();
    });

    it("should reject a zero iteration budget", () => {
      expect(() => validateRenderRequest({ ...request, maxIterations: 0 })).toThrow(InvalidRequestError);
      expect(() => validateRenderRequest({ ...request, maxIterations: 2.5 })).toThrow(InvalidRequestError);
    });

    it("should reject an empty resolution", () => {
      expect(() => validateRenderRequest({ ...request, resolution: { width: 0, height: 3 } })).toThrow(
        "Resolution must have positive integer dimensions, got 0x3"
      );
    });
  });
});
