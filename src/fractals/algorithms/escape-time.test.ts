import { describe, expect, it } from "vitest";

import { DEFAULT_JULIA_PARAMETER, computeIteration, iterate } from "./escape-time";

describe("escape-time iteration", () => {
  describe("mandelbrot", () => {
    it("should never escape at the origin", () => {
      const result = computeIteration({ type: "mandelbrot" }, { re: 0, im: 0 }, 1000);
      expect(result).toEqual({ escaped: false, iterations: 1000, zr: 0, zi: 0 });
    });

    it("should escape at iteration 1 for c = 2 + 2i", () => {
      const result = computeIteration({ type: "mandelbrot" }, { re: 2, im: 2 }, 100);

      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(1);
      expect(result.zr).toBe(2);
      expect(result.zi).toBe(2);
      if (result.escaped) {
        // 2 - log2(log2(sqrt(8)))
        expect(result.smoothed).toBeCloseTo(1.4150375, 6);
      }
    });

    it("should escape just outside the main cardioid", () => {
      const result = computeIteration({ type: "mandelbrot" }, { re: 0.5, im: 0 }, 100);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(5);
    });

    it("should keep points of the period-2 bulb interior", () => {
      const result = computeIteration({ type: "mandelbrot" }, { re: -1, im: 0 }, 500);
      expect(result.escaped).toBe(false);
    });

    it("should report the iteration budget for interior points", () => {
      expect(computeIteration({ type: "mandelbrot" }, { re: -0.1, im: 0.1 }, 37).iterations).toBe(37);
    });
  });

  describe("julia", () => {
    it("should keep the origin bounded for c = -0.123 + 0.745i", () => {
      const result = computeIteration({ type: "julia", c: { re: -0.123, im: 0.745 } }, { re: 0, im: 0 }, 1000);
      expect(result.escaped).toBe(false);
    });

    it("should escape late from the origin for the default parameter", () => {
      const result = computeIteration({ type: "julia", c: DEFAULT_JULIA_PARAMETER }, { re: 0, im: 0 }, 1000);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(252);
    });

    it("should stay interior when the budget runs out before escape", () => {
      const result = computeIteration({ type: "julia", c: DEFAULT_JULIA_PARAMETER }, { re: 0, im: 0 }, 200);
      expect(result).toMatchObject({ escaped: false, iterations: 200 });
    });

    it("should escape at iteration 0 when z0 is already outside the radius", () => {
      const result = computeIteration({ type: "julia", c: DEFAULT_JULIA_PARAMETER }, { re: 10, im: 10 }, 100);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(0);
      expect(result.zr).toBe(10);
      expect(result.zi).toBe(10);
    });
  });

  describe("iterate", () => {
    it("should treat |z|² = 4 as not escaped", () => {
      // z stays at 2 for c = -2: 2² - 2 = 2
      const result = iterate({ re: 2, im: 0 }, { re: -2, im: 0 }, 50);
      expect(result.escaped).toBe(false);
    });

    it("should produce smoothed values close to the integer count", () => {
      const result = iterate({ re: 0, im: 0 }, { re: 1, im: 0 }, 100);
      expect(result.escaped).toBe(true);
      expect(result.iterations).toBe(3);
      if (result.escaped) {
        expect(result.smoothed).toBeGreaterThan(2);
        expect(result.smoothed).toBeLessThan(4);
      }
    });
  });
});
