// ABOUTME: Tests for palette evaluation and escape-result coloring
// ABOUTME: Covers built-in curves, user gradients and the interior color

import { describe, expect, it } from "vitest";

import { InvalidRequestError } from "../errors";
import type { IterationResult } from "../types";
import {
  BUILT_IN_PALETTES,
  INTERIOR_COLOR,
  builtInPalette,
  colorForResult,
  gradientPalette,
  hslToRgb,
  isBuiltInPaletteId,
  normalizeEscape,
  paletteColor,
} from "./coloring";

const interior: IterationResult = { escaped: false, iterations: 100, zr: 0.1, zi: 0.2 };

describe("coloring", () => {
  describe("gradient palettes", () => {
    const blackToWhite = gradientPalette([0, 0, 0], [255, 255, 255]);

    it("should return the start color at t = 0", () => {
      expect(paletteColor(blackToWhite, 0)).toEqual([0, 0, 0]);
    });

    it("should return the end color at t = 1", () => {
      expect(paletteColor(blackToWhite, 1)).toEqual([255, 255, 255]);
    });

    it("should round the midpoint to the nearest channel value", () => {
      expect(paletteColor(blackToWhite, 0.5)).toEqual([128, 128, 128]);
    });

    it("should interpolate each channel independently", () => {
      const palette = gradientPalette([0, 255, 255], [255, 0, 255]);
      expect(paletteColor(palette, 0.25)).toEqual([64, 191, 255]);
    });

    it("should clamp t outside [0, 1]", () => {
      expect(paletteColor(blackToWhite, -3)).toEqual([0, 0, 0]);
      expect(paletteColor(blackToWhite, 7)).toEqual([255, 255, 255]);
      expect(paletteColor(blackToWhite, Number.NaN)).toEqual([0, 0, 0]);
    });

    it("should reject colors that are not 8-bit triples", () => {
      expect(() => gradientPalette([0, 0, 256], [0, 0, 0])).toThrow(InvalidRequestError);
      expect(() => gradientPalette([0, 0.5, 0], [0, 0, 0])).toThrow(InvalidRequestError);
    });

    it("should copy the colors it is given", () => {
      const from: [number, number, number] = [1, 2, 3];
      const palette = gradientPalette(from, [4, 5, 6]);
      from[0] = 99;
      expect(paletteColor(palette, 0)).toEqual([1, 2, 3]);
    });
  });

  describe("built-in palettes", () => {
    it("should go from blue to red in the classic palette", () => {
      expect(paletteColor(builtInPalette("classic"), 0)).toEqual([0, 0, 255]);
      expect(paletteColor(builtInPalette("classic"), 1)).toEqual([255, 0, 0]);
    });

    it("should pass black, red, yellow and white in the fire palette", () => {
      const fire = builtInPalette("fire");
      expect(paletteColor(fire, 0)).toEqual([0, 0, 0]);
      expect(paletteColor(fire, 0.05)).toEqual([128, 0, 0]);
      expect(paletteColor(fire, 0.1)).toEqual([255, 0, 0]);
      expect(paletteColor(fire, 0.5)).toEqual([255, 255, 0]);
      expect(paletteColor(fire, 1)).toEqual([255, 255, 255]);
    });

    it("should be a straight ramp in grayscale", () => {
      expect(paletteColor(builtInPalette("grayscale"), 0.2)).toEqual([51, 51, 51]);
    });

    it("should produce valid 8-bit channels across the whole range", () => {
      for (const { id } of BUILT_IN_PALETTES) {
        for (let i = 0; i <= 20; i++) {
          const color = paletteColor(builtInPalette(id), i / 20);
          expect(color).toHaveLength(3);
          for (const value of color) {
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
            expect(value).toBeLessThanOrEqual(255);
          }
        }
      }
    });

    it("should list every palette id once", () => {
      const ids = BUILT_IN_PALETTES.map((p) => p.id);
      expect(new Set(ids).size).toBe(ids.length);
      expect(ids.every(isBuiltInPaletteId)).toBe(true);
      expect(isBuiltInPaletteId("toString")).toBe(false);
      expect(isBuiltInPaletteId("sepia")).toBe(false);
    });
  });

  describe("hslToRgb", () => {
    it("should convert primary hues", () => {
      expect(hslToRgb(0, 1, 0.5)).toEqual([255, 0, 0]);
      expect(hslToRgb(120, 1, 0.5)).toEqual([0, 255, 0]);
      expect(hslToRgb(240, 1, 0.5)).toEqual([0, 0, 255]);
    });

    it("should wrap hues outside 0-360", () => {
      expect(hslToRgb(480, 1, 0.5)).toEqual(hslToRgb(120, 1, 0.5));
      expect(hslToRgb(-120, 1, 0.5)).toEqual(hslToRgb(240, 1, 0.5));
    });
  });

  describe("colorForResult", () => {
    it("should color interior points black for every palette", () => {
      for (const { id } of BUILT_IN_PALETTES) {
        expect(colorForResult(interior, builtInPalette(id), 100)).toEqual([0, 0, 0]);
      }
      expect(colorForResult(interior, gradientPalette([255, 255, 255], [200, 10, 10]), 100)).toEqual([0, 0, 0]);
      expect(INTERIOR_COLOR).toEqual([0, 0, 0]);
    });

    it("should normalize the smoothed value by the iteration budget", () => {
      const escaped: IterationResult = { escaped: true, iterations: 49, smoothed: 50, zr: 3, zi: 0 };
      const palette = gradientPalette([0, 0, 0], [255, 255, 255]);
      expect(colorForResult(escaped, palette, 100)).toEqual([128, 128, 128]);
    });

    it("should clamp normalized values", () => {
      expect(normalizeEscape(-0.9, 100)).toBe(0);
      expect(normalizeEscape(150, 100)).toBe(1);
      expect(normalizeEscape(25, 100)).toBe(0.25);
    });
  });
});
