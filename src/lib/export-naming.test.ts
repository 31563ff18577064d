import { describe, expect, it } from "vitest";

import { builtInPalette, gradientPalette } from "../fractals/algorithms/coloring";
import { exportFileName, favoriteFileName, formatTimestamp } from "./export-naming";

// Local time, so the expected stamps hold in any time zone
const timestamp = new Date(2024, 0, 2, 3, 4, 5);

describe("export naming", () => {
  it("should format timestamps as YYYYMMDD_HHMMSS", () => {
    expect(formatTimestamp(timestamp)).toBe("20240102_030405");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe("20231231_235958");
  });

  it("should name high-resolution image exports", () => {
    expect(
      exportFileName({
        fractal: "julia",
        palette: builtInPalette("fire"),
        resolution: { width: 3200, height: 2400 },
        highResolution: true,
        timestamp,
      })
    ).toBe("fractals/julia_fire_20240102_030405_3200x2400_highres.png");
  });

  it("should name standard exports with a gradient palette", () => {
    expect(
      exportFileName({
        fractal: "mandelbrot",
        palette: gradientPalette([0, 255, 255], [255, 0, 255]),
        resolution: { width: 800, height: 600 },
        highResolution: false,
        timestamp,
      })
    ).toBe("fractals/mandelbrot_gradient_20240102_030405_800x600_std.png");
  });

  it("should name favorite files", () => {
    expect(favoriteFileName(timestamp)).toBe("fractals/favorite_20240102_030405.json");
  });
});
