import { InvalidRequestError } from "../errors";
import type { BuiltInPaletteId, IterationResult, Palette, Rgb } from "../types";

/** Color of points that never escape, whatever the palette. */
export const INTERIOR_COLOR: Readonly<Rgb> = [0, 0, 0];

type Curve = (t: number) => Rgb;

const clamp01 = (x: number) => Math.min(1, Math.max(0, x));

const channel = (value: number) => Math.min(255, Math.max(0, Math.round(value)));

const rgb = (r: number, g: number, b: number): Rgb => [channel(r), channel(g), channel(b)];

/**
 * HSL to RGB conversion utility function.
 *
 * @param h - Hue (0-360 degrees)
 * @param s - Saturation (0-1)
 * @param l - Lightness (0-1)
 */
export function hslToRgb(h: number, s: number, l: number): Rgb {
  h = h % 360;
  if (h < 0) h += 360;

  const c = (1 - Math.abs(2 * l - 1)) * s;
  const x = c * (1 - Math.abs(((h / 60) % 2) - 1));
  const m = l - c / 2;

  let r = 0,
    g = 0,
    b = 0;

  if (h < 60) {
    r = c;
    g = x;
  } else if (h < 120) {
    r = x;
    g = c;
  } else if (h < 180) {
    g = c;
    b = x;
  } else if (h < 240) {
    g = x;
    b = c;
  } else if (h < 300) {
    r = x;
    b = c;
  } else {
    r = c;
    b = x;
  }

  return rgb((r + m) * 255, (g + m) * 255, (b + m) * 255);
}

/**
 * Black → red → yellow → white.
 * - 0-10%: dark to bright red
 * - 10-50%: red to yellow (adding green)
 * - 50-100%: yellow to white (adding blue)
 */
const fire: Curve = (t) => {
  if (t < 0.1) return rgb(t * 10 * 255, 0, 0);
  if (t < 0.5) return rgb(255, (t - 0.1) * 2.5 * 255, 0);
  return rgb(255, 255, (t - 0.5) * 2 * 255);
};

// Bernstein-polynomial rainbow: dark at both ends, every hue in between
const rainbow: Curve = (t) =>
  rgb(
    9 * (1 - t) * t * t * t * 255,
    15 * (1 - t) * (1 - t) * t * t * 255,
    8.5 * (1 - t) * (1 - t) * (1 - t) * t * 255
  );

// Hue cycles six times over the range so deep zooms keep showing detail
const spectrum: Curve = (t) => hslToRgb(t * 6 * 360, 0.9, 0.5);

const curves: Record<BuiltInPaletteId, Curve> = {
  classic: (t) => rgb(255 * t, 0, 255 * (1 - t)),
  fire,
  ocean: (t) => rgb(0, 0.5 * 255 * t, 0.9 * 255 * t),
  forest: (t) => rgb(0.2 * 255 * t, 0.8 * 255 * t, 0.3 * 255 * t),
  rainbow,
  pastel: (t) => rgb(200, 200 - 255 * t, 255 - 127.5 * t),
  sunset: (t) => rgb(255 * t, 100 * (1 - t) + 50 * t, 50 * (1 - t)),
  ice: (t) => rgb(180 * (1 - t) + 200 * t, 220 * t, 255 * t),
  neon: (t) => rgb(255 * (1 - t), 255 * t, 255 * (1 - t) * t),
  grayscale: (t) => rgb(255 * t, 255 * t, 255 * t),
  spectrum,
};

/** Built-in palettes in picker order. */
export const BUILT_IN_PALETTES: ReadonlyArray<{ id: BuiltInPaletteId; label: string }> = [
  { id: "classic", label: "Classic" },
  { id: "fire", label: "Fire" },
  { id: "ocean", label: "Ocean" },
  { id: "forest", label: "Forest" },
  { id: "rainbow", label: "Rainbow" },
  { id: "pastel", label: "Pastel" },
  { id: "sunset", label: "Sunset" },
  { id: "ice", label: "Ice" },
  { id: "neon", label: "Neon" },
  { id: "grayscale", label: "Grayscale" },
  { id: "spectrum", label: "Spectrum" },
];

export const isBuiltInPaletteId = (value: unknown): value is BuiltInPaletteId =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(curves, value);

export const isRgb = (value: unknown): value is Rgb =>
  Array.isArray(value) &&
  value.length === 3 &&
  value.every((v) => typeof v === "number" && Number.isInteger(v) && v >= 0 && v <= 255);

export const builtInPalette = (id: BuiltInPaletteId): Palette => ({ type: "builtin", id });

/** @throws InvalidRequestError unless both colors have integer channels in 0-255 */
export const gradientPalette = (from: Rgb, to: Rgb): Palette => {
  if (!isRgb(from) || !isRgb(to)) {
    throw new InvalidRequestError(`Gradient colors must be 8-bit RGB triples, got ${JSON.stringify([from, to])}`);
  }
  return { type: "gradient", from: [...from], to: [...to] };
};

export const DEFAULT_PALETTE: Palette = builtInPalette("classic");

/**
 * Evaluates a palette at a normalized escape value. `t` is clamped to [0, 1].
 * This is the only place palettes are dispatched.
 */
export function paletteColor(palette: Palette, t: number): Rgb {
  const u = clamp01(Number.isNaN(t) ? 0 : t);
  switch (palette.type) {
    case "builtin":
      return curves[palette.id](u);
    case "gradient": {
      const { from, to } = palette;
      return rgb(from[0] + (to[0] - from[0]) * u, from[1] + (to[1] - from[1]) * u, from[2] + (to[2] - from[2]) * u);
    }
  }
}

/** Normalized escape value: smoothed / maxIterations, clamped to [0, 1]. */
export const normalizeEscape = (smoothed: number, maxIterations: number): number =>
  clamp01(smoothed / maxIterations);

/**
 * Color for one iteration result. Interior points are always INTERIOR_COLOR so the
 * set's silhouette stays distinguishable from escaping points.
 */
export function colorForResult(result: IterationResult, palette: Palette, maxIterations: number): Rgb {
  if (!result.escaped) return [INTERIOR_COLOR[0], INTERIOR_COLOR[1], INTERIOR_COLOR[2]];
  return paletteColor(palette, normalizeEscape(result.smoothed, maxIterations));
}
