// ABOUTME: Shared value types for the escape-time fractal engine
// ABOUTME: Viewport, fractal kinds, palettes, render requests and pixel buffers

export type ComplexPoint = {
  re: number;
  im: number;
};

/** A point on the pixel grid. Screen y grows downward. */
export type PixelPoint = {
  x: number;
  y: number;
};

/**
 * The region of the complex plane mapped onto a pixel grid.
 *
 * `halfWidth / halfHeight` always equals `pixelWidth / pixelHeight` for viewports
 * produced by the zoom operations. Viewports are never mutated in place.
 */
export type Viewport = Readonly<{
  center: Readonly<ComplexPoint>;
  halfWidth: number;
  halfHeight: number;
  pixelWidth: number;
  pixelHeight: number;
}>;

export type ViewportBounds = {
  minRe: number;
  maxRe: number;
  minIm: number;
  maxIm: number;
};

// --- Fractal kinds ---
// Julia carries its fixed parameter; for Mandelbrot c varies per pixel.
export type MandelbrotKind = { type: "mandelbrot" };

export type JuliaKind = { type: "julia"; c: ComplexPoint };

export type FractalKind = MandelbrotKind | JuliaKind;

export type FractalType = FractalKind["type"];

// --- Iteration results ---
type IterationState = {
  /** Iteration at which the point escaped, or maxIterations */
  iterations: number;
  /** Real component of the final z value */
  zr: number;
  /** Imaginary component of the final z value */
  zi: number;
};

export type EscapedResult = IterationState & {
  escaped: true;
  /** Continuous escape value n + 1 - log2(log2(|z|)) */
  smoothed: number;
};

export type InteriorResult = IterationState & {
  escaped: false;
};

export type IterationResult = EscapedResult | InteriorResult;

// --- Colors and palettes ---
export type Rgb = [r: number, g: number, b: number]; // 0-255

export type BuiltInPaletteId =
  | "classic"
  | "fire"
  | "ocean"
  | "forest"
  | "rainbow"
  | "pastel"
  | "sunset"
  | "ice"
  | "neon"
  | "grayscale"
  | "spectrum";

export type BuiltInPalette = { type: "builtin"; id: BuiltInPaletteId };

export type GradientPalette = { type: "gradient"; from: Rgb; to: Rgb };

export type Palette = BuiltInPalette | GradientPalette;

// --- Rendering ---
export type Resolution = {
  width: number;
  height: number;
};

/**
 * Everything needed to render one image. A request is a snapshot: the renderer
 * never mutates it, and later navigation does not affect a render in flight.
 */
export type RenderRequest = Readonly<{
  viewport: Viewport;
  fractal: FractalKind;
  palette: Palette;
  maxIterations: number;
  /** Output size. May differ from the viewport grid; the complex bounds are reused. */
  resolution: Resolution;
}>;

/**
 * Rendered image, row-major, three bytes (R, G, B) per pixel.
 * `data.length === width * height * 3`.
 */
export type PixelBuffer = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

