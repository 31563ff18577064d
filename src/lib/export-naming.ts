import type { FractalType, Palette, Resolution } from "../fractals/types";

export const EXPORT_DIRECTORY = "fractals";

const pad = (value: number) => String(value).padStart(2, "0");

/** Local-time stamp as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

const paletteSlug = (palette: Palette) => (palette.type === "builtin" ? palette.id : "gradient");

/**
 * File name for an exported image, e.g.
 * `fractals/julia_fire_20240102_030405_3200x2400_highres.png`.
 */
export function exportFileName(options: {
  fractal: FractalType;
  palette: Palette;
  resolution: Resolution;
  highResolution: boolean;
  timestamp: Date;
}): string {
  const { fractal, palette, resolution, highResolution, timestamp } = options;
  const quality = highResolution ? "highres" : "std";
  return (
    `${EXPORT_DIRECTORY}/${fractal}_${paletteSlug(palette)}_${formatTimestamp(timestamp)}_` +
    `${resolution.width}x${resolution.height}_${quality}.png`
  );
}

export function favoriteFileName(timestamp: Date): string {
  return `${EXPORT_DIRECTORY}/favorite_${formatTimestamp(timestamp)}.json`;
}
