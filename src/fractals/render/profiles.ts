import type { RenderRequest, Resolution, Viewport } from "../types";

export type RenderProfile = "interactive" | "highResolution";

/**
 * Resolution profiles as multiples of the viewport's pixel grid.
 * The 800x600 default grid gives 800x600 previews and 3200x2400 exports.
 */
export const RENDER_PROFILES = {
  interactive: { scale: 1 },
  highResolution: { scale: 4 },
} as const satisfies Record<RenderProfile, { scale: number }>;

export const profileResolution = (viewport: Viewport, profile: RenderProfile): Resolution => {
  const { scale } = RENDER_PROFILES[profile];
  return { width: viewport.pixelWidth * scale, height: viewport.pixelHeight * scale };
};

/** The same request at a profile's resolution. The viewport itself is never changed. */
export const requestForProfile = (request: RenderRequest, profile: RenderProfile): RenderRequest => ({
  ...request,
  resolution: profileResolution(request.viewport, profile),
});
