export * from "./fractals/types";
export * from "./fractals/errors";
export {
  BUILT_IN_PALETTES,
  DEFAULT_PALETTE,
  INTERIOR_COLOR,
  builtInPalette,
  colorForResult,
  gradientPalette,
  isBuiltInPaletteId,
  normalizeEscape,
  paletteColor,
} from "./fractals/algorithms/coloring";
export { DEFAULT_JULIA_PARAMETER, ESCAPE_RADIUS_SQUARED, computeIteration, iterate } from "./fractals/algorithms/escape-time";
export { computePixel, computePixelIteration, validateRenderRequest } from "./fractals/engine";
export { createHighResolutionJob, pixelAt, renderFractal } from "./fractals/render";
export {
  DEFAULT_PING_TIMEOUT_MS,
  ParallelRenderer,
  getOptimalWorkerCount,
  spawnRenderWorker,
  type FractalRenderer,
  type ParallelRendererOptions,
  type RenderMode,
  type RenderOptions,
} from "./fractals/render/parallel-renderer";
export { createPartitions, type PartitionLayout, type RenderPartition } from "./fractals/render/partitions";
export { RENDER_PROFILES, profileResolution, requestForProfile, type RenderProfile } from "./fractals/render/profiles";
export { RenderJob, type RenderJobListener, type RenderJobStatus } from "./fractals/render/render-job";
export * from "./lib/viewport";
export * from "./lib/favorites";
export * from "./lib/export-naming";
export { PerformanceMonitor, type RenderSessionMetrics } from "./lib/performance-monitor";
export {
  DEFAULT_MAX_ITERATIONS,
  createExplorerStore,
  initialExplorerState,
  type ExplorerState,
  type ExplorerStore,
} from "./state/explorer-store";
