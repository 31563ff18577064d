import { createStore } from "zustand/vanilla";

import { DEFAULT_PALETTE, gradientPalette } from "../fractals/algorithms/coloring";
import { DEFAULT_JULIA_PARAMETER } from "../fractals/algorithms/escape-time";
import { FractalError } from "../fractals/errors";
import { createHighResolutionJob } from "../fractals/render";
import type { FractalRenderer } from "../fractals/render/parallel-renderer";
import { profileResolution, type RenderProfile } from "../fractals/render/profiles";
import type { RenderJob, RenderJobStatus } from "../fractals/render/render-job";
import type {
  ComplexPoint,
  FractalKind,
  FractalType,
  Palette,
  PixelBuffer,
  PixelPoint,
  RenderRequest,
  Rgb,
  Viewport,
} from "../fractals/types";
import { exportFileName, favoriteFileName } from "../lib/export-naming";
import { toFavorite, type FavoriteView } from "../lib/favorites";
import { DEFAULT_VIEWPORT, resetViewport, zoomOut, zoomToRect } from "../lib/viewport";

export const DEFAULT_MAX_ITERATIONS = 255;

type ExportState = {
  status: RenderJobStatus | "idle";
  progress: number;
  fileName: string | null;
  result: PixelBuffer | null;
};

type State = {
  viewport: Viewport;
  fractalType: FractalType;
  juliaParameter: ComplexPoint;
  palette: Palette;
  userGradient: { from: Rgb; to: Rgb };
  maxIterations: number;
  renderProgress: number;
  lastError: Error | null;
  export: ExportState;
};

type Actions = {
  /** Zooms into a drag selection. Returns false (and records lastError) if the selection is unusable. */
  zoomToRect: (p0: PixelPoint, p1: PixelPoint) => boolean;
  zoomOut: () => void;
  resetView: () => void;
  setFractalType: (fractalType: FractalType) => void;
  setJuliaParameter: (c: ComplexPoint) => void;
  setPalette: (palette: Palette) => void;
  setUserGradient: (from: Rgb, to: Rgb) => void;
  setMaxIterations: (maxIterations: number) => void;
  setRenderProgress: (progress: number) => void;
  clearError: () => void;
  /** Immutable request for the current view at a profile's resolution. */
  snapshotRequest: (profile?: RenderProfile) => RenderRequest;
  /** The current view as a favorite plus the file name it would be saved under. */
  exportFavorite: (timestamp?: Date) => { favorite: FavoriteView; fileName: string };
  applyFavorite: (favorite: FavoriteView) => void;
  /** Starts (or returns the running) high-resolution render of the current view. */
  startHighResolutionExport: (renderer: FractalRenderer, timestamp?: Date) => RenderJob;
  resetExplorerState: () => void;
};

export type ExplorerState = State & Actions;

export const initialExplorerState: State = {
  viewport: DEFAULT_VIEWPORT,
  fractalType: "mandelbrot",
  juliaParameter: DEFAULT_JULIA_PARAMETER,
  palette: DEFAULT_PALETTE,
  userGradient: { from: [0, 255, 255], to: [255, 0, 255] },
  maxIterations: DEFAULT_MAX_ITERATIONS,
  renderProgress: 0,
  lastError: null,
  export: { status: "idle", progress: 0, fileName: null, result: null },
};

const fractalKind = (state: State): FractalKind =>
  state.fractalType === "julia"
    ? { type: "julia", c: { re: state.juliaParameter.re, im: state.juliaParameter.im } }
    : { type: "mandelbrot" };

const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));

/**
 * Session state for an explorer front end. The viewport, fractal and palette
 * only change through these actions, between renders; every render gets its
 * own snapshot from `snapshotRequest`.
 */
export const createExplorerStore = (overrides: Partial<State> = {}) => {
  let exportJob: RenderJob | null = null;

  return createStore<ExplorerState>()((set, get) => ({
    ...initialExplorerState,
    ...overrides,

    zoomToRect: (p0, p1) => {
      try {
        set({ viewport: zoomToRect(get().viewport, p0, p1), lastError: null });
        return true;
      } catch (error) {
        if (error instanceof FractalError) {
          set({ lastError: error });
          return false;
        }
        throw error;
      }
    },
    zoomOut: () => set((state) => ({ viewport: zoomOut(state.viewport) })),
    resetView: () => set((state) => ({ viewport: resetViewport(state.viewport) })),
    setFractalType: (fractalType) => set({ fractalType }),
    setJuliaParameter: (c) => set({ juliaParameter: { re: c.re, im: c.im } }),
    setPalette: (palette) => set({ palette }),
    setUserGradient: (from, to) => {
      const palette = gradientPalette(from, to);
      if (palette.type === "gradient") {
        set({ palette, userGradient: { from: palette.from, to: palette.to } });
      }
    },
    setMaxIterations: (maxIterations) => set({ maxIterations }),
    setRenderProgress: (renderProgress) => set({ renderProgress }),
    clearError: () => set({ lastError: null }),

    snapshotRequest: (profile = "interactive") => {
      const state = get();
      return structuredClone({
        viewport: state.viewport,
        fractal: fractalKind(state),
        palette: state.palette,
        maxIterations: state.maxIterations,
        resolution: profileResolution(state.viewport, profile),
      });
    },

    exportFavorite: (timestamp = new Date()) => {
      const state = get();
      return {
        favorite: toFavorite({ viewport: state.viewport, fractal: fractalKind(state), palette: state.palette }),
        fileName: favoriteFileName(timestamp),
      };
    },

    applyFavorite: (favorite) => {
      const { viewport, fractal, palette } = structuredClone(favorite);
      set((state) => ({
        viewport,
        fractalType: fractal.type,
        juliaParameter: fractal.type === "julia" ? fractal.c : state.juliaParameter,
        palette,
        userGradient: palette.type === "gradient" ? { from: palette.from, to: palette.to } : state.userGradient,
        lastError: null,
      }));
    },

    startHighResolutionExport: (renderer, timestamp = new Date()) => {
      if (exportJob?.isBusy) {
        return exportJob;
      }

      const state = get();
      const job = createHighResolutionJob(renderer, state.snapshotRequest("interactive"));
      const fileName = exportFileName({
        fractal: state.fractalType,
        palette: state.palette,
        resolution: job.request.resolution,
        highResolution: true,
        timestamp,
      });
      exportJob = job;

      set({ export: { status: job.status, progress: 0, fileName, result: null } });
      job.subscribe(({ status, progress }) => {
        set((current) => ({ export: { ...current.export, status, progress } }));
      });

      job.start().then(
        (result) => set((current) => ({ export: { ...current.export, result } })),
        (error: unknown) => set({ lastError: toError(error) })
      );

      return job;
    },

    resetExplorerState: () => {
      exportJob = null;
      set(initialExplorerState);
    },
  }));
};

export type ExplorerStore = ReturnType<typeof createExplorerStore>;
