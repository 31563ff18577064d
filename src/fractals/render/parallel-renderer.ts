// ABOUTME: Orchestrates parallel fractal rendering using worker threads
// ABOUTME: Fork-join per render: spawns workers, distributes partitions, assembles one buffer

import { availableParallelism } from "node:os";
import { Worker } from "node:worker_threads";

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";

import { PerformanceMonitor } from "../../lib/performance-monitor";
import { validateRenderRequest } from "../engine";
import { InvalidRequestError, RenderCancelledError } from "../errors";
import type { PixelBuffer, RenderRequest } from "../types";
import { computePartition } from "../workers/compute-partition";
import type { RenderWorkerAPI } from "../workers/render.worker";
import type { PartitionComputeRequest, PartitionComputeResult } from "../workers/types";
import { calculatePartitionCount, createPartitions, type PartitionLayout, type RenderPartition } from "./partitions";

export type RenderMode = "parallel" | "single-threaded";

/**
 * Options for controlling render behavior
 */
export interface RenderOptions {
  /**
   * Invoked with the fraction of partitions completed (0-1) each time a partition
   * lands. Values never decrease and 1 is reported exactly once, on completion.
   */
  onProgress?: (fraction: number) => void;
  /** Signal to cancel the render operation */
  signal?: AbortSignal;
  /** Number of partitions (default: a few per worker) */
  partitionCount?: number;
  /** Row bands (default) or center-out tiles */
  layout?: PartitionLayout;
}

/** Anything that turns a request into a pixel buffer. */
export interface FractalRenderer {
  render(request: RenderRequest, options?: RenderOptions): Promise<PixelBuffer>;
}

export interface ParallelRendererOptions {
  /** Number of worker threads per render (defaults to 75% of CPU cores) */
  workerCount?: number;
  mode?: RenderMode;
  /** Creates one worker thread running render.worker */
  createWorker?: () => Worker;
  monitor?: PerformanceMonitor;
  /** Milliseconds a worker may take to answer its startup ping before it is terminated */
  pingTimeout?: number;
}

type ComputeLane = (request: PartitionComputeRequest) => Promise<PartitionComputeResult>;

type WorkerHandle = {
  worker: Worker;
  api: Comlink.Remote<RenderWorkerAPI>;
  /** Rejects if the thread crashes or exits, so no call waits forever on a dead worker */
  failure: Promise<never>;
};

const WORKER_ENTRY = new URL("../workers/render.worker.ts", import.meta.url);

/** How long a new worker gets to load and answer its first ping. */
export const DEFAULT_PING_TIMEOUT_MS = 15_000;

/**
 * Starts a worker thread on the TypeScript worker entry.
 *
 * Loader flags in `execArgv` do not reach worker threads on Node 20, so the
 * thread runs a small bootstrap that registers tsx before importing the entry.
 */
export function spawnRenderWorker(): Worker {
  const bootstrap =
    `import("tsx/esm/api").then(({ register }) => { register(); ` +
    `return import(${JSON.stringify(WORKER_ENTRY.href)}); });`;
  return new Worker(bootstrap, { eval: true });
}

/**
 * Calculates the optimal number of workers based on available CPU cores.
 * Uses 75% of cores, with a minimum of 2 and maximum of 16.
 */
export function getOptimalWorkerCount(): number {
  const cpuCount = availableParallelism() || 4;
  return Math.max(2, Math.min(16, Math.floor(cpuCount * 0.75)));
}

/**
 * Copies one partition's pixels into its region of the full-image buffer.
 * Partitions are disjoint, so completion order never changes the result.
 */
export function placePartition(buffer: Uint8ClampedArray, imageWidth: number, result: PartitionComputeResult): void {
  const { startX, startY, width, height } = result.partition;
  const rowLength = width * 3;
  if (result.data.length !== rowLength * height) {
    throw new Error(
      `Partition at (${startX}, ${startY}) returned ${result.data.length} bytes, expected ${rowLength * height}`
    );
  }

  for (let row = 0; row < height; row++) {
    const source = row * rowLength;
    buffer.set(result.data.subarray(source, source + rowLength), ((startY + row) * imageWidth + startX) * 3);
  }
}

/**
 * ParallelRenderer computes a RenderRequest across worker threads.
 *
 * Each render is fork-join: it spawns its own workers, hands every worker a
 * stream of partitions, and terminates all of them when the render settles, so
 * nothing survives between renders. In "single-threaded" mode the same
 * partitions are computed in-process.
 *
 * Usage:
 * ```typescript
 * const renderer = new ParallelRenderer({ workerCount: 4 });
 * const buffer = await renderer.render(request, {
 *   onProgress: (fraction) => console.log(`${Math.round(fraction * 100)}% complete`),
 *   signal: abortController.signal,
 * });
 * ```
 */
export class ParallelRenderer implements FractalRenderer {
  private readonly workerCount: number;
  private readonly mode: RenderMode;
  private readonly createWorker: () => Worker;
  private readonly performanceMonitor: PerformanceMonitor;
  private readonly pingTimeout: number;

  constructor(options: ParallelRendererOptions = {}) {
    this.workerCount = Math.max(1, Math.floor(options.workerCount ?? getOptimalWorkerCount()));
    this.mode = options.mode ?? "parallel";
    this.createWorker = options.createWorker ?? spawnRenderWorker;
    this.performanceMonitor = options.monitor ?? new PerformanceMonitor();
    this.pingTimeout = options.pingTimeout ?? DEFAULT_PING_TIMEOUT_MS;
  }

  /**
   * Renders a request into a new pixel buffer.
   *
   * @throws InvalidRequestError before any partitioning if the request or partition count is invalid
   * @throws RenderCancelledError if the signal aborts; no partial buffer is returned
   */
  async render(request: RenderRequest, options: RenderOptions = {}): Promise<PixelBuffer> {
    validateRenderRequest(request);

    const { signal, onProgress } = options;
    if (signal?.aborted) {
      throw new RenderCancelledError("Render cancelled before starting");
    }

    // The render works on its own copy; later navigation cannot reach it
    const snapshot: RenderRequest = structuredClone(request);
    const { width, height } = snapshot.resolution;

    const partitionCount = options.partitionCount ?? calculatePartitionCount(height, this.workerCount);
    if (!Number.isFinite(partitionCount) || partitionCount <= 0) {
      throw new InvalidRequestError(`partitionCount must be a positive number, got ${partitionCount}`);
    }
    const partitions = createPartitions(width, height, options.layout ?? "rows", partitionCount);
    const totalPartitions = partitions.length;

    console.log(
      `Starting ${this.mode} render: ${width}x${height}, ${snapshot.fractal.type}, ` +
        `center=(${snapshot.viewport.center.re}, ${snapshot.viewport.center.im}), ` +
        `${totalPartitions} partitions`
    );

    const sessionId = this.performanceMonitor.startRender(totalPartitions, width * height);
    const buffer = new Uint8ClampedArray(width * height * 3);
    const workers: WorkerHandle[] = [];

    let nextPartition = 0;
    let completedPartitions = 0;
    let failed = false;

    const runLane = async (lane: ComputeLane) => {
      while (!failed) {
        const index = nextPartition++;
        if (index >= totalPartitions) return;
        if (signal?.aborted) throw new RenderCancelledError();

        const partition: RenderPartition = partitions[index];
        const startedAt = performance.now();
        const result = await lane({ partition, request: snapshot });
        if (failed) return;
        if (signal?.aborted) throw new RenderCancelledError();

        placePartition(buffer, width, result);
        this.performanceMonitor.recordPartition(
          sessionId,
          index,
          performance.now() - startedAt,
          partition.width * partition.height
        );

        completedPartitions++;
        onProgress?.(completedPartitions / totalPartitions);
      }
    };

    try {
      const lanes: ComputeLane[] = [];
      if (this.mode === "parallel") {
        const laneCount = Math.min(this.workerCount, totalPartitions);
        for (let i = 0; i < laneCount; i++) {
          const handle = await this.startWorker(i);
          workers.push(handle);
          lanes.push((partitionRequest) =>
            Promise.race([handle.api.computePartition(partitionRequest), handle.failure])
          );
        }
      } else {
        lanes.push(async (partitionRequest) => computePartition(partitionRequest));
      }

      await Promise.all(
        lanes.map((lane) =>
          runLane(lane).catch((error: unknown) => {
            failed = true;
            throw error;
          })
        )
      );

      const metrics = this.performanceMonitor.endRender(sessionId);
      console.log(
        `Render complete: ${totalPartitions} partitions in ${metrics.duration.toFixed(1)}ms ` +
          `(${metrics.pixelsPerSecond.toFixed(0)} pixels/s)`
      );

      return { width, height, data: buffer };
    } catch (error) {
      this.performanceMonitor.abandonRender(sessionId);
      if (error instanceof RenderCancelledError) {
        console.log("Render cancelled by caller");
      } else {
        console.error("Render failed:", error);
      }
      throw error;
    } finally {
      await this.terminateWorkers(workers);
    }
  }

  /**
   * Spawns one worker, wraps it with Comlink and checks it responds.
   */
  private async startWorker(index: number): Promise<WorkerHandle> {
    const worker = this.createWorker();
    const api = Comlink.wrap<RenderWorkerAPI>(nodeEndpoint(worker));
    const failure = new Promise<never>((_, reject) => {
      worker.once("error", reject);
      worker.once("exit", (code: number) => reject(new Error(`Worker ${index} exited with code ${code}`)));
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Worker ${index} did not answer ping within ${this.pingTimeout}ms`)),
        this.pingTimeout
      );
    });

    try {
      const response = await Promise.race([api.ping(), failure, timeout]);
      if (response !== "pong") {
        throw new Error(`Worker ${index} failed to respond to ping`);
      }
    } catch (error) {
      api[Comlink.releaseProxy]();
      await worker.terminate();
      throw error;
    } finally {
      clearTimeout(timer);
    }

    return { worker, api, failure };
  }

  private async terminateWorkers(workers: WorkerHandle[]): Promise<void> {
    await Promise.all(
      workers.map(async ({ worker, api }) => {
        api[Comlink.releaseProxy]();
        await worker.terminate();
      })
    );
  }

  getWorkerCount(): number {
    return this.workerCount;
  }

  getMode(): RenderMode {
    return this.mode;
  }

  getPerformanceMonitor(): PerformanceMonitor {
    return this.performanceMonitor;
  }
}
