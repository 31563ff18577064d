// ABOUTME: Tracks one render through pending -> running -> completed | failed
// ABOUTME: Lets a caller poll progress without blocking on the render itself

import { InvalidJobTransitionError } from "../errors";
import type { PixelBuffer, RenderRequest } from "../types";
import type { FractalRenderer, RenderOptions } from "./parallel-renderer";

export type RenderJobStatus = "pending" | "running" | "completed" | "failed";

export type RenderJobListener = (job: RenderJob) => void;

const allowedTransitions: Record<RenderJobStatus, RenderJobStatus[]> = {
  pending: ["running"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

/**
 * A single render with an observable lifecycle.
 *
 * ```typescript
 * const job = new RenderJob(renderer, request);
 * job.subscribe((j) => console.log(j.status, j.progress));
 * const buffer = await job.start();
 * ```
 */
export class RenderJob {
  private currentStatus: RenderJobStatus = "pending";
  private currentProgress = 0;
  private buffer: PixelBuffer | null = null;
  private failure: unknown = null;
  private listeners = new Set<RenderJobListener>();

  constructor(
    private readonly renderer: FractalRenderer,
    readonly request: RenderRequest,
    private readonly options: Omit<RenderOptions, "onProgress"> = {}
  ) {}

  get status(): RenderJobStatus {
    return this.currentStatus;
  }

  /** Fraction of partitions completed (0-1). Never decreases. */
  get progress(): number {
    return this.currentProgress;
  }

  /** The rendered image once completed, otherwise null. */
  get result(): PixelBuffer | null {
    return this.buffer;
  }

  get error(): unknown {
    return this.failure;
  }

  get isBusy(): boolean {
    return this.currentStatus === "pending" || this.currentStatus === "running";
  }

  subscribe(listener: RenderJobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Runs the render. Resolves with the buffer, or rejects with the render's error
   * after the job has moved to "failed".
   *
   * @throws InvalidJobTransitionError if the job was already started
   */
  async start(): Promise<PixelBuffer> {
    this.transition("running");

    try {
      const buffer = await this.renderer.render(this.request, {
        ...this.options,
        onProgress: (fraction) => {
          if (fraction <= this.currentProgress) return;
          this.currentProgress = fraction;
          this.notify();
        },
      });
      this.buffer = buffer;
      this.transition("completed");
      return buffer;
    } catch (error) {
      this.failure = error;
      this.transition("failed");
      throw error;
    }
  }

  private transition(next: RenderJobStatus): void {
    if (!allowedTransitions[this.currentStatus].includes(next)) {
      throw new InvalidJobTransitionError(this.currentStatus, next);
    }
    this.currentStatus = next;
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener(this);
    }
  }
}
