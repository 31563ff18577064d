/**
 * Metrics for a single partition computation.
 */
export interface PartitionMetrics {
  partitionIndex: number;
  computeTime: number; // milliseconds
  pixels: number;
}

/**
 * Metrics for a complete render session.
 */
export interface RenderSessionMetrics {
  sessionId: string;
  startTime: number;
  endTime: number;
  duration: number; // milliseconds
  totalPartitions: number;
  completedPartitions: number;
  totalPixels: number;
  pixelsPerSecond: number;
  averagePartitionTime: number;
  slowestPartitionTime: number;
}

interface RenderSession {
  sessionId: string;
  startTime: number;
  totalPartitions: number;
  partitionMetrics: PartitionMetrics[];
  totalPixels: number;
}

/**
 * Tracks timing and throughput of renders.
 *
 * Usage:
 * ```typescript
 * const monitor = new PerformanceMonitor();
 * const sessionId = monitor.startRender(totalPartitions, totalPixels);
 *
 * // For each partition completion:
 * monitor.recordPartition(sessionId, partitionIndex, computeTime, pixels);
 *
 * const metrics = monitor.endRender(sessionId);
 * console.log(`Render took ${metrics.duration}ms at ${metrics.pixelsPerSecond} px/s`);
 * ```
 */
export class PerformanceMonitor {
  private activeSessions = new Map<string, RenderSession>();
  private completedSessions: RenderSessionMetrics[] = [];

  constructor(private maxHistorySize = 50) {}

  /**
   * Starts a new render session.
   *
   * @returns Session ID for tracking
   */
  startRender(totalPartitions: number, totalPixels: number): string {
    const sessionId = `render-${Date.now()}-${Math.random().toString(36).slice(2, 11)}`;

    this.activeSessions.set(sessionId, {
      sessionId,
      startTime: performance.now(),
      totalPartitions,
      partitionMetrics: [],
      totalPixels,
    });

    return sessionId;
  }

  recordPartition(sessionId: string, partitionIndex: number, computeTime: number, pixels: number): void {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      console.warn(`PerformanceMonitor: Unknown session ${sessionId}`);
      return;
    }

    session.partitionMetrics.push({ partitionIndex, computeTime, pixels });
  }

  /**
   * Ends a render session, moves it to history and returns its metrics.
   */
  endRender(sessionId: string): RenderSessionMetrics {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      throw new Error(`PerformanceMonitor: Unknown session ${sessionId}`);
    }

    const endTime = performance.now();
    const duration = endTime - session.startTime;
    const times = session.partitionMetrics.map((m) => m.computeTime);

    const metrics: RenderSessionMetrics = {
      sessionId,
      startTime: session.startTime,
      endTime,
      duration,
      totalPartitions: session.totalPartitions,
      completedPartitions: session.partitionMetrics.length,
      totalPixels: session.totalPixels,
      pixelsPerSecond: duration > 0 ? (session.totalPixels / duration) * 1000 : 0,
      averagePartitionTime: times.length > 0 ? times.reduce((a, b) => a + b, 0) / times.length : 0,
      slowestPartitionTime: times.length > 0 ? Math.max(...times) : 0,
    };

    this.completedSessions.push(metrics);
    if (this.completedSessions.length > this.maxHistorySize) {
      this.completedSessions.shift();
    }

    this.activeSessions.delete(sessionId);

    return metrics;
  }

  /** Drops a session that will never complete (failed or cancelled render). */
  abandonRender(sessionId: string): void {
    this.activeSessions.delete(sessionId);
  }

  /**
   * @returns Fraction of partitions completed (0-1), or null if the session is unknown
   */
  getProgress(sessionId: string): number | null {
    const session = this.activeSessions.get(sessionId);
    if (!session) {
      return null;
    }

    return session.totalPartitions > 0 ? session.partitionMetrics.length / session.totalPartitions : 0;
  }

  getActiveSessionCount(): number {
    return this.activeSessions.size;
  }

  getLastRenderMetrics(): RenderSessionMetrics | null {
    return this.completedSessions.at(-1) ?? null;
  }

  /**
   * Gets summary statistics across all completed renders.
   */
  getStats(): { totalRenders: number; averageDuration: number; averagePixelsPerSecond: number } {
    const count = this.completedSessions.length;
    if (count === 0) {
      return { totalRenders: 0, averageDuration: 0, averagePixelsPerSecond: 0 };
    }

    const totalDuration = this.completedSessions.reduce((sum, m) => sum + m.duration, 0);
    const totalPixelsPerSecond = this.completedSessions.reduce((sum, m) => sum + m.pixelsPerSecond, 0);

    return {
      totalRenders: count,
      averageDuration: totalDuration / count,
      averagePixelsPerSecond: totalPixelsPerSecond / count,
    };
  }

  getHistory(): RenderSessionMetrics[] {
    return [...this.completedSessions];
  }

  clearHistory(): void {
    this.completedSessions = [];
  }
}
