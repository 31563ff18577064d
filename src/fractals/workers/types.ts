// ABOUTME: Type definitions for worker-thread communication
// ABOUTME: Defines request/response interfaces for partition-based fractal computation

import type { RenderPartition } from "../render/partitions";
import type { RenderRequest } from "../types";

/**
 * Request sent to a worker to compute one partition of the output image.
 * Everything in it survives the structured clone algorithm as-is.
 */
export interface PartitionComputeRequest {
  /** Region of the output grid to compute */
  partition: RenderPartition;
  /** Snapshot of the render request the partition belongs to */
  request: RenderRequest;
}

/**
 * Result returned from a worker after computing a partition.
 */
export interface PartitionComputeResult {
  /** Bounds of the computed partition (matches request) */
  partition: RenderPartition;
  /** partition.width * partition.height RGB triples, row-major within the partition */
  data: Uint8ClampedArray;
}
