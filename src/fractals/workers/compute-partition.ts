// ABOUTME: Core partition computation logic for worker threads
// ABOUTME: Converts one region of the output grid into RGB pixel data

import { colorForResult } from "../algorithms/coloring";
import { computePixelIteration, renderGrid, validateRenderRequest } from "../engine";
import { OutOfBoundsError } from "../errors";
import type { PartitionComputeRequest, PartitionComputeResult } from "./types";

/**
 * Computes RGB pixel data for a rectangular partition of the output grid.
 *
 * Runs inside a worker thread (or in-process in single-threaded mode). The result
 * covers only the partition, so callers can copy it into their own slice of the
 * final buffer without touching any other partition's pixels.
 *
 * @throws InvalidRequestError if the request cannot be rendered
 * @throws OutOfBoundsError if the partition does not fit the request's resolution
 */
export function computePartition({ partition, request }: PartitionComputeRequest): PartitionComputeResult {
  validateRenderRequest(request);

  const { startX, startY, width, height } = partition;
  const { resolution } = request;
  if (startX < 0 || startY < 0 || startX + width > resolution.width || startY + height > resolution.height) {
    throw new OutOfBoundsError(startX + width - 1, startY + height - 1, resolution.width, resolution.height);
  }

  const grid = renderGrid(request);
  const data = new Uint8ClampedArray(width * height * 3);

  let index = 0;
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const result = computePixelIteration(grid, startX + x, startY + y, request);
      const [r, g, b] = colorForResult(result, request.palette, request.maxIterations);
      data[index] = r;
      data[index + 1] = g;
      data[index + 2] = b;
      index += 3;
    }
  }

  return { partition, data };
}
