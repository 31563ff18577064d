// ABOUTME: Worker-thread entry for parallel fractal computation using Comlink RPC
// ABOUTME: Exposes computePartition for the main thread to call via Comlink

import { parentPort } from "node:worker_threads";

import * as Comlink from "comlink";
import nodeEndpoint from "comlink/dist/umd/node-adapter";

import { computePartition } from "./compute-partition";
import type { PartitionComputeRequest } from "./types";

/**
 * Worker API exposed to the main thread via Comlink.
 * All methods can be called as if they were async functions on the main thread.
 */
const workerAPI = {
  computePartition: (request: PartitionComputeRequest) => computePartition(request),

  /**
   * Simple ping method for testing worker connectivity.
   * @returns "pong" string
   */
  ping: () => "pong" as const,
};

if (parentPort) {
  Comlink.expose(workerAPI, nodeEndpoint(parentPort));
}

export type RenderWorkerAPI = typeof workerAPI;
