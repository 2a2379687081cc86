/**
 * @lazy-paths/search
 *
 * Incremental single-source shortest paths over implicit graphs.
 *
 * Key concepts:
 * - NeighborProvider: caller-supplied discovery of a node's direct neighbors
 * - Path: immutable result, start to destination with cumulative distances
 * - LazySequence: pull-driven results; work happens only as elements are requested
 *
 * Pipeline:
 * 1. Caller supplies a start node and a NeighborProvider
 * 2. shortestPathsFrom() seeds the frontier with the start
 * 3. Each pull finalizes the next-closest node -> Path
 */

export type * from "@lazy-paths/types";

export * from "./search/index.js";
export { PriorityQueue } from "./frontier/priority-queue.js";
export { LazySequence, lazy } from "./sequence/lazy-sequence.js";
export { InvalidArgumentError } from "./errors.js";
