/**
 * Dijkstra's shortest-path search as a lazy, incrementally computed sequence.
 *
 * Compared to an eager traversal, the incremental search answers bounded
 * questions without exploring the whole graph. Find the three nearest sushi
 * places:
 *
 * ```ts
 * const sushi = shortestPathsFrom(here, placesAround)
 *   .map((path) => path.to)
 *   .filter(isSushiRestaurant)
 *   .take(3)
 *   .toArray();
 * ```
 *
 * Or every gas station within 5 km:
 *
 * ```ts
 * const stations = shortestPathsFrom(here, placesAround)
 *   .takeWhile((path) => path.distance <= 5)
 *   .map((path) => path.to)
 *   .filter(isGasStation)
 *   .toArray();
 * ```
 *
 * Each pull finalizes exactly one node: pop the closest frontier entry, skip
 * it if its node was already finalized through a shorter entry, otherwise
 * relax its neighbors and emit its path. Outdated frontier entries are never
 * removed eagerly; the visited check at pop time discards them.
 */

import type { NeighborProvider, UnweightedNeighborProvider, Neighbor } from "@lazy-paths/types";
import { InvalidArgumentError, requireNonNull } from "../errors.js";
import { PriorityQueue } from "../frontier/priority-queue.js";
import { LazySequence } from "../sequence/lazy-sequence.js";
import { Path } from "./path.js";
import { resolveSearchOptions, type SearchOptions } from "./options.js";

/**
 * - ready: waiting for the next pull
 * - finalizing: a node was popped and its neighbors are being relaxed
 * - exhausted: terminal; the frontier ran dry or a pull failed
 */
export type SearchState = "ready" | "finalizing" | "exhausted";

interface FrontierEntry<N> {
  path: Path<N>;
  /** Sort key, equal to `path.distance` */
  distance: number;
}

/**
 * Single-pass iterator over shortest paths in non-decreasing distance order.
 *
 * Iterating it again continues where the previous consumer stopped; a fresh
 * search needs a fresh iterator.
 */
export class ShortestPathIterator<N> implements IterableIterator<Path<N>> {
  private currentState: SearchState = "ready";
  private readonly frontier = new PriorityQueue<FrontierEntry<N>>((entry) => entry.distance);
  /** Keys of finalized nodes */
  private readonly finalized = new Set<unknown>();
  /** Shortest path discovered so far to each node not yet finalized */
  private readonly bestKnown = new Map<unknown, Path<N>>();
  private readonly options: Required<SearchOptions<N>>;
  private staleSkipped = 0;

  constructor(
    start: N,
    private readonly findNeighbors: NeighborProvider<N>,
    options?: SearchOptions<N>,
  ) {
    requireNonNull(start, "Starting node");
    requireProvider(findNeighbors);
    this.options = resolveSearchOptions(options);
    this.frontier.push({ path: Path.startingAt(start), distance: 0 });
  }

  get state(): SearchState {
    return this.currentState;
  }

  /** Number of nodes finalized so far */
  get finalizedCount(): number {
    return this.finalized.size;
  }

  [Symbol.iterator](): this {
    return this;
  }

  next(): IteratorResult<Path<N>> {
    while (this.currentState === "ready") {
      const entry = this.frontier.pop();
      if (!entry) {
        this.exhaust();
        break;
      }

      this.currentState = "finalizing";
      let finalized: boolean;
      try {
        finalized = this.finalize(entry.path);
      } catch (err) {
        this.abandon();
        throw err;
      }
      this.currentState = "ready";

      if (finalized) return { done: false, value: entry.path };
    }
    return { done: true, value: undefined };
  }

  /** Finalizes the path's node and relaxes its neighbors; false if the entry was stale */
  private finalize(path: Path<N>): boolean {
    const key = this.options.keyOf(path.to);
    if (this.finalized.has(key)) {
      this.staleSkipped++;
      if (this.options.debug) {
        this.options.log(`[dijkstra] Skipped stale ${describeKey(key)} at ${path.distance}`);
      }
      return false;
    }

    this.finalized.add(key);
    this.bestKnown.delete(key);
    this.relaxNeighbors(path, key);

    if (this.options.debug) {
      this.options.log(
        `[dijkstra] Finalized ${describeKey(key)} at ${path.distance} (frontier=${this.frontier.size})`,
      );
    }
    return true;
  }

  private relaxNeighbors(path: Path<N>, pathKey: unknown): void {
    for (const [neighbor, distance] of this.findNeighbors(path.to)) {
      requireNonNull(neighbor, () => `Neighbor of ${describeKey(pathKey)}`);
      requireEdgeDistance(distance);

      const key = this.options.keyOf(neighbor);
      if (this.finalized.has(key)) continue;

      const candidate = path.distance + distance;
      const known = this.bestKnown.get(key);
      if (known === undefined || candidate < known.distance) {
        const shorter = path.extendTo(neighbor, distance);
        this.bestKnown.set(key, shorter);
        this.frontier.push({ path: shorter, distance: candidate });
      }
    }
  }

  private exhaust(): void {
    this.currentState = "exhausted";
    if (this.options.debug) {
      this.options.log(
        `[dijkstra] Exhausted: finalized=${this.finalized.size}, staleSkipped=${this.staleSkipped}`,
      );
    }
  }

  private abandon(): void {
    this.currentState = "exhausted";
    this.frontier.clear();
    this.bestKnown.clear();
    if (this.options.debug) {
      this.options.log(`[dijkstra] Abandoned after ${this.finalized.size} finalized`);
    }
  }
}

/**
 * Lazy sequence of shortest paths from `start`.
 *
 * The first path ends at `start` with distance 0, followed by the next closest
 * node, and so on. `findNeighbors` is called on the fly, once per emitted node
 * and before that node's path is emitted, to list its direct neighbors with
 * their edge distances.
 *
 * @throws InvalidArgumentError when `start` is null/undefined or
 * `findNeighbors` is not a function. Negative distances and missing neighbors
 * are reported by the pull that first reaches them.
 */
export function shortestPathsFrom<N>(
  start: N,
  findNeighbors: NeighborProvider<N>,
  options?: SearchOptions<N>,
): LazySequence<Path<N>> {
  return new LazySequence(new ShortestPathIterator(start, findNeighbors, options));
}

/**
 * Like {@link shortestPathsFrom} with every edge weighing 1, so distances are
 * hop counts.
 */
export function unweightedShortestPathsFrom<N>(
  start: N,
  findNeighbors: UnweightedNeighborProvider<N>,
  options?: SearchOptions<N>,
): LazySequence<Path<N>> {
  requireProvider(findNeighbors);
  return shortestPathsFrom(start, (node) => unitEdges(findNeighbors(node)), options);
}

/**
 * The shortest path from `start` to `target`, or undefined when `target` is
 * unreachable. Explores only nodes closer than `target` (plus ties).
 */
export function shortestPath<N>(
  start: N,
  target: N,
  findNeighbors: NeighborProvider<N>,
  options?: SearchOptions<N>,
): Path<N> | undefined {
  requireNonNull(target, "Target node");
  const { keyOf } = resolveSearchOptions(options);
  const targetKey = keyOf(target);
  return shortestPathsFrom(start, findNeighbors, options).find((path) =>
    sameValueZero(keyOf(path.to), targetKey),
  );
}

function requireProvider(findNeighbors: unknown): void {
  if (typeof findNeighbors !== "function") {
    const got = findNeighbors === null ? "null" : typeof findNeighbors;
    throw new InvalidArgumentError(`Neighbor provider must be a function, got ${got}`);
  }
}

function requireEdgeDistance(distance: number): void {
  if (Number.isNaN(distance)) {
    throw new InvalidArgumentError(`Distance must be a number: ${distance}`);
  }
  if (distance < 0) {
    throw new InvalidArgumentError(`Distance cannot be negative: ${distance}`);
  }
}

function* unitEdges<N>(neighbors: Iterable<N>): Generator<Neighbor<N>> {
  for (const neighbor of neighbors) yield [neighbor, 1];
}

/**
 * Printable form of a node key for messages. Nodes are opaque: a key without a
 * usable string conversion (null prototype, throwing `toString`) prints as its
 * `Object.prototype.toString` tag.
 */
function describeKey(key: unknown): string {
  try {
    return String(key);
  } catch {
    return Object.prototype.toString.call(key);
  }
}

/** Key equality as `Map` and `Set` see it */
function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b));
}
