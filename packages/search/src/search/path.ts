/**
 * Immutable, backward-linked search paths.
 *
 * Each path holds its destination, its cumulative distance and a reference to
 * the path it extends. Extending never mutates, so one finalized path can be
 * the shared prefix of every path relaxed through it.
 */

import type { PathStep } from "@lazy-paths/types";

/** The path from the starting node to a destination node */
export class Path<N> {
  private constructor(
    /** Last node of this path */
    readonly to: N,
    /** Distance from the starting node to {@link to} */
    readonly distance: number,
    private readonly predecessor: Path<N> | undefined,
  ) {}

  /** The zero-length path that starts and ends at `node` */
  static startingAt<N>(node: N): Path<N> {
    return new Path(node, 0, undefined);
  }

  /** First node of this path */
  get from(): N {
    let path: Path<N> = this;
    while (path.predecessor) path = path.predecessor;
    return path.to;
  }

  /** Number of edges along this path */
  get length(): number {
    let edges = 0;
    for (let p = this.predecessor; p; p = p.predecessor) edges++;
    return edges;
  }

  /** A new path one edge longer. This path is left untouched. */
  extendTo(next: N, edgeDistance: number): Path<N> {
    return new Path(next, this.distance + edgeDistance, this);
  }

  /**
   * All nodes from the starting node to {@link to}, each with its cumulative
   * distance from the starting node. Walks the predecessor chain on every call.
   */
  nodes(): PathStep<N>[] {
    const steps: PathStep<N>[] = [];
    for (let p: Path<N> | undefined = this; p; p = p.predecessor) {
      steps.push({ node: p.to, distance: p.distance });
    }
    return steps.reverse();
  }

  /** Node list only, start first */
  toArray(): N[] {
    return this.nodes().map((step) => step.node);
  }

  toString(): string {
    return this.toArray().map(String).join("->");
  }
}
