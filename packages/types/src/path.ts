/**
 * Path types shared by search results.
 */

/** One node along a path with its cumulative distance from the start */
export interface PathStep<N> {
  node: N;
  /** Sum of edge weights from the start node up to `node` */
  distance: number;
}
