/**
 * Implicit graph vocabulary.
 *
 * The search never stores a graph. Callers describe one by answering
 * "what is next to this node?" on demand.
 */

/** A direct neighbor and the weight of the edge leading to it */
export type Neighbor<N> = readonly [node: N, distance: number];

/**
 * Discovers the direct neighbors of a node.
 *
 * Must return a finite collection per call. A `Map<N, number>`, an array of
 * tuples or a generator all qualify. Called at most once per finalized node.
 */
export type NeighborProvider<N> = (node: N) => Iterable<Neighbor<N>>;

/** Neighbor discovery for graphs whose edges all weigh the same */
export type UnweightedNeighborProvider<N> = (node: N) => Iterable<N>;

/**
 * Maps a node to the value used for identity comparisons.
 *
 * Keys are compared the way `Map` compares keys (SameValueZero).
 */
export type NodeKey<N> = (node: N) => unknown;
