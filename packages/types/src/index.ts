/**
 * @lazy-paths/types
 *
 * Shared types for the incremental shortest-path search.
 *
 * - Graph: neighbor discovery over an implicit graph
 * - Path: the steps of a search result
 */

export * from "./graph.js";
export * from "./path.js";
