/**
 * Shortest-path search module.
 *
 * start + neighbor provider -> lazy sequence of Paths, closest first
 */

export {
  ShortestPathIterator,
  shortestPathsFrom,
  unweightedShortestPathsFrom,
  shortestPath,
  type SearchState,
} from "./shortest-paths.js";
export { Path } from "./path.js";
export { DEFAULT_SEARCH_OPTIONS, resolveSearchOptions, type SearchOptions } from "./options.js";
