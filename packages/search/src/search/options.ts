import type { NodeKey } from "@lazy-paths/types";

/** Options for a shortest-path search */
export interface SearchOptions<N> {
  /** Log every finalized node and a summary on exhaustion (default false) */
  debug?: boolean;
  /** Log sink used when `debug` is on (default console.log) */
  log?: (message: string) => void;
  /**
   * Identity of a node for visited/best-known bookkeeping. Defaults to the
   * node itself; supply one when equal nodes are distinct objects.
   */
  keyOf?: NodeKey<N>;
}

/** Default search options */
export const DEFAULT_SEARCH_OPTIONS: Required<SearchOptions<unknown>> = {
  debug: false,
  log: (message) => console.log(message),
  keyOf: (node) => node,
};

export function resolveSearchOptions<N>(options?: SearchOptions<N>): Required<SearchOptions<N>> {
  return {
    debug: options?.debug ?? DEFAULT_SEARCH_OPTIONS.debug,
    log: options?.log ?? DEFAULT_SEARCH_OPTIONS.log,
    keyOf: options?.keyOf ?? DEFAULT_SEARCH_OPTIONS.keyOf,
  };
}
