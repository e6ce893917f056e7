/**
 * The structure of a graph made of node handles `N`, edge handles `E` and
 * subgraph handles `S`, where each edge maps to a source and a target node.
 *
 * Handles are opaque to the renderer; they are only passed back into the
 * graph's own methods. Each enumeration may return an array, a generator or a
 * view over internal state, but it must yield the same elements every time it
 * is called during one render.
 */
export interface GraphWalk<N, E, S = never> {
  /** Every node. Edge endpoints missing from here get no attribute statement. */
  nodes(): Iterable<N>;
  edges(): Iterable<E>;
  source(edge: E): N;
  target(edge: E): N;
  /** Defaults to no subgraphs. */
  subgraphs?(): Iterable<S>;
  /** Members of `subgraph`. A node may be listed under several subgraphs. */
  subgraphNodes?(subgraph: S): Iterable<N>;
}

/**
 * Every endpoint of `edges`, sorted with `compare` and without duplicates.
 * Graphs that only store an edge list can return this from `nodes()` and get
 * a stable node order.
 */
export function nodesOfEdges<N, E>(
  edges: Iterable<E>,
  endpoints: (edge: E) => readonly [N, N],
  compare: (a: N, b: N) => number
): N[] {
  const all: N[] = [];
  for (const e of edges) {
    const [from, to] = endpoints(e);
    all.push(from, to);
  }
  all.sort(compare);

  const out: N[] = [];
  for (const n of all) {
    if (out.length > 0 && compare(out[out.length - 1], n) === 0) continue;
    out.push(n);
  }
  return out;
}
