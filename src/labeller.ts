import type { Arrow } from "./arrow";
import type { GraphWalk } from "./graph_walk";
import type { Id } from "./id";
import type { Text } from "./label";
import type { Style } from "./style";

/** Keyword of the graph; decides the edge operator too. */
export type Kind = "digraph" | "graph";

export function edgeOperator(kind: Kind): "->" | "--" {
  return kind === "digraph" ? "->" : "--";
}

/** Values of a subgraph's `rank` attribute. `same` keeps its members on one rank. */
export type Rank = "same" | "min" | "max" | "source" | "sink";

/**
 * How a graph names and decorates its elements.
 *
 * Only the graph id and the node ids are required. Everything else falls back
 * to a default that writes no attribute, except labels: a node is labelled
 * with its id and an edge with the empty string unless told otherwise.
 */
export interface Labeller<N, E, S = never> {
  graphId(): Id;

  /**
   * Must be unique per node. Two nodes sharing an id are merged by Graphviz;
   * the renderer does not check.
   */
  nodeId(node: N): Id;
  nodeLabel?(node: N): Text;
  nodeStyle?(node: N): Style;
  /** A Graphviz color name or `#rrggbb` value. */
  nodeColor?(node: N): Text | undefined;
  /** A Graphviz node shape name such as `box` or `ellipse`. */
  nodeShape?(node: N): Text | undefined;

  edgeLabel?(edge: E): Text;
  edgeStyle?(edge: E): Style;
  edgeColor?(edge: E): Text | undefined;
  edgeStartArrow?(edge: E): Arrow;
  edgeEndArrow?(edge: E): Arrow;

  /**
   * Without an id the subgraph is written anonymously. Prefix the id with
   * `cluster` to have Graphviz draw it inside its own rectangle.
   */
  subgraphId?(subgraph: S): Id | undefined;
  subgraphLabel?(subgraph: S): Text;
  subgraphStyle?(subgraph: S): Style;
  subgraphColor?(subgraph: S): Text | undefined;
  subgraphShape?(subgraph: S): Text | undefined;
  subgraphRank?(subgraph: S): Rank | undefined;

  /** Defaults to `digraph`. */
  kind?(): Kind;
}

/** What the renderer walks: a graph that can both enumerate and label itself. */
export type DotGraph<N, E, S = never> = GraphWalk<N, E, S> & Labeller<N, E, S>;
