import { WriteFailure } from "./errors";
import { labelStr, textToDotString, type Text } from "./label";
import { edgeOperator, type DotGraph } from "./labeller";
import { StringSink, type OutputSink } from "./sink";
import { styleKeyword, type Style } from "./style";

export type RenderOptions = {
  noNodeLabels?: boolean;
  noEdgeLabels?: boolean;
  noNodeStyles?: boolean;
  noEdgeStyles?: boolean;
  noNodeColors?: boolean;
  noEdgeColors?: boolean;
  noArrows?: boolean;
  /** Font for the graph, its nodes and its edges. */
  fontname?: string;
  /** White on black. */
  darkTheme?: boolean;
};

const INDENT = "    ";

function emit(sink: OutputSink, line: string): void {
  try {
    sink.write(line);
  } catch (err) {
    if (err instanceof WriteFailure) throw err;
    throw new WriteFailure(err);
  }
}

function styleAttribute(style: Style | undefined): string {
  if (style === undefined || style === "none") return "";
  return `[style="${styleKeyword(style)}"]`;
}

function textAttribute(key: string, value: Text | undefined): string {
  return value === undefined ? "" : `[${key}=${textToDotString(value)}]`;
}

function defaultStatements(options: RenderOptions): string[] {
  const graphAttrs: string[] = [];
  const contentAttrs: string[] = [];

  if (options.fontname !== undefined) {
    const font = `fontname=${textToDotString(labelStr(options.fontname))}`;
    graphAttrs.push(font);
    contentAttrs.push(font);
  }
  if (options.darkTheme) {
    graphAttrs.push('bgcolor="black"', 'fontcolor="white"');
    contentAttrs.push('color="white"', 'fontcolor="white"');
  }

  if (graphAttrs.length === 0 && contentAttrs.length === 0) return [];

  const content = contentAttrs.join(" ");
  return [`${INDENT}graph[${graphAttrs.join(" ")}];\n`, `${INDENT}node[${content}];\n`, `${INDENT}edge[${content}];\n`];
}

function renderSubgraph<N, E, S>(graph: DotGraph<N, E, S>, subgraph: S, sink: OutputSink): void {
  const inner = INDENT + INDENT;

  const id = graph.subgraphId?.(subgraph);
  emit(sink, id === undefined ? `${INDENT}subgraph {\n` : `${INDENT}subgraph ${id.toDotString()} {\n`);

  const label = graph.subgraphLabel?.(subgraph) ?? labelStr("");
  emit(sink, `${inner}label=${textToDotString(label)};\n`);

  const style = graph.subgraphStyle?.(subgraph) ?? "none";
  if (style !== "none") emit(sink, `${inner}style="${styleKeyword(style)}";\n`);

  const color = graph.subgraphColor?.(subgraph);
  if (color !== undefined) emit(sink, `${inner}color=${textToDotString(color)};\n`);

  const shape = graph.subgraphShape?.(subgraph);
  if (shape !== undefined) emit(sink, `${inner}shape=${textToDotString(shape)};\n`);

  const rank = graph.subgraphRank?.(subgraph);
  if (rank !== undefined) emit(sink, `${inner}rank="${rank}";\n`);

  emit(sink, "\n");

  // Membership only; attributes come with the flat node statements.
  for (const n of graph.subgraphNodes?.(subgraph) ?? []) {
    emit(sink, `${inner}${graph.nodeId(n).toDotString()};\n`);
  }

  emit(sink, `${INDENT}}\n`);
  emit(sink, "\n");
}

function nodeStatement<N, E, S>(graph: DotGraph<N, E, S>, node: N, options: RenderOptions): string {
  const id = graph.nodeId(node);
  let text = id.toDotString();

  if (!options.noNodeLabels) {
    const label = graph.nodeLabel ? graph.nodeLabel(node) : labelStr(id.name);
    text += `[label=${textToDotString(label)}]`;
  }
  if (!options.noNodeStyles) text += styleAttribute(graph.nodeStyle?.(node));
  if (!options.noNodeColors) text += textAttribute("color", graph.nodeColor?.(node));
  text += textAttribute("shape", graph.nodeShape?.(node));

  return `${INDENT}${text};\n`;
}

function edgeStatement<N, E, S>(graph: DotGraph<N, E, S>, edge: E, op: string, options: RenderOptions): string {
  const source = graph.nodeId(graph.source(edge));
  const target = graph.nodeId(graph.target(edge));
  let text = `${source.toDotString()} ${op} ${target.toDotString()}`;

  if (!options.noEdgeLabels) {
    text += `[label=${textToDotString(graph.edgeLabel?.(edge) ?? labelStr(""))}]`;
  }
  if (!options.noEdgeStyles) text += styleAttribute(graph.edgeStyle?.(edge));
  if (!options.noEdgeColors) text += textAttribute("color", graph.edgeColor?.(edge));

  if (!options.noArrows) {
    const start = graph.edgeStartArrow?.(edge);
    const end = graph.edgeEndArrow?.(edge);
    const parts: string[] = [];
    if (end !== undefined && !end.isDefault()) parts.push(`arrowhead="${end.toDotString()}"`);
    if (start !== undefined && !start.isDefault()) parts.push(`dir="both" arrowtail="${start.toDotString()}"`);
    if (parts.length > 0) text += `[${parts.join(" ")}]`;
  }

  return `${INDENT}${text};\n`;
}

/**
 * Writes `graph` to `sink` as DOT: subgraphs first, then one statement per
 * node, then one per edge, each in the order the graph enumerates them.
 *
 * The graph id is asked for before anything is written. A sink failure
 * surfaces as `WriteFailure` and stops the render; errors thrown by the
 * graph's own methods (an `IdError` from `nodeId`, say) propagate unchanged.
 * Either way the sink may hold a partial document.
 */
export function renderDot<N, E, S = never>(
  graph: DotGraph<N, E, S>,
  sink: OutputSink,
  options: RenderOptions = {}
): void {
  const kind = graph.kind?.() ?? "digraph";
  const graphId = graph.graphId();
  const op = edgeOperator(kind);

  emit(sink, `${kind} ${graphId.toDotString()} {\n`);

  for (const line of defaultStatements(options)) {
    emit(sink, line);
  }

  for (const s of graph.subgraphs?.() ?? []) {
    renderSubgraph(graph, s, sink);
  }

  for (const n of graph.nodes()) {
    emit(sink, nodeStatement(graph, n, options));
  }

  for (const e of graph.edges()) {
    emit(sink, edgeStatement(graph, e, op, options));
  }

  emit(sink, "}\n");
}

export function renderDotToString<N, E, S = never>(graph: DotGraph<N, E, S>, options: RenderOptions = {}): string {
  const sink = new StringSink();
  renderDot(graph, sink, options);
  return sink.toString();
}
