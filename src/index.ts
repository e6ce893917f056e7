export { Arrow, Shape, shapeToDotString, type ArrowShape, type Fill, type Side } from "./arrow";
export { IdError, WriteFailure } from "./errors";
export { nodesOfEdges, type GraphWalk } from "./graph_walk";
export { Id } from "./id";
export { escapeHtml, escStr, htmlStr, labelStr, suffixLine, textToDotString, type Text } from "./label";
export { edgeOperator, type DotGraph, type Kind, type Labeller, type Rank } from "./labeller";
export { renderDot, renderDotToString, type RenderOptions } from "./render";
export { FileSink, StreamSink, StringSink, type OutputSink, type TextStream } from "./sink";
export { styleKeyword, type Style } from "./style";
