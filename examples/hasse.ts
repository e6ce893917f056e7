import { FileSink, Id, StreamSink, htmlStr, labelStr, nodesOfEdges, renderDot, type DotGraph, type Text } from "../src/index";

type Subset = readonly string[];
type Inclusion = { readonly from: Subset; readonly to: Subset };

const SUBSETS: Subset[] = [["x", "y"], ["x"], ["y"], []];

// Each subset covers the ones with exactly one element fewer.
const INCLUSIONS: Inclusion[] = SUBSETS.flatMap((from) =>
  SUBSETS.filter((to) => to.length === from.length - 1 && to.every((e) => from.includes(e))).map((to) => ({
    from,
    to,
  }))
);

function subsetName(s: Subset): string {
  return `{${s.join(",")}}`;
}

// Larger subsets first.
function compareSubsets(a: Subset, b: Subset): number {
  return b.length - a.length || subsetName(a).localeCompare(subsetName(b));
}

const hasse: DotGraph<Subset, Inclusion> = {
  graphId: () => Id.create("hasse"),
  nodeId: (s) => Id.create(`S_${s.join("") || "empty"}`),
  nodeLabel: (s): Text => labelStr(subsetName(s)),
  edgeLabel: (): Text => htmlStr("&sube;"),
  nodes: () => nodesOfEdges(INCLUSIONS, (e) => [e.from, e.to] as const, compareSubsets),
  edges: () => INCLUSIONS,
  source: (e) => e.from,
  target: (e) => e.to,
};

function warn(msg: string): void {
  process.stderr.write(`${msg}\n`);
}

function main(): void {
  const args = process.argv.slice(2);
  const verbose = args.includes("--verbose");
  const positional = args.filter((a) => !a.startsWith("--"));
  const unknown = args.filter((a) => a.startsWith("--") && a !== "--verbose" && a !== "--dark");
  if (unknown.length > 0) {
    throw new Error(`Unknown argument: ${unknown[0]}`);
  }
  if (positional.length > 1) {
    throw new Error("Too many positional arguments");
  }

  const outputPath = positional[0];
  if (verbose) {
    warn(`Writing ${INCLUSIONS.length} inclusions as DOT to ${outputPath ?? "STDOUT"}.`);
  }

  const options = { darkTheme: args.includes("--dark") };
  if (outputPath) {
    const sink = FileSink.open(outputPath);
    try {
      renderDot(hasse, sink, options);
    } finally {
      sink.close();
    }
  } else {
    renderDot(hasse, new StreamSink(process.stdout), options);
  }

  if (verbose) {
    warn("Done.");
  }
}

try {
  main();
} catch (err) {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${msg}\n`);
  process.exitCode = 1;
}
