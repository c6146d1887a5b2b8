import { formatAttribute } from "./attributes";
import type { Graph, Operation, RegionId } from "./graph";
import { formatType } from "./types";

function valueName(id: number): string {
  return `%${id}`;
}

export function printOp(graph: Graph, op: Operation, indent = ""): string[] {
  const lines: string[] = [];
  const results = op.results.length > 0 ? `${op.results.map(valueName).join(", ")} = ` : "";
  const operands = op.operands.map(valueName).join(", ");
  const keys = Object.keys(op.attributes).sort();
  const attrs =
    keys.length > 0
      ? ` {${keys.map((key) => `${key} = ${formatAttribute(op.attributes[key])}`).join(", ")}}`
      : "";
  const operandTypes = op.operands.map((id) => formatType(graph.typeOf(id))).join(", ");
  const resultTypes = op.results.map((id) => formatType(graph.typeOf(id))).join(", ");
  const head = `${indent}${results}${op.name}(${operands})${attrs} : (${operandTypes}) -> (${resultTypes})`;

  if (op.regions.length === 0) {
    lines.push(head);
    return lines;
  }
  lines.push(`${head} {`);
  op.regions.forEach((region, index) => {
    if (index > 0) {
      lines.push(`${indent}} {`);
    }
    lines.push(...printRegion(graph, region, `${indent}  `));
  });
  lines.push(`${indent}}`);
  return lines;
}

function printRegion(graph: Graph, id: RegionId, indent: string): string[] {
  const region = graph.region(id);
  const lines: string[] = [];
  if (region.args.length > 0) {
    const args = region.args.map((arg) => `${valueName(arg)}: ${formatType(graph.typeOf(arg))}`);
    lines.push(`${indent.slice(2)}^(${args.join(", ")}):`);
  }
  for (const opId of region.ops) {
    lines.push(...printOp(graph, graph.op(opId), indent));
  }
  return lines;
}

/** Textual form of the whole graph; stable for a given construction order. */
export function printGraph(graph: Graph): string {
  return ["module {", ...printRegion(graph, graph.rootRegion, "  "), "}"].join("\n");
}
