import type { ConversionError } from "../conversion/conversion-errors";
import type { ConversionStats } from "../conversion/driver";
import type { DialectRegistry } from "../dialects/dialect";
import type { Graph } from "../ir/graph";

export type PassStats = ConversionStats & {
  /** Streamify ops created by the wrapper */
  wrappers: number;
  /** Ops moved into streamify bodies */
  wrappedOps: number;
};

export type PassResult =
  | { status: "success"; stats: PassStats }
  | { status: "failure"; error: ConversionError };

export interface Pass {
  readonly name: string;

  /** Load every vocabulary the pass may create ops in. */
  getDependentDialects(registry: DialectRegistry): void;

  run(graph: Graph): PassResult;
}

/** Load the pass's dependent dialects into the graph's registry, then run it. */
export function runPass(graph: Graph, pass: Pass): PassResult {
  pass.getDependentDialects(graph.registry);
  return pass.run(graph);
}
