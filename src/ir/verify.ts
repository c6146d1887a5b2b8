import { StructuralViolationError } from "../conversion/conversion-errors";
import type { Graph, Operation } from "./graph";

/**
 * Structural checks over the whole graph. Returns one message per problem;
 * an empty list means the graph is well formed.
 */
export function verifyGraph(graph: Graph): string[] {
  const problems: string[] = [];

  const checkOp = (op: Operation) => {
    const where = `${op.name} (#${op.id})`;
    if (op.parent !== null && !graph.region(op.parent).ops.includes(op.id)) {
      problems.push(`${where} is not listed in its parent region`);
    }
    try {
      graph.registry.verifyOp(op.name, op.operands.length, op.results.length, op.regions.length);
    } catch (error) {
      if (!(error instanceof StructuralViolationError)) {
        throw error;
      }
      problems.push(error.message);
    }
    op.operands.forEach((operand, index) => {
      if (!graph.hasValue(operand)) {
        problems.push(`${where} operand ${index} refers to erased value %${operand}`);
      } else if (!graph.isVisibleAt(operand, graph.pointBefore(op))) {
        problems.push(`${where} operand ${index} (%${operand}) does not dominate its use`);
      }
    });
    op.results.forEach((result, index) => {
      const def = graph.value(result).def;
      if (def.kind !== "result" || def.op !== op.id || def.index !== index) {
        problems.push(`${where} result ${index} (%${result}) has a mismatched definition`);
      }
    });
    for (const regionId of op.regions) {
      const region = graph.region(regionId);
      if (region.parent !== op.id) {
        problems.push(`${where} region ^${regionId} has a mismatched parent`);
      }
      region.args.forEach((arg, index) => {
        const def = graph.value(arg).def;
        if (def.kind !== "arg" || def.region !== regionId || def.index !== index) {
          problems.push(`${where} region ^${regionId} argument ${index} has a mismatched definition`);
        }
      });
    }
  };

  graph.walk(checkOp);
  return problems;
}

export function assertValidGraph(graph: Graph): void {
  const problems = verifyGraph(graph);
  if (problems.length > 0) {
    throw new StructuralViolationError(`invalid graph:\n  ${problems.join("\n  ")}`);
  }
}
