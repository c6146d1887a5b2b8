/**
 * Region wrapping (streamify).
 *
 * Ops that need a stream and a chain to lower are grouped into maximal
 * contiguous runs per region, and each run is moved into the body of a new
 * `rtgpu.streamify` op:
 *
 *   %c1, %e... = rtgpu.streamify(%c0, %s, %captures...) {
 *   ^(%chain, %stream, %capture_args...):
 *     <run>
 *     rtgpu.yield(%chain, %escapes...)
 *   }
 *
 * Values the run reads from outside become wrapper operands and block
 * arguments; results the run hands to later ops become wrapper results.
 * Successive wrappers in a region are ordered through the chain. Patterns
 * lowering the wrapped ops find the stream and chain as block arguments.
 */

import { StructuralViolationError } from "../conversion/conversion-errors";
import type { ConversionTarget } from "../conversion/target";
import type { ConversionTrace } from "../conversion/trace";
import { dialectOf } from "../dialects/dialect";
import type { Graph, OpId, Operation, RegionId, ValueId } from "../ir/graph";
import { CHAIN, STREAM } from "../ir/types";

export const STREAMIFY_OP = "rtgpu.streamify";
export const YIELD_OP = "rtgpu.yield";

export type StreamifyOptions = {
  /** Ops this target accepts are claimed for wrapping. */
  wrapTarget: ConversionTarget;
  /** Main conversion target; ops it explicitly accepts are never wrapped. */
  target: ConversionTarget;
  /** Vocabularies the conversion produces; their ops are never wrapped. */
  destinationDialects: readonly string[];
  trace?: ConversionTrace;
};

export type StreamifyResult = {
  wrappers: OpId[];
  wrappedOps: number;
};

export function isInsideStreamify(graph: Graph, op: Operation): boolean {
  for (let parent = graph.parentOp(op); parent; parent = graph.parentOp(parent)) {
    if (parent.name === STREAMIFY_OP) {
      return true;
    }
  }
  return false;
}

function isExplicitlyLegal(graph: Graph, op: Operation, target: ConversionTarget): boolean {
  return target.classification(op.name) !== undefined && target.isLegal(op, graph);
}

/** Why `op` must stay outside a wrapper, or undefined when it may be wrapped. */
function wrapRefusal(graph: Graph, op: Operation, options: StreamifyOptions): string | undefined {
  if (op.name === STREAMIFY_OP) {
    return "it is a streamify op";
  }
  if (options.destinationDialects.includes(dialectOf(op.name))) {
    return "it belongs to a destination dialect";
  }
  if (isExplicitlyLegal(graph, op, options.target)) {
    return "it is already legal";
  }
  if (isInsideStreamify(graph, op)) {
    return "it is already wrapped";
  }
  return undefined;
}

export function needsWrapping(graph: Graph, op: Operation, options: StreamifyOptions): boolean {
  return wrapRefusal(graph, op, options) === undefined && options.wrapTarget.isLegal(op, graph);
}

/** Maximal contiguous runs of ops in `region` that need wrapping. */
export function findWrapRuns(graph: Graph, region: RegionId, options: StreamifyOptions): Operation[][] {
  const runs: Operation[][] = [];
  let current: Operation[] = [];
  for (const id of graph.region(region).ops) {
    const op = graph.op(id);
    if (needsWrapping(graph, op, options)) {
      current.push(op);
      continue;
    }
    if (current.length > 0) {
      runs.push(current);
    }
    current = [];
  }
  if (current.length > 0) {
    runs.push(current);
  }
  return runs;
}

function validateRun(graph: Graph, ops: Operation[], options: StreamifyOptions): RegionId {
  if (ops.length === 0) {
    throw new StructuralViolationError("cannot wrap an empty run");
  }
  const region = ops[0].parent;
  if (region === null) {
    throw new StructuralViolationError("cannot wrap the root module");
  }
  const start = graph.position(ops[0]);
  ops.forEach((op, index) => {
    if (op.parent !== region) {
      throw new StructuralViolationError(`wrap run spans regions at ${op.name} (#${op.id})`);
    }
    if (graph.position(op) !== start + index) {
      throw new StructuralViolationError(`wrap run is not contiguous at ${op.name} (#${op.id})`);
    }
    const refusal = wrapRefusal(graph, op, options);
    if (refusal) {
      throw new StructuralViolationError(`cannot wrap ${op.name} (#${op.id}): ${refusal}`);
    }
  });
  return region;
}

/**
 * Move the contiguous run `ops` into a new streamify op placed where the run
 * was. Validates the run before mutating anything.
 */
export function wrapOperations(
  graph: Graph,
  ops: Operation[],
  chain: ValueId,
  stream: ValueId,
  options: StreamifyOptions,
): Operation {
  const region = validateRun(graph, ops, options);

  const inside = new Set<OpId>();
  for (const op of ops) {
    inside.add(op.id);
    for (const nested of op.regions) {
      graph.walk((child) => inside.add(child.id), nested);
    }
  }
  const isInternal = (value: ValueId): boolean => {
    const def = graph.value(value).def;
    if (def.kind === "result") {
      return inside.has(def.op);
    }
    return inside.has(graph.region(def.region).parent);
  };

  const captures: ValueId[] = [];
  for (const id of inside) {
    for (const operand of graph.op(id).operands) {
      if (!isInternal(operand) && !captures.includes(operand)) {
        captures.push(operand);
      }
    }
  }
  const escapes: ValueId[] = [];
  for (const op of ops) {
    for (const result of op.results) {
      if (graph.users(result).some((user) => !inside.has(user.id))) {
        escapes.push(result);
      }
    }
  }

  const wrapper = graph.createOp(
    STREAMIFY_OP,
    {
      operands: [chain, stream, ...captures],
      resultTypes: [CHAIN, ...escapes.map((id) => graph.typeOf(id))],
      regions: 1,
    },
    { region, before: ops[0].id },
  );
  const body = wrapper.regions[0];
  const bodyChain = graph.addRegionArg(body, CHAIN);
  graph.addRegionArg(body, STREAM);
  const captureArgs = captures.map((id) => graph.addRegionArg(body, graph.typeOf(id)));

  for (const op of ops) {
    graph.moveOp(op, { region: body, before: null });
  }
  captures.forEach((capture, index) => {
    graph.replaceUsesWhere(capture, captureArgs[index], (user) => inside.has(user.id));
  });
  const terminator = graph.createOp(YIELD_OP, { operands: [bodyChain, ...escapes] }, { region: body, before: null });
  escapes.forEach((escape, index) => {
    graph.replaceUsesWhere(
      escape,
      wrapper.results[index + 1],
      (user) => !inside.has(user.id) && user.id !== terminator.id,
    );
  });

  options.trace?.record({
    type: "wrap",
    wrapper: wrapper.id,
    ops: ops.map((op) => op.id),
    captures: captures.length,
    escapes: escapes.length,
  });
  return wrapper;
}

function regionsToVisit(graph: Graph): RegionId[] {
  const out: RegionId[] = [graph.rootRegion];
  graph.walk((op) => {
    if (op.name !== STREAMIFY_OP && !isInsideStreamify(graph, op)) {
      out.push(...op.regions);
    }
  });
  return out;
}

/**
 * Wrap every run of ops that needs a stream and a chain. Each region with at
 * least one run gets a fresh chain and the current stream right before its
 * first run; the chain is threaded from wrapper to wrapper.
 */
export function streamifyRegions(graph: Graph, options: StreamifyOptions): StreamifyResult {
  const result: StreamifyResult = { wrappers: [], wrappedOps: 0 };
  for (const region of regionsToVisit(graph)) {
    const owner = graph.lookupOp(graph.region(region).parent);
    if (owner && owner.id !== graph.root && isInsideStreamify(graph, owner)) {
      continue;
    }
    const runs = findWrapRuns(graph, region, options);
    if (runs.length === 0) {
      continue;
    }
    const point = graph.pointBefore(runs[0][0]);
    let chain = graph.createOp("rt.new_chain", { resultTypes: [CHAIN] }, point).results[0];
    const stream = graph.createOp("rtgpu.stream.get", { resultTypes: [STREAM] }, point).results[0];
    for (const run of runs) {
      const wrapper = wrapOperations(graph, run, chain, stream, options);
      chain = wrapper.results[0];
      result.wrappers.push(wrapper.id);
      result.wrappedOps += run.length;
    }
  }
  return result;
}
