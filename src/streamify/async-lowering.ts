import type { RewritePattern } from "../conversion/pattern";
import type { ConversionRewriter } from "../conversion/rewriter";
import type { Graph, Operation, ValueId } from "../ir/graph";
import { STREAMIFY_OP } from "./streamify";

export type StreamContext = {
  wrapper: Operation;
  stream: ValueId;
  /** Chain that is live right before the op being lowered. */
  chain: ValueId;
};

/**
 * Stream and chain available to `op`, which must sit directly in a
 * streamify body. The live chain is the last chain produced before `op`, or
 * the body's chain argument.
 */
export function getStreamContext(graph: Graph, op: Operation): StreamContext | undefined {
  const wrapper = graph.parentOp(op);
  if (!wrapper || wrapper.name !== STREAMIFY_OP) {
    return undefined;
  }
  const body = graph.region(wrapper.regions[0]);
  let chain = body.args[0];
  for (const id of body.ops) {
    if (id === op.id) {
      break;
    }
    for (const result of graph.op(id).results) {
      if (graph.typeOf(result).kind === "chain") {
        chain = result;
      }
    }
  }
  return { wrapper, stream: body.args[1], chain };
}

/**
 * Emit the runtime ops for `op` before it and return the chain signalling
 * their completion, or undefined when `op` cannot be lowered this way.
 */
export type AsyncLowering = (
  op: Operation,
  rewriter: ConversionRewriter,
  ctx: StreamContext,
) => ValueId | undefined;

export type AsyncLoweringOptions = {
  name: string;
  rootKinds: readonly string[];
  benefit?: number;
  match?: (op: Operation, graph: Graph) => boolean;
  lower: AsyncLowering;
};

/**
 * Pattern for an op that lowers to chain-carrying runtime ops. It applies
 * only inside a streamify body once all operands have runtime types; the
 * produced chain replaces the incoming chain for every later op in the body.
 */
export function asyncLoweringPattern(options: AsyncLoweringOptions): RewritePattern {
  return {
    name: options.name,
    rootKinds: options.rootKinds,
    benefit: options.benefit,
    match: options.match,
    rewrite(op, rewriter) {
      const ctx = getStreamContext(rewriter.graph, op);
      if (!ctx || !rewriter.operandsLegal(op)) {
        return false;
      }
      rewriter.setInsertionPointBefore(op);
      const outChain = options.lower(op, rewriter, ctx);
      if (outChain === undefined) {
        return false;
      }
      rewriter.replaceUsesAfter(ctx.chain, outChain, op);
      rewriter.eraseOp(op);
      return true;
    },
  };
}
