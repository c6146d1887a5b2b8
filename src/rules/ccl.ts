/**
 * Collectives. Every input/output pair becomes one communicator op on a
 * shared handle; `rtgpu.ccl.execute` launches the group on the stream.
 */

import type { PatternProvider } from "../conversion/pattern";
import { getNumberMatrix, getString } from "../ir/attributes";
import type { Operation } from "../ir/graph";
import { CHAIN, handle } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { pickAttributes } from "./common";

const REDUCTIONS = new Set(["sum", "prod", "min", "max"]);

const PAIRED_COLLECTIVES: Record<string, string> = {
  "lhlo.all_gather": "rtgpu.ccl.all_gather",
  "lhlo.all_reduce": "rtgpu.ccl.all_reduce",
  "lhlo.reduce_scatter": "rtgpu.ccl.reduce_scatter",
  "lhlo.all_to_all": "rtgpu.ccl.all_to_all",
};

function needsReduction(op: Operation): boolean {
  return op.name === "lhlo.all_reduce" || op.name === "lhlo.reduce_scatter";
}

export const registerCclPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "collective-to-ccl",
      rootKinds: Object.keys(PAIRED_COLLECTIVES),
      match(op) {
        if (op.operands.length === 0 || op.operands.length % 2 !== 0) {
          return false;
        }
        return !needsReduction(op) || REDUCTIONS.has(getString(op, "reduction") ?? "");
      },
      lower(op, rewriter, ctx) {
        const count = op.operands.length / 2;
        const groups = pickAttributes(op, ["replica_groups"]);
        const ccl = rewriter.createValue("rtgpu.ccl.create", [ctx.chain], handle("ccl"), groups);
        const attrs = pickAttributes(op, ["reduction"]);
        let chain = ctx.chain;
        for (let i = 0; i < count; i += 1) {
          chain = rewriter.createValue(
            PAIRED_COLLECTIVES[op.name],
            [ccl, op.operands[i], op.operands[count + i], chain],
            CHAIN,
            attrs,
          );
        }
        return rewriter.createValue("rtgpu.ccl.execute", [ctx.stream, ccl, chain], CHAIN);
      },
    }),
    asyncLoweringPattern({
      name: "collective-permute-to-ccl",
      rootKinds: ["lhlo.collective_permute"],
      match(op) {
        return getNumberMatrix(op, "source_target_pairs") !== undefined;
      },
      lower(op, rewriter, ctx) {
        const [input, output] = op.operands;
        const pairs = pickAttributes(op, ["source_target_pairs"]);
        const ccl = rewriter.createValue("rtgpu.ccl.create", [ctx.chain], handle("ccl"));
        const sent = rewriter.createValue("rtgpu.ccl.send", [ccl, input, ctx.chain], CHAIN, pairs);
        const received = rewriter.createValue("rtgpu.ccl.recv", [ccl, output, sent], CHAIN, pairs);
        return rewriter.createValue("rtgpu.ccl.execute", [ctx.stream, ccl, received], CHAIN);
      },
    }),
  );
};
