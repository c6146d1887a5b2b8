import type { PatternProvider } from "../conversion/pattern";
import { getBool } from "../ir/attributes";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { copyBuffer, createHandle, pickAttributes } from "./common";

/** Factorisation happens in place, so the input is first copied into the output. */
export const registerCholeskyPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "cholesky-to-solver",
      rootKinds: ["lhlo_gpu.cholesky"],
      lower(op, rewriter, ctx) {
        const [input, output, scratch, info] = op.operands;
        let chain = ctx.chain;
        if (input !== output) {
          chain = copyBuffer(rewriter, ctx, output, input, chain);
        }
        const solver = createHandle(rewriter, ctx, "solver");
        return rewriter.createValue(
          "rtgpu.solver.potrf",
          [solver, ctx.stream, output, scratch, info, chain],
          CHAIN,
          {
            fill_mode: (getBool(op, "is_lower") ?? true) ? "lower" : "upper",
            ...pickAttributes(op, ["n", "batch_size"]),
          },
        );
      },
    }),
  );
};
