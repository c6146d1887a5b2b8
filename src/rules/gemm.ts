import type { PatternProvider } from "../conversion/pattern";
import { getBool, getNumber } from "../ir/attributes";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { createHandle, pickAttributes } from "./common";

export const registerGemmPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "gemm-to-blas",
      rootKinds: ["lhlo_gpu.gemm"],
      lower(op, rewriter, ctx) {
        const [a, b, c] = op.operands;
        const batch = getNumber(op, "batch_size") ?? 1;
        const blas = createHandle(rewriter, ctx, "blas");
        return rewriter.createValue(
          batch > 1 ? "rtgpu.blas.gemm_batch" : "rtgpu.blas.gemm",
          [blas, ctx.stream, a, b, c, ctx.chain],
          CHAIN,
          {
            alpha: getNumber(op, "alpha") ?? 1,
            beta: getNumber(op, "beta") ?? 0,
            transpose_a: getBool(op, "transpose_a") ?? false,
            transpose_b: getBool(op, "transpose_b") ?? false,
            ...pickAttributes(op, ["m", "n", "k", "batch_size"]),
          },
        );
      },
    }),
  );
};
