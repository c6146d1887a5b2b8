import type { PatternProvider } from "../conversion/pattern";
import { getBool, getString } from "../ir/attributes";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { copyBuffer, createHandle } from "./common";

const BLAS_OPERATION: Record<string, string> = {
  none: "N",
  transpose: "T",
  adjoint: "C",
};

/** The solve overwrites its right-hand side, so `b` is first copied into the output. */
export const registerTriangularSolvePatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "triangular-solve-to-blas",
      rootKinds: ["lhlo.triangular_solve"],
      match(op) {
        return Object.hasOwn(BLAS_OPERATION, getString(op, "transpose_a") ?? "none");
      },
      lower(op, rewriter, ctx) {
        const [a, b, output] = op.operands;
        let chain = ctx.chain;
        if (b !== output) {
          chain = copyBuffer(rewriter, ctx, output, b, chain);
        }
        const blas = createHandle(rewriter, ctx, "blas");
        return rewriter.createValue("rtgpu.blas.trsm", [blas, ctx.stream, a, output, chain], CHAIN, {
          side: (getBool(op, "left_side") ?? true) ? "left" : "right",
          fill_mode: (getBool(op, "lower") ?? true) ? "lower" : "upper",
          operation: BLAS_OPERATION[getString(op, "transpose_a") ?? "none"],
          diag: (getBool(op, "unit_diagonal") ?? false) ? "unit" : "non_unit",
        });
      },
    }),
  );
};
