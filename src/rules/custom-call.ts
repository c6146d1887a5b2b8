import type { PatternProvider } from "../conversion/pattern";
import { getNumber, getString } from "../ir/attributes";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";

export const registerCustomCallPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "custom-call-to-runtime",
      rootKinds: ["lhlo.custom_call"],
      match(op) {
        return getString(op, "call_target_name") !== undefined;
      },
      lower(op, rewriter, ctx) {
        const symbol = getString(op, "call_target_name") ?? "";
        return rewriter.createValue("xrt.custom_call", [ctx.stream, ...op.operands, ctx.chain], CHAIN, {
          symbol,
          num_args: getNumber(op, "num_args") ?? op.operands.length,
        });
      },
    }),
  );
};
