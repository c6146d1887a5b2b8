import type { PatternProvider } from "../conversion/pattern";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { pickAttributes } from "./common";

export const registerInfeedOutfeedPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "feed-to-runtime",
      rootKinds: ["lhlo.infeed", "lhlo.outfeed"],
      lower(op, rewriter, ctx) {
        const name = op.name === "lhlo.infeed" ? "xrt.infeed" : "xrt.outfeed";
        return rewriter.createValue(
          name,
          [ctx.stream, ...op.operands, ctx.chain],
          CHAIN,
          pickAttributes(op, ["config"]),
        );
      },
    }),
  );
};
