import type { PatternProvider } from "../conversion/pattern";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";

export const registerReplicaAndPartitionPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "replica-partition-id-to-runtime",
      rootKinds: ["lhlo.replica_id", "lhlo.partition_id"],
      lower(op, rewriter, ctx) {
        const name = op.name === "lhlo.replica_id" ? "xrt.replica_id" : "xrt.partition_id";
        return rewriter.createValue(name, [ctx.stream, op.operands[0], ctx.chain], CHAIN);
      },
    }),
  );
};
