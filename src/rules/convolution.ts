import type { PatternProvider } from "../conversion/pattern";
import { CHAIN } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";
import { createHandle, pickAttributes } from "./common";

const CONVOLUTIONS: Record<string, string> = {
  "lhlo_gpu.conv_forward": "rtgpu.dnn.convolution_forward",
  "lhlo_gpu.conv_backward_input": "rtgpu.dnn.convolution_backward_data",
  "lhlo_gpu.conv_backward_filter": "rtgpu.dnn.convolution_backward_filter",
};

const CONVOLUTION_ATTRIBUTES = [
  "algorithm",
  "window_strides",
  "padding",
  "lhs_dilation",
  "rhs_dilation",
  "feature_group_count",
];

export const registerConvolutionPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "convolution-to-dnn",
      rootKinds: Object.keys(CONVOLUTIONS),
      lower(op, rewriter, ctx) {
        const dnn = createHandle(rewriter, ctx, "dnn");
        return rewriter.createValue(
          CONVOLUTIONS[op.name],
          [dnn, ctx.stream, ...op.operands, ctx.chain],
          CHAIN,
          pickAttributes(op, CONVOLUTION_ATTRIBUTES),
        );
      },
    }),
  );
};
