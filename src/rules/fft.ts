import type { PatternProvider } from "../conversion/pattern";
import { getNumberArray, getString } from "../ir/attributes";
import { CHAIN, handle } from "../ir/types";
import { asyncLoweringPattern } from "../streamify/async-lowering";

const DIRECTIONS: Record<string, "forward" | "inverse"> = {
  FFT: "forward",
  RFFT: "forward",
  IFFT: "inverse",
  IRFFT: "inverse",
};

export const registerFftPatterns: PatternProvider = (patterns) => {
  patterns.add(
    asyncLoweringPattern({
      name: "fft-to-plan",
      rootKinds: ["lhlo.fft"],
      match(op) {
        return Object.hasOwn(DIRECTIONS, getString(op, "fft_type") ?? "") && getNumberArray(op, "fft_length") !== undefined;
      },
      lower(op, rewriter, ctx) {
        const [input, output] = op.operands;
        const type = getString(op, "fft_type") ?? "FFT";
        const plan = rewriter.createValue("rtgpu.fft.create", [ctx.stream], handle("fft"), {
          type,
          dims: getNumberArray(op, "fft_length") ?? [],
        });
        return rewriter.createValue("rtgpu.fft.execute", [plan, ctx.stream, input, output, ctx.chain], CHAIN, {
          direction: DIRECTIONS[type],
        });
      },
    }),
  );
};
