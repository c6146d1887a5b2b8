import type { PatternProvider } from "../conversion/pattern";
import { registerCclPatterns } from "./ccl";
import { registerCholeskyPatterns } from "./cholesky";
import { registerConvolutionPatterns } from "./convolution";
import { registerCustomCallPatterns } from "./custom-call";
import { registerFftPatterns } from "./fft";
import { registerGemmPatterns } from "./gemm";
import { registerInfeedOutfeedPatterns } from "./infeed-outfeed";
import { registerReplicaAndPartitionPatterns } from "./replica-partition";
import { registerTriangularSolvePatterns } from "./triangular-solve";

export {
  registerCclPatterns,
  registerCholeskyPatterns,
  registerConvolutionPatterns,
  registerCustomCallPatterns,
  registerFftPatterns,
  registerGemmPatterns,
  registerInfeedOutfeedPatterns,
  registerReplicaAndPartitionPatterns,
  registerTriangularSolvePatterns,
};

/** One provider per op family; none depends on another's registration order. */
export const DEFAULT_PATTERN_PROVIDERS: PatternProvider[] = [
  registerCclPatterns,
  registerCholeskyPatterns,
  registerConvolutionPatterns,
  registerCustomCallPatterns,
  registerGemmPatterns,
  registerInfeedOutfeedPatterns,
  registerReplicaAndPartitionPatterns,
  registerTriangularSolvePatterns,
  registerFftPatterns,
];
