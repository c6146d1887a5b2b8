/**
 * Buffer-level linear-algebra vocabulary consumed by the lowering.
 *
 * Ops write their outputs into buffer operands and produce no results.
 */

import { defineDialect } from "./dialect";

export const LHLO_DIALECT = defineDialect("lhlo", {
  // Collectives: N inputs followed by N outputs.
  all_gather: { operands: "variadic", results: 0, summary: "gather across replica groups" },
  all_reduce: { operands: "variadic", results: 0, summary: "reduce across replica groups" },
  reduce_scatter: { operands: "variadic", results: 0, summary: "reduce then scatter" },
  all_to_all: { operands: "variadic", results: 0, summary: "exchange slices between replicas" },
  collective_permute: { operands: 2, results: 0, summary: "send/recv along `source_target_pairs`" },

  custom_call: { operands: "variadic", results: 0, summary: "opaque call of `call_target_name`" },
  triangular_solve: { operands: 3, results: 0, summary: "solve op(a) x = b into output" },
  replica_id: { operands: 1, results: 0, summary: "write the replica id" },
  partition_id: { operands: 1, results: 0, summary: "write the partition id" },
  infeed: { operands: "variadic", results: 0, summary: "host to device data feed" },
  outfeed: { operands: "variadic", results: 0, summary: "device to host data feed" },
  fft: { operands: 2, results: 0, summary: "spectral transform of `fft_type`" },
  copy: { operands: 2, results: 0, summary: "buffer copy" },
});

export const LHLO_GPU_DIALECT = defineDialect("lhlo_gpu", {
  gemm: { operands: 3, results: 0, summary: "c = alpha * op(a) op(b) + beta * c" },
  conv_forward: { operands: 4, results: 0, summary: "input, filter, output, scratch" },
  conv_backward_input: { operands: 4, results: 0, summary: "d_output, filter, d_input, scratch" },
  conv_backward_filter: { operands: 4, results: 0, summary: "input, d_output, d_filter, scratch" },
  cholesky: { operands: 4, results: 0, summary: "input, output, scratch, info" },
});
