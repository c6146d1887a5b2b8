/**
 * Asynchronous runtime vocabulary. Every async op takes a chain operand and
 * produces the chain that signals its completion.
 */

import { defineDialect } from "./dialect";

export const RT_DIALECT = defineDialect("rt", {
  new_chain: { operands: 0, results: 1, summary: "fresh ready chain" },
  merge_chains: { operands: "variadic", results: 1, summary: "chain ready when all inputs are" },
  call: { operands: "variadic", results: "variadic", summary: "call of `callee`" },
  return: { operands: "variadic", results: 0, terminator: true, summary: "return" },
  while: { operands: "variadic", results: "variadic", regions: 1, summary: "loop carrying its operands" },
});

export const RTGPU_DIALECT = defineDialect("rtgpu", {
  streamify: {
    operands: "variadic",
    results: "variadic",
    regions: 1,
    summary: "(chain, stream, captures...) -> (chain, escapes...)",
  },
  yield: { operands: "variadic", results: 0, terminator: true, summary: "streamify terminator" },
  "stream.get": { operands: 0, results: 1, summary: "stream of the current execution context" },

  "mem.allocate": { operands: 0, results: 1, summary: "device buffer of `size` bytes" },
  "mem.deallocate": { operands: 1, results: 0, summary: "release a device buffer" },
  "mem.view": { operands: 1, results: 1, summary: "sub-buffer at `offset` of `size` bytes" },
  "mem.copy": { operands: 4, results: 1, summary: "(dst, src, stream, chain) -> chain" },

  "blas.create": { operands: 1, results: 1, summary: "(stream) -> blas handle" },
  "blas.gemm": { operands: 6, results: 1, summary: "(handle, stream, a, b, c, chain) -> chain" },
  "blas.gemm_batch": { operands: 6, results: 1, summary: "(handle, stream, a, b, c, chain) -> chain" },
  "blas.trsm": { operands: 5, results: 1, summary: "(handle, stream, a, b, chain) -> chain" },

  "dnn.create": { operands: 1, results: 1, summary: "(stream) -> dnn handle" },
  "dnn.convolution_forward": { operands: 7, results: 1, summary: "(handle, stream, x, w, y, scratch, chain) -> chain" },
  "dnn.convolution_backward_data": { operands: 7, results: 1, summary: "(handle, stream, dy, w, dx, scratch, chain) -> chain" },
  "dnn.convolution_backward_filter": { operands: 7, results: 1, summary: "(handle, stream, x, dy, dw, scratch, chain) -> chain" },

  "solver.create": { operands: 1, results: 1, summary: "(stream) -> solver handle" },
  "solver.potrf": { operands: 6, results: 1, summary: "(handle, stream, a, scratch, info, chain) -> chain" },

  "fft.create": { operands: 1, results: 1, summary: "(stream) -> fft plan handle" },
  "fft.execute": { operands: 5, results: 1, summary: "(handle, stream, input, output, chain) -> chain" },

  "ccl.create": { operands: 1, results: 1, summary: "(chain) -> communicator handle" },
  "ccl.all_gather": { operands: 4, results: 1, summary: "(handle, input, output, chain) -> chain" },
  "ccl.all_reduce": { operands: 4, results: 1, summary: "(handle, input, output, chain) -> chain" },
  "ccl.reduce_scatter": { operands: 4, results: 1, summary: "(handle, input, output, chain) -> chain" },
  "ccl.all_to_all": { operands: 4, results: 1, summary: "(handle, input, output, chain) -> chain" },
  "ccl.send": { operands: 3, results: 1, summary: "(handle, input, chain) -> chain along `source_target_pairs`" },
  "ccl.recv": { operands: 3, results: 1, summary: "(handle, output, chain) -> chain along `source_target_pairs`" },
  "ccl.execute": { operands: 3, results: 1, summary: "(stream, handle, chain) -> chain" },
});

/** Runtime extensions for host interaction and opaque calls. */
export const XRT_DIALECT = defineDialect("xrt", {
  custom_call: { operands: "variadic", results: 1, summary: "(stream, buffers..., chain) -> chain" },
  infeed: { operands: "variadic", results: 1, summary: "(stream, outputs..., chain) -> chain" },
  outfeed: { operands: "variadic", results: 1, summary: "(stream, inputs..., chain) -> chain" },
  replica_id: { operands: 3, results: 1, summary: "(stream, output, chain) -> chain" },
  partition_id: { operands: 3, results: 1, summary: "(stream, output, chain) -> chain" },
});
