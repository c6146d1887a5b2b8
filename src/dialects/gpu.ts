import { defineDialect } from "./dialect";

/** Kernel-level GPU ops. They carry implicit stream semantics and are never wrapped. */
export const GPU_DIALECT = defineDialect("gpu", {
  launch_func: { operands: "variadic", results: 0, summary: "launch `kernel` with buffer operands" },
  memcpy: { operands: 2, results: 0, summary: "device copy dst <- src" },
  memset: { operands: 2, results: 0, summary: "fill a buffer with a value" },
});
