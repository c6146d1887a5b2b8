import { defineDialect } from "./dialect";

export const BUILTIN_DIALECT = defineDialect("builtin", {
  module: { operands: 0, results: 0, regions: 1, summary: "top-level container" },
});

export const FUNC_DIALECT = defineDialect("func", {
  func: {
    operands: 0,
    results: 0,
    regions: 1,
    summary: "function; `sym_name` and `function_type` attributes",
  },
  return: { operands: "variadic", results: 0, terminator: true, summary: "function return" },
  call: { operands: "variadic", results: "variadic", summary: "direct call of `callee`" },
});

export const MEMREF_DIALECT = defineDialect("memref", {
  alloc: { operands: 0, results: 1, summary: "heap allocation of a statically shaped buffer" },
  alloca: { operands: 0, results: 1, summary: "stack allocation of a statically shaped buffer" },
  dealloc: { operands: 1, results: 0, summary: "release an allocation" },
  view: { operands: 1, results: 1, summary: "typed view at `byte_shift` into a byte buffer" },
  reinterpret_cast: { operands: 1, results: 1, summary: "view with an element `offset`" },
  load: { operands: "variadic", results: 1, summary: "host read of one element" },
});
