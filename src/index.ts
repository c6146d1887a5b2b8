export * from "./conversion/config";
export * from "./conversion/conversion-errors";
export * from "./conversion/driver";
export * from "./conversion/pattern";
export * from "./conversion/rewriter";
export * from "./conversion/target";
export * from "./conversion/trace";
export * from "./conversion/type-converter";
export * from "./dialects";
export * from "./ir/attributes";
export * from "./ir/builder";
export * from "./ir/graph";
export * from "./ir/printer";
export * from "./ir/types";
export * from "./ir/verify";
export * from "./pass/lower-to-gpu";
export * from "./pass/pass";
export * from "./rules";
export * from "./streamify/async-lowering";
export * from "./streamify/conversion-patterns";
export * from "./streamify/streamify";
