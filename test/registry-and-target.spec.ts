import { describe, expect, it } from "vitest";

import { type PatternProvider, PatternRegistry, type RewritePattern } from "../src/conversion/pattern";
import { ConversionTarget } from "../src/conversion/target";
import { createBufferToRuntimeConverter } from "../src/conversion/type-converter";
import { GraphBuilder } from "../src/ir/builder";
import { memref } from "../src/ir/types";

function named(name: string, benefit?: number, rootKinds?: string[]): RewritePattern {
  return { name, benefit, rootKinds, rewrite: () => false };
}

function copyGraph() {
  const b = GraphBuilder.create();
  const buffer = b.value("memref.alloc", [], memref([4], "f32"));
  const copy = b.op("lhlo.copy", [buffer, buffer]);
  const gemm = b.op("lhlo_gpu.gemm", [buffer, buffer, buffer]);
  return { graph: b.graph, copy, gemm, alloc: b.graph.op(3) };
}

describe("PatternRegistry", () => {
  it("orders candidates by benefit, then registration order", () => {
    const { graph, copy } = copyGraph();
    const registry = new PatternRegistry().add(
      named("low", 1),
      named("high-first", 5),
      named("default"),
      named("high-second", 5),
    );
    expect(registry.candidatesFor(copy, graph).map((entry) => entry.pattern.name)).toEqual([
      "high-first",
      "high-second",
      "low",
      "default",
    ]);
  });

  it("filters by root kind and match predicate", () => {
    const { graph, copy, gemm } = copyGraph();
    const registry = new PatternRegistry().add(
      named("copies", 1, ["lhlo.copy"]),
      { name: "three-operands", match: (op) => op.operands.length === 3, rewrite: () => false },
    );
    expect(registry.candidatesFor(copy, graph).map((entry) => entry.pattern.name)).toEqual(["copies"]);
    expect(registry.candidatesFor(gemm, graph).map((entry) => entry.pattern.name)).toEqual(["three-operands"]);
  });

  it("gives the same order for providers registered in the same order", () => {
    const { graph, copy } = copyGraph();
    const first: PatternProvider = (patterns) => {
      patterns.add(named("a", 2), named("b", 2));
    };
    const second: PatternProvider = (patterns) => {
      patterns.add(named("c", 2));
    };
    const converter = createBufferToRuntimeConverter();
    const build = () => new PatternRegistry().addProvider(first, converter).addProvider(second, converter);
    const names = (registry: PatternRegistry) =>
      registry.candidatesFor(copy, graph).map((entry) => entry.pattern.name);
    expect(names(build())).toEqual(["a", "b", "c"]);
    expect(names(build())).toEqual(names(build()));
    expect(build().size).toBe(3);
  });

  it("rejects registration after freezing", () => {
    const registry = new PatternRegistry().add(named("a"));
    registry.freeze();
    expect(registry.isFrozen).toBe(true);
    expect(() => registry.add(named("b"))).toThrow("pattern registry is frozen");
    expect(registry.patterns().map((pattern) => pattern.name)).toEqual(["a"]);
  });
});

describe("ConversionTarget", () => {
  it("classifies ops by op rule, then dialect rule", () => {
    const { graph, copy, gemm } = copyGraph();
    const target = new ConversionTarget().addIllegalDialect("lhlo", "lhlo_gpu").addLegalOp("lhlo.copy");
    expect(target.isLegal(copy, graph)).toBe(true);
    expect(target.isIllegal(gemm, graph)).toBe(true);
    expect(target.classificationSource("lhlo.copy")).toBe("op");
    expect(target.classificationSource("lhlo_gpu.gemm")).toBe("dialect");
    expect(target.isStaticallyLegal("lhlo.copy")).toBe(true);
  });

  it("evaluates dynamic rules against the op as it is now", () => {
    const { graph, copy } = copyGraph();
    const target = new ConversionTarget().addDynamicallyLegalOp(
      ["lhlo.copy"],
      (op) => op.attributes.done === true,
    );
    expect(target.getOpLegality(copy, graph)).toBe(false);
    graph.setAttribute(copy, "done", true);
    expect(target.getOpLegality(copy, graph)).toBe(true);
  });

  it("leaves unclassified ops undecided without a default", () => {
    const { graph, alloc } = copyGraph();
    const target = new ConversionTarget().addLegalDialect("lhlo");
    expect(target.getOpLegality(alloc, graph)).toBeUndefined();
    expect(target.isLegal(alloc, graph)).toBe(false);
    expect(target.isIllegal(alloc, graph)).toBe(false);
    expect(target.classificationSource("memref.alloc")).toBe("none");
  });

  it("lets an explicit classification shadow the unknown-op default", () => {
    const { graph, copy, gemm, alloc } = copyGraph();
    const claimed = new ConversionTarget().addLegalOp("lhlo.copy", "lhlo_gpu.gemm");
    const target = new ConversionTarget()
      .addLegalOp("lhlo.copy")
      .markUnknownOpDynamicallyLegal((op, g) => !claimed.isLegal(op, g));
    expect(target.isLegal(copy, graph)).toBe(true);
    expect(target.isIllegal(gemm, graph)).toBe(true);
    expect(target.isLegal(alloc, graph)).toBe(true);
    expect(target.classificationSource("lhlo_gpu.gemm")).toBe("unknown");
  });
});
