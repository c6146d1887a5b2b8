import { describe, expect, it } from "vitest";

import { NoApplicablePatternError } from "../src/conversion/conversion-errors";
import { applyPartialConversion } from "../src/conversion/driver";
import { PatternRegistry, type RewritePattern } from "../src/conversion/pattern";
import { ConversionTarget } from "../src/conversion/target";
import { ConversionTrace } from "../src/conversion/trace";
import { createBufferToRuntimeConverter } from "../src/conversion/type-converter";
import { GraphBuilder } from "../src/ir/builder";
import { printGraph } from "../src/ir/printer";
import { memref, tensor } from "../src/ir/types";

const F32x4 = memref([4], "f32");

/** alloc (#3, value %4) followed by one lhlo.copy (#5). */
function copyGraph() {
  const b = GraphBuilder.create();
  const buf = b.value("memref.alloc", [], F32x4);
  const copy = b.op("lhlo.copy", [buf, buf]);
  return { b, graph: b.graph, buf, copy };
}

function replaceWith(name: string, extra: Partial<RewritePattern> = {}): RewritePattern {
  return {
    name: `copy-to-${name}`,
    rootKinds: ["lhlo.copy"],
    rewrite(op, rewriter) {
      rewriter.create(name, { operands: op.operands });
      rewriter.eraseOp(op);
      return true;
    },
    ...extra,
  };
}

const copyIsIllegal = () => new ConversionTarget().addIllegalOp("lhlo.copy");

function convert(b: GraphBuilder, target: ConversionTarget, patterns: RewritePattern[], trace?: ConversionTrace) {
  return applyPartialConversion(
    b.graph,
    target,
    new PatternRegistry().add(...patterns),
    createBufferToRuntimeConverter(),
    { trace, config: { maxRewrites: 100 } },
  );
}

function names(b: GraphBuilder): string[] {
  return b.graph.collectOps().map((op) => op.name);
}

describe("applyPartialConversion", () => {
  it("rewrites illegal ops until the target accepts the graph", () => {
    const { b, graph } = copyGraph();
    const target = copyIsIllegal();
    const outcome = convert(b, target, [replaceWith("gpu.memcpy")]);

    expect(outcome.status).toBe("legal");
    expect(outcome.stats.rewrites).toBe(1);
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
    expect(graph.collectOps().some((op) => target.isIllegal(op, graph))).toBe(false);
  });

  it("freezes the registry it consumes", () => {
    const { b, graph } = copyGraph();
    const patterns = new PatternRegistry().add(replaceWith("gpu.memcpy"));
    applyPartialConversion(graph, copyIsIllegal(), patterns, createBufferToRuntimeConverter());
    expect(patterns.isFrozen).toBe(true);
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
  });

  it("breaks benefit ties by registration order", () => {
    const first = copyGraph();
    convert(first.b, copyIsIllegal(), [replaceWith("gpu.memcpy"), replaceWith("gpu.memset")]);
    expect(names(first.b)).toEqual(["memref.alloc", "gpu.memcpy"]);

    const second = copyGraph();
    convert(second.b, copyIsIllegal(), [replaceWith("gpu.memset"), replaceWith("gpu.memcpy")]);
    expect(names(second.b)).toEqual(["memref.alloc", "gpu.memset"]);

    const third = copyGraph();
    convert(third.b, copyIsIllegal(), [replaceWith("gpu.memset"), replaceWith("gpu.memcpy", { benefit: 3 })]);
    expect(names(third.b)).toEqual(["memref.alloc", "gpu.memcpy"]);
  });

  it("ends a rewrite-to-self loop in Stuck and restores the input", () => {
    const { b, graph } = copyGraph();
    const printed = printGraph(graph);
    const outcome = convert(b, copyIsIllegal(), [replaceWith("lhlo.copy")]);

    expect(outcome.status).toBe("stuck");
    if (outcome.status !== "stuck") return;
    expect(outcome.error).toBeInstanceOf(NoApplicablePatternError);
    expect(outcome.error.reason).toBe("no_applicable_pattern");
    expect(outcome.error.first).toEqual({ id: 6, name: "lhlo.copy" });
    expect(outcome.error.last).toEqual({ id: 6, name: "lhlo.copy" });
    expect(outcome.error.message).toBe(
      "failed to legalize 1 op(s); first: lhlo.copy (#6), last: lhlo.copy (#6)",
    );
    expect(printGraph(graph)).toBe(printed);
  });

  it("stops a bounded-recursion loop at the rewrite limit", () => {
    const { b, graph } = copyGraph();
    const printed = printGraph(graph);
    const outcome = applyPartialConversion(
      graph,
      copyIsIllegal(),
      new PatternRegistry().add(replaceWith("lhlo.copy", { boundedRecursion: true })),
      createBufferToRuntimeConverter(),
      { config: { maxRewrites: 5 } },
    );

    expect(outcome.status).toBe("stuck");
    if (outcome.status !== "stuck") return;
    expect(outcome.stats.rewrites).toBe(5);
    expect(outcome.error.reason).toBe("rewrite_limit");
    expect(outcome.error.message).toBe("rewrite limit reached with 1 illegal op(s); first: lhlo.copy (#10)");
    expect(printGraph(graph)).toBe(printed);
    expect(names(b)).toEqual(["memref.alloc", "lhlo.copy"]);
  });

  it("rolls back a pattern that mutates and then declines", () => {
    const { b } = copyGraph();
    const trace = new ConversionTrace();
    const declines: RewritePattern = {
      name: "declines",
      rootKinds: ["lhlo.copy"],
      benefit: 2,
      rewrite(op, rewriter) {
        rewriter.create("gpu.memset", { operands: op.operands });
        return false;
      },
    };
    const outcome = convert(b, copyIsIllegal(), [declines, replaceWith("gpu.memcpy")], trace);

    expect(outcome.status).toBe("legal");
    expect(outcome.stats.rejected).toBe(1);
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
    expect(trace.snapshot()[0]).toEqual({
      type: "pattern_rejected",
      pattern: "declines",
      op: 5,
      name: "lhlo.copy",
      reason: "no_match",
    });
  });

  it("applies an in-place rewrite to the live op after a rollback", () => {
    const { b, graph } = copyGraph();
    const target = new ConversionTarget().addDynamicallyLegalOp(
      ["lhlo.copy"],
      (op) => op.attributes.done === true,
    );
    const declines: RewritePattern = {
      name: "declines",
      rootKinds: ["lhlo.copy"],
      benefit: 2,
      rewrite(op, rewriter) {
        rewriter.setAttribute(op, "done", false);
        return false;
      },
    };
    const marks: RewritePattern = {
      name: "marks",
      rootKinds: ["lhlo.copy"],
      rewrite(op, rewriter) {
        rewriter.setAttribute(op, "done", true);
        return true;
      },
    };
    const outcome = convert(b, target, [declines, marks]);

    expect(outcome.status).toBe("legal");
    expect(outcome.stats.rewrites).toBe(1);
    expect(outcome.stats.rejected).toBe(1);
    expect(graph.op(5).attributes).toEqual({ done: true });
  });

  it("rejects a pattern that reports success without changing anything", () => {
    const { b } = copyGraph();
    const trace = new ConversionTrace();
    const idle: RewritePattern = { name: "idle", rootKinds: ["lhlo.copy"], rewrite: () => true };
    const outcome = convert(b, copyIsIllegal(), [idle], trace);

    expect(outcome.status).toBe("stuck");
    const rejected = trace.snapshot().filter((event) => event.type === "pattern_rejected");
    expect(rejected[0]).toMatchObject({ pattern: "idle", reason: "no_progress" });
  });

  it("treats an unsupported type inside a rewrite as a local failure", () => {
    const { b } = copyGraph();
    const trace = new ConversionTrace();
    const needsTensor: RewritePattern = {
      name: "needs-tensor",
      rootKinds: ["lhlo.copy"],
      benefit: 2,
      rewrite(op, rewriter) {
        rewriter.create("gpu.memset", { operands: op.operands });
        rewriter.typeConverter.convertType(tensor([2], "f32"));
        return true;
      },
    };
    const outcome = convert(b, copyIsIllegal(), [needsTensor, replaceWith("gpu.memcpy")], trace);

    expect(outcome.status).toBe("legal");
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
    expect(trace.snapshot()[0]).toEqual({
      type: "pattern_rejected",
      pattern: "needs-tensor",
      op: 5,
      name: "lhlo.copy",
      reason: "unsupported_type",
      message: "no conversion for type tensor<2xf32>",
    });
  });

  it("treats a structural violation inside a rewrite as a local failure", () => {
    const { b, graph } = copyGraph();
    const trace = new ConversionTrace();
    const erasesProducer: RewritePattern = {
      name: "erases-producer",
      rootKinds: ["lhlo.copy"],
      benefit: 2,
      rewrite(_op, rewriter) {
        rewriter.eraseOp(graph.op(3));
        return true;
      },
    };
    const outcome = convert(b, copyIsIllegal(), [erasesProducer, replaceWith("gpu.memcpy")], trace);

    expect(outcome.status).toBe("legal");
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
    expect(trace.snapshot()[0]).toMatchObject({ pattern: "erases-producer", reason: "structural_violation" });
  });

  it("restores the graph and rethrows unexpected errors", () => {
    const { b, graph } = copyGraph();
    const printed = printGraph(graph);
    const trace = new ConversionTrace();
    const broken: RewritePattern = {
      name: "broken",
      rootKinds: ["lhlo.copy"],
      rewrite(op, rewriter) {
        rewriter.create("gpu.memcpy", { operands: op.operands });
        throw new Error("boom");
      },
    };

    expect(() => convert(b, copyIsIllegal(), [broken], trace)).toThrow("boom");
    expect(printGraph(graph)).toBe(printed);
    expect(trace.snapshot().at(-1)?.type).toBe("restored");
  });

  it("skips ids of ops erased by an earlier rewrite", () => {
    const b = GraphBuilder.create();
    const buf = b.value("memref.alloc", [], F32x4);
    b.op("lhlo.copy", [buf, buf]);
    b.op("lhlo.copy", [buf, buf]);
    const mergeCopies: RewritePattern = {
      name: "merge-copies",
      rootKinds: ["lhlo.copy"],
      rewrite(op, rewriter) {
        rewriter.create("gpu.memcpy", { operands: op.operands });
        for (const other of rewriter.graph.collectOps().filter((candidate) => candidate.name === "lhlo.copy")) {
          rewriter.eraseOp(other);
        }
        return true;
      },
    };
    const outcome = convert(b, copyIsIllegal(), [mergeCopies]);

    expect(outcome.status).toBe("legal");
    expect(outcome.stats).toEqual({ rewrites: 1, rejected: 0, visited: 4 });
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy"]);
  });

  it("retries blocked ops once the graph has changed", () => {
    const b = GraphBuilder.create();
    const buf = b.value("memref.alloc", [], F32x4);
    b.op("lhlo.copy", [buf, buf]);
    b.op("lhlo_gpu.gemm", [buf, buf, buf]);
    const trace = new ConversionTrace();
    const copyAfterGemm: RewritePattern = {
      ...replaceWith("gpu.memcpy"),
      match: (_op, graph) => graph.collectOps().every((op) => op.name !== "lhlo_gpu.gemm"),
    };
    const gemmToLaunch: RewritePattern = {
      name: "gemm-to-launch",
      rootKinds: ["lhlo_gpu.gemm"],
      rewrite(op, rewriter) {
        rewriter.create("gpu.launch_func", { operands: op.operands });
        rewriter.eraseOp(op);
        return true;
      },
    };
    const target = copyIsIllegal().addIllegalDialect("lhlo_gpu");
    const outcome = convert(b, target, [copyAfterGemm, gemmToLaunch], trace);

    expect(outcome.status).toBe("legal");
    expect(names(b)).toEqual(["memref.alloc", "gpu.memcpy", "gpu.launch_func"]);
    expect(trace.snapshot().map((event) => event.type)).toEqual(["op_blocked", "pattern_applied", "pattern_applied"]);
  });

  it("leaves unclassified ops alone", () => {
    const { b } = copyGraph();
    const outcome = convert(b, new ConversionTarget().addIllegalOp("lhlo.fft"), [replaceWith("gpu.memcpy")]);
    expect(outcome).toEqual({ status: "legal", stats: { rewrites: 0, rejected: 0, visited: 2 } });
    expect(names(b)).toEqual(["memref.alloc", "lhlo.copy"]);
  });
});
