/**
 * Patterns that carry the type conversion through the structure around the
 * wrapped ops: function signatures, calls and returns, loops, streamify
 * bodies, and the memref ops that produce buffers.
 */

import type { PatternRegistry, RewritePattern } from "../conversion/pattern";
import type { ConversionTarget } from "../conversion/target";
import type { TypeConverter } from "../conversion/type-converter";
import { getNumber, requireSignature, signatureAttr } from "../ir/attributes";
import type { Graph, Operation } from "../ir/graph";
import { BUFFER, byteSize, elementByteSize } from "../ir/types";
import { isInsideStreamify, STREAMIFY_OP, YIELD_OP } from "./streamify";

/** Ops whose legality is just "all operand, result and region types legal". */
export const TYPE_CONVERTED_OPS = [
  "func.call",
  "func.return",
  "rt.call",
  "rt.return",
  "rt.while",
  YIELD_OP,
];

/** Ops that must not survive the conversion. */
export const MEMREF_ALLOCATION_OPS = [
  "memref.reinterpret_cast",
  "memref.view",
  "memref.alloca",
  "memref.alloc",
  "memref.dealloc",
];

export function hasLegalTypes(converter: TypeConverter, graph: Graph, op: Operation): boolean {
  return (
    converter.isLegalOp(graph, op) &&
    op.regions.every((region) => converter.isLegalRegion(graph, region))
  );
}

const funcSignatureConversion: RewritePattern = {
  name: "func-signature-conversion",
  rootKinds: ["func.func"],
  rewrite(op, rewriter) {
    const converted = rewriter.typeConverter.convertSignature(requireSignature(op));
    rewriter.setAttribute(op, "function_type", signatureAttr(converted));
    rewriter.convertRegionArgTypes(op.regions[0]);
    return true;
  },
};

const opTypeConversion: RewritePattern = {
  name: "op-type-conversion",
  rootKinds: TYPE_CONVERTED_OPS,
  rewrite(op, rewriter) {
    // Operands turn legal when their producers are converted.
    if (!rewriter.operandsLegal(op)) {
      return false;
    }
    let changed = rewriter.convertResultTypes(op);
    for (const region of op.regions) {
      changed = rewriter.convertRegionArgTypes(region) || changed;
    }
    return changed;
  },
};

const streamifyConversion: RewritePattern = {
  name: "streamify-conversion",
  rootKinds: [STREAMIFY_OP],
  rewrite(op, rewriter) {
    if (!rewriter.operandsLegal(op)) {
      return false;
    }
    const argsChanged = rewriter.convertRegionArgTypes(op.regions[0]);
    const resultsChanged = rewriter.convertResultTypes(op);
    return argsChanged || resultsChanged;
  },
};

const allocConversion: RewritePattern = {
  name: "memref-alloc-conversion",
  rootKinds: ["memref.alloc", "memref.alloca"],
  rewrite(op, rewriter) {
    const type = rewriter.graph.typeOf(op.results[0]);
    const buffer = rewriter.createValue("rtgpu.mem.allocate", [], BUFFER, { size: byteSize(type) });
    rewriter.replaceOp(op, [buffer]);
    return true;
  },
};

const deallocConversion: RewritePattern = {
  name: "memref-dealloc-conversion",
  rootKinds: ["memref.dealloc"],
  rewrite(op, rewriter) {
    if (!rewriter.operandsLegal(op)) {
      return false;
    }
    rewriter.create("rtgpu.mem.deallocate", { operands: [op.operands[0]] });
    rewriter.eraseOp(op);
    return true;
  },
};

const viewConversion: RewritePattern = {
  name: "memref-view-conversion",
  rootKinds: ["memref.view", "memref.reinterpret_cast"],
  rewrite(op, rewriter) {
    if (!rewriter.operandsLegal(op)) {
      return false;
    }
    const type = rewriter.graph.typeOf(op.results[0]);
    if (type.kind !== "memref") {
      return false;
    }
    const offset =
      op.name === "memref.view"
        ? getNumber(op, "byte_shift")
        : scaled(getNumber(op, "offset"), elementByteSize(type.element));
    if (offset === undefined) {
      return false;
    }
    const view = rewriter.createValue("rtgpu.mem.view", [op.operands[0]], BUFFER, {
      offset,
      size: byteSize(type),
    });
    rewriter.replaceOp(op, [view]);
    return true;
  },
};

function scaled(value: number | undefined, factor: number): number | undefined {
  return value === undefined ? undefined : value * factor;
}

/**
 * Register the structural conversions and claim host loads outside a
 * streamify body for wrapping.
 */
export function populateStreamifyConversionPatterns(
  patterns: PatternRegistry,
  wrapTarget: ConversionTarget,
): void {
  wrapTarget.addDynamicallyLegalOp(["memref.load"], (op, graph) => !isInsideStreamify(graph, op));
  patterns.add(
    funcSignatureConversion,
    opTypeConversion,
    streamifyConversion,
    allocConversion,
    deallocConversion,
    viewConversion,
  );
}
