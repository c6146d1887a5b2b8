/**
 * Lowering of buffer-level linear algebra and collectives to GPU runtime ops.
 *
 * The pass wraps every run of ops that needs a stream into `rtgpu.streamify`
 * regions, then drives the registered rules until every op is legal. The
 * graph is either fully converted or left exactly as it was.
 */

import { type ConversionConfig, resolveConversionConfig } from "../conversion/config";
import {
  type ConversionError,
  NoApplicablePatternError,
  StructuralViolationError,
  UnsupportedTypeError,
} from "../conversion/conversion-errors";
import { applyPartialConversion } from "../conversion/driver";
import { type PatternProvider, PatternRegistry } from "../conversion/pattern";
import { ConversionTarget } from "../conversion/target";
import type { ConversionTrace } from "../conversion/trace";
import { createBufferToRuntimeConverter, type TypeConverter } from "../conversion/type-converter";
import { DESTINATION_DIALECTS } from "../dialects";
import type { DialectRegistry } from "../dialects/dialect";
import { getSignature } from "../ir/attributes";
import type { Graph, Operation } from "../ir/graph";
import { DEFAULT_PATTERN_PROVIDERS } from "../rules";
import {
  hasLegalTypes,
  MEMREF_ALLOCATION_OPS,
  populateStreamifyConversionPatterns,
  TYPE_CONVERTED_OPS,
} from "../streamify/conversion-patterns";
import { isInsideStreamify, STREAMIFY_OP, streamifyRegions } from "../streamify/streamify";
import type { Pass, PassResult } from "./pass";

/** Source ops that need a stream and a chain to lower. */
export const STREAM_CONSUMING_LHLO_OPS = [
  "lhlo.all_gather",
  "lhlo.all_reduce",
  "lhlo.reduce_scatter",
  "lhlo.all_to_all",
  "lhlo.collective_permute",
  "lhlo.custom_call",
  "lhlo.triangular_solve",
  "lhlo.replica_id",
  "lhlo.partition_id",
  "lhlo.infeed",
  "lhlo.outfeed",
  "lhlo.fft",
];

export type LowerToGpuOptions = {
  /** Rule providers; defaults to every family this package ships. */
  providers?: readonly PatternProvider[];
  config?: Partial<ConversionConfig>;
  trace?: ConversionTrace;
};

function isConversionError(error: unknown): error is ConversionError {
  return (
    error instanceof UnsupportedTypeError ||
    error instanceof StructuralViolationError ||
    error instanceof NoApplicablePatternError
  );
}

function funcIsLegal(converter: TypeConverter, graph: Graph, op: Operation): boolean {
  const signature = getSignature(op);
  if (!signature || !converter.isSignatureLegal(signature)) {
    return false;
  }
  return op.regions.every((region) => converter.isLegalRegion(graph, region));
}

export function createWrapTarget(): ConversionTarget {
  return new ConversionTarget()
    .addLegalDialect("lhlo_gpu")
    .addLegalOp(...STREAM_CONSUMING_LHLO_OPS);
}

export function createLoweringTarget(
  converter: TypeConverter,
  wrapTarget: ConversionTarget,
): ConversionTarget {
  const typesLegal = (op: Operation, graph: Graph) => hasLegalTypes(converter, graph, op);
  return new ConversionTarget()
    .addIllegalOp(...MEMREF_ALLOCATION_OPS)
    .addDynamicallyLegalOp(["func.func"], (op, graph) => funcIsLegal(converter, graph, op))
    .addDynamicallyLegalOp([STREAMIFY_OP, ...TYPE_CONVERTED_OPS], typesLegal)
    .addDynamicallyLegalOp(["memref.load"], (op, graph) => isInsideStreamify(graph, op))
    .markUnknownOpDynamicallyLegal((op, graph) => !wrapTarget.isLegal(op, graph));
}

export class LowerToGpuPass implements Pass {
  readonly name = "lower-to-gpu";

  constructor(private readonly options: LowerToGpuOptions = {}) {}

  getDependentDialects(registry: DialectRegistry): void {
    registry.insert(...DESTINATION_DIALECTS);
  }

  run(graph: Graph): PassResult {
    const config = resolveConversionConfig(this.options.config);
    const trace = this.options.trace;
    const input = graph.snapshot();

    const converter = createBufferToRuntimeConverter();
    const wrapTarget = createWrapTarget();
    const patterns = new PatternRegistry();
    for (const provider of this.options.providers ?? DEFAULT_PATTERN_PROVIDERS) {
      patterns.addProvider(provider, converter);
    }
    populateStreamifyConversionPatterns(patterns, wrapTarget);
    const target = createLoweringTarget(converter, wrapTarget);

    try {
      const wrapped = streamifyRegions(graph, {
        wrapTarget,
        target,
        destinationDialects: DESTINATION_DIALECTS.map((dialect) => dialect.name),
        trace,
      });
      if (config.debug) {
        console.log(`[legalize] ${this.name}: wrapped ${wrapped.wrappedOps} op(s) into ${wrapped.wrappers.length} streamify op(s)`);
      }

      const outcome = applyPartialConversion(graph, target, patterns, converter, { config, trace });
      if (outcome.status === "stuck") {
        graph.restore(input);
        return { status: "failure", error: outcome.error };
      }
      return {
        status: "success",
        stats: { ...outcome.stats, wrappers: wrapped.wrappers.length, wrappedOps: wrapped.wrappedOps },
      };
    } catch (error) {
      graph.restore(input);
      if (isConversionError(error)) {
        if (config.debug) {
          console.log(`[legalize] ${this.name} failed: ${error.message}`);
        }
        return { status: "failure", error };
      }
      throw error;
    }
  }
}
