/**
 * Partial conversion driver.
 *
 * Runs a worklist over op ids until every op is accepted by the target
 * (Legal) or some illegal op has no pattern left to try (Stuck):
 * - ops are visited in pre-order; ids of erased ops are skipped
 * - candidates are tried by benefit, then registration order
 * - each attempt runs against a snapshot and is rolled back unless the
 *   pattern reports success and changed the graph
 * - a pattern is not re-applied to ops it produced (its lineage) unless it
 *   declares bounded recursion
 * - ops blocked at one generation are retried once the graph has moved on
 *
 * On Stuck the graph is restored to its state at entry.
 */

import { assertValidGraph } from "../ir/verify";
import type { Graph, OpId, Operation } from "../ir/graph";
import { type ConversionConfig, resolveConversionConfig } from "./config";
import {
  NoApplicablePatternError,
  StructuralViolationError,
  type StuckReason,
  UnsupportedTypeError,
} from "./conversion-errors";
import type { PatternRegistry, RegisteredPattern } from "./pattern";
import { ConversionRewriter } from "./rewriter";
import type { ConversionTarget } from "./target";
import type { ConversionTrace, ConversionTraceEvent } from "./trace";
import type { TypeConverter } from "./type-converter";

export type ConversionStats = {
  /** Successful pattern applications */
  rewrites: number;
  /** Attempts rolled back */
  rejected: number;
  /** Worklist entries that resolved to a live op */
  visited: number;
};

export type ConversionOutcome =
  | { status: "legal"; stats: ConversionStats }
  | { status: "stuck"; error: NoApplicablePatternError; stats: ConversionStats };

export type ConversionOptions = {
  config?: Partial<ConversionConfig>;
  trace?: ConversionTrace;
};

type RejectReason = Extract<ConversionTraceEvent, { type: "pattern_rejected" }>["reason"];

const NO_LINEAGE: ReadonlySet<number> = new Set();

function ancestorsOf(graph: Graph, op: Operation): OpId[] {
  const out: OpId[] = [];
  let current = graph.parentOp(op);
  while (current && current.id !== graph.root) {
    out.push(current.id);
    current = graph.parentOp(current);
  }
  return out;
}

export function applyPartialConversion(
  graph: Graph,
  target: ConversionTarget,
  patterns: PatternRegistry,
  converter: TypeConverter,
  options: ConversionOptions = {},
): ConversionOutcome {
  const config = resolveConversionConfig(options.config);
  const trace = options.trace;
  patterns.freeze();

  const entry = graph.snapshot();
  const stats: ConversionStats = { rewrites: 0, rejected: 0, visited: 0 };
  const lineage = new Map<OpId, ReadonlySet<number>>();
  const blocked = new Map<OpId, number>();
  const queue: OpId[] = [];
  const queued = new Set<OpId>();

  const enqueue = (id: OpId) => {
    if (!queued.has(id)) {
      queued.add(id);
      queue.push(id);
    }
  };

  const illegalOps = (): Operation[] =>
    graph.collectOps().filter((op) => target.isIllegal(op, graph));

  const stuck = (reason: StuckReason): ConversionOutcome => {
    const remaining = illegalOps();
    const first = remaining[0];
    const last = remaining[remaining.length - 1];
    const error = new NoApplicablePatternError(
      reason,
      { id: first.id, name: first.name },
      { id: last.id, name: last.name },
      remaining.length,
    );
    trace?.record({ type: "stuck", reason, ops: remaining.map((op) => op.id) });
    if (config.debug) {
      console.log(`[legalize] stuck (${reason}): ${error.message}`);
    }
    graph.restore(entry);
    trace?.record({ type: "restored", generation: graph.generation });
    return { status: "stuck", error, stats };
  };

  const reject = (candidate: RegisteredPattern, op: Operation, reason: RejectReason, message?: string) => {
    stats.rejected += 1;
    trace?.record({
      type: "pattern_rejected",
      pattern: candidate.pattern.name,
      op: op.id,
      name: op.name,
      reason,
      message,
    });
  };

  const tryLegalize = (root: Operation): boolean => {
    const applied = lineage.get(root.id) ?? NO_LINEAGE;
    const ancestors = ancestorsOf(graph, root);
    for (const candidate of patterns.candidatesFor(root, graph)) {
      const { pattern, order } = candidate;
      if (applied.has(order) && !pattern.boundedRecursion) {
        continue;
      }
      // A rolled-back attempt leaves earlier op objects detached from the graph.
      const op = graph.op(root.id);

      const before = graph.snapshot();
      const rewriter = new ConversionRewriter(graph, converter, op);
      let reason: RejectReason | undefined;
      let message: string | undefined;
      try {
        if (!pattern.rewrite(op, rewriter)) {
          reason = "no_match";
        } else if (graph.generation === before.generation) {
          reason = "no_progress";
        }
      } catch (error) {
        if (error instanceof UnsupportedTypeError) {
          reason = "unsupported_type";
        } else if (error instanceof StructuralViolationError) {
          reason = "structural_violation";
        } else {
          throw error;
        }
        message = error.message;
      }
      if (reason !== undefined) {
        graph.restore(before);
        reject(candidate, op, reason, message);
        continue;
      }

      stats.rewrites += 1;
      const next = new Set(applied);
      next.add(order);
      const created = rewriter.createdOps();
      for (const id of created) {
        lineage.set(id, next);
      }
      if (graph.lookupOp(op.id)) {
        lineage.set(op.id, next);
        enqueue(op.id);
      }
      for (const id of rewriter.touchedOps()) {
        enqueue(id);
      }
      // Enclosing ops may be legal only once their bodies are.
      for (const id of ancestors) {
        if (graph.lookupOp(id)) {
          enqueue(id);
        }
      }
      trace?.record({ type: "pattern_applied", pattern: pattern.name, op: op.id, name: op.name, created });
      if (config.debug) {
        console.log(`[legalize] ${pattern.name} rewrote ${op.name} (#${op.id}), created ${created.length} op(s)`);
      }
      return true;
    }
    return false;
  };

  try {
    graph.walk((op) => enqueue(op.id));
    for (;;) {
      for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
        queued.delete(id);
        const op = graph.lookupOp(id);
        if (!op) {
          continue;
        }
        stats.visited += 1;
        if (!target.isIllegal(op, graph)) {
          continue;
        }
        if (stats.rewrites >= config.maxRewrites) {
          return stuck("rewrite_limit");
        }
        if (!tryLegalize(op)) {
          blocked.set(op.id, graph.generation);
          trace?.record({ type: "op_blocked", op: op.id, name: op.name, generation: graph.generation });
        }
      }

      let requeued = false;
      for (const op of illegalOps()) {
        if (blocked.get(op.id) !== graph.generation) {
          enqueue(op.id);
          requeued = true;
        }
      }
      if (!requeued) {
        break;
      }
    }

    if (illegalOps().length > 0) {
      return stuck("no_applicable_pattern");
    }
    if (config.verify) {
      assertValidGraph(graph);
    }
    return { status: "legal", stats };
  } catch (error) {
    graph.restore(entry);
    trace?.record({ type: "restored", generation: graph.generation });
    throw error;
  }
}
