/**
 * Legality oracle.
 *
 * Op names and dialect names map to a classification. Op rules shadow
 * dialect rules, and any explicit rule shadows the unknown-op default.
 * Nothing is cached: predicates see the op as it is at query time.
 */

import { dialectOf } from "../dialects/dialect";
import type { Graph, Operation } from "../ir/graph";

export type LegalityPredicate = (op: Operation, graph: Graph) => boolean;

export type Legality =
  | { kind: "legal" }
  | { kind: "illegal" }
  | { kind: "dynamic"; predicate: LegalityPredicate };

export type ClassificationSource = "op" | "dialect" | "unknown" | "none";

const LEGAL: Legality = { kind: "legal" };
const ILLEGAL: Legality = { kind: "illegal" };

export class ConversionTarget {
  private readonly opRules = new Map<string, Legality>();
  private readonly dialectRules = new Map<string, Legality>();
  private unknownRule: LegalityPredicate | undefined;

  addLegalOp(...names: string[]): this {
    return this.setOps(names, LEGAL);
  }

  addIllegalOp(...names: string[]): this {
    return this.setOps(names, ILLEGAL);
  }

  addDynamicallyLegalOp(names: string[], predicate: LegalityPredicate): this {
    return this.setOps(names, { kind: "dynamic", predicate });
  }

  addLegalDialect(...names: string[]): this {
    return this.setDialects(names, LEGAL);
  }

  addIllegalDialect(...names: string[]): this {
    return this.setDialects(names, ILLEGAL);
  }

  addDynamicallyLegalDialect(names: string[], predicate: LegalityPredicate): this {
    return this.setDialects(names, { kind: "dynamic", predicate });
  }

  /** Default for ops with no op or dialect rule. */
  markUnknownOpDynamicallyLegal(predicate: LegalityPredicate): this {
    this.unknownRule = predicate;
    return this;
  }

  /** Explicit rule for an op name, if any. */
  classification(name: string): Legality | undefined {
    return this.opRules.get(name) ?? this.dialectRules.get(dialectOf(name));
  }

  classificationSource(name: string): ClassificationSource {
    if (this.opRules.has(name)) {
      return "op";
    }
    if (this.dialectRules.has(dialectOf(name))) {
      return "dialect";
    }
    return this.unknownRule ? "unknown" : "none";
  }

  /** Whether the op is unconditionally legal by an explicit rule. */
  isStaticallyLegal(name: string): boolean {
    return this.classification(name)?.kind === "legal";
  }

  /**
   * true/false when some rule decides the op, undefined when it is
   * unclassified and no unknown-op default is set.
   */
  getOpLegality(op: Operation, graph: Graph): boolean | undefined {
    const legality = this.classification(op.name);
    if (legality) {
      switch (legality.kind) {
        case "legal":
          return true;
        case "illegal":
          return false;
        case "dynamic":
          return legality.predicate(op, graph);
      }
    }
    return this.unknownRule ? this.unknownRule(op, graph) : undefined;
  }

  isLegal(op: Operation, graph: Graph): boolean {
    return this.getOpLegality(op, graph) === true;
  }

  /** Ops the driver must rewrite. Unclassified ops are left alone. */
  isIllegal(op: Operation, graph: Graph): boolean {
    return this.getOpLegality(op, graph) === false;
  }

  private setOps(names: string[], legality: Legality): this {
    for (const name of names) {
      this.opRules.set(name, legality);
    }
    return this;
  }

  private setDialects(names: string[], legality: Legality): this {
    for (const name of names) {
      this.dialectRules.set(name, legality);
    }
    return this;
  }
}
