import type { Graph, Operation } from "../ir/graph";
import type { ConversionRewriter } from "./rewriter";
import type { TypeConverter } from "./type-converter";

export interface RewritePattern {
  readonly name: string;

  /** Op names this pattern applies to; omitted means any op. */
  readonly rootKinds?: readonly string[];

  /** Higher runs first (default 1). */
  readonly benefit?: number;

  /**
   * Allow the pattern to apply to ops it produced itself. Without this the
   * driver never re-applies a pattern along its own rewrite lineage.
   */
  readonly boundedRecursion?: boolean;

  /** Extra match condition, e.g. on current operand types. */
  match?(op: Operation, graph: Graph): boolean;

  /**
   * Rewrite `op` through `rewriter`. Returning false (or throwing
   * UnsupportedTypeError / StructuralViolationError) rolls back every
   * change made during the call.
   */
  rewrite(op: Operation, rewriter: ConversionRewriter): boolean;
}

export type PatternProvider = (patterns: PatternRegistry, converter: TypeConverter) => void;

export type RegisteredPattern = {
  pattern: RewritePattern;
  /** Registration order; breaks benefit ties. */
  order: number;
};

export function patternBenefit(pattern: RewritePattern): number {
  return pattern.benefit ?? 1;
}

/**
 * Rewrite rules contributed by independent providers. The driver freezes
 * the registry when it starts consuming it.
 */
export class PatternRegistry {
  private readonly entries: RegisteredPattern[] = [];
  private frozen = false;

  add(...patterns: RewritePattern[]): this {
    if (this.frozen) {
      throw new Error("pattern registry is frozen; register patterns before conversion starts");
    }
    for (const pattern of patterns) {
      this.entries.push({ pattern, order: this.entries.length });
    }
    return this;
  }

  addProvider(provider: PatternProvider, converter: TypeConverter): this {
    provider(this, converter);
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  patterns(): RewritePattern[] {
    return this.entries.map((entry) => entry.pattern);
  }

  /** Matching patterns, highest benefit first, then first registered. */
  candidatesFor(op: Operation, graph: Graph): RegisteredPattern[] {
    return this.entries
      .filter(({ pattern }) => {
        if (pattern.rootKinds && !pattern.rootKinds.includes(op.name)) {
          return false;
        }
        return pattern.match ? pattern.match(op, graph) : true;
      })
      .sort((a, b) => {
        const byBenefit = patternBenefit(b.pattern) - patternBenefit(a.pattern);
        return byBenefit !== 0 ? byBenefit : a.order - b.order;
      });
  }
}
