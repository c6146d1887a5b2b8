/**
 * Operation catalogs.
 *
 * Every operation name is `<dialect>.<op>`. A dialect lists the ops it
 * defines with their arity so graph construction can reject malformed ops
 * before they are inserted.
 */

import { StructuralViolationError } from "../conversion/conversion-errors";

// ============================================================================
// Types
// ============================================================================

export type Arity = number | "variadic";

export interface OpDef {
  /** Number of operands */
  operands: Arity;

  /** Number of results */
  results: Arity;

  /** Number of nested regions (default 0) */
  regions?: number;

  /** Ends a region body */
  terminator?: boolean;

  summary: string;
}

export interface Dialect {
  name: string;
  ops: Record<string, OpDef>;
}

export function dialectOf(opName: string): string {
  const dot = opName.indexOf(".");
  return dot < 0 ? opName : opName.slice(0, dot);
}

export function defineDialect(name: string, ops: Record<string, OpDef>): Dialect {
  return { name, ops };
}

function arityMatches(arity: Arity, count: number): boolean {
  return arity === "variadic" || arity === count;
}

// ============================================================================
// Registry
// ============================================================================

export class DialectRegistry {
  private readonly dialects = new Map<string, Dialect>();

  insert(...dialects: Dialect[]): void {
    for (const dialect of dialects) {
      this.dialects.set(dialect.name, dialect);
    }
  }

  isLoaded(name: string): boolean {
    return this.dialects.has(name);
  }

  loadedDialects(): string[] {
    return Array.from(this.dialects.keys()).sort();
  }

  lookupOp(opName: string): OpDef | undefined {
    const dialect = this.dialects.get(dialectOf(opName));
    if (!dialect) {
      return undefined;
    }
    return dialect.ops[opName.slice(dialect.name.length + 1)];
  }

  /**
   * Check that an op with the given shape may be created.
   * Throws StructuralViolationError otherwise.
   */
  verifyOp(
    opName: string,
    operandCount: number,
    resultCount: number,
    regionCount: number,
  ): void {
    const dialectName = dialectOf(opName);
    if (!this.dialects.has(dialectName)) {
      throw new StructuralViolationError(
        `dialect '${dialectName}' is not loaded (creating ${opName})`,
      );
    }
    const def = this.lookupOp(opName);
    if (!def) {
      throw new StructuralViolationError(`unknown operation ${opName}`);
    }
    if (!arityMatches(def.operands, operandCount)) {
      throw new StructuralViolationError(
        `${opName} expects ${def.operands} operand(s), got ${operandCount}`,
      );
    }
    if (!arityMatches(def.results, resultCount)) {
      throw new StructuralViolationError(
        `${opName} expects ${def.results} result(s), got ${resultCount}`,
      );
    }
    if ((def.regions ?? 0) !== regionCount) {
      throw new StructuralViolationError(
        `${opName} expects ${def.regions ?? 0} region(s), got ${regionCount}`,
      );
    }
  }
}
