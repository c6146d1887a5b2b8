import type { Attribute } from "../ir/attributes";
import type {
  Graph,
  InsertPoint,
  OpId,
  OpInit,
  Operation,
  RegionId,
  ValueId,
} from "../ir/graph";
import { type Type, typesEqual } from "../ir/types";
import { StructuralViolationError } from "./conversion-errors";
import type { TypeConverter } from "./type-converter";

/**
 * Mutation surface handed to a pattern for one rewrite step. The driver
 * snapshots the graph before the step, so nothing here needs to undo itself.
 * It records which ops were created or touched so the driver can re-queue
 * them.
 */
export class ConversionRewriter {
  private point: InsertPoint;
  private readonly created: OpId[] = [];
  private readonly touched = new Set<OpId>();
  /** Values that belonged to ops erased during this step. */
  private readonly erasedValues = new Set<ValueId>();

  constructor(
    readonly graph: Graph,
    readonly typeConverter: TypeConverter,
    readonly root: Operation,
  ) {
    this.point = graph.pointBefore(root);
  }

  // ==========================================================================
  // Insertion point
  // ==========================================================================

  get insertionPoint(): InsertPoint {
    return this.point;
  }

  setInsertionPoint(point: InsertPoint): void {
    this.point = point;
  }

  setInsertionPointBefore(op: Operation): void {
    this.point = this.graph.pointBefore(op);
  }

  setInsertionPointAfter(op: Operation): void {
    this.point = this.graph.pointAfter(op);
  }

  setInsertionPointToEnd(region: RegionId): void {
    this.point = { region, before: null };
  }

  // ==========================================================================
  // Creation and replacement
  // ==========================================================================

  create(name: string, init: OpInit = {}): Operation {
    for (const operand of init.operands ?? []) {
      if (this.erasedValues.has(operand)) {
        throw new StructuralViolationError(
          `${name} uses %${operand}, produced by an op erased in the same rewrite`,
        );
      }
    }
    const op = this.graph.createOp(name, init, this.point);
    this.created.push(op.id);
    this.touched.add(op.id);
    return op;
  }

  /** Create a single-result op and return that result. */
  createValue(name: string, operands: ValueId[], type: Type, attributes: Record<string, Attribute> = {}): ValueId {
    return this.create(name, { operands, resultTypes: [type], attributes }).results[0];
  }

  /** Redirect every use of `op`'s results to `values`, then erase `op`. */
  replaceOp(op: Operation, values: ValueId[]): void {
    if (values.length !== op.results.length) {
      throw new StructuralViolationError(
        `${op.name} (#${op.id}) has ${op.results.length} result(s), got ${values.length} replacement(s)`,
      );
    }
    op.results.forEach((result, index) => {
      const replacement = values[index];
      if (replacement === result) {
        throw new StructuralViolationError(`${op.name} (#${op.id}) cannot be replaced by its own result`);
      }
      this.markTouched(this.graph.replaceAllUsesWith(result, replacement));
    });
    this.eraseOp(op);
  }

  eraseOp(op: Operation): void {
    const doomed = [op, ...op.regions.flatMap((region) => this.graph.collectOps(region))];
    const parent = this.graph.parentOp(op);
    this.graph.eraseOp(op.id);
    for (const erased of doomed) {
      for (const result of erased.results) {
        this.erasedValues.add(result);
      }
      this.touched.delete(erased.id);
    }
    if (parent) {
      this.touched.add(parent.id);
    }
  }

  modifyOpInPlace(op: Operation, update: () => void): void {
    update();
    this.touched.add(op.id);
  }

  setOperand(op: Operation, index: number, value: ValueId): void {
    this.graph.setOperand(op, index, value);
    this.touched.add(op.id);
  }

  setAttribute(op: Operation, key: string, value: Attribute): void {
    this.graph.setAttribute(op, key, value);
    this.touched.add(op.id);
  }

  /**
   * Redirect uses of `from` by ops placed after `anchor` in its region
   * (including ops nested in them) to `to`.
   */
  replaceUsesAfter(from: ValueId, to: ValueId, anchor: Operation): void {
    const region = anchor.parent;
    const anchorIndex = this.graph.position(anchor);
    const isAfter = (user: Operation): boolean => {
      let current: Operation | undefined = user;
      while (current && current.parent !== region) {
        current = this.graph.parentOp(current);
      }
      return current !== undefined && current.id !== anchor.id && this.graph.position(current) > anchorIndex;
    };
    this.markTouched(this.graph.replaceUsesWhere(from, to, isAfter));
  }

  // ==========================================================================
  // Type conversion
  // ==========================================================================

  /** Convert the type of `value` in place; returns the new type. */
  convertValueType(value: ValueId): Type {
    const current = this.graph.typeOf(value);
    const converted = this.typeConverter.convertType(current);
    if (!typesEqual(current, converted)) {
      this.graph.setType(value, converted);
      this.markTouched(this.graph.users(value));
      const def = this.graph.definingOp(value);
      if (def) {
        this.touched.add(def.id);
      }
    }
    return converted;
  }

  /** Returns true when any result type changed. */
  convertResultTypes(op: Operation): boolean {
    return this.convertAll(op.results);
  }

  /** Returns true when any block argument type changed. */
  convertRegionArgTypes(region: RegionId): boolean {
    const changed = this.convertAll(this.graph.region(region).args);
    if (changed) {
      this.touched.add(this.graph.region(region).parent);
    }
    return changed;
  }

  operandsLegal(op: Operation): boolean {
    return op.operands.every((id) => this.typeConverter.isLegal(this.graph.typeOf(id)));
  }

  // ==========================================================================
  // Bookkeeping for the driver
  // ==========================================================================

  createdOps(): OpId[] {
    return this.created.filter((id) => this.graph.lookupOp(id) !== undefined);
  }

  touchedOps(): OpId[] {
    return Array.from(this.touched).filter((id) => this.graph.lookupOp(id) !== undefined);
  }

  private convertAll(values: ValueId[]): boolean {
    let changed = false;
    for (const value of values) {
      const before = this.graph.typeOf(value);
      const after = this.convertValueType(value);
      changed = changed || !typesEqual(before, after);
    }
    return changed;
  }

  private markTouched(ops: Operation[]): void {
    for (const op of ops) {
      this.touched.add(op.id);
    }
  }
}
