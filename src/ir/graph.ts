/**
 * Operation graph arena.
 *
 * Operations, values and regions live in id-keyed maps; an operation refers
 * to its nested regions and operands by id, a region to its parent op and
 * its ops by id. Ids are never reused, so an id held across a rewrite either
 * resolves to the same entity or to nothing.
 *
 * Every structural change bumps `generation`. `snapshot()`/`restore()` give
 * the conversion driver transactional rewrites.
 */

import { StructuralViolationError } from "../conversion/conversion-errors";
import type { DialectRegistry } from "../dialects/dialect";
import type { Attribute } from "./attributes";
import type { Type } from "./types";

export type OpId = number;
export type ValueId = number;
export type RegionId = number;

export type ValueDef =
  | { kind: "result"; op: OpId; index: number }
  | { kind: "arg"; region: RegionId; index: number };

export interface Value {
  id: ValueId;
  type: Type;
  def: ValueDef;
}

export interface Region {
  id: RegionId;
  parent: OpId;
  args: ValueId[];
  ops: OpId[];
}

export interface Operation {
  id: OpId;
  name: string;
  operands: ValueId[];
  results: ValueId[];
  regions: RegionId[];
  attributes: Record<string, Attribute>;
  /** Region holding this op; null only for the root module. */
  parent: RegionId | null;
}

/** Insert before `before`, or at the end of the region when it is null. */
export type InsertPoint = {
  region: RegionId;
  before: OpId | null;
};

export type OpInit = {
  operands?: ValueId[];
  resultTypes?: Type[];
  attributes?: Record<string, Attribute>;
  regions?: number;
};

export type GraphSnapshot = {
  ops: Map<OpId, Operation>;
  values: Map<ValueId, Value>;
  regions: Map<RegionId, Region>;
  generation: number;
};

function copyOp(op: Operation): Operation {
  return {
    ...op,
    operands: op.operands.slice(),
    results: op.results.slice(),
    regions: op.regions.slice(),
    attributes: { ...op.attributes },
  };
}

function copyRegion(region: Region): Region {
  return { ...region, args: region.args.slice(), ops: region.ops.slice() };
}

function copyValue(value: Value): Value {
  return { ...value, def: { ...value.def } };
}

function copyMap<K, V>(source: Map<K, V>, copy: (v: V) => V): Map<K, V> {
  const out = new Map<K, V>();
  for (const [key, entry] of source) {
    out.set(key, copy(entry));
  }
  return out;
}

export class Graph {
  private ops = new Map<OpId, Operation>();
  private values = new Map<ValueId, Value>();
  private regions = new Map<RegionId, Region>();
  private nextId = 1;
  private gen = 0;

  readonly root: OpId;
  readonly rootRegion: RegionId;

  constructor(readonly registry: DialectRegistry) {
    const moduleOp: Operation = {
      id: this.nextId++,
      name: "builtin.module",
      operands: [],
      results: [],
      regions: [],
      attributes: {},
      parent: null,
    };
    const body: Region = { id: this.nextId++, parent: moduleOp.id, args: [], ops: [] };
    moduleOp.regions.push(body.id);
    this.ops.set(moduleOp.id, moduleOp);
    this.regions.set(body.id, body);
    this.root = moduleOp.id;
    this.rootRegion = body.id;
  }

  get generation(): number {
    return this.gen;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  lookupOp(id: OpId): Operation | undefined {
    return this.ops.get(id);
  }

  op(id: OpId): Operation {
    const op = this.ops.get(id);
    if (!op) {
      throw new StructuralViolationError(`operation #${id} does not exist`);
    }
    return op;
  }

  value(id: ValueId): Value {
    const value = this.values.get(id);
    if (!value) {
      throw new StructuralViolationError(`value %${id} does not exist`);
    }
    return value;
  }

  hasValue(id: ValueId): boolean {
    return this.values.has(id);
  }

  region(id: RegionId): Region {
    const region = this.regions.get(id);
    if (!region) {
      throw new StructuralViolationError(`region ^${id} does not exist`);
    }
    return region;
  }

  typeOf(id: ValueId): Type {
    return this.value(id).type;
  }

  /** Op whose result `id` is, if it is an op result. */
  definingOp(id: ValueId): Operation | undefined {
    const def = this.value(id).def;
    return def.kind === "result" ? this.ops.get(def.op) : undefined;
  }

  parentOp(op: Operation): Operation | undefined {
    if (op.parent === null) {
      return undefined;
    }
    const region = this.regions.get(op.parent);
    return region ? this.ops.get(region.parent) : undefined;
  }

  position(op: Operation): number {
    if (op.parent === null) {
      return 0;
    }
    return this.region(op.parent).ops.indexOf(op.id);
  }

  users(id: ValueId): Operation[] {
    const out: Operation[] = [];
    for (const op of this.ops.values()) {
      if (op.operands.includes(id)) {
        out.push(op);
      }
    }
    return out;
  }

  hasUses(id: ValueId): boolean {
    for (const op of this.ops.values()) {
      if (op.operands.includes(id)) {
        return true;
      }
    }
    return false;
  }

  get opCount(): number {
    return this.ops.size;
  }

  /** Pre-order walk of all ops nested in `region` (default: the module body). */
  walk(callback: (op: Operation) => void, region: RegionId = this.rootRegion): void {
    for (const id of this.region(region).ops.slice()) {
      const op = this.ops.get(id);
      if (!op) {
        continue;
      }
      callback(op);
      for (const nested of op.regions) {
        if (this.regions.has(nested)) {
          this.walk(callback, nested);
        }
      }
    }
  }

  collectOps(region: RegionId = this.rootRegion): Operation[] {
    const out: Operation[] = [];
    this.walk((op) => out.push(op), region);
    return out;
  }

  /**
   * Whether `id` may be used by an op inserted at `point`: it is an argument
   * of the region or one of its ancestors, or the result of an op placed
   * before the insertion point in such a region.
   */
  isVisibleAt(id: ValueId, point: InsertPoint): boolean {
    const value = this.values.get(id);
    if (!value) {
      return false;
    }
    let regionId: RegionId | null = point.region;
    let limit = point.before === null ? Infinity : this.region(point.region).ops.indexOf(point.before);
    while (regionId !== null) {
      const region = this.region(regionId);
      if (value.def.kind === "arg" && value.def.region === regionId) {
        return true;
      }
      if (value.def.kind === "result") {
        const index = region.ops.indexOf(value.def.op);
        if (index >= 0) {
          return index < limit;
        }
      }
      const owner = this.op(region.parent);
      if (owner.parent === null) {
        return false;
      }
      regionId = owner.parent;
      limit = this.region(owner.parent).ops.indexOf(owner.id);
    }
    return false;
  }

  pointBefore(op: Operation): InsertPoint {
    if (op.parent === null) {
      throw new StructuralViolationError("cannot insert around the root module");
    }
    return { region: op.parent, before: op.id };
  }

  pointAfter(op: Operation): InsertPoint {
    if (op.parent === null) {
      throw new StructuralViolationError("cannot insert around the root module");
    }
    const ops = this.region(op.parent).ops;
    const next = ops[ops.indexOf(op.id) + 1];
    return { region: op.parent, before: next ?? null };
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  createOp(name: string, init: OpInit, point: InsertPoint): Operation {
    const operands = init.operands ?? [];
    const resultTypes = init.resultTypes ?? [];
    const regionCount = init.regions ?? 0;
    this.registry.verifyOp(name, operands.length, resultTypes.length, regionCount);
    for (const operand of operands) {
      if (!this.isVisibleAt(operand, point)) {
        throw new StructuralViolationError(
          `operand %${operand} of ${name} is not defined before its use`,
        );
      }
    }

    const op: Operation = {
      id: this.nextId++,
      name,
      operands: operands.slice(),
      results: [],
      regions: [],
      attributes: { ...(init.attributes ?? {}) },
      parent: point.region,
    };
    resultTypes.forEach((type, index) => {
      const value: Value = { id: this.nextId++, type, def: { kind: "result", op: op.id, index } };
      this.values.set(value.id, value);
      op.results.push(value.id);
    });
    for (let i = 0; i < regionCount; i += 1) {
      const region: Region = { id: this.nextId++, parent: op.id, args: [], ops: [] };
      this.regions.set(region.id, region);
      op.regions.push(region.id);
    }
    this.ops.set(op.id, op);
    this.insert(op.id, point);
    this.gen += 1;
    return op;
  }

  addRegionArg(regionId: RegionId, type: Type): ValueId {
    const region = this.region(regionId);
    const value: Value = {
      id: this.nextId++,
      type,
      def: { kind: "arg", region: regionId, index: region.args.length },
    };
    this.values.set(value.id, value);
    region.args.push(value.id);
    this.gen += 1;
    return value.id;
  }

  /**
   * Erase `op` together with everything nested in it. Results must have no
   * users outside the erased subtree.
   */
  eraseOp(id: OpId): void {
    const op = this.op(id);
    if (op.parent === null) {
      throw new StructuralViolationError("cannot erase the root module");
    }
    const subtree = new Set<OpId>([op.id]);
    for (const region of op.regions) {
      this.walk((nested) => subtree.add(nested.id), region);
    }
    for (const member of subtree) {
      for (const result of this.op(member).results) {
        for (const user of this.users(result)) {
          if (!subtree.has(user.id)) {
            throw new StructuralViolationError(
              `cannot erase ${op.name} (#${op.id}): result %${result} is still used by ${user.name} (#${user.id})`,
            );
          }
        }
      }
    }

    this.detach(op);
    for (const member of subtree) {
      const doomed = this.op(member);
      for (const result of doomed.results) {
        this.values.delete(result);
      }
      for (const regionId of doomed.regions) {
        for (const arg of this.region(regionId).args) {
          this.values.delete(arg);
        }
        this.regions.delete(regionId);
      }
      this.ops.delete(member);
    }
    this.gen += 1;
  }

  setOperand(op: Operation, index: number, value: ValueId): void {
    if (!this.isVisibleAt(value, this.pointBefore(op))) {
      throw new StructuralViolationError(
        `%${value} is not visible at ${op.name} (#${op.id})`,
      );
    }
    op.operands[index] = value;
    this.gen += 1;
  }

  /** Redirect the uses of `from` accepted by `filter` to `to`. */
  replaceUsesWhere(
    from: ValueId,
    to: ValueId,
    filter: (user: Operation) => boolean,
  ): Operation[] {
    const users = this.users(from).filter(filter);
    for (const user of users) {
      if (!this.isVisibleAt(to, this.pointBefore(user))) {
        throw new StructuralViolationError(
          `replacing %${from} with %${to} at ${user.name} (#${user.id}) would use a value before its definition`,
        );
      }
    }
    for (const user of users) {
      user.operands = user.operands.map((operand) => (operand === from ? to : operand));
    }
    if (users.length > 0) {
      this.gen += 1;
    }
    return users;
  }

  replaceAllUsesWith(from: ValueId, to: ValueId): Operation[] {
    return this.replaceUsesWhere(from, to, () => true);
  }

  setType(id: ValueId, type: Type): void {
    this.value(id).type = type;
    this.gen += 1;
  }

  setAttribute(op: Operation, key: string, value: Attribute): void {
    op.attributes = { ...op.attributes, [key]: value };
    this.gen += 1;
  }

  setName(op: Operation, name: string): void {
    const def = this.registry.lookupOp(name);
    if (!def) {
      throw new StructuralViolationError(`unknown operation ${name}`);
    }
    this.registry.verifyOp(name, op.operands.length, op.results.length, op.regions.length);
    op.name = name;
    this.gen += 1;
  }

  /** Move `op` to `point`. Operand visibility is the caller's concern. */
  moveOp(op: Operation, point: InsertPoint): void {
    if (point.before === op.id) {
      return;
    }
    this.detach(op);
    op.parent = point.region;
    this.insert(op.id, point);
    this.gen += 1;
  }

  // ==========================================================================
  // Transactions
  // ==========================================================================

  snapshot(): GraphSnapshot {
    return {
      ops: copyMap(this.ops, copyOp),
      values: copyMap(this.values, copyValue),
      regions: copyMap(this.regions, copyRegion),
      generation: this.gen,
    };
  }

  restore(snapshot: GraphSnapshot): void {
    this.ops = copyMap(snapshot.ops, copyOp);
    this.values = copyMap(snapshot.values, copyValue);
    this.regions = copyMap(snapshot.regions, copyRegion);
    this.gen = snapshot.generation;
  }

  clone(): Graph {
    const copy = new Graph(this.registry);
    copy.restore(this.snapshot());
    copy.nextId = this.nextId;
    return copy;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private insert(id: OpId, point: InsertPoint): void {
    const ops = this.region(point.region).ops;
    if (point.before === null) {
      ops.push(id);
      return;
    }
    const index = ops.indexOf(point.before);
    if (index < 0) {
      throw new StructuralViolationError(
        `insertion anchor #${point.before} is not in region ^${point.region}`,
      );
    }
    ops.splice(index, 0, id);
  }

  private detach(op: Operation): void {
    if (op.parent === null) {
      return;
    }
    const ops = this.region(op.parent).ops;
    const index = ops.indexOf(op.id);
    if (index >= 0) {
      ops.splice(index, 1);
    }
  }
}
