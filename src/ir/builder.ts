import { createSourceRegistry } from "../dialects";
import type { DialectRegistry } from "../dialects/dialect";
import { type Attribute, signatureAttr } from "./attributes";
import { Graph, type Operation, type RegionId, type ValueId } from "./graph";
import type { FunctionSignature, Type } from "./types";

/**
 * Appends operations to the end of one region. Used by graph producers and
 * tests; rewrite patterns go through ConversionRewriter instead.
 */
export class GraphBuilder {
  constructor(
    readonly graph: Graph,
    readonly region: RegionId = graph.rootRegion,
  ) {}

  static create(registry: DialectRegistry = createSourceRegistry()): GraphBuilder {
    return new GraphBuilder(new Graph(registry));
  }

  op(
    name: string,
    operands: ValueId[] = [],
    resultTypes: Type[] = [],
    attributes: Record<string, Attribute> = {},
  ): Operation {
    return this.graph.createOp(
      name,
      { operands, resultTypes, attributes, regions: this.regionCountOf(name) },
      { region: this.region, before: null },
    );
  }

  /** Create a single-result op and return the result. */
  value(
    name: string,
    operands: ValueId[],
    type: Type,
    attributes: Record<string, Attribute> = {},
  ): ValueId {
    return this.op(name, operands, [type], attributes).results[0];
  }

  func(
    name: string,
    signature: FunctionSignature,
    body: (b: GraphBuilder, args: ValueId[]) => void,
  ): Operation {
    const fn = this.op("func.func", [], [], {
      sym_name: name,
      function_type: signatureAttr(signature),
    });
    this.fillRegion(fn.regions[0], signature.inputs, body);
    return fn;
  }

  /** Populate region `index` of `op`, declaring `argTypes` as block arguments. */
  body(
    op: Operation,
    argTypes: Type[],
    body: (b: GraphBuilder, args: ValueId[]) => void,
    index = 0,
  ): Operation {
    this.fillRegion(op.regions[index], argTypes, body);
    return op;
  }

  private fillRegion(
    region: RegionId,
    argTypes: Type[],
    body: (b: GraphBuilder, args: ValueId[]) => void,
  ): void {
    const args = argTypes.map((type) => this.graph.addRegionArg(region, type));
    body(new GraphBuilder(this.graph, region), args);
  }

  private regionCountOf(name: string): number {
    return this.graph.registry.lookupOp(name)?.regions ?? 0;
  }
}
