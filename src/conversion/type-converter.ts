/**
 * Source-to-target type mapping.
 *
 * A rule returns the converted type, `null` when the type has no runtime
 * representation, or `undefined` to defer to older rules. Rules are tried
 * newest first. Results are memoised per type key, so one type always maps
 * to one target type for the lifetime of the converter.
 */

import type { Graph, Operation, RegionId } from "../ir/graph";
import {
  BUFFER,
  type FunctionSignature,
  type Type,
  typeKey,
  typesEqual,
} from "../ir/types";
import { UnsupportedTypeError } from "./conversion-errors";

export type ConversionRule = (type: Type) => Type | null | undefined;

export class TypeConverter {
  private readonly rules: ConversionRule[] = [];
  private readonly cache = new Map<string, Type | null>();

  addConversion(rule: ConversionRule): this {
    this.rules.push(rule);
    this.cache.clear();
    return this;
  }

  tryConvertType(type: Type): Type | undefined {
    const key = typeKey(type);
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached ?? undefined;
    }
    let result: Type | null = null;
    for (let i = this.rules.length - 1; i >= 0; i -= 1) {
      const converted = this.rules[i](type);
      if (converted !== undefined) {
        result = converted;
        break;
      }
    }
    this.cache.set(key, result);
    return result ?? undefined;
  }

  convertType(type: Type): Type {
    const converted = this.tryConvertType(type);
    if (!converted) {
      throw new UnsupportedTypeError(type);
    }
    return converted;
  }

  /** A type is legal when it converts to itself. */
  isLegal(type: Type): boolean {
    const converted = this.tryConvertType(type);
    return converted !== undefined && typesEqual(converted, type);
  }

  isLegalOp(graph: Graph, op: Operation): boolean {
    return (
      op.operands.every((id) => this.isLegal(graph.typeOf(id))) &&
      op.results.every((id) => this.isLegal(graph.typeOf(id)))
    );
  }

  /** Region boundary check: every block argument has a legal type. */
  isLegalRegion(graph: Graph, region: RegionId): boolean {
    return graph.region(region).args.every((id) => this.isLegal(graph.typeOf(id)));
  }

  isSignatureLegal(signature: FunctionSignature): boolean {
    return (
      signature.inputs.every((type) => this.isLegal(type)) &&
      signature.results.every((type) => this.isLegal(type))
    );
  }

  convertSignature(signature: FunctionSignature): FunctionSignature {
    return {
      inputs: signature.inputs.map((type) => this.convertType(type)),
      results: signature.results.map((type) => this.convertType(type)),
    };
  }
}

/**
 * Converter used by the GPU lowering: buffers become runtime buffer handles,
 * runtime and neutral types are kept, value-semantic tensors are rejected.
 */
export function createBufferToRuntimeConverter(): TypeConverter {
  return new TypeConverter()
    .addConversion((type) => type)
    .addConversion((type) => (type.kind === "memref" ? BUFFER : undefined))
    .addConversion((type) => (type.kind === "tensor" ? null : undefined));
}
