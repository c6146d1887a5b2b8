import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { UnsupportedTypeError } from "../src/conversion/conversion-errors";
import { createBufferToRuntimeConverter, TypeConverter } from "../src/conversion/type-converter";
import {
  BUFFER,
  CHAIN,
  type ElementType,
  formatType,
  handle,
  INDEX,
  memref,
  scalar,
  STREAM,
  tensor,
  type Type,
  typeDomain,
  typesEqual,
} from "../src/ir/types";

const ELEMENTS: ElementType[] = ["i1", "i8", "i32", "i64", "ui8", "f16", "bf16", "f32", "f64", "c64", "c128"];

const elementArb = fc.constantFrom(...ELEMENTS);
const shapeArb = fc.array(fc.integer({ min: 1, max: 16 }), { maxLength: 4 });

const typeArb: fc.Arbitrary<Type> = fc.oneof(
  fc.tuple(shapeArb, elementArb).map(([shape, element]) => memref(shape, element)),
  fc.tuple(shapeArb, elementArb).map(([shape, element]) => tensor(shape, element)),
  elementArb.map((element) => scalar(element)),
  fc.constantFrom(INDEX, BUFFER, STREAM, CHAIN, handle("blas"), handle("ccl")),
);

describe("TypeConverter", () => {
  const converter = createBufferToRuntimeConverter();

  it("maps every memref to a runtime buffer", () => {
    expect(converter.convertType(memref([4, 4], "f32"))).toEqual(BUFFER);
    expect(converter.convertType(memref([], "i8"))).toEqual(BUFFER);
  });

  it("keeps runtime and neutral types unchanged", () => {
    for (const type of [BUFFER, STREAM, CHAIN, INDEX, scalar("f16"), handle("dnn")]) {
      expect(converter.convertType(type)).toEqual(type);
      expect(converter.isLegal(type)).toBe(true);
    }
  });

  it("rejects tensors with UnsupportedTypeError", () => {
    const type = tensor([2, 3], "f32");
    expect(converter.tryConvertType(type)).toBeUndefined();
    expect(() => converter.convertType(type)).toThrow(UnsupportedTypeError);
    expect(() => converter.convertType(type)).toThrow("no conversion for type tensor<2x3xf32>");
    expect(converter.isLegal(type)).toBe(false);
  });

  it("treats memrefs as convertible but not legal", () => {
    expect(converter.isLegal(memref([8], "f32"))).toBe(false);
  });

  it("tries newer rules first and lets them defer", () => {
    const custom = new TypeConverter()
      .addConversion(() => BUFFER)
      .addConversion((type) => (type.kind === "index" ? scalar("i64") : undefined));
    expect(custom.convertType(INDEX)).toEqual(scalar("i64"));
    expect(custom.convertType(STREAM)).toEqual(BUFFER);
  });

  it("forgets memoised results when a rule is added", () => {
    const custom = new TypeConverter().addConversion((type) => type);
    expect(custom.convertType(INDEX)).toEqual(INDEX);
    custom.addConversion((type) => (type.kind === "index" ? scalar("i32") : undefined));
    expect(custom.convertType(INDEX)).toEqual(scalar("i32"));
  });

  it("converts function signatures entry by entry", () => {
    const signature = { inputs: [memref([2], "f32"), INDEX], results: [memref([3], "i32")] };
    expect(converter.isSignatureLegal(signature)).toBe(false);
    const converted = converter.convertSignature(signature);
    expect(converted).toEqual({ inputs: [BUFFER, INDEX], results: [BUFFER] });
    expect(converter.isSignatureLegal(converted)).toBe(true);
  });

  it("fails a signature holding a tensor", () => {
    expect(() => converter.convertSignature({ inputs: [tensor([1], "f32")], results: [] })).toThrow(
      UnsupportedTypeError,
    );
  });

  it("is deterministic and maps into the target or neutral domain", () => {
    fc.assert(
      fc.property(typeArb, (type) => {
        const fresh = createBufferToRuntimeConverter();
        const first = fresh.tryConvertType(type);
        const second = fresh.tryConvertType(type);
        if (first === undefined) {
          expect(type.kind).toBe("tensor");
          expect(second).toBeUndefined();
          return;
        }
        expect(second).toBeDefined();
        expect(typesEqual(first, second ?? first)).toBe(true);
        expect(typeDomain(first)).not.toBe("source");
        expect(fresh.isLegal(first)).toBe(true);
      }),
    );
  });

  it("maps types with equal keys to equal results", () => {
    fc.assert(
      fc.property(typeArb, (type) => {
        const copy = structuredClone(type);
        const a = converter.tryConvertType(type);
        const b = converter.tryConvertType(copy);
        expect(a === undefined ? undefined : formatType(a)).toBe(b === undefined ? undefined : formatType(b));
      }),
    );
  });
});

describe("type printing", () => {
  it("formats source and runtime types", () => {
    expect(formatType(memref([2, 3], "f32"))).toBe("memref<2x3xf32>");
    expect(formatType(memref([], "i32"))).toBe("memref<i32>");
    expect(formatType(BUFFER)).toBe("!rtgpu.buffer");
    expect(formatType(CHAIN)).toBe("!rt.chain");
    expect(formatType(handle("solver"))).toBe("!rtgpu.solver.handle");
    expect(typeDomain(INDEX)).toBe("neutral");
  });
});
