// ============================================================================
// Element and value types
// ============================================================================

export type ElementType =
  | "i1"
  | "i8"
  | "i32"
  | "i64"
  | "ui8"
  | "f16"
  | "bf16"
  | "f32"
  | "f64"
  | "c64"
  | "c128";

const ELEMENT_BYTES: Record<ElementType, number> = {
  i1: 1,
  i8: 1,
  i32: 4,
  i64: 8,
  ui8: 1,
  f16: 2,
  bf16: 2,
  f32: 4,
  f64: 8,
  c64: 8,
  c128: 16,
};

/** Device resources that the runtime hands out as opaque handles. */
export type HandleResource = "blas" | "dnn" | "solver" | "fft" | "ccl";

export type Type =
  // Source domain: buffer-typed values of the input vocabulary.
  | { kind: "memref"; shape: number[]; element: ElementType }
  | { kind: "tensor"; shape: number[]; element: ElementType }
  // Target domain: runtime handles.
  | { kind: "buffer" }
  | { kind: "stream" }
  | { kind: "chain" }
  | { kind: "handle"; resource: HandleResource }
  // Neutral: valid on both sides of the conversion.
  | { kind: "index" }
  | { kind: "scalar"; element: ElementType };

export type TypeDomain = "source" | "target" | "neutral";

export type FunctionSignature = {
  inputs: Type[];
  results: Type[];
};

// ============================================================================
// Constructors
// ============================================================================

export function memref(shape: number[], element: ElementType): Type {
  return { kind: "memref", shape: shape.slice(), element };
}

export function tensor(shape: number[], element: ElementType): Type {
  return { kind: "tensor", shape: shape.slice(), element };
}

export function scalar(element: ElementType): Type {
  return { kind: "scalar", element };
}

export function handle(resource: HandleResource): Type {
  return { kind: "handle", resource };
}

export const INDEX: Type = { kind: "index" };
export const BUFFER: Type = { kind: "buffer" };
export const STREAM: Type = { kind: "stream" };
export const CHAIN: Type = { kind: "chain" };

// ============================================================================
// Queries
// ============================================================================

export function typeDomain(type: Type): TypeDomain {
  switch (type.kind) {
    case "memref":
    case "tensor":
      return "source";
    case "buffer":
    case "stream":
    case "chain":
    case "handle":
      return "target";
    case "index":
    case "scalar":
      return "neutral";
  }
}

export function formatType(type: Type): string {
  switch (type.kind) {
    case "memref":
    case "tensor":
      return `${type.kind}<${[...type.shape.map(String), type.element].join("x")}>`;
    case "buffer":
      return "!rtgpu.buffer";
    case "stream":
      return "!rtgpu.stream";
    case "chain":
      return "!rt.chain";
    case "handle":
      return `!rtgpu.${type.resource}.handle`;
    case "index":
      return "index";
    case "scalar":
      return type.element;
  }
}

/** Canonical key; two types are equal iff their keys are equal. */
export function typeKey(type: Type): string {
  return formatType(type);
}

export function typesEqual(a: Type, b: Type): boolean {
  return typeKey(a) === typeKey(b);
}

export function elementByteSize(element: ElementType): number {
  return ELEMENT_BYTES[element];
}

/** Size in bytes of a statically shaped memref or tensor. */
export function byteSize(type: Type): number {
  if (type.kind !== "memref" && type.kind !== "tensor") {
    throw new Error(`byteSize requires a shaped type, got ${formatType(type)}`);
  }
  let count = 1;
  for (const dim of type.shape) {
    count *= dim;
  }
  return count * ELEMENT_BYTES[type.element];
}

export function formatSignature(signature: FunctionSignature): string {
  const inputs = signature.inputs.map(formatType).join(", ");
  const results = signature.results.map(formatType).join(", ");
  return `(${inputs}) -> (${results})`;
}
