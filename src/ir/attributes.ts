import { StructuralViolationError } from "../conversion/conversion-errors";
import type { Operation } from "./graph";
import { type FunctionSignature, formatSignature } from "./types";

export type SignatureAttr = { kind: "signature"; signature: FunctionSignature };

export type Attribute =
  | string
  | number
  | boolean
  | number[]
  | string[]
  | number[][]
  | SignatureAttr;

export function signatureAttr(signature: FunctionSignature): SignatureAttr {
  return {
    kind: "signature",
    signature: { inputs: signature.inputs.slice(), results: signature.results.slice() },
  };
}

function missing(op: Operation, key: string, expected: string): never {
  throw new StructuralViolationError(
    `${op.name} (#${op.id}) requires ${expected} attribute '${key}'`,
  );
}

export function getString(op: Operation, key: string): string | undefined {
  const value = op.attributes[key];
  return typeof value === "string" ? value : undefined;
}

export function requireString(op: Operation, key: string): string {
  return getString(op, key) ?? missing(op, key, "a string");
}

export function getNumber(op: Operation, key: string): number | undefined {
  const value = op.attributes[key];
  return typeof value === "number" ? value : undefined;
}

export function getBool(op: Operation, key: string): boolean | undefined {
  const value = op.attributes[key];
  return typeof value === "boolean" ? value : undefined;
}

export function getNumberArray(op: Operation, key: string): number[] | undefined {
  const value = op.attributes[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  const out: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number") {
      return undefined;
    }
    out.push(entry);
  }
  return out;
}

export function getNumberMatrix(op: Operation, key: string): number[][] | undefined {
  const value = op.attributes[key];
  if (!Array.isArray(value)) {
    return undefined;
  }
  const out: number[][] = [];
  for (const row of value) {
    if (!Array.isArray(row)) {
      return undefined;
    }
    out.push(row.slice());
  }
  return out;
}

export function getSignature(op: Operation, key = "function_type"): FunctionSignature | undefined {
  const value = op.attributes[key];
  if (typeof value === "object" && !Array.isArray(value)) {
    return value.signature;
  }
  return undefined;
}

export function requireSignature(op: Operation, key = "function_type"): FunctionSignature {
  return getSignature(op, key) ?? missing(op, key, "a signature");
}

export function formatAttribute(value: Attribute): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  if (Array.isArray(value)) {
    return JSON.stringify(value);
  }
  return formatSignature(value.signature);
}
