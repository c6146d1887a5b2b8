import type { ConversionRewriter } from "../conversion/rewriter";
import type { Attribute } from "../ir/attributes";
import type { Operation, ValueId } from "../ir/graph";
import { CHAIN, handle, type HandleResource } from "../ir/types";
import type { StreamContext } from "../streamify/async-lowering";

export function createHandle(
  rewriter: ConversionRewriter,
  ctx: StreamContext,
  resource: HandleResource,
): ValueId {
  return rewriter.createValue(`rtgpu.${resource}.create`, [ctx.stream], handle(resource));
}

/** Order `dst <- src` after `chain`; returns the copy's chain. */
export function copyBuffer(
  rewriter: ConversionRewriter,
  ctx: StreamContext,
  dst: ValueId,
  src: ValueId,
  chain: ValueId,
): ValueId {
  return rewriter.createValue("rtgpu.mem.copy", [dst, src, ctx.stream, chain], CHAIN);
}

/** The subset of `keys` present on `op`. */
export function pickAttributes(op: Operation, keys: readonly string[]): Record<string, Attribute> {
  const out: Record<string, Attribute> = {};
  for (const key of keys) {
    const value = op.attributes[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}
