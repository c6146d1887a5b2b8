import { BUILTIN_DIALECT, FUNC_DIALECT, MEMREF_DIALECT } from "./builtin";
import { type Dialect, DialectRegistry } from "./dialect";
import { GPU_DIALECT } from "./gpu";
import { RT_DIALECT, RTGPU_DIALECT, XRT_DIALECT } from "./runtime";
import { LHLO_DIALECT, LHLO_GPU_DIALECT } from "./source";

export * from "./builtin";
export * from "./dialect";
export * from "./gpu";
export * from "./runtime";
export * from "./source";

export const SOURCE_DIALECTS: Dialect[] = [
  BUILTIN_DIALECT,
  FUNC_DIALECT,
  MEMREF_DIALECT,
  LHLO_DIALECT,
  LHLO_GPU_DIALECT,
];

export const DESTINATION_DIALECTS: Dialect[] = [
  GPU_DIALECT,
  RT_DIALECT,
  RTGPU_DIALECT,
  XRT_DIALECT,
];

/**
 * Registry holding the vocabularies an input graph is written in. Inputs may
 * already contain kernel launches, so the gpu dialect is loaded as well.
 */
export function createSourceRegistry(): DialectRegistry {
  const registry = new DialectRegistry();
  registry.insert(...SOURCE_DIALECTS, GPU_DIALECT);
  return registry;
}
