/**
 * @asmprobe/resolver - Public API
 */

export type {
  AssemblyResolutionStrategy,
  AssemblyResolverOptions,
  ProbeLogger,
  ProbeOptions,
  ResolverProbes,
  SharedProbeOptions,
} from "./types.js";
export { hasReservedPathChars, isSymbolicName } from "./path-token.js";
export {
  ASSEMBLY_EXTENSIONS,
  candidateExtensions,
  getExtension,
  removeAssemblyExtension,
} from "./assembly-name.js";
export { findLocalAssembly } from "./local-probe.js";
export {
  findSharedAssembly,
  getSharedRuntimeDirectory,
} from "./shared-probe.js";
export {
  AssemblyResolver,
  createAssemblyResolver,
  resolveAssembly,
} from "./assembly-resolver.js";
