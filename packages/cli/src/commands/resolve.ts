/**
 * asmprobe resolve / probe / shared - run the resolver and report matches
 */

import {
  getSharedRuntimeDirectory,
  type AssemblyResolver,
} from "@asmprobe/resolver";
import type { ResolvedConfig, Result } from "../types.js";

export type ResolvedAssemblies = {
  readonly paths: readonly string[];
};

const toResult = (
  paths: readonly string[],
  notFound: string
): Result<ResolvedAssemblies, string> =>
  paths.length > 0
    ? { ok: true, value: { paths } }
    : { ok: false, error: notFound };

/**
 * Full resolution: search directories in order, then the shared location
 */
export const resolveCommand = (
  resolver: AssemblyResolver,
  name: string,
  config: ResolvedConfig
): Result<ResolvedAssemblies, string> => {
  const dirCount = config.searchDirs.length;
  return toResult(
    resolver.findAssembly(name, config.searchDirs),
    `No assembly found for '${name}' (${dirCount} search ${dirCount === 1 ? "directory" : "directories"} and shared location)`
  );
};

/**
 * Probe a single directory only
 */
export const probeCommand = (
  resolver: AssemblyResolver,
  name: string,
  dir: string
): Result<ResolvedAssemblies, string> =>
  toResult(
    resolver.findLocalAssembly(name, dir),
    `No assembly found for '${name}' in ${dir}`
  );

/**
 * Probe the shared location only
 */
export const sharedCommand = (
  resolver: AssemblyResolver,
  name: string
): Result<ResolvedAssemblies, string> =>
  toResult(
    resolver.findSharedAssembly(name),
    `No assembly found for '${name}' in ${resolver.sharedDirectory ?? getSharedRuntimeDirectory() ?? "the shared location"}`
  );

/**
 * Render matches as one path per line, or a JSON array
 */
export const formatPaths = (
  paths: readonly string[],
  json: boolean
): string => (json ? JSON.stringify(paths) : paths.join("\n"));
