/**
 * Shared runtime location fallback
 *
 * There is no global assembly registry to query, so the "shared" location
 * is the directory holding the hosting runtime's executable (or a
 * configured replacement), probed like any other search directory.
 */

import { dirname } from "node:path";
import { findLocalAssembly } from "./local-probe.js";
import type { SharedProbeOptions } from "./types.js";

/**
 * Directory containing the running Node.js executable
 */
export const getSharedRuntimeDirectory = (): string | undefined =>
  process.execPath ? dirname(process.execPath) : undefined;

export const findSharedAssembly = (
  name: string,
  options: SharedProbeOptions
): readonly string[] => {
  const sharedDir = options.sharedDirectory ?? getSharedRuntimeDirectory();
  if (!sharedDir) {
    return [];
  }

  options.log?.(`Probing shared location ${sharedDir} for '${name}'`);
  return findLocalAssembly(name, sharedDir, options);
};
