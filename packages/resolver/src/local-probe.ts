/**
 * Probing a single directory for an assembly
 */

import { basename, dirname, isAbsolute, join, resolve } from "node:path";
import { candidateExtensions } from "./assembly-name.js";
import { isExistingDirectory, isExistingFile } from "./file-system.js";
import type { ProbeOptions } from "./types.js";

/**
 * Combine a search directory with a requested name. An absolute name
 * replaces the directory.
 */
const joinProbePath = (dir: string, name: string): string =>
  isAbsolute(name) ? name : join(dir, name);

/**
 * Look for `name` in `dir`.
 *
 * Returns at most one absolute path: the first candidate from
 * candidateExtensions() that exists and is not excluded. The result is an
 * array because a namespace may one day map to several assembly files.
 *
 * @example
 * // lib/ contains Acme.Widget.dll and Acme.Widget.exe
 * findLocalAssembly("Acme.Widget", "lib", { ignoreFileName: "" });
 * // -> ["/abs/lib/Acme.Widget.dll"]
 */
export const findLocalAssembly = (
  name: string,
  dir: string,
  options: ProbeOptions
): readonly string[] => {
  const { ignoreFileName, log } = options;

  // A relative name has nothing to be joined onto
  if (dir === "" && !isAbsolute(name)) {
    return [];
  }

  const asmFile = joinProbePath(dir, name);

  // `name` may carry its own subdirectories, so check the joined parent
  // rather than `dir`
  const parentDir = dirname(asmFile);
  if (!isExistingDirectory(parentDir)) {
    log?.(`No directory ${parentDir} for '${name}'`);
    return [];
  }

  for (const ext of candidateExtensions(name)) {
    const file = asmFile + ext;
    if (basename(file) === ignoreFileName) {
      log?.(`Ignoring excluded file ${file}`);
      continue;
    }
    if (isExistingFile(file)) {
      log?.(`Found ${file}`);
      return [resolve(file)];
    }
  }

  if (
    asmFile !== basename(asmFile) &&
    basename(asmFile) !== ignoreFileName &&
    isExistingFile(asmFile)
  ) {
    log?.(`Found ${asmFile}`);
    return [resolve(asmFile)];
  }

  return [];
};
