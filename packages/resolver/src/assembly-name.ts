/**
 * Assembly file name helpers
 */

import { basename } from "node:path";

export const ASSEMBLY_EXTENSIONS: readonly string[] = [".dll", ".exe"];

/**
 * Extension of the last path segment, dot included ("" when there is none).
 *
 * Dotted namespaces report their last part: "System.Linq" -> ".Linq".
 * A trailing dot is no extension ("Widget." -> ""), a leading one is
 * (".hidden" -> ".hidden").
 */
export const getExtension = (name: string): string => {
  const fileName = basename(name);
  const dot = fileName.lastIndexOf(".");
  return dot === -1 || dot === fileName.length - 1 ? "" : fileName.slice(dot);
};

/**
 * Strip a trailing .dll/.exe (any case). Other names are returned unchanged.
 */
export const removeAssemblyExtension = (name: string): string => {
  const lower = name.toLowerCase();
  const ext = ASSEMBLY_EXTENSIONS.find((e) => lower.endsWith(e));
  return ext ? name.slice(0, name.length - ext.length) : name;
};

/**
 * Suffixes to probe, in order.
 *
 * - No extension: the name is most likely shorthand for a compiled module,
 *   so well-known assembly extensions go first and the bare name last.
 * - Any extension: the name as written goes first, assembly extensions
 *   are appended after it.
 */
export const candidateExtensions = (name: string): readonly string[] =>
  getExtension(name) === ""
    ? [...ASSEMBLY_EXTENSIONS, ""]
    : ["", ...ASSEMBLY_EXTENSIONS];
