/**
 * asmprobe classify - report whether a reference is a literal path or a name
 */

import { hasReservedPathChars } from "@asmprobe/resolver";

export type ReferenceKind = "path" | "symbolic";

export const classifyCommand = (name: string): ReferenceKind =>
  hasReservedPathChars(name) ? "path" : "symbolic";
