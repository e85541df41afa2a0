/**
 * Existence checks used by the probes.
 *
 * statSync still throws for input it cannot look up at all (embedded NUL,
 * ENOTDIR, EACCES); each check reads that as "not there".
 */

import { statSync } from "node:fs";

export const isExistingFile = (filePath: string): boolean => {
  try {
    return statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  } catch {
    return false;
  }
};

export const isExistingDirectory = (dirPath: string): boolean => {
  try {
    return (
      statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false
    );
  } catch {
    return false;
  }
};
