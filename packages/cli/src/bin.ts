#!/usr/bin/env -S node --import tsx
/**
 * asmprobe executable
 */

import { runCli } from "./index.js";

// Run CLI with arguments (skip node and script name)
runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
