/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  name?: string;
  secondArg?: string; // Directory for `probe`
  options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let name: string | undefined;
  let secondArg: string | undefined;
  let positionalOnly = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is positional (names may start with "-")
    if (arg === "--" && !positionalOnly) {
      positionalOnly = true;
      continue;
    }

    const isPositional = positionalOnly || !arg.startsWith("-");

    // Commands
    if (!command && isPositional) {
      command = arg;
      continue;
    }

    // First positional arg after command (assembly name)
    if (command && name === undefined && isPositional) {
      name = arg;
      continue;
    }

    // Second positional arg (for commands that take two args like probe)
    if (command && name !== undefined && secondArg === undefined && isPositional) {
      secondArg = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-i":
      case "--ignore":
        {
          const ignore = args[++i] ?? "";
          if (ignore) {
            options.ignore = ignore;
          }
        }
        break;
      case "--shared-dir":
        options.sharedDir = args[++i] ?? "";
        break;
      case "--json":
        options.json = true;
        break;
      case "-L":
      case "--lib":
        {
          const libPath = args[++i] ?? "";
          if (libPath) {
            options.lib = options.lib || [];
            options.lib.push(libPath);
          }
        }
        break;
    }
  }

  return { command, name, secondArg, options };
};
