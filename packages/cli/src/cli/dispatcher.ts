/**
 * CLI command dispatcher
 */

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { createAssemblyResolver } from "@asmprobe/resolver";
import {
  checkCliOptions,
  loadConfig,
  findConfig,
  resolveConfig,
} from "../config.js";
import { classifyCommand } from "../commands/classify.js";
import {
  formatPaths,
  probeCommand,
  resolveCommand,
  sharedCommand,
} from "../commands/resolve.js";
import type { AsmprobeConfig, Result } from "../types.js";
import type { ResolvedAssemblies } from "../commands/resolve.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const COMMANDS = ["resolve", "probe", "shared", "classify"];

/**
 * Main CLI entry point
 * @param cwd - Base for relative paths and config discovery
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`asmprobe v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (!COMMANDS.includes(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'asmprobe --help' for usage information");
    return 2;
  }

  const name = parsed.name;
  if (name === undefined) {
    console.error("Error: Assembly name required");
    console.error(`Usage: asmprobe ${parsed.command} <name>`);
    return 1;
  }

  // Classification is pure string inspection, no config needed
  if (parsed.command === "classify") {
    console.log(classifyCommand(name));
    return 0;
  }

  if (parsed.command === "probe" && !parsed.secondArg) {
    console.error("Error: Directory required");
    console.error("Usage: asmprobe probe <name> <dir>");
    return 1;
  }

  const optionsResult = checkCliOptions(parsed.options);
  if (!optionsResult.ok) {
    console.error(`Error: ${optionsResult.error}`);
    return 1;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (configPath && !existsSync(configPath)) {
    console.error(`Error: Config file not found: ${configPath}`);
    return 3;
  }

  let fileConfig: AsmprobeConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 1;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing the config file
  const projectRoot = configPath ? dirname(configPath) : cwd;
  const config = resolveConfig(fileConfig, optionsResult.value, projectRoot, cwd);

  const resolver = createAssemblyResolver({
    ignoreFileName: config.ignoreFileName,
    sharedDirectory: config.sharedDirectory,
    verbose: config.verbose,
    traceToStderr: config.json,
  });

  // Dispatch to command handlers
  let result: Result<ResolvedAssemblies, string>;
  switch (parsed.command) {
    case "probe":
      result = probeCommand(resolver, name, resolve(cwd, parsed.secondArg ?? ""));
      break;
    case "shared":
      result = sharedCommand(resolver, name);
      break;
    default:
      result = resolveCommand(resolver, name, config);
      break;
  }

  if (!result.ok) {
    if (!config.quiet) {
      console.error(`Error: ${result.error}`);
    }
    return 4;
  }

  if (!config.quiet) {
    console.log(formatPaths(result.value.paths, config.json));
  }
  return 0;
};
