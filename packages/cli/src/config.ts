/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { basename, dirname, extname, join, resolve } from "node:path";
import YAML from "yaml";
import type {
  AsmprobeConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

/**
 * Config file names, in lookup order within one directory
 */
export const CONFIG_FILE_NAMES: readonly string[] = [
  "asmprobe.json",
  "asmprobe.yaml",
  "asmprobe.yml",
];

const isYamlFile = (configPath: string): boolean => {
  const ext = extname(configPath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// The exclusion is compared against base names only
const isFileNameOnly = (value: string): boolean => !/[\\/]/.test(value);

const isOptionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === "string";

const isOptionalStringArray = (
  value: unknown
): value is readonly string[] | undefined =>
  value === undefined ||
  (Array.isArray(value) && value.every((v) => typeof v === "string"));

/**
 * Validate parsed config content
 */
export const parseConfig = (
  parsed: unknown,
  fileName: string
): Result<AsmprobeConfig, string> => {
  // An empty YAML document parses to null
  if (parsed === null || parsed === undefined) {
    return { ok: true, value: {} };
  }

  if (!isRecord(parsed)) {
    return { ok: false, error: `${fileName}: expected an object` };
  }

  const { $schema, searchDirs, ignoreFileName, sharedDirectory } = parsed;

  if (!isOptionalString($schema)) {
    return { ok: false, error: `${fileName}: '$schema' must be a string` };
  }

  if (!isOptionalStringArray(searchDirs)) {
    return {
      ok: false,
      error: `${fileName}: 'searchDirs' must be an array of strings`,
    };
  }

  if (!isOptionalString(ignoreFileName)) {
    return {
      ok: false,
      error: `${fileName}: 'ignoreFileName' must be a string`,
    };
  }

  if (ignoreFileName !== undefined && !isFileNameOnly(ignoreFileName)) {
    return {
      ok: false,
      error: `${fileName}: 'ignoreFileName' must be a file name, not a path`,
    };
  }

  if (!isOptionalString(sharedDirectory)) {
    return {
      ok: false,
      error: `${fileName}: 'sharedDirectory' must be a string`,
    };
  }

  return {
    ok: true,
    value: { $schema, searchDirs, ignoreFileName, sharedDirectory },
  };
};

/**
 * Validate command-line options that the parser accepts as free text
 */
export const checkCliOptions = (
  cliOptions: CliOptions
): Result<CliOptions, string> => {
  if (cliOptions.ignore !== undefined && !isFileNameOnly(cliOptions.ignore)) {
    return {
      ok: false,
      error: `--ignore must be a file name, not a path: ${cliOptions.ignore}`,
    };
  }

  return { ok: true, value: cliOptions };
};

/**
 * Load asmprobe.json / asmprobe.yaml
 */
export const loadConfig = (
  configPath: string
): Result<AsmprobeConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  const fileName = basename(configPath);
  let parsed: unknown;
  try {
    const content = readFileSync(configPath, "utf-8");
    parsed = isYamlFile(configPath) ? YAML.parse(content) : JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${fileName}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(parsed, fileName);
};

/**
 * Find a config file by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find a config file or hit root
  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = join(currentDir, fileName);
      if (existsSync(configPath)) {
        return configPath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing the config file (base for its relative paths)
 * @param cwd - Base for relative paths given on the command line
 */
export const resolveConfig = (
  config: AsmprobeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string = process.cwd()
): ResolvedConfig => {
  // Directories named on the command line are probed before configured ones
  const cliDirs = (cliOptions.lib ?? []).map((dir) => resolve(cwd, dir));
  const configDirs = (config.searchDirs ?? []).map((dir) =>
    resolve(projectRoot, dir)
  );

  const sharedDirectory = cliOptions.sharedDir
    ? resolve(cwd, cliOptions.sharedDir)
    : config.sharedDirectory
      ? resolve(projectRoot, config.sharedDirectory)
      : undefined;

  return {
    projectRoot,
    searchDirs: [...cliDirs, ...configDirs],
    ignoreFileName: cliOptions.ignore || (config.ignoreFileName ?? ""),
    sharedDirectory,
    json: cliOptions.json ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
