/**
 * Assembly resolution orchestrator
 *
 * Turns a namespace / assembly file name into the locations of existing
 * assembly files:
 * 1. A name with reserved path characters is a literal path: accepted only
 *    when absolute and present, never searched for.
 * 2. Otherwise each search directory is probed in order and the first one
 *    with a match wins. Later directories are not consulted.
 * 3. Nothing found: the shared runtime location is probed with any
 *    .dll/.exe extension removed.
 *
 * Not found is always an empty array, never an exception.
 */

import { isAbsolute } from "node:path";
import { removeAssemblyExtension } from "./assembly-name.js";
import { isExistingFile } from "./file-system.js";
import { findLocalAssembly } from "./local-probe.js";
import { hasReservedPathChars } from "./path-token.js";
import { findSharedAssembly } from "./shared-probe.js";
import type {
  AssemblyResolutionStrategy,
  AssemblyResolverOptions,
  ProbeLogger,
  ResolverProbes,
  SharedProbeOptions,
} from "./types.js";

const LOG_PREFIX = "[Assembly Resolver]";

/**
 * Default resolution strategy
 */
export const resolveAssembly = (
  name: string,
  searchDirs: readonly string[],
  options: SharedProbeOptions
): readonly string[] => {
  if (name.trim() === "") {
    return [];
  }

  if (hasReservedPathChars(name)) {
    // Relative names with reserved characters are never probed
    return isAbsolute(name) && isExistingFile(name) ? [name] : [];
  }

  for (const dir of searchDirs) {
    const found = findLocalAssembly(name, dir, options);
    if (found.length > 0) {
      return found;
    }
  }

  return findSharedAssembly(removeAssemblyExtension(name), options);
};

const createLogger = (
  options: AssemblyResolverOptions
): ProbeLogger | undefined => {
  if (options.logger) {
    return options.logger;
  }
  if (options.verbose) {
    return options.traceToStderr
      ? (message) => console.error(`${LOG_PREFIX} ${message}`)
      : (message) => console.log(`${LOG_PREFIX} ${message}`);
  }
  return undefined;
};

/**
 * Assembly resolver with a replaceable strategy
 *
 * Configuration (excluded file name, shared directory, logging) is fixed at
 * construction. The strategy is a plain function value; swapping it
 * replaces the whole algorithm behind findAssembly().
 */
export class AssemblyResolver {
  readonly ignoreFileName: string;
  readonly sharedDirectory: string | undefined;
  readonly probes: ResolverProbes;

  private readonly probeOptions: SharedProbeOptions;
  private readonly initialStrategy: AssemblyResolutionStrategy;
  private strategy: AssemblyResolutionStrategy;

  constructor(options: AssemblyResolverOptions = {}) {
    this.ignoreFileName = options.ignoreFileName ?? "";
    this.sharedDirectory = options.sharedDirectory;
    this.probeOptions = {
      ignoreFileName: this.ignoreFileName,
      sharedDirectory: this.sharedDirectory,
      log: createLogger(options),
    };

    const probeOptions = this.probeOptions;
    this.probes = {
      defaultStrategy: (name, searchDirs) =>
        resolveAssembly(name, searchDirs, probeOptions),
      findLocalAssembly: (name, dir) =>
        findLocalAssembly(name, dir, probeOptions),
      findSharedAssembly: (name) => findSharedAssembly(name, probeOptions),
    };

    this.initialStrategy = options.strategy
      ? options.strategy(this.probes)
      : this.probes.defaultStrategy;
    this.strategy = this.initialStrategy;
  }

  /**
   * Resolve namespace / assembly file name into assembly locations
   */
  findAssembly(name: string, searchDirs: readonly string[]): readonly string[] {
    this.probeOptions.log?.(
      `Resolving '${name}' (${searchDirs.length} search directories)`
    );
    return this.strategy(name, searchDirs);
  }

  findLocalAssembly(name: string, dir: string): readonly string[] {
    return this.probes.findLocalAssembly(name, dir);
  }

  findSharedAssembly(name: string): readonly string[] {
    return this.probes.findSharedAssembly(name);
  }

  /**
   * Replace the resolution algorithm used by findAssembly()
   */
  useStrategy(strategy: AssemblyResolutionStrategy): void {
    this.strategy = strategy;
  }

  /**
   * Go back to the strategy the resolver was constructed with
   */
  resetStrategy(): void {
    this.strategy = this.initialStrategy;
  }
}

export const createAssemblyResolver = (
  options?: AssemblyResolverOptions
): AssemblyResolver => new AssemblyResolver(options);
