/**
 * Resolver type definitions
 */

/**
 * Receives one line of probe trace output
 */
export type ProbeLogger = (message: string) => void;

/**
 * Settings shared by every probe
 */
export type ProbeOptions = {
  // File name (not a path) that is never accepted as a match
  readonly ignoreFileName: string;
  readonly log?: ProbeLogger;
};

export type SharedProbeOptions = ProbeOptions & {
  // Overrides the hosting runtime's own directory
  readonly sharedDirectory?: string;
};

/**
 * Resolves a namespace or assembly file name against ordered search
 * directories. Returns absolute paths of existing files, empty when nothing
 * matched.
 */
export type AssemblyResolutionStrategy = (
  name: string,
  searchDirs: readonly string[]
) => readonly string[];

/**
 * Probes bound to a resolver's configuration, handed to custom strategies
 * so they can delegate instead of re-implementing the search.
 */
export type ResolverProbes = {
  readonly defaultStrategy: AssemblyResolutionStrategy;
  readonly findLocalAssembly: (name: string, dir: string) => readonly string[];
  readonly findSharedAssembly: (name: string) => readonly string[];
};

export type AssemblyResolverOptions = {
  readonly ignoreFileName?: string;
  readonly sharedDirectory?: string;
  readonly verbose?: boolean;
  // Send the `verbose` trace to stderr, keeping stdout for results
  readonly traceToStderr?: boolean;
  // Replaces the console trace enabled by `verbose`
  readonly logger?: ProbeLogger;
  readonly strategy?: (probes: ResolverProbes) => AssemblyResolutionStrategy;
};
