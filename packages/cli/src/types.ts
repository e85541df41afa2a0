/**
 * Type definitions for CLI
 */

/**
 * Configuration file (asmprobe.json / asmprobe.yaml)
 */
export type AsmprobeConfig = {
  readonly $schema?: string;
  readonly searchDirs?: readonly string[]; // Relative to the config file
  readonly ignoreFileName?: string; // File name never returned
  readonly sharedDirectory?: string; // Replaces the runtime's own directory
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  lib?: string[]; // Search directories, in probe order
  ignore?: string;
  sharedDir?: string;
  json?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing the config file, or cwd
  readonly searchDirs: readonly string[]; // Absolute
  readonly ignoreFileName: string;
  readonly sharedDirectory: string | undefined;
  readonly json: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Result type for operations
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };
