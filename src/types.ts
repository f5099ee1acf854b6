/**
 * Shared types for the release-antecedent CLI
 */

import type { ApiLogger } from './api/logger.js';
import type { BackendConnector } from './api/types.js';
import type { ResolvedConfig } from './config/connection.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 *
 * A type alias so it satisfies commander's `OptionValues` record.
 */
export type GlobalOptions = {
  /** Path to a kubeconfig file */
  kubeconfig?: string;
  /** Kubeconfig context */
  context?: string;
  /** Release namespace */
  namespace?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
};

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to command handlers
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
  /** Resolved connection, namespace and retry settings */
  config: ResolvedConfig;
  /** Opens backend sessions */
  connector: BackendConnector;
  logger: ApiLogger;
}

/**
 * Result of command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
  /** Process exit code; 0 when successful, 1 otherwise, unless set */
  exitCode?: number;
}

/**
 * Options shared by verify and claim
 */
export interface ReleaseCommandOptions {
  /** Manifest file path, or `-` for standard input */
  manifest: string;
  /** Release identifier */
  id: string;
  /** Release name for log context */
  release?: string;
}
