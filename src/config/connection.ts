/**
 * Connection and retry configuration
 *
 * Each setting is resolved from, in priority order:
 * 1. CLI flag
 * 2. Environment variable
 * 3. Default
 */

import { ConfigError } from '../api/errors.js';
import type { KubernetesConnectionConfig } from '../api/kubernetes.js';
import type { RetrySchedule } from '../api/retry.js';

/** Environment variable names */
export const ENV_KUBECONFIG = 'KUBECONFIG';
export const ENV_CONTEXT = 'RELEASE_ANTECEDENT_CONTEXT';
export const ENV_NAMESPACE = 'RELEASE_ANTECEDENT_NAMESPACE';
export const ENV_RETRY_ATTEMPTS = 'RELEASE_ANTECEDENT_RETRY_ATTEMPTS';
export const ENV_RETRY_INITIAL_MS = 'RELEASE_ANTECEDENT_RETRY_INITIAL_MS';

/** Namespace used when neither flag nor environment names one */
export const DEFAULT_NAMESPACE = 'default';

/**
 * Where a setting came from
 */
export type ConfigSource = 'cli' | 'env' | 'default';

/**
 * Settings taken from CLI flags
 */
export interface CliConnectionOptions {
  kubeconfig?: string;
  context?: string;
  namespace?: string;
}

/**
 * Inputs for configuration resolution
 */
export interface ConfigResolveOptions {
  cli?: CliConnectionOptions;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolved configuration
 */
export interface ResolvedConfig {
  connection: KubernetesConnectionConfig;
  /** Namespace for release resources that name none */
  namespace: string;
  /** Overrides for the fetch retry schedule */
  retry: Partial<RetrySchedule>;
  /** Source of each resolved setting */
  sources: {
    kubeconfig: ConfigSource;
    context: ConfigSource;
    namespace: ConfigSource;
  };
}

function pick(
  cliValue: string | undefined,
  envValue: string | undefined
): { value: string | undefined; source: ConfigSource } {
  if (cliValue) {
    return { value: cliValue, source: 'cli' };
  }
  if (envValue) {
    return { value: envValue, source: 'env' };
  }
  return { value: undefined, source: 'default' };
}

/**
 * Parse a positive integer from an environment variable
 *
 * @throws ConfigError when the value is set but not a positive integer
 */
export function parsePositiveInt(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`, {
      variable: name,
    });
  }
  return parsed;
}

/**
 * Resolve connection, namespace and retry settings
 *
 * @throws ConfigError when a retry override is malformed
 */
export function resolveConfig(options: ConfigResolveOptions = {}): ResolvedConfig {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;

  const kubeconfig = pick(cli.kubeconfig, env[ENV_KUBECONFIG]);
  const context = pick(cli.context, env[ENV_CONTEXT]);
  const namespace = pick(cli.namespace, env[ENV_NAMESPACE]);

  const retry: Partial<RetrySchedule> = {};
  const maxAttempts = parsePositiveInt(ENV_RETRY_ATTEMPTS, env[ENV_RETRY_ATTEMPTS]);
  if (maxAttempts !== undefined) {
    retry.maxAttempts = maxAttempts;
  }
  const initialDelayMs = parsePositiveInt(ENV_RETRY_INITIAL_MS, env[ENV_RETRY_INITIAL_MS]);
  if (initialDelayMs !== undefined) {
    retry.initialDelayMs = initialDelayMs;
  }

  // A KUBECONFIG from the environment may list several files; the client's
  // default loading merges them, so only an explicit flag is passed through.
  const connection: KubernetesConnectionConfig = {};
  if (kubeconfig.source === 'cli' && kubeconfig.value) {
    connection.kubeconfig = kubeconfig.value;
  }
  if (context.value) {
    connection.context = context.value;
  }

  return {
    connection,
    namespace: namespace.value ?? DEFAULT_NAMESPACE,
    retry,
    sources: {
      kubeconfig: kubeconfig.source,
      context: context.source,
      namespace: namespace.source,
    },
  };
}
