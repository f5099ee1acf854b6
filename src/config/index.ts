/**
 * Configuration module exports
 */

export {
  resolveConfig,
  parsePositiveInt,
  DEFAULT_NAMESPACE,
  ENV_KUBECONFIG,
  ENV_CONTEXT,
  ENV_NAMESPACE,
  ENV_RETRY_ATTEMPTS,
  ENV_RETRY_INITIAL_MS,
  type ConfigSource,
  type CliConnectionOptions,
  type ConfigResolveOptions,
  type ResolvedConfig,
} from './connection.js';
