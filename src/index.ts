/**
 * secret-bootstrap
 *
 * Library exports for programmatic usage
 */

// Runner
export { runBootstrap, createDefaultDeps } from './bootstrap.js'
export type { BootstrapDeps, BootstrapLog, LogLevel } from './bootstrap.js'

// Types
export type {
  Authenticator,
  BootstrapConfig,
  BootstrapResult,
  BootstrapState,
  BootstrapStep,
  BootstrapTransition,
  ConfigWriter,
  DecryptRequest,
  Decryptor,
  LoginRequest,
  SopsFormat,
  VaultToken
} from './types.js'
export { SOPS_FORMATS } from './types.js'

// Config
export {
  resolveConfig,
  loadConfigFile,
  loadEnvFile,
  expandEnvVars,
  transitKeyUri,
  DEFAULT_CONFIG,
  ENV_VARS
} from './lib/config-loader.js'
export type { ConfigFile, ConfigOverrides, ResolveConfigOptions } from './lib/config-loader.js'

// Collaborators
export { KubernetesAuthenticator, readServiceAccountToken } from './lib/vault-auth.js'
export type { FetchLike, KubernetesAuthenticatorOptions } from './lib/vault-auth.js'
export { SopsDecryptor, spawnCommand } from './lib/sops.js'
export type { CommandResult, CommandRunner, CommandOptions, SopsDecryptorOptions } from './lib/sops.js'
export { AtomicFileWriter, writeFileAtomic } from './lib/atomic-write.js'
export type { AtomicWriteOptions } from './lib/atomic-write.js'

// Errors
export {
  BootstrapError,
  ConfigurationError,
  TransportError,
  AuthenticationError,
  DecryptionError,
  IOError,
  isBootstrapError,
  isConfigurationError,
  isTransportError,
  isAuthenticationError,
  isDecryptionError,
  isIOError,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'

// Utilities
export { maskToken, redact } from './lib/masking.js'
export { withTimeout, TimeoutError } from './lib/timeout.js'
