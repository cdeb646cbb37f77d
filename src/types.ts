/**
 * secret-bootstrap - Type Definitions
 */

// ============================================================================
// Configuration
// ============================================================================

/** sops store formats accepted by --input-type / --output-type */
export const SOPS_FORMATS = ['ini', 'dotenv', 'yaml', 'json', 'binary'] as const

export type SopsFormat = typeof SOPS_FORMATS[number]

/**
 * Fully resolved bootstrap configuration.
 *
 * Built once by the config loader and passed explicitly to every part of the
 * bootstrap; nothing reads process.env after resolution.
 */
export interface BootstrapConfig {
  /** Path to the Kubernetes service-account JWT */
  jwtPath: string
  /** Vault base URL, without trailing slash */
  vaultAddr: string
  /** Vault Enterprise namespace (sent as X-Vault-Namespace) */
  vaultNamespace?: string
  /** Vault Kubernetes auth role */
  role: string
  /** Mount point of the Kubernetes auth method */
  authMount: string
  /** Mount point of the transit engine holding the sops key */
  transitMount: string
  /** Transit key name */
  transitKey: string
  /** sops-encrypted config file (never modified) */
  encryptedFile: string
  /** Destination of the decrypted config */
  outputFile: string
  /** sops executable */
  sopsBinary: string
  inputType?: SopsFormat
  outputType?: SopsFormat
  loginTimeoutMs: number
  decryptTimeoutMs: number
  verbose: boolean
}

// ============================================================================
// Bootstrap Collaborators
// ============================================================================

/**
 * Token issued by Vault on a successful login.
 * Only `token` is required; the rest is reported in verbose mode.
 */
export interface VaultToken {
  token: string
  accessor?: string
  leaseDurationSeconds?: number
  renewable?: boolean
  policies?: string[]
}

export interface LoginRequest {
  jwtPath: string
  role: string
  vaultAddr: string
}

export interface DecryptRequest {
  token: VaultToken
  vaultAddr: string
  /** Full transit key URI: {vaultAddr}/v1/{mount}/keys/{name} */
  keyUri: string
  encryptedFile: string
}

/** Exchanges the workload identity for a Vault token */
export interface Authenticator {
  login(request: LoginRequest): Promise<VaultToken>
}

/** Produces the plaintext of an encrypted config blob */
export interface Decryptor {
  decrypt(request: DecryptRequest): Promise<Buffer>
}

/** Persists the plaintext config so that readers never see a partial file */
export interface ConfigWriter {
  write(filePath: string, data: Buffer): Promise<void>
}

// ============================================================================
// Bootstrap State
// ============================================================================

export type BootstrapStep = 'authenticate' | 'decrypt' | 'write'

export type BootstrapState =
  | 'start'
  | 'token-acquired'
  | 'config-decrypted'
  | 'done'
  | 'failed'

export interface BootstrapTransition {
  from: BootstrapState
  to: BootstrapState
  step?: BootstrapStep
  at: Date
}

export interface BootstrapResult {
  state: 'done'
  outputFile: string
  bytesWritten: number
  /** True when the write step was skipped (dry run) */
  dryRun: boolean
  token: Pick<VaultToken, 'accessor' | 'leaseDurationSeconds' | 'renewable' | 'policies'>
  transitions: BootstrapTransition[]
  durationMs: number
}
