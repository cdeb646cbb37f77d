/**
 * Bootstrap Config Loader
 *
 * Resolves the explicit BootstrapConfig from, highest priority first:
 *   1. overrides (CLI flags)
 *   2. environment variables (JWT_PATH, VAULT_ADDR, BOOTSTRAP_*)
 *   3. an optional YAML file (--config / BOOTSTRAP_CONFIG)
 *   4. built-in defaults
 */

import fs from 'node:fs'
import dotenv from 'dotenv'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { SOPS_FORMATS, type BootstrapConfig } from '../types.js'
import { ConfigurationError, errorMessage } from './errors.js'

type Env = Record<string, string | undefined>

export const DEFAULT_CONFIG = {
  role: 'sops',
  authMount: 'kubernetes',
  transitMount: 'sops',
  transitKey: 'first-key',
  encryptedFile: 'configs/app-config-encrypted.ini',
  outputFile: 'configs/app-config.ini',
  sopsBinary: 'sops',
  loginTimeoutMs: 10_000,
  decryptTimeoutMs: 30_000,
  verbose: false
} satisfies Partial<BootstrapConfig>

/** Environment variable backing each config field */
export const ENV_VARS = {
  jwtPath: 'JWT_PATH',
  vaultAddr: 'VAULT_ADDR',
  vaultNamespace: 'VAULT_NAMESPACE',
  role: 'BOOTSTRAP_ROLE',
  authMount: 'BOOTSTRAP_AUTH_MOUNT',
  transitMount: 'BOOTSTRAP_TRANSIT_MOUNT',
  transitKey: 'BOOTSTRAP_TRANSIT_KEY',
  encryptedFile: 'BOOTSTRAP_ENCRYPTED_FILE',
  outputFile: 'BOOTSTRAP_OUTPUT_FILE',
  sopsBinary: 'SOPS_BIN',
  inputType: 'BOOTSTRAP_INPUT_TYPE',
  outputType: 'BOOTSTRAP_OUTPUT_TYPE',
  loginTimeoutMs: 'BOOTSTRAP_LOGIN_TIMEOUT_MS',
  decryptTimeoutMs: 'BOOTSTRAP_DECRYPT_TIMEOUT_MS',
  verbose: 'BOOTSTRAP_VERBOSE'
} as const satisfies Record<keyof BootstrapConfig, string>

export const CONFIG_FILE_ENV = 'BOOTSTRAP_CONFIG'

// ============================================================================
// Schemas
// ============================================================================

const nonEmpty = (label: string) =>
  z.string({ required_error: `${label} is required` }).trim().min(1, `${label} is required`)

const mountPath = (label: string) =>
  nonEmpty(label).transform(value => value.replace(/^\/+|\/+$/g, ''))

const timeout = z.coerce.number().int().positive()

const configSchema = z.object({
  jwtPath: nonEmpty('JWT_PATH'),
  vaultAddr: nonEmpty('VAULT_ADDR')
    .refine(value => /^https?:\/\/[^/]/.test(value), 'VAULT_ADDR must be an http(s) URL')
    .transform(value => value.replace(/\/+$/, '')),
  vaultNamespace: z.string().trim().min(1).optional(),
  role: nonEmpty('role'),
  authMount: mountPath('auth mount'),
  transitMount: mountPath('transit mount'),
  transitKey: nonEmpty('transit key'),
  encryptedFile: nonEmpty('encrypted file'),
  outputFile: nonEmpty('output file'),
  sopsBinary: nonEmpty('sops binary'),
  inputType: z.enum(SOPS_FORMATS).optional(),
  outputType: z.enum(SOPS_FORMATS).optional(),
  loginTimeoutMs: timeout,
  decryptTimeoutMs: timeout,
  verbose: z.boolean()
})

/** Keys accepted in the YAML config file */
const fileSchema = z.object({
  jwt_path: z.string(),
  vault_addr: z.string(),
  vault_namespace: z.string(),
  role: z.string(),
  auth_mount: z.string(),
  transit_mount: z.string(),
  transit_key: z.string(),
  encrypted_file: z.string(),
  output_file: z.string(),
  sops_binary: z.string(),
  input_type: z.string(),
  output_type: z.string(),
  login_timeout_ms: z.union([z.number(), z.string()]),
  decrypt_timeout_ms: z.union([z.number(), z.string()]),
  verbose: z.boolean()
}).partial().strict()

export type ConfigFile = z.infer<typeof fileSchema>

export type ConfigOverrides = Partial<BootstrapConfig>

export interface ResolveConfigOptions {
  overrides?: ConfigOverrides
  /** Defaults to process.env */
  env?: Env
  /** YAML file path; falls back to BOOTSTRAP_CONFIG */
  configFile?: string
}

// ============================================================================
// Env Expansion
// ============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Env = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, name: string, fallback: string) => env[name] || fallback)
    .replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, name: string) => env[name] || '')
}

function expandEnvVarsInObject(value: unknown, env: Env): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInObject(item, env))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInObject(item, env)
    }
    return result
  }
  return value
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
    .join('; ')
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Load a .env file into process.env without overriding existing values
 *
 * @returns number of variables found in the file
 */
export function loadEnvFile(filePath: string): number {
  const result = dotenv.config({ path: filePath, override: false, quiet: true })
  if (result.error) {
    throw new ConfigurationError(`Cannot load env file ${filePath}: ${result.error.message}`, {
      context: { filePath },
      cause: result.error
    })
  }
  return result.parsed ? Object.keys(result.parsed).length : 0
}

/**
 * Read and validate a YAML config file
 */
export function loadConfigFile(filePath: string, env: Env = process.env): ConfigFile {
  let content: string
  try {
    content = fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(err)}`, {
      context: { filePath },
      cause: err
    })
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}: ${errorMessage(err)}`, {
      context: { filePath },
      cause: err
    })
  }

  const result = fileSchema.safeParse(expandEnvVarsInObject(parsed ?? {}, env))
  if (!result.success) {
    throw new ConfigurationError(`Invalid config in ${filePath}: ${formatIssues(result.error.issues)}`, {
      context: { filePath }
    })
  }
  return result.data
}

function fromFile(file: ConfigFile): Record<keyof BootstrapConfig, unknown> {
  return {
    jwtPath: file.jwt_path,
    vaultAddr: file.vault_addr,
    vaultNamespace: file.vault_namespace,
    role: file.role,
    authMount: file.auth_mount,
    transitMount: file.transit_mount,
    transitKey: file.transit_key,
    encryptedFile: file.encrypted_file,
    outputFile: file.output_file,
    sopsBinary: file.sops_binary,
    inputType: file.input_type,
    outputType: file.output_type,
    loginTimeoutMs: file.login_timeout_ms,
    decryptTimeoutMs: file.decrypt_timeout_ms,
    verbose: file.verbose
  }
}

function fromEnv(env: Env): Record<keyof BootstrapConfig, unknown> {
  const read = (name: string): string | undefined => {
    const value = env[name]
    return value === undefined || value.trim() === '' ? undefined : value
  }
  const verbose = read(ENV_VARS.verbose)

  return {
    jwtPath: read(ENV_VARS.jwtPath),
    vaultAddr: read(ENV_VARS.vaultAddr),
    vaultNamespace: read(ENV_VARS.vaultNamespace),
    role: read(ENV_VARS.role),
    authMount: read(ENV_VARS.authMount),
    transitMount: read(ENV_VARS.transitMount),
    transitKey: read(ENV_VARS.transitKey),
    encryptedFile: read(ENV_VARS.encryptedFile),
    outputFile: read(ENV_VARS.outputFile),
    sopsBinary: read(ENV_VARS.sopsBinary),
    inputType: read(ENV_VARS.inputType),
    outputType: read(ENV_VARS.outputType),
    loginTimeoutMs: read(ENV_VARS.loginTimeoutMs),
    decryptTimeoutMs: read(ENV_VARS.decryptTimeoutMs),
    verbose: verbose === undefined ? undefined : ['1', 'true', 'yes'].includes(verbose.toLowerCase())
  }
}

/**
 * Resolve and validate the bootstrap configuration
 *
 * @throws ConfigurationError listing every invalid or missing field
 */
export function resolveConfig(options: ResolveConfigOptions = {}): BootstrapConfig {
  const env = options.env ?? process.env
  const configFile = options.configFile ?? env[CONFIG_FILE_ENV]

  const layers: Array<Record<string, unknown>> = [
    { ...options.overrides },
    fromEnv(env),
    configFile ? fromFile(loadConfigFile(configFile, env)) : {},
    DEFAULT_CONFIG
  ]

  const raw = Object.fromEntries(
    Object.keys(ENV_VARS).map(key => [
      key,
      layers.map(layer => layer[key]).find(value => value !== undefined)
    ])
  )

  const result = configSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigurationError(`Invalid bootstrap configuration: ${formatIssues(result.error.issues)}`, {
      context: { fields: result.error.issues.map(issue => issue.path.join('.')) }
    })
  }
  return result.data
}

/**
 * Transit key URI handed to sops: {VAULT_ADDR}/v1/{mount}/keys/{key}
 */
export function transitKeyUri(config: Pick<BootstrapConfig, 'vaultAddr' | 'transitMount' | 'transitKey'>): string {
  return `${config.vaultAddr}/v1/${config.transitMount}/keys/${encodeURIComponent(config.transitKey)}`
}
