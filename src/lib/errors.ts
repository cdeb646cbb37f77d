/**
 * secret-bootstrap Error Hierarchy
 *
 * Every failure of a bootstrap run surfaces as one of these classes so the
 * CLI can name the failed step and pick a distinct exit code.
 *
 * Hierarchy:
 *   BootstrapError (base)
 *   ├── ConfigurationError   (missing/invalid input, unreadable JWT)
 *   ├── TransportError       (Vault unreachable, timeout)
 *   ├── AuthenticationError  (Vault rejected the login, no token in reply)
 *   ├── DecryptionError      (sops failed)
 *   └── IOError              (config could not be written)
 */

import type { BootstrapStep } from '../types.js'

interface BootstrapErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all bootstrap errors
 */
export class BootstrapError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Process exit status used by the CLI */
  readonly exitCode: number

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  /** Bootstrap step that was running when the error was raised */
  step?: BootstrapStep

  constructor(
    message: string,
    code: string,
    exitCode: number,
    options: BootstrapErrorOptions = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'BootstrapError'
    this.code = code
    this.exitCode = exitCode
    this.suggestion = options.suggestion
    this.context = options.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Record the failed step, keeping the first one assigned
   */
  atStep(step: BootstrapStep): this {
    if (!this.step) {
      this.step = step
    }
    return this
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const prefix = this.step ? `${this.step} failed: ` : ''
    const lines = [`Error: ${prefix}${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      step: this.step,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Concrete Errors
// =============================================================================

/**
 * Required input is missing or invalid (env, flags, config file, JWT file)
 */
export class ConfigurationError extends BootstrapError {
  constructor(message: string, options: BootstrapErrorOptions = {}) {
    super(message, 'CONFIGURATION_ERROR', 2, {
      suggestion: 'Check JWT_PATH, VAULT_ADDR and the bootstrap options',
      ...options
    })
    this.name = 'ConfigurationError'
  }
}

/**
 * Vault could not be reached or did not answer in time
 */
export class TransportError extends BootstrapError {
  constructor(url: string, reason: string, cause?: unknown) {
    super(`Cannot reach Vault at ${url}: ${reason}`, 'TRANSPORT_ERROR', 3, {
      suggestion: 'Verify VAULT_ADDR and network access to Vault',
      context: { url },
      cause
    })
    this.name = 'TransportError'
  }
}

/**
 * Vault rejected the credentials or role, or replied without a token
 */
export class AuthenticationError extends BootstrapError {
  constructor(message: string, options: { status?: number; role?: string; cause?: unknown } = {}) {
    super(message, 'AUTHENTICATION_ERROR', 4, {
      suggestion: options.role
        ? `Check that role "${options.role}" is bound to this service account`
        : 'Check the Vault Kubernetes auth role binding',
      context: { status: options.status, role: options.role },
      cause: options.cause
    })
    this.name = 'AuthenticationError'
  }
}

/**
 * The transit decryption (sops) failed
 */
export class DecryptionError extends BootstrapError {
  constructor(reason: string, options: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}) {
    super(`Decryption failed: ${reason}`, 'DECRYPTION_ERROR', 5, {
      suggestion: 'Ensure the transit key exists and the token policy allows decrypt on it',
      context: { exitCode: options.exitCode, stderr: options.stderr },
      cause: options.cause
    })
    this.name = 'DecryptionError'
  }
}

/**
 * Filesystem read/write failure on the output side
 */
export class IOError extends BootstrapError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Cannot write ${filePath}: ${reason}`, 'IO_ERROR', 6, {
      suggestion: 'Check that the output directory exists and is writable',
      context: { filePath },
      cause
    })
    this.name = 'IOError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isBootstrapError(error: unknown): error is BootstrapError {
  return error instanceof BootstrapError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError
}

export function isDecryptionError(error: unknown): error is DecryptionError {
  return error instanceof DecryptionError
}

export function isIOError(error: unknown): error is IOError {
  return error instanceof IOError
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isBootstrapError(error)) {
    return error.toCliOutput()
  }
  return `Error: ${errorMessage(error)}`
}

/**
 * Wrap a generic error into a BootstrapError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): BootstrapError {
  if (isBootstrapError(error)) {
    return error
  }
  return new BootstrapError(errorMessage(error), defaultCode, 1, {
    cause: error instanceof Error ? error : undefined
  })
}
