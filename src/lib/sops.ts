/**
 * sops transit decryption
 *
 * Runs `sops --decrypt --hc-vault-transit <key uri> <file>` with the freshly
 * issued token in VAULT_TOKEN and captures the plaintext from stdout. Nothing
 * is streamed to disk here; the caller decides where the bytes go.
 */

import { spawn } from 'node:child_process'
import { access, constants } from 'node:fs/promises'
import type { DecryptRequest, Decryptor, SopsFormat } from '../types.js'
import { DecryptionError, errorMessage } from './errors.js'
import { redact } from './masking.js'
import { TimeoutError, withTimeout } from './timeout.js'

export interface CommandResult {
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: Buffer
  stderr: string
}

export interface CommandOptions {
  env: NodeJS.ProcessEnv
  signal?: AbortSignal
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: CommandOptions
) => Promise<CommandResult>

/**
 * Default runner: spawn without a shell, buffer both streams
 */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

    child.on('error', reject)
    child.on('close', (exitCode, signal) => {
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout),
        stderr: Buffer.concat(stderr).toString('utf-8')
      })
    })
  })

export interface SopsDecryptorOptions {
  /** sops executable (default: sops) */
  binary?: string
  inputType?: SopsFormat
  outputType?: SopsFormat
  /** Kill sops after this long (default: 30000) */
  timeoutMs?: number
  /** Base environment for the child (default: process.env) */
  env?: NodeJS.ProcessEnv
  runner?: CommandRunner
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

/** Last non-empty stderr line; sops prints the reason there */
function lastLine(text: string): string {
  const lines = text.split('\n').map(line => line.trim()).filter(Boolean)
  return lines[lines.length - 1] ?? ''
}

export class SopsDecryptor implements Decryptor {
  private readonly binary: string
  private readonly inputType?: SopsFormat
  private readonly outputType?: SopsFormat
  private readonly timeoutMs: number
  private readonly env: NodeJS.ProcessEnv
  private readonly runner: CommandRunner

  constructor(options: SopsDecryptorOptions = {}) {
    this.binary = options.binary ?? 'sops'
    this.inputType = options.inputType
    this.outputType = options.outputType
    this.timeoutMs = options.timeoutMs ?? 30_000
    this.env = options.env ?? process.env
    this.runner = options.runner ?? spawnCommand
  }

  buildArgs(keyUri: string, encryptedFile: string): string[] {
    const args = ['--decrypt', '--hc-vault-transit', keyUri]
    if (this.inputType) {
      args.push('--input-type', this.inputType)
    }
    if (this.outputType) {
      args.push('--output-type', this.outputType)
    }
    args.push(encryptedFile)
    return args
  }

  async decrypt(request: DecryptRequest): Promise<Buffer> {
    try {
      await access(request.encryptedFile, constants.R_OK)
    } catch (err) {
      throw new DecryptionError(`encrypted file ${request.encryptedFile} is not readable`, { cause: err })
    }

    const args = this.buildArgs(request.keyUri, request.encryptedFile)
    const env: NodeJS.ProcessEnv = {
      ...this.env,
      VAULT_ADDR: request.vaultAddr,
      VAULT_TOKEN: request.token.token
    }

    let result: CommandResult
    try {
      result = await withTimeout(
        signal => this.runner(this.binary, args, { env, signal }),
        this.timeoutMs,
        'sops decrypt'
      )
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new DecryptionError(`sops did not finish within ${this.timeoutMs}ms`, { cause: err })
      }
      if (isMissingBinary(err)) {
        throw new DecryptionError(`sops binary not found: ${this.binary}`, { cause: err })
      }
      throw new DecryptionError(`cannot run ${this.binary}: ${errorMessage(err)}`, { cause: err })
    }

    const stderr = redact(result.stderr, [request.token.token])

    if (result.signal) {
      throw new DecryptionError(`sops was killed by ${result.signal}`, { stderr })
    }
    if (result.exitCode !== 0) {
      const reason = lastLine(stderr)
      throw new DecryptionError(
        `sops exited with code ${result.exitCode}${reason ? `: ${reason}` : ''}`,
        { exitCode: result.exitCode, stderr }
      )
    }

    return result.stdout
  }
}
