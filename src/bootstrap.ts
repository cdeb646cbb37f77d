/**
 * Secret Bootstrap Runner
 *
 *   start → token-acquired → config-decrypted → done
 *
 * Any failing step moves the run to `failed` and rethrows the typed error with
 * the step recorded on it. There are no retries: the container restart policy
 * reruns the whole bootstrap, which always redoes both steps.
 */

import type {
  Authenticator,
  BootstrapConfig,
  BootstrapResult,
  BootstrapState,
  BootstrapStep,
  BootstrapTransition,
  ConfigWriter,
  Decryptor
} from './types.js'
import { AuthenticationError, wrapError } from './lib/errors.js'
import { transitKeyUri } from './lib/config-loader.js'
import { KubernetesAuthenticator } from './lib/vault-auth.js'
import { SopsDecryptor } from './lib/sops.js'
import { AtomicFileWriter } from './lib/atomic-write.js'
import { maskToken } from './lib/masking.js'

export type LogLevel = 'info' | 'verbose'

export type BootstrapLog = (message: string, level: LogLevel) => void

export interface BootstrapDeps {
  authenticator?: Authenticator
  decryptor?: Decryptor
  writer?: ConfigWriter
  /** Authenticate and decrypt, but do not write the output */
  dryRun?: boolean
  log?: BootstrapLog
  onTransition?: (transition: BootstrapTransition) => void
  now?: () => Date
}

/**
 * Default collaborators for a config: Vault Kubernetes login, sops, atomic writer
 */
export function createDefaultDeps(config: BootstrapConfig): Required<Pick<BootstrapDeps, 'authenticator' | 'decryptor' | 'writer'>> {
  return {
    authenticator: new KubernetesAuthenticator({
      mount: config.authMount,
      namespace: config.vaultNamespace,
      timeoutMs: config.loginTimeoutMs
    }),
    decryptor: new SopsDecryptor({
      binary: config.sopsBinary,
      inputType: config.inputType,
      outputType: config.outputType,
      timeoutMs: config.decryptTimeoutMs
    }),
    writer: new AtomicFileWriter()
  }
}

export async function runBootstrap(
  config: BootstrapConfig,
  deps: BootstrapDeps = {}
): Promise<BootstrapResult> {
  const defaults = createDefaultDeps(config)
  const authenticator = deps.authenticator ?? defaults.authenticator
  const decryptor = deps.decryptor ?? defaults.decryptor
  const writer = deps.writer ?? defaults.writer
  const dryRun = deps.dryRun ?? false
  const log: BootstrapLog = deps.log ?? (() => {})
  const now = deps.now ?? (() => new Date())

  const startedAt = Date.now()
  const transitions: BootstrapTransition[] = []
  let state: BootstrapState = 'start'

  const moveTo = (to: BootstrapState, step?: BootstrapStep): void => {
    const transition: BootstrapTransition = { from: state, to, step, at: now() }
    transitions.push(transition)
    state = to
    deps.onTransition?.(transition)
  }

  let step: BootstrapStep = 'authenticate'
  try {
    log(`Authenticating to ${config.vaultAddr} with role "${config.role}"`, 'info')
    const token = await authenticator.login({
      jwtPath: config.jwtPath,
      role: config.role,
      vaultAddr: config.vaultAddr
    })
    if (!token.token) {
      throw new AuthenticationError('Vault returned an empty token', { role: config.role })
    }
    moveTo('token-acquired', step)
    log(`Token acquired: ${maskToken(token.token)}`, 'verbose')
    if (token.leaseDurationSeconds !== undefined) {
      log(`Token lease: ${token.leaseDurationSeconds}s (renewable: ${token.renewable ?? false})`, 'verbose')
    }

    step = 'decrypt'
    const keyUri = transitKeyUri(config)
    log(`Decrypting ${config.encryptedFile} with ${keyUri}`, 'info')
    const plaintext = await decryptor.decrypt({
      token,
      vaultAddr: config.vaultAddr,
      keyUri,
      encryptedFile: config.encryptedFile
    })
    moveTo('config-decrypted', step)
    log(`Decrypted ${plaintext.length} bytes`, 'verbose')

    if (dryRun) {
      log(`Dry run: ${config.outputFile} not written`, 'info')
    } else {
      step = 'write'
      await writer.write(config.outputFile, plaintext)
      log(`Wrote ${config.outputFile}`, 'info')
    }
    moveTo('done', dryRun ? undefined : step)

    return {
      state: 'done',
      outputFile: config.outputFile,
      bytesWritten: dryRun ? 0 : plaintext.length,
      dryRun,
      token: {
        accessor: token.accessor,
        leaseDurationSeconds: token.leaseDurationSeconds,
        renewable: token.renewable,
        policies: token.policies
      },
      transitions,
      durationMs: Date.now() - startedAt
    }
  } catch (err) {
    const error = wrapError(err).atStep(step)
    moveTo('failed', step)
    throw error
  }
}
