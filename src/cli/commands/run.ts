/**
 * Bootstrap command
 *
 * Provisions the decrypted config, then optionally hands over to the main
 * process (the `bootstrap && app` chain of a container entrypoint).
 *
 * @example
 * secret-bootstrap
 * secret-bootstrap --output configs/app.ini -- node server.js
 */

import { spawn } from 'node:child_process'
import type { BootstrapConfig } from '../../types.js'
import { runBootstrap, type BootstrapDeps } from '../../bootstrap.js'
import { loadEnvFile, resolveConfig } from '../../lib/config-loader.js'
import { errorMessage, wrapError } from '../../lib/errors.js'
import type { CliOptions } from '../args.js'
import { c, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP']

/**
 * Spawn the main process with inherited stdio and resolve with its exit code
 */
export function launchCommand(command: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const [program, ...args] = command
  if (!program) {
    return Promise.resolve(0)
  }

  return new Promise((resolve, reject) => {
    const child = spawn(program, args, { stdio: 'inherit', env })

    const forward = (signal: NodeJS.Signals) => {
      child.kill(signal)
    }
    for (const signal of FORWARDED_SIGNALS) {
      process.on(signal, forward)
    }
    const detach = () => {
      for (const signal of FORWARDED_SIGNALS) {
        process.off(signal, forward)
      }
    }

    child.on('error', (err) => {
      detach()
      reject(err)
    })
    child.on('close', (code) => {
      detach()
      resolve(code ?? 1)
    })
  })
}

function printConfig(config: BootstrapConfig): void {
  ui.verbose(`vault: ${c.value(config.vaultAddr)}${config.vaultNamespace ? ` (namespace ${config.vaultNamespace})` : ''}`)
  ui.verbose(`auth: ${config.authMount} / role ${config.role}`)
  ui.verbose(`transit: ${config.transitMount} / key ${config.transitKey}`)
  ui.verbose(`files: ${config.encryptedFile} ${symbols.arrow} ${config.outputFile}`)
}

/**
 * Run the bootstrap and, on success, the main command
 *
 * @returns process exit code
 */
export async function runBootstrapCommand(
  options: CliOptions,
  deps: Omit<BootstrapDeps, 'dryRun' | 'log'> = {}
): Promise<number> {
  ui.setVerbosity(options.quiet ? 'quiet' : 'normal')

  try {
    if (options.envFile) {
      const count = loadEnvFile(options.envFile)
      ui.log(`Loaded ${count} variables from ${options.envFile}`)
    }

    const config = resolveConfig({ overrides: options.overrides, configFile: options.configFile })
    if (config.verbose && !options.quiet) {
      ui.setVerbosity('verbose')
    }
    printConfig(config)

    const result = await runBootstrap(config, {
      ...deps,
      dryRun: options.dryRun,
      log: (message, level) => level === 'verbose' ? ui.verbose(message) : ui.log(message)
    })

    ui.success(result.dryRun
      ? `Bootstrap complete (dry run) in ${result.durationMs}ms`
      : `Bootstrap complete: ${result.outputFile} (${result.bytesWritten} bytes) in ${result.durationMs}ms`)
  } catch (err) {
    const error = wrapError(err)
    ui.error(error.step ? `${c.step(error.step)} failed: ${error.message}` : error.message)
    if (error.suggestion) {
      ui.log(`  ${c.label('Suggestion:')} ${error.suggestion}`)
    }
    if (error.context) {
      ui.verbose(`  Context: ${JSON.stringify(error.context)}`)
    }
    return error.exitCode
  }

  if (options.command.length === 0) {
    return 0
  }
  if (options.dryRun) {
    ui.warn(`Dry run: not starting ${options.command.join(' ')}`)
    return 0
  }

  ui.log(`Starting ${c.command(options.command.join(' '))}`)
  try {
    return await launchCommand(options.command)
  } catch (err) {
    ui.error(`Failed to execute command: ${errorMessage(err)}`)
    return 127
  }
}
