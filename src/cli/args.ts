/**
 * Command line parsing
 *
 * secret-bootstrap [options] [-- <command> [args...]]
 */

import yargs from 'yargs'
import { SOPS_FORMATS, type SopsFormat } from '../types.js'
import type { ConfigOverrides } from '../lib/config-loader.js'
import { ConfigurationError, errorMessage } from '../lib/errors.js'

export interface CliOptions {
  configFile?: string
  envFile?: string
  overrides: ConfigOverrides
  dryRun: boolean
  quiet: boolean
  /** Main process to launch after a successful bootstrap */
  command: string[]
}

/**
 * Split our own flags from the command that follows `--`
 */
export function splitCommand(argv: string[]): { own: string[]; command: string[] } {
  const index = argv.indexOf('--')
  if (index === -1) {
    return { own: argv, command: [] }
  }
  return { own: argv.slice(0, index), command: argv.slice(index + 1) }
}

function toSopsFormat(value: string | undefined): SopsFormat | undefined {
  return SOPS_FORMATS.find(format => format === value)
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws ConfigurationError on unknown flags or bad values
 */
export function parseCliArgs(argv: string[], version = '0.0.0'): CliOptions {
  const { own, command } = splitCommand(argv)

  const parsed = yargs(own)
    .scriptName('secret-bootstrap')
    .usage('$0 [options] [-- <command> [args...]]')
    .option('config', { type: 'string', describe: 'YAML config file (env: BOOTSTRAP_CONFIG)' })
    .option('env-file', { type: 'string', describe: 'Load a .env file before resolving the config' })
    .option('vault-addr', { type: 'string', describe: 'Vault base URL (env: VAULT_ADDR)' })
    .option('jwt-path', { type: 'string', describe: 'Service account token path (env: JWT_PATH)' })
    .option('role', { type: 'string', describe: 'Vault Kubernetes auth role (default: sops)' })
    .option('auth-mount', { type: 'string', describe: 'Kubernetes auth mount (default: kubernetes)' })
    .option('transit-mount', { type: 'string', describe: 'Transit engine mount (default: sops)' })
    .option('key', { type: 'string', describe: 'Transit key name (default: first-key)' })
    .option('input', { type: 'string', describe: 'Encrypted config file' })
    .option('output', { type: 'string', describe: 'Decrypted config destination' })
    .option('sops-bin', { type: 'string', describe: 'sops executable' })
    .option('input-type', { type: 'string', choices: SOPS_FORMATS, describe: 'sops input format' })
    .option('output-type', { type: 'string', choices: SOPS_FORMATS, describe: 'sops output format' })
    .option('dry-run', { type: 'boolean', default: false, describe: 'Authenticate and decrypt without writing' })
    .option('verbose', { alias: 'v', type: 'boolean', describe: 'Show token metadata and byte counts' })
    .option('quiet', { alias: 'q', type: 'boolean', describe: 'Only print errors (wins over --verbose)' })
    .version(version)
    .help()
    .strict()
    .fail((message: string | undefined, err: Error | undefined) => {
      throw new ConfigurationError(message ?? errorMessage(err), { cause: err })
    })
    .parseSync()

  return {
    configFile: parsed.config,
    envFile: parsed['env-file'],
    overrides: {
      vaultAddr: parsed['vault-addr'],
      jwtPath: parsed['jwt-path'],
      role: parsed.role,
      authMount: parsed['auth-mount'],
      transitMount: parsed['transit-mount'],
      transitKey: parsed.key,
      encryptedFile: parsed.input,
      outputFile: parsed.output,
      sopsBinary: parsed['sops-bin'],
      inputType: toSopsFormat(parsed['input-type']),
      outputType: toSopsFormat(parsed['output-type']),
      verbose: parsed.verbose
    },
    dryRun: parsed['dry-run'],
    quiet: parsed.quiet ?? false,
    command
  }
}
