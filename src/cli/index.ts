#!/usr/bin/env node
/**
 * secret-bootstrap CLI
 *
 * Vault Kubernetes login + sops transit decryption before the main process starts
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { hideBin } from 'yargs/helpers'
import { parseCliArgs } from './args.js'
import { runBootstrapCommand } from './commands/run.js'
import { formatErrorForCli, wrapError } from '../lib/errors.js'
import * as ui from './ui.js'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 4; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: { version?: string } = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      return pkg.version
    }
    dir = path.dirname(dir)
  }
  return undefined
}

async function main(): Promise<void> {
  const options = parseCliArgs(hideBin(process.argv), getPackageVersion())
  process.exitCode = await runBootstrapCommand(options)
}

main().catch((err: unknown) => {
  ui.error(formatErrorForCli(err))
  process.exitCode = wrapError(err).exitCode
})
