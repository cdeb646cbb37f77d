/**
 * CLI output
 *
 * Everything goes to stderr: stdout belongs to the main process launched
 * after the bootstrap.
 */

import { c, symbols } from './lib/colors.js'

const PREFIX = '[secret-bootstrap]'

export type Verbosity = 'quiet' | 'normal' | 'verbose'

let verbosity: Verbosity = 'normal'

export function setVerbosity(level: Verbosity): void {
  verbosity = level
}

/**
 * Progress message (hidden with --quiet)
 */
export function log(message: string): void {
  if (verbosity !== 'quiet') {
    console.error(`${c.muted(PREFIX)} ${message}`)
  }
}

/**
 * Detail message (only with --verbose)
 */
export function verbose(message: string): void {
  if (verbosity === 'verbose') {
    console.error(`${c.muted(PREFIX)} ${c.label(message)}`)
  }
}

/**
 * Success line (hidden with --quiet)
 */
export function success(message: string): void {
  if (verbosity !== 'quiet') {
    console.error(`${c.muted(PREFIX)} ${symbols.success} ${c.success(message)}`)
  }
}

/**
 * Warning (always shown)
 */
export function warn(message: string): void {
  console.error(`${c.muted(PREFIX)} ${symbols.warning} ${c.warning(message)}`)
}

/**
 * Error (always shown)
 */
export function error(message: string): void {
  console.error(`${c.muted(PREFIX)} ${symbols.error} ${c.error(message)}`)
}
