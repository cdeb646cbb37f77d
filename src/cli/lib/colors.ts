/**
 * secret-bootstrap CLI - Colors
 *
 * Plain ANSI escapes on stderr. Supports NO_COLOR and FORCE_COLOR.
 */

const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  // Diagnostics go to stderr, so that is the stream to check
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const ansi = {
  bold: (s: string) => enabled ? `\x1b[1m${s}\x1b[22m` : s,
  dim: (s: string) => enabled ? `\x1b[2m${s}\x1b[22m` : s,

  neonBlue: (s: string) => enabled ? `\x1b[38;5;39m${s}\x1b[39m` : s,
  electricBlue: (s: string) => enabled ? `\x1b[38;5;45m${s}\x1b[39m` : s,
  iceBlue: (s: string) => enabled ? `\x1b[38;5;117m${s}\x1b[39m` : s,
  gray: (s: string) => enabled ? `\x1b[38;5;245m${s}\x1b[39m` : s,

  red: (s: string) => enabled ? `\x1b[91m${s}\x1b[39m` : s,
  green: (s: string) => enabled ? `\x1b[92m${s}\x1b[39m` : s,
  yellow: (s: string) => enabled ? `\x1b[93m${s}\x1b[39m` : s,
}

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.neonBlue(text)),
  step: (text: string) => ansi.bold(ansi.electricBlue(text)),
  value: (text: string) => ansi.iceBlue(text),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  label: (text: string) => ansi.gray(text),
  muted: (text: string) => ansi.dim(text),
}

export const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
  arrow: enabled ? ansi.neonBlue('→') : '->',
}
