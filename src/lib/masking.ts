/**
 * Masking for credentials that appear in diagnostics
 */

export interface MaskOptions {
  /** Characters visible at start (default: 4) */
  visibleStart?: number
  /** Characters visible at end (default: 4) */
  visibleEnd?: number
  /** Minimum length to show any edge (default: 12) */
  minLengthToMask?: number
}

/**
 * Mask a token for log output
 *
 * @example
 * maskToken('hvs.CAESIabcdefgh1234')
 * // => 'hvs.****1234'
 *
 * maskToken('short')
 * // => '***'
 */
export function maskToken(value: string | undefined, options: MaskOptions = {}): string {
  if (!value) {
    return ''
  }

  const { visibleStart = 4, visibleEnd = 4, minLengthToMask = 12 } = options

  if (value.length < minLengthToMask) {
    return '***'
  }

  return `${value.slice(0, visibleStart)}****${value.slice(-visibleEnd)}`
}

/**
 * Remove every occurrence of the given secrets from a piece of text
 * (sops stderr, Vault error bodies) before it is shown
 */
export function redact(text: string, secrets: Array<string | undefined>): string {
  let result = text
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      result = result.split(secret).join(maskToken(secret))
    }
  }
  return result
}
