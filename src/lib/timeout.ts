/**
 * Timeout utilities for async operations
 *
 * Keeps the bootstrap from hanging on an unresponsive Vault or sops process.
 */

/**
 * Raised by withTimeout when the deadline passes first
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number, operation: string) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

/**
 * Run an abortable operation with a deadline
 *
 * The operation receives an AbortSignal that fires when the timeout elapses,
 * so the underlying request or child process is torn down as well.
 *
 * @example
 * ```ts
 * const res = await withTimeout(
 *   signal => fetch(url, { signal }),
 *   10000,
 *   'vault login'
 * )
 * ```
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  const controller = new AbortController()
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      const error = new TimeoutError(timeoutMs, operation)
      // Settle first: an aborted operation rejects with its own AbortError
      reject(error)
      controller.abort(error)
    }, timeoutMs)
  })

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
