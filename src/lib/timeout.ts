/**
 * Timeout utilities for async operations
 *
 * Keeps external commands (render engine) from hanging a run indefinitely.
 */

export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`)
    this.name = 'TimeoutError'
  }
}

/**
 * Resolve after `ms` milliseconds
 */
export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Wrap a promise with a timeout
 *
 * @param operation - Operation name for the error message
 * @param onTimeout - Called before rejecting, e.g. to kill a child process
 *
 * @example
 * ```ts
 * const code = await withTimeout(waitForExit(child), 600000, 'quarto render', () => child.kill())
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string,
  onTimeout?: () => void
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      onTimeout?.()
      reject(new TimeoutError(operation, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([promise, timeoutPromise])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
