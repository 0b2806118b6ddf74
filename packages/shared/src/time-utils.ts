import parse from 'parse-duration'

/**
 * Parse duration string to milliseconds
 * @param duration - Duration string (e.g., '10s', '45s', '1m30s')
 * @returns Duration in milliseconds
 * @throws Error if duration format is invalid or negative
 */
export function parseDuration(duration: string): number {
  const result = parse(duration)

  if (result === null || result === undefined) {
    throw new Error(
      `Invalid duration format: ${duration}. Expected format: duration string (e.g., 10s, 45s, 1m30s)`
    )
  }

  if (result < 0) {
    throw new Error(
      `Invalid duration: ${duration}. Duration cannot be negative`
    )
  }

  return result
}

/**
 * Parse an interval where a bare number means seconds
 * (e.g. '45' or '45s' → 45000, '2m' → 120000)
 */
export function parseIntervalSeconds(interval: string): number {
  const trimmed = interval.trim()
  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10) * 1000
  }
  return parseDuration(trimmed)
}

/**
 * Wait for `ms` milliseconds.
 * @returns true when the full delay elapsed, false when `signal` aborted it
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false)
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timeoutHandle)
      resolve(false)
    }
    const timeoutHandle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Error raised by {@link withTimeout} when the wrapped operation is too slow
 */
export class TimeoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Reject with a TimeoutError if `operation` does not settle within `ms`
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  ms: number,
  description: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined

  const timeout = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(
      () => reject(new TimeoutError(`${description} timed out after ${ms}ms`)),
      ms
    )
  })

  try {
    return await Promise.race([operation, timeout])
  } finally {
    clearTimeout(timeoutHandle)
  }
}
