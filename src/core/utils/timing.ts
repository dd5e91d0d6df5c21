export type TimedOutcome<T> = { timedOut: false; value: T } | { timedOut: true }

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Races a promise against a deadline. On expiry the promise is abandoned, not
 * cancelled; a rejection that arrives later goes to `onLateRejection`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onLateRejection?: (error: unknown) => void,
): Promise<TimedOutcome<T>> {
  return new Promise<TimedOutcome<T>>((resolve, reject) => {
    let settled = false

    const timer = setTimeout(() => {
      settled = true
      resolve({ timedOut: true })
    }, timeoutMs)

    promise.then(
      (value) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        resolve({ timedOut: false, value })
      },
      (error: unknown) => {
        if (settled) {
          onLateRejection?.(error)
          return
        }
        settled = true
        clearTimeout(timer)
        reject(error)
      },
    )
  })
}
