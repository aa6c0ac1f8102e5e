import type { Milliseconds, Sleeper } from "@pricecache/clock"

const TIMED_OUT = Symbol("timed-out")

export type DeadlineDeps = {
  sleeper: Sleeper
}

export type DeadlineOptions = {
  timeoutMs: Milliseconds

  /** Builds the error thrown when the deadline wins. */
  onTimeout: () => Error
}

/**
 * Run `fn` and stop waiting for it after `timeoutMs`.
 *
 * On timeout the signal handed to `fn` is aborted with the timeout error and
 * that error is thrown. Whatever `fn` settles with afterwards is ignored.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  deps: DeadlineDeps,
  opts: DeadlineOptions,
): Promise<T> {
  const work = new AbortController()
  const timer = new AbortController()

  const deadline = deps.sleeper
    .sleep(opts.timeoutMs, timer.signal)
    .then((): typeof TIMED_OUT => TIMED_OUT)

  try {
    const outcome = await Promise.race([fn(work.signal), deadline])

    if (outcome === TIMED_OUT) {
      const error = opts.onTimeout()
      work.abort(error)
      throw error
    }

    return outcome
  } finally {
    timer.abort()
  }
}
