import * as _ from 'radash'

/**
 * Result tuples used instead of throwing across package boundaries.
 * `[undefined, value]` on success, `[error, undefined]` on failure.
 */

export type SafePromise<T, E extends Error = Error> = Promise<
  SafeError<E> | SafeResult<T>
>

export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]

export function safeResult<T>(res: T): SafeResult<T> {
  return [undefined, res]
}

export function safeError<E extends Error>(err: E): SafeError<E> {
  return [err, undefined]
}

export async function safeTry<T>(promise: Promise<T>): SafePromise<T> {
  return _.try(() => promise)()
}

/**
 * Settle `promise` or reject with `onAbort()` as soon as `signal` fires,
 * whichever comes first. The listener is removed once settled.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort: () => Error,
): Promise<T> {
  if (!signal) return promise
  if (signal.aborted) return Promise.reject(onAbort())

  return new Promise<T>((resolve, reject) => {
    const abort = () => reject(onAbort())
    signal.addEventListener('abort', abort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', abort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abort)
        reject(error)
      },
    )
  })
}
