/**
 * Promise Timeout
 *
 * Races a collaborator call against a timer. The underlying call is not
 * aborted; its eventual result is ignored once the timer wins.
 */

import { TimeoutError } from '../calendar/errors.js'

/** Default timeout for collaborator calls */
export const DEFAULT_TIMEOUT_MS = 5_000

/**
 * Resolve with the task's result, or reject with TimeoutError
 * if it does not settle within `timeoutMs`.
 *
 * @param label - Name used in the timeout message (e.g. "saveEvents")
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs)
  })

  try {
    return await Promise.race([task, timeout])
  } finally {
    clearTimeout(timer)
  }
}
