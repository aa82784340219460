import { logger } from '../../logger'

/**
 * Races `work` against a timer. The timer is always cleared; if the timer wins,
 * a later settlement of `work` is only logged at debug level.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), Math.max(0, timeoutMs))
  })

  try {
    return await Promise.race([work, expired])
  } finally {
    clearTimeout(timer)
    work.catch((error: unknown) => {
      logger.debug('Abandoned operation failed after its deadline:', error)
    })
  }
}
