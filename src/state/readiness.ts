import type { PageDriver } from '../driver/types'
import type { Logger } from '../logger'

/**
 * DOM content first, then network idle, each bounded. Pages that keep a
 * socket open never reach network idle; that is logged and tolerated.
 */
export async function waitForPageReady(page: PageDriver, logger: Logger, timeoutMs = 8000): Promise<void> {
  const t0 = Date.now()
  try {
    await page.waitForLoadState('domcontentloaded', timeoutMs)
  } catch (err) {
    logger.debug({ url: page.url(), err: err instanceof Error ? err.message : String(err) }, 'domcontentloaded not reached')
    return
  }
  const remaining = Math.max(500, timeoutMs - (Date.now() - t0))
  try {
    await page.waitForLoadState('networkidle', remaining)
  } catch (err) {
    logger.debug({ url: page.url(), err: err instanceof Error ? err.message : String(err) }, 'networkidle not reached')
  }
}
