import type { DriverElement } from '../driver/types.js';
import { ClickInterceptedError } from '../errors.js';
import type { Logger } from '../monitoring/logger.js';

export type ClickPath = 'direct' | 'script';

/**
 * Native click first. An intercepted click (overlapping tooltip, an
 * animation still running) is retried exactly once as a script-dispatched
 * click; if that fails too, its error propagates. Any other click error
 * propagates without a retry.
 */
export async function clickWithFallback(
  element: DriverElement,
  logger: Logger,
  context: Record<string, unknown> = {},
): Promise<ClickPath> {
  try {
    await element.click();
    return 'direct';
  } catch (err) {
    if (!(err instanceof ClickInterceptedError)) throw err;
    logger.debug('Click intercepted, retrying with script click', { ...context, error: err.message });
  }

  await element.scriptClick();
  return 'script';
}
