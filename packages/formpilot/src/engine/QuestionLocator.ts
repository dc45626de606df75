/**
 * QuestionLocator: resolves a question label to its list-item container.
 *
 * Runs the ordered strategies until one returns a match, takes the first
 * match, scrolls it to the viewport centre and waits for the smooth scroll
 * to settle. Nothing is cached: sections are replaced wholesale on page
 * advance, so every call re-queries the live document.
 */

import type { BrowserDriver, DriverElement } from '../driver/types.js';
import { QuestionNotFoundError, errorMessage } from '../errors.js';
import { sleep } from '../lib/sleep.js';
import type { Logger } from '../monitoring/logger.js';
import {
  defaultLocatorStrategies,
  type LocatorStrategy,
  type LocatorStrategyName,
} from './locatorStrategies.js';

export interface ResolvedContainer {
  label: string;
  element: DriverElement;
  strategy: LocatorStrategyName;
  /** Strategies tried, including the one that matched */
  attempts: number;
}

export interface QuestionLocatorOptions {
  strategies?: LocatorStrategy[];
  /** Wait after the smooth scroll. Default: 500 */
  scrollSettleMs?: number;
}

export class QuestionLocator {
  private readonly strategies: LocatorStrategy[];
  private readonly scrollSettleMs: number;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly logger: Logger,
    options: QuestionLocatorOptions = {},
  ) {
    this.strategies = options.strategies ?? defaultLocatorStrategies();
    this.scrollSettleMs = options.scrollSettleMs ?? 500;
  }

  async locate(label: string): Promise<ResolvedContainer> {
    this.logger.debug('Locating question container', { label });

    let attempts = 0;
    for (const strategy of this.strategies) {
      attempts++;
      let matches: DriverElement[];
      try {
        matches = await strategy.attempt(this.driver, label);
      } catch (err) {
        // A strategy that errors (stale context, bad selector) is a miss.
        this.logger.debug('Locator strategy failed', {
          label,
          strategy: strategy.name,
          error: errorMessage(err),
        });
        continue;
      }

      if (matches.length > 0) {
        const element = matches[0];
        await this.scrollIntoView(element);
        this.logger.debug('Question container resolved', {
          label,
          strategy: strategy.name,
          matches: matches.length,
        });
        return { label, element, strategy: strategy.name, attempts };
      }
    }

    this.logger.error('Question container not found', { label, attempts });
    throw new QuestionNotFoundError(label);
  }

  /**
   * Smooth-scroll to the viewport centre, then settle. A failed scroll is
   * logged and the caller carries on with the element where it is.
   */
  async scrollIntoView(element: DriverElement): Promise<void> {
    try {
      await element.scrollIntoView({ behavior: 'smooth' });
    } catch (err) {
      this.logger.warn('Error scrolling to element', { error: errorMessage(err) });
    }
    await sleep(this.scrollSettleMs);
  }
}
