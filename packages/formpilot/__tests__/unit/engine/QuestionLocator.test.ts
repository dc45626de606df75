import { describe, expect, test, vi } from 'vitest';
import { MockDriver } from '../../../src/driver/mock.js';
import type { DriverElement, ElementQuery } from '../../../src/driver/types.js';
import { QuestionNotFoundError } from '../../../src/errors.js';
import {
  ContainsTextStrategy,
  ExactTextStrategy,
  NestedTextStrategy,
} from '../../../src/engine/locatorStrategies.js';
import { QuestionLocator } from '../../../src/engine/QuestionLocator.js';
import { FORM_URL, memoryLogger, stubDriver, stubElement, xpathDriver } from '../../helpers.js';

describe('QuestionLocator', () => {
  // ── Strategy order ─────────────────────────────────────────────────

  describe('strategy order', () => {
    test('prefers exact-text when it matches', async () => {
      const exact = stubElement();
      const driver = xpathDriver({
        [ExactTextStrategy.xpath('Age')]: [exact],
        [NestedTextStrategy.xpath('Age')]: [stubElement()],
      });
      const { logger } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.strategy).toBe('exact-text');
      expect(result.element).toBe(exact);
      expect(result.attempts).toBe(1);
    });

    test('falls through to nested-text', async () => {
      const nested = stubElement();
      const driver = xpathDriver({ [NestedTextStrategy.xpath('Age')]: [nested] });
      const { logger } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.strategy).toBe('nested-text');
      expect(result.element).toBe(nested);
      expect(result.attempts).toBe(2);
    });

    test('falls through to contains-text', async () => {
      const partial = stubElement();
      const driver = xpathDriver({ [ContainsTextStrategy.xpath('Age')]: [partial] });
      const { logger } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.strategy).toBe('contains-text');
      expect(result.attempts).toBe(3);
    });

    test('uses the script scan as the last resort', async () => {
      const scanned = stubElement();
      const driver = xpathDriver({}, scanned);
      const { logger } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.strategy).toBe('script-scan');
      expect(result.element).toBe(scanned);
      expect(result.attempts).toBe(4);
    });

    test('takes the first of several matches', async () => {
      const first = stubElement();
      const second = stubElement();
      const driver = xpathDriver({ [ExactTextStrategy.xpath('Age')]: [first, second] });
      const { logger } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.element).toBe(first);
    });
  });

  // ── Failures ───────────────────────────────────────────────────────

  describe('failures', () => {
    test('treats a throwing strategy as a miss', async () => {
      const nested = stubElement();
      const driver = stubDriver({
        queryAll: vi.fn(async (query: ElementQuery): Promise<DriverElement[]> => {
          if ('xpath' in query && query.xpath === ExactTextStrategy.xpath('Age')) {
            throw new Error('Execution context was destroyed');
          }
          return 'xpath' in query && query.xpath === NestedTextStrategy.xpath('Age') ? [nested] : [];
        }),
      });
      const { logger, sink } = memoryLogger();

      const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('Age');

      expect(result.strategy).toBe('nested-text');
      const failure = sink.find('Locator strategy failed');
      expect(failure?.level).toBe('debug');
      expect(failure?.strategy).toBe('exact-text');
      expect(failure?.error).toBe('Execution context was destroyed');
    });

    test('raises QuestionNotFoundError when every strategy misses', async () => {
      const { logger, sink } = memoryLogger();
      const locator = new QuestionLocator(xpathDriver({}), logger, { scrollSettleMs: 0 });

      const error = await locator.locate('Favourite colour').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(QuestionNotFoundError);
      expect(error).toHaveProperty('message', 'Could not find question with text: Favourite colour');
      expect(sink.find('Question container not found')?.attempts).toBe(4);
    });
  });

  // ── Scrolling ──────────────────────────────────────────────────────

  describe('scrolling', () => {
    test('smooth-scrolls the resolved container', async () => {
      const container = stubElement();
      const { logger } = memoryLogger();

      await new QuestionLocator(xpathDriver({}, container), logger, { scrollSettleMs: 0 }).locate('Age');

      expect(container.scrollIntoView).toHaveBeenCalledTimes(1);
      expect(container.scrollIntoView).toHaveBeenCalledWith({ behavior: 'smooth' });
    });

    test('logs a failed scroll and still returns the container', async () => {
      const container = stubElement({
        scrollIntoView: vi.fn(async (): Promise<void> => {
          throw new Error('Element is not attached to the DOM');
        }),
      });
      const { logger, sink } = memoryLogger();

      const result = await new QuestionLocator(xpathDriver({}, container), logger, { scrollSettleMs: 0 }).locate(
        'Age',
      );

      expect(result.element).toBe(container);
      expect(sink.find('Error scrolling to element')?.level).toBe('warn');
    });
  });

  test('resolves a label split across inline markup on the mock form', async () => {
    const driver = new MockDriver({
      sections: [
        {
          questions: [
            { label: 'Name or Initials', control: 'text' },
            { label: 'City, State', control: 'text', nestedLabel: true },
          ],
        },
      ],
    });
    await driver.launch({ headless: true });
    await driver.navigate(FORM_URL);
    const { logger } = memoryLogger();

    const result = await new QuestionLocator(driver, logger, { scrollSettleMs: 0 }).locate('City, State');

    expect(result.element).toBe(driver.listItem('City, State'));
  });
});
