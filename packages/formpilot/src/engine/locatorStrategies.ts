/**
 * Question-label resolution strategies.
 *
 * Each strategy turns a human-readable label into the list-item container
 * that holds the question's controls. QuestionLocator tries them in order:
 * exact-text > nested-text > contains-text > script-scan. Earlier strategies
 * are precise (labels sharing a prefix resolve to the right question); later
 * ones tolerate markup and whitespace variation.
 */

import type { BrowserDriver, DriverElement } from '../driver/types.js';

export const LIST_ITEM_SELECTOR = "[role='listitem']";

export type LocatorStrategyName = 'exact-text' | 'nested-text' | 'contains-text' | 'script-scan';

export interface LocatorStrategy {
  readonly name: LocatorStrategyName;
  /** Matching containers in document order; empty when the strategy misses. */
  attempt(driver: BrowserDriver, label: string): Promise<DriverElement[]>;
}

/**
 * Quote `value` as an XPath 1.0 string literal. XPath has no escape
 * sequences, so a value holding both quote kinds is built with concat().
 */
export function xpathLiteral(value: string): string {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  const parts = value.split("'").map((part) => `'${part}'`);
  return `concat(${parts.join(`, "'", `)})`;
}

const NEAREST_LIST_ITEM = "ancestor::*[@role='listitem'][1]";

export class ExactTextStrategy implements LocatorStrategy {
  readonly name = 'exact-text' as const;

  static xpath(label: string): string {
    return `//*[normalize-space(text())=${xpathLiteral(label.trim())}]/${NEAREST_LIST_ITEM}`;
  }

  attempt(driver: BrowserDriver, label: string): Promise<DriverElement[]> {
    return driver.queryAll({ xpath: ExactTextStrategy.xpath(label) });
  }
}

/** Label text split across inline markup (`<b>`, `<span>`) inside the item. */
export class NestedTextStrategy implements LocatorStrategy {
  readonly name = 'nested-text' as const;

  static xpath(label: string): string {
    return `//*[@role='listitem']//*[normalize-space(.)=${xpathLiteral(label.trim())}]/${NEAREST_LIST_ITEM}`;
  }

  attempt(driver: BrowserDriver, label: string): Promise<DriverElement[]> {
    return driver.queryAll({ xpath: NestedTextStrategy.xpath(label) });
  }
}

export class ContainsTextStrategy implements LocatorStrategy {
  readonly name = 'contains-text' as const;

  static xpath(label: string): string {
    return `//*[contains(text(), ${xpathLiteral(label)})]/${NEAREST_LIST_ITEM}`;
  }

  attempt(driver: BrowserDriver, label: string): Promise<DriverElement[]> {
    return driver.queryAll({ xpath: ContainsTextStrategy.xpath(label) });
  }
}

/** Full-document scan in page script; the last resort. */
export class ScriptScanStrategy implements LocatorStrategy {
  readonly name = 'script-scan' as const;

  async attempt(driver: BrowserDriver, label: string): Promise<DriverElement[]> {
    const container = await driver.findContainingAncestor(label, LIST_ITEM_SELECTOR);
    return container ? [container] : [];
  }
}

export function defaultLocatorStrategies(): LocatorStrategy[] {
  return [
    new ExactTextStrategy(),
    new NestedTextStrategy(),
    new ContainsTextStrategy(),
    new ScriptScanStrategy(),
  ];
}
