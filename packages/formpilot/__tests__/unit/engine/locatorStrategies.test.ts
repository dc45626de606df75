import { describe, expect, test, vi } from 'vitest';
import {
  ContainsTextStrategy,
  ExactTextStrategy,
  LIST_ITEM_SELECTOR,
  NestedTextStrategy,
  ScriptScanStrategy,
  defaultLocatorStrategies,
  xpathLiteral,
} from '../../../src/engine/locatorStrategies.js';
import { stubDriver, stubElement } from '../../helpers.js';

describe('xpathLiteral', () => {
  test('wraps plain text in single quotes', () => {
    expect(xpathLiteral('Age')).toBe("'Age'");
  });

  test('switches to double quotes for an apostrophe', () => {
    expect(xpathLiteral("Don't know")).toBe(`"Don't know"`);
  });

  test('builds concat() when both quote kinds appear', () => {
    expect(xpathLiteral(`He said "don't"`)).toBe(`concat('He said "don', "'", 't"')`);
  });
});

describe('strategy expressions', () => {
  test('exact-text trims the label and climbs to the nearest list item', () => {
    expect(ExactTextStrategy.xpath('  Age ')).toBe(
      "//*[normalize-space(text())='Age']/ancestor::*[@role='listitem'][1]",
    );
  });

  test('nested-text matches the normalized text of any descendant of a list item', () => {
    expect(NestedTextStrategy.xpath('City, State')).toBe(
      "//*[@role='listitem']//*[normalize-space(.)='City, State']/ancestor::*[@role='listitem'][1]",
    );
  });

  test('contains-text keeps the label as given', () => {
    expect(ContainsTextStrategy.xpath(' Age')).toBe("//*[contains(text(), ' Age')]/ancestor::*[@role='listitem'][1]");
  });

  test('xpath strategies query the driver with their expression', async () => {
    const driver = stubDriver();
    await new ExactTextStrategy().attempt(driver, 'Height');
    expect(driver.queryAll).toHaveBeenCalledWith({ xpath: ExactTextStrategy.xpath('Height') });
  });
});

describe('ScriptScanStrategy', () => {
  test('returns the container found by the document scan', async () => {
    const container = stubElement();
    const findContainingAncestor = vi.fn(async () => container);
    const driver = stubDriver({ findContainingAncestor });

    const result = await new ScriptScanStrategy().attempt(driver, 'Gender');

    expect(result).toEqual([container]);
    expect(findContainingAncestor).toHaveBeenCalledWith('Gender', LIST_ITEM_SELECTOR);
  });

  test('returns no matches when the scan finds nothing', async () => {
    expect(await new ScriptScanStrategy().attempt(stubDriver(), 'Gender')).toEqual([]);
  });
});

test('default strategies run from most to least precise', () => {
  expect(defaultLocatorStrategies().map((s) => s.name)).toEqual([
    'exact-text',
    'nested-text',
    'contains-text',
    'script-scan',
  ]);
});
