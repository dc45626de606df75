import { describe, expect, test, vi } from 'vitest';
import { NO_DELAY_TIMING } from '../../../src/config/timing.js';
import { MockDriver, type MockQuestion } from '../../../src/driver/mock.js';
import type { DriverElement } from '../../../src/driver/types.js';
import { InputFieldNotFoundError, NoOptionsFoundError, QuestionNotFoundError } from '../../../src/errors.js';
import {
  FieldInteractionEngine,
  LIKERT_LABELS,
  countSweep,
  resolveLikertLabel,
  type FieldInteractionEngineOptions,
} from '../../../src/engine/FieldInteractionEngine.js';
import type { RandomSource } from '../../../src/generator/random.js';
import { FORM_URL, memoryLogger, stubDriver, stubElement } from '../../helpers.js';

async function setup(questions: MockQuestion[], options: FieldInteractionEngineOptions = {}) {
  const driver = new MockDriver({ sections: [{ questions }] });
  await driver.launch({ headless: true });
  await driver.navigate(FORM_URL);
  const { logger, sink } = memoryLogger();
  const engine = new FieldInteractionEngine(driver, logger, { timing: NO_DELAY_TIMING, ...options });
  return { driver, engine, sink };
}

const always = (value: number): RandomSource => () => value;

describe('FieldInteractionEngine', () => {
  // ── fillText ───────────────────────────────────────────────────────

  describe('fillText', () => {
    test('types into a text input', async () => {
      const { driver, engine } = await setup([{ label: 'Name or Initials', control: 'text' }]);

      expect(await engine.fillText('Name or Initials', 'QX')).toBe("input[type='text']");
      expect(driver.fieldValue('Name or Initials')).toBe('QX');
    });

    test('tries email, number and textarea controls in turn', async () => {
      const { driver, engine } = await setup([
        { label: 'E-mail ID', control: 'email' },
        { label: 'Height', control: 'number' },
        { label: 'Comments', control: 'textarea' },
      ]);

      expect(await engine.fillText('E-mail ID', 'abcde@example.com')).toBe("input[type='email']");
      expect(await engine.fillText('Height', 172)).toBe("input[type='number']");
      expect(await engine.fillText('Comments', 'none')).toBe('textarea');
      expect(driver.fieldValue('Height')).toBe('172');
      expect(driver.fieldValue('Comments')).toBe('none');
    });

    test('replaces the previous value', async () => {
      const { driver, engine } = await setup([{ label: 'Age', control: 'text' }]);

      await engine.fillText('Age', 19);
      await engine.fillText('Age', 24);

      expect(driver.fieldValue('Age')).toBe('24');
    });

    test('raises InputFieldNotFoundError for a question without an input', async () => {
      const { engine, sink } = await setup([{ label: 'I Agree', control: 'checkbox' }]);

      const error = await engine.fillText('I Agree', 'x').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(InputFieldNotFoundError);
      expect(error).toHaveProperty('message', "Could not find input field for question 'I Agree'");
      expect(sink.find('Error filling text input')?.level).toBe('error');
    });

    test('raises QuestionNotFoundError for an unknown label', async () => {
      const { engine } = await setup([{ label: 'Age', control: 'text' }]);

      await expect(engine.fillText('Shoe size', 42)).rejects.toBeInstanceOf(QuestionNotFoundError);
    });
  });

  // ── checkBox ───────────────────────────────────────────────────────

  describe('checkBox', () => {
    test('checks an unchecked box once and leaves it checked on repeat', async () => {
      const { driver, engine } = await setup([{ label: 'I Agree', control: 'checkbox' }]);

      expect(await engine.checkBox('I Agree')).toEqual({ label: 'I Agree', changed: true, via: 'direct' });
      expect(await engine.checkBox('I Agree')).toEqual({ label: 'I Agree', changed: false });

      const [box] = driver.controls('I Agree', 'checkbox');
      expect(box.clickCount).toBe(1);
      expect(box.attributes.get('aria-checked')).toBe('true');
    });

    test('does not click a box that starts checked', async () => {
      const { driver, engine } = await setup([{ label: 'I Agree', control: 'checkbox', initiallyChecked: true }]);

      expect((await engine.checkBox('I Agree')).changed).toBe(false);
      expect(driver.controls('I Agree', 'checkbox')[0].clickCount).toBe(0);
    });

    test('raises InputFieldNotFoundError when the question has no checkbox', async () => {
      const { engine } = await setup([{ label: 'Age', control: 'text' }]);

      await expect(engine.checkBox('Age')).rejects.toThrow("Could not find checkbox for question 'Age'");
    });

    test('falls back to a script click when the box is covered', async () => {
      const { driver, engine } = await setup([{ label: 'I Agree', control: 'checkbox', clickBehavior: 'intercept' }]);

      expect((await engine.checkBox('I Agree')).via).toBe('script');
      const [box] = driver.controls('I Agree', 'checkbox');
      expect(box.clickCount).toBe(1);
      expect(box.scriptClickCount).toBe(1);
      expect(box.attributes.get('aria-checked')).toBe('true');
    });
  });

  // ── selectRadio ────────────────────────────────────────────────────

  describe('selectRadio', () => {
    test('picks an option at random and leaves exactly one selected', async () => {
      const { driver, engine } = await setup([{ label: 'Gender', control: 'radio' }], { random: always(0.5) });

      const selection = await engine.selectRadio('Gender');

      expect(selection).toEqual({ label: 'Gender', option: 'Option 2', clicked: true, via: 'direct' });
      expect(driver.checkedOptions('Gender')).toEqual(['Option 2']);
    });

    test('keeps exactly one option selected across repeated calls', async () => {
      const draws = [0, 0.5, 0.99];
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio' }], {
        random: () => draws.shift() ?? 0,
      });

      await engine.selectRadio('Q');
      await engine.selectRadio('Q');
      await engine.selectRadio('Q');

      expect(driver.checkedOptions('Q')).toEqual(['Option 1']);
    });

    test('ignores the preferred option unless hints are honoured', async () => {
      const { driver, engine } = await setup([{ label: 'Gender', control: 'radio', options: ['Female', 'Male'] }], {
        random: always(0),
      });

      const selection = await engine.selectRadio('Gender', 'Male');

      expect(selection.option).toBe('Female');
      expect(driver.checkedOptions('Gender')).toEqual(['Female']);
    });

    test('leaves a group that already has a selection untouched', async () => {
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio', initiallyChecked: 'Option 3' }], {
        random: always(0),
      });

      const selection = await engine.selectRadio('Q');

      expect(selection).toEqual({ label: 'Q', option: 'Option 3', clicked: false });
      expect(driver.checkedOptions('Q')).toEqual(['Option 3']);
      expect(driver.controls('Q', 'radio').every((r) => r.clickCount === 0)).toBe(true);
    });

    test('selects the named option case-insensitively when hints are honoured', async () => {
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio', initiallyChecked: 'Option 1' }], {
        honorOptionHints: true,
      });

      const selection = await engine.selectRadio('Q', ' option 3 ');

      expect(selection).toEqual({ label: 'Q', option: 'Option 3', clicked: true, via: 'direct' });
      expect(driver.checkedOptions('Q')).toEqual(['Option 3']);
    });

    test('does not click a hinted option that is already selected', async () => {
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio', initiallyChecked: 'Option 2' }], {
        honorOptionHints: true,
      });

      expect((await engine.selectRadio('Q', 'Option 2')).clicked).toBe(false);
      expect(driver.controls('Q', 'radio')[1].clickCount).toBe(0);
    });

    test('raises NoOptionsFoundError for an unknown hinted option', async () => {
      const { engine } = await setup([{ label: 'Q', control: 'radio' }], { honorOptionHints: true });

      const error = await engine.selectRadio('Q', 'Maybe').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NoOptionsFoundError);
      expect(error).toHaveProperty('message', "No radio option 'Maybe' found for question 'Q'");
    });

    test('names an option by data-value when its aria-label is blank', async () => {
      const radio = (ariaLabel: string, value: string) =>
        stubElement({
          getAttribute: vi.fn(async (name: string): Promise<string | null> => {
            if (name === 'aria-label') return ariaLabel;
            if (name === 'data-value') return value;
            if (name === 'aria-checked') return 'false';
            return null;
          }),
        });
      const often = radio('', 'Often');
      const never = radio('  ', 'Never');
      const container = stubElement({ queryAll: vi.fn(async (): Promise<DriverElement[]> => [never, often]) });
      const driver = stubDriver({
        findContainingAncestor: vi.fn(async (): Promise<DriverElement | null> => container),
      });
      const { logger } = memoryLogger();
      const engine = new FieldInteractionEngine(driver, logger, { timing: NO_DELAY_TIMING, honorOptionHints: true });

      const selection = await engine.selectRadio('Q', 'Often');

      expect(selection).toEqual({ label: 'Q', option: 'Often', clicked: true, via: 'direct' });
      expect(often.click).toHaveBeenCalledTimes(1);
      expect(never.click).not.toHaveBeenCalled();
    });

    test('raises NoOptionsFoundError when the question has no radios', async () => {
      const { engine } = await setup([{ label: 'Age', control: 'text' }]);

      await expect(engine.selectRadio('Age')).rejects.toThrow("No radio options found for question 'Age'");
    });

    test('retries an intercepted option click once through script', async () => {
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio', clickBehavior: 'intercept' }], {
        random: always(0),
      });

      const selection = await engine.selectRadio('Q');

      expect(selection.via).toBe('script');
      const [first] = driver.controls('Q', 'radio');
      expect(first.clickCount).toBe(1);
      expect(first.scriptClickCount).toBe(1);
      expect(driver.checkedOptions('Q')).toEqual(['Option 1']);
    });

    test('surfaces the error when both click paths fail', async () => {
      const { driver, engine, sink } = await setup([{ label: 'Q', control: 'radio', clickBehavior: 'broken' }], {
        random: always(0),
      });

      await expect(engine.selectRadio('Q')).rejects.toThrow('Element is not attached to the DOM');
      expect(driver.checkedOptions('Q')).toEqual([]);
      expect(sink.find('Error selecting radio option')?.error).toBe('Element is not attached to the DOM');
    });
  });

  // ── selectLikert ───────────────────────────────────────────────────

  describe('selectLikert', () => {
    test('maps scale values onto labels', () => {
      expect(resolveLikertLabel(1)).toBe('Never');
      expect(resolveLikertLabel(6)).toBe('Always');
      expect(resolveLikertLabel(' 3 ')).toBe('Sometimes');
      expect(resolveLikertLabel('very often')).toBe('Very Often');
    });

    test('passes values outside the scale through', () => {
      expect(resolveLikertLabel(7)).toBe('7');
      expect(resolveLikertLabel(2.5)).toBe('2.5');
      expect(resolveLikertLabel('Maybe')).toBe('Maybe');
    });

    test('selects the mapped label when hints are honoured', async () => {
      const { driver, engine } = await setup([{ label: 'Q', control: 'radio', options: [...LIKERT_LABELS] }], {
        honorOptionHints: true,
      });

      expect((await engine.selectLikert('Q', 5)).option).toBe('Very Often');
      expect(driver.checkedOptions('Q')).toEqual(['Very Often']);

      await engine.selectLikert('Q', '2');
      expect(driver.checkedOptions('Q')).toEqual(['Rarely']);
    });
  });

  // ── fillAllRadiosRandomly ──────────────────────────────────────────

  describe('fillAllRadiosRandomly', () => {
    test('records an outcome for every list item', async () => {
      const { driver, engine } = await setup(
        [
          { label: 'First', control: 'radio' },
          { label: 'Second', control: 'text' },
          { label: 'Third', control: 'radio', initiallyChecked: 'Option 1' },
          { label: 'Fourth', control: 'radio', clickBehavior: 'intercept' },
        ],
        { random: always(0) },
      );

      const result = await engine.fillAllRadiosRandomly();

      expect(result.completed).toBe(true);
      expect(result.items).toEqual([
        { index: 0, status: 'selected', option: 'Option 1', via: 'direct' },
        { index: 1, status: 'skipped' },
        { index: 2, status: 'already_selected', option: 'Option 1' },
        { index: 3, status: 'selected', option: 'Option 1', via: 'script' },
      ]);
      expect(countSweep(result)).toEqual({ selected: 2, already_selected: 1, skipped: 1, failed: 0 });
      expect(driver.checkedOptions('First')).toEqual(['Option 1']);
      expect(driver.fieldValue('Second')).toBe('');
    });

    test('keeps going after a failing item', async () => {
      const { driver, engine, sink } = await setup(
        [
          { label: 'First', control: 'radio', clickBehavior: 'broken' },
          { label: 'Second', control: 'radio' },
        ],
        { random: always(0.99) },
      );

      const result = await engine.fillAllRadiosRandomly();

      expect(result.items).toEqual([
        { index: 0, status: 'failed', error: 'Element is not attached to the DOM' },
        { index: 1, status: 'selected', option: 'Option 3', via: 'direct' },
      ]);
      expect(driver.checkedOptions('Second')).toEqual(['Option 3']);
      expect(sink.find('Error processing a question')?.index).toBe(0);
    });

    test('reports an incomplete sweep when the items cannot be listed', async () => {
      const driver = stubDriver({
        queryAll: vi.fn(async (): Promise<DriverElement[]> => {
          throw new Error('Target page, context or browser has been closed');
        }),
      });
      const { logger } = memoryLogger();
      const engine = new FieldInteractionEngine(driver, logger, { timing: NO_DELAY_TIMING });

      expect(await engine.fillAllRadiosRandomly()).toEqual({
        items: [],
        completed: false,
        error: 'Target page, context or browser has been closed',
      });
    });
  });
});
