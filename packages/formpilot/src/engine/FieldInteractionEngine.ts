/**
 * FieldInteractionEngine: sets values on the three control archetypes.
 *
 * Every per-question operation resolves the container through
 * QuestionLocator first, then scrolls the specific control into view. Two
 * faults are expected: not-found (raised, never retried) and click
 * interception (retried once through a script click, see clickWithFallback).
 */

import { resolveTiming, type InteractionTiming } from '../config/timing.js';
import type { BrowserDriver, DriverElement } from '../driver/types.js';
import { InputFieldNotFoundError, NoOptionsFoundError, errorMessage } from '../errors.js';
import { defaultRandom, pickOne, type RandomSource } from '../generator/random.js';
import { sleep } from '../lib/sleep.js';
import type { Logger } from '../monitoring/logger.js';
import { clickWithFallback, type ClickPath } from './clickWithFallback.js';
import { QuestionLocator } from './QuestionLocator.js';

// ── Selectors ────────────────────────────────────────────────────────────

/** Tried in this order; the first type present in the container wins. */
export const TEXT_INPUT_SELECTORS = [
  "input[type='text']",
  "input[type='email']",
  "input[type='number']",
  'textarea',
] as const;

export type TextInputSelector = (typeof TEXT_INPUT_SELECTORS)[number];

export const CHECKBOX_SELECTOR = "div[role='checkbox']";
export const RADIO_SELECTOR = "div[role='radio']";
export const LIST_ITEM_CSS = "div[role='listitem']";

// ── Likert scale ─────────────────────────────────────────────────────────

export const LIKERT_LABELS = ['Never', 'Rarely', 'Sometimes', 'Often', 'Very Often', 'Always'] as const;

/** 1–6, "1"–"6" or a label word (any case) to the canonical label; anything else passes through. */
export function resolveLikertLabel(value: number | string): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 1 && value <= LIKERT_LABELS.length
      ? LIKERT_LABELS[value - 1]
      : String(value);
  }
  const trimmed = value.trim();
  if (/^[1-6]$/.test(trimmed)) return LIKERT_LABELS[Number(trimmed) - 1];
  return LIKERT_LABELS.find((l) => l.toLowerCase() === trimmed.toLowerCase()) ?? value;
}

// ── Result types ─────────────────────────────────────────────────────────

export interface CheckboxResult {
  label: string;
  /** False when the box was already checked and nothing was clicked */
  changed: boolean;
  via?: ClickPath;
}

export interface RadioSelection {
  label: string;
  /** aria-label / data-value / text of the option left selected */
  option: string;
  clicked: boolean;
  via?: ClickPath;
}

export type RadioSweepStatus = 'selected' | 'already_selected' | 'skipped' | 'failed';

export interface RadioSweepItem {
  index: number;
  status: RadioSweepStatus;
  option?: string;
  via?: ClickPath;
  error?: string;
}

export interface RadioSweepResult {
  items: RadioSweepItem[];
  /** False only when the page's list items could not be enumerated */
  completed: boolean;
  error?: string;
}

export function countSweep(result: RadioSweepResult): Record<RadioSweepStatus, number> {
  const counts: Record<RadioSweepStatus, number> = { selected: 0, already_selected: 0, skipped: 0, failed: 0 };
  for (const item of result.items) counts[item.status]++;
  return counts;
}

// ── Engine ───────────────────────────────────────────────────────────────

export interface FieldInteractionEngineOptions {
  /**
   * Pick the radio option named by the caller instead of a random one.
   * Off by default: answers are randomized even for directed questions.
   */
  honorOptionHints?: boolean;
  random?: RandomSource;
  timing?: Partial<InteractionTiming>;
  locator?: QuestionLocator;
}

export class FieldInteractionEngine {
  private readonly honorOptionHints: boolean;
  private readonly random: RandomSource;
  private readonly timing: InteractionTiming;
  readonly locator: QuestionLocator;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly logger: Logger,
    options: FieldInteractionEngineOptions = {},
  ) {
    this.honorOptionHints = options.honorOptionHints ?? false;
    this.random = options.random ?? defaultRandom;
    this.timing = resolveTiming(options.timing);
    this.locator =
      options.locator ?? new QuestionLocator(driver, logger, { scrollSettleMs: this.timing.scrollSettleMs });
  }

  /** Clear the first input-like control in the question and type `value`. */
  async fillText(label: string, value: string | number): Promise<TextInputSelector> {
    try {
      const container = await this.locator.locate(label);

      for (const selector of TEXT_INPUT_SELECTORS) {
        const fields = await container.element.queryAll({ css: selector });
        if (fields.length === 0) continue;

        const field = fields[0];
        await this.locator.scrollIntoView(field);
        await field.clear();
        await field.type(String(value));
        this.logger.info('Entered value for question', { label, value: String(value) });
        return selector;
      }

      throw new InputFieldNotFoundError(label, 'input field');
    } catch (err) {
      this.logger.error('Error filling text input', { label, error: errorMessage(err) });
      throw err;
    }
  }

  /** Check the question's checkbox. Never unchecks. */
  async checkBox(label: string): Promise<CheckboxResult> {
    try {
      const container = await this.locator.locate(label);
      const boxes = await container.element.queryAll({ css: CHECKBOX_SELECTOR });
      if (boxes.length === 0) {
        throw new InputFieldNotFoundError(label, 'checkbox');
      }

      const box = boxes[0];
      await this.locator.scrollIntoView(box);

      if (await isChecked(box)) {
        this.logger.info('Checkbox was already checked', { label });
        return { label, changed: false };
      }

      const via = await clickWithFallback(box, this.logger, { label });
      this.logger.info('Checked checkbox', { label, via });
      return { label, changed: true, via };
    } catch (err) {
      this.logger.error('Error checking checkbox', { label, error: errorMessage(err) });
      throw err;
    }
  }

  /**
   * Select one option of the question's radio group. Unless
   * honorOptionHints is on, `preferredOptionText` is accepted but ignored
   * and the option is drawn uniformly at random. A group that already has
   * a selection is left as it is.
   */
  async selectRadio(label: string, preferredOptionText?: string): Promise<RadioSelection> {
    try {
      const container = await this.locator.locate(label);
      const radios = await container.element.queryAll({ css: RADIO_SELECTOR });
      if (radios.length === 0) {
        throw new NoOptionsFoundError(label);
      }

      const hint = this.honorOptionHints ? preferredOptionText : undefined;
      const directed = hint !== undefined;
      const option = hint !== undefined ? await this.findOption(label, radios, hint) : pickOne(this.random, radios);

      if (!directed) {
        const selected = await firstChecked(radios);
        if (selected) {
          const name = await optionName(selected);
          this.logger.info('Option was already selected', { label, option: name });
          return { label, option: name, clicked: false };
        }
      }

      const name = await optionName(option);
      await this.locator.scrollIntoView(option);

      if (await isChecked(option)) {
        this.logger.info('Option was already selected', { label, option: name });
        return { label, option: name, clicked: false };
      }

      const via = await clickWithFallback(option, this.logger, { label });
      this.logger.info(directed ? 'Selected option for question' : 'Selected random option for question', {
        label,
        option: name,
        via,
      });
      return { label, option: name, clicked: true, via };
    } catch (err) {
      this.logger.error('Error selecting radio option', { label, error: errorMessage(err) });
      throw err;
    }
  }

  /**
   * Map a 1–6 scale value to its label and select it. The label only
   * matters when honorOptionHints is on; otherwise selectRadio picks at
   * random.
   */
  selectLikert(label: string, scaleValue: number | string): Promise<RadioSelection> {
    return this.selectRadio(label, resolveLikertLabel(scaleValue));
  }

  /**
   * Pick one random option in every radio question on the current page.
   * Per-item failures are recorded and the sweep moves on.
   */
  async fillAllRadiosRandomly(): Promise<RadioSweepResult> {
    const items: RadioSweepItem[] = [];

    let listItems: DriverElement[];
    try {
      listItems = await this.driver.queryAll({ css: LIST_ITEM_CSS });
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error('Error selecting random radio options', { error });
      return { items, completed: false, error };
    }
    this.logger.info('Found question items on the page', { count: listItems.length });

    for (let index = 0; index < listItems.length; index++) {
      const item = listItems[index];
      try {
        const radios = await item.queryAll({ css: RADIO_SELECTOR });
        if (radios.length === 0) {
          items.push({ index, status: 'skipped' });
          continue;
        }

        await this.locator.scrollIntoView(item);
        await sleep(this.timing.sweepItemSettleMs);

        const option = pickOne(this.random, radios);
        const name = await optionName(option);

        if (await isChecked(option)) {
          this.logger.info('Option was already selected', { index, option: name });
          items.push({ index, status: 'already_selected', option: name });
          continue;
        }

        await this.locator.scrollIntoView(option);
        const via = await clickWithFallback(option, this.logger, { index });
        await sleep(this.timing.selectionSettleMs);
        this.logger.info('Selected a random radio option', { index, option: name, via });
        items.push({ index, status: 'selected', option: name, via });
      } catch (err) {
        const error = errorMessage(err);
        this.logger.error('Error processing a question', { index, error });
        items.push({ index, status: 'failed', error });
      }
    }

    return { items, completed: true };
  }

  private async findOption(label: string, radios: DriverElement[], wanted: string): Promise<DriverElement> {
    const target = wanted.trim().toLowerCase();
    for (const radio of radios) {
      if ((await optionName(radio)).trim().toLowerCase() === target) return radio;
    }
    throw new NoOptionsFoundError(label, wanted);
  }
}

// ── Control state helpers ────────────────────────────────────────────────

async function isChecked(el: DriverElement): Promise<boolean> {
  return (await el.getAttribute('aria-checked')) === 'true';
}

async function firstChecked(els: DriverElement[]): Promise<DriverElement | null> {
  for (const el of els) {
    if (await isChecked(el)) return el;
  }
  return null;
}

/** aria-label, then data-value, then visible text; blank values are skipped. */
async function optionName(el: DriverElement): Promise<string> {
  return (
    (await el.getAttribute('aria-label'))?.trim() ||
    (await el.getAttribute('data-value'))?.trim() ||
    (await el.textContent()).trim()
  );
}
