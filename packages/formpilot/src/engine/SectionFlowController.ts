/**
 * SectionFlowController: moves a multi-page form between sections and
 * submits it.
 *
 *   participant → <survey sections…> → submitted
 *
 * Submission is classified into three outcomes. A visible confirmation
 * phrase or a response-page URL means `confirmed`. No signal either way
 * means `unconfirmed`, which still counts as success. A missing submit
 * button or a thrown error means `failed`.
 */

import type { NavigationDefinition } from '../config/survey.js';
import { resolveTiming, type InteractionTiming } from '../config/timing.js';
import type { BrowserDriver, DriverElement } from '../driver/types.js';
import { errorMessage } from '../errors.js';
import { sleep } from '../lib/sleep.js';
import type { Logger } from '../monitoring/logger.js';
import { clickWithFallback } from './clickWithFallback.js';
import { QuestionLocator } from './QuestionLocator.js';

export type ConfirmationStatus = 'confirmed' | 'unconfirmed' | 'failed';

export interface SubmissionConfirmation {
  status: ConfirmationStatus;
  /** What confirmed the submission, when status is 'confirmed' */
  signal?: 'phrase' | 'url';
  phrase?: string;
  url?: string;
  error?: string;
}

export const DEFAULT_NAVIGATION: Readonly<NavigationDefinition> = Object.freeze({
  nextButtonText: 'Next',
  submitButtonTexts: ['Submit', 'Submit form', 'Send'],
  submitFallbackSelector: "div[role='button'][jsaction*='submit']",
  confirmationPhrases: [
    'Your response has been recorded',
    'Thank you for your response',
    'Response submitted',
    'Form submitted',
  ],
  responseUrlMarker: 'formResponse',
});

export interface SectionFlowControllerOptions {
  navigation?: NavigationDefinition;
  timing?: Partial<InteractionTiming>;
  locator?: QuestionLocator;
}

export class SectionFlowController {
  private readonly navigation: NavigationDefinition;
  private readonly timing: InteractionTiming;
  private readonly locator: QuestionLocator;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly logger: Logger,
    options: SectionFlowControllerOptions = {},
  ) {
    this.navigation = options.navigation ?? DEFAULT_NAVIGATION;
    this.timing = resolveTiming(options.timing);
    this.locator =
      options.locator ?? new QuestionLocator(driver, logger, { scrollSettleMs: this.timing.scrollSettleMs });
  }

  /** Navigate and wait, bounded, for the form element. */
  async openForm(url: string): Promise<void> {
    try {
      await this.driver.navigate(url);
      this.logger.info('Navigated to form URL', { url });
      await this.driver.waitFor({ css: 'form' }, this.timing.formLoadTimeoutMs);
      this.logger.info('Form loaded successfully');
    } catch (err) {
      this.logger.error('Failed to open form', { url, error: errorMessage(err) });
      throw err;
    }
  }

  /**
   * Click "Next" and wait for the following section to render. Returns
   * false, without raising, when the page has no Next button (terminal
   * section).
   */
  async advanceSection(): Promise<boolean> {
    await this.scrollToBottom();

    const buttons = await this.driver.queryAll({
      role: 'button',
      name: this.navigation.nextButtonText,
      exact: true,
    });
    if (buttons.length === 0) {
      this.logger.warn("Could not find 'Next' button. This might be the last section.");
      return false;
    }

    const button = buttons[0];
    await this.locator.scrollIntoView(button);
    const via = await clickWithFallback(button, this.logger, { button: this.navigation.nextButtonText });
    this.logger.info('Clicked Next button to navigate to next section', { via });

    await sleep(this.timing.sectionSettleMs);
    return true;
  }

  async submit(): Promise<SubmissionConfirmation> {
    this.logger.info('Attempting to submit form...');

    try {
      await this.scrollToBottom();

      const buttons = await this.findSubmitButtons();
      if (buttons.length === 0) {
        this.logger.error('No submit button found.');
        return { status: 'failed', error: 'No submit button found' };
      }

      const button = buttons[0];
      await this.locator.scrollIntoView(button);
      const via = await clickWithFallback(button, this.logger, { button: 'submit' });
      this.logger.info('Submit button clicked', { via });

      await sleep(this.timing.submitSettleMs);
      return await this.classifySubmission();
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error('Error submitting form', { error });
      return { status: 'failed', error };
    }
  }

  /** Inspect the page after the submit click. */
  async classifySubmission(): Promise<SubmissionConfirmation> {
    for (const phrase of this.navigation.confirmationPhrases) {
      const matches = await this.driver.queryAll({ text: phrase });
      if (matches.length > 0 && (await matches[0].isVisible())) {
        this.logger.info('submission_confirmed', { signal: 'phrase', phrase });
        return { status: 'confirmed', signal: 'phrase', phrase };
      }
    }

    const url = await this.driver.currentUrl();
    if (url.includes(this.navigation.responseUrlMarker)) {
      this.logger.info('submission_confirmed', { signal: 'url', url });
      return { status: 'confirmed', signal: 'url', url };
    }

    this.logger.warn('submission_unconfirmed', {
      url,
      detail: 'No explicit confirmation message found, but submission might have succeeded.',
    });
    return { status: 'unconfirmed', url };
  }

  private async findSubmitButtons(): Promise<DriverElement[]> {
    const buttons: DriverElement[] = [];
    for (const text of this.navigation.submitButtonTexts) {
      buttons.push(...(await this.driver.queryAll({ role: 'button', name: text, exact: true })));
    }
    if (buttons.length > 0) return buttons;

    return this.driver.queryAll({ css: this.navigation.submitFallbackSelector });
  }

  private async scrollToBottom(): Promise<void> {
    try {
      await this.driver.scrollToBottom();
    } catch (err) {
      this.logger.warn('Error scrolling to bottom of page', { error: errorMessage(err) });
    }
    await sleep(this.timing.bottomScrollSettleMs);
  }
}
