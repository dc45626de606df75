/**
 * SubmissionRunner: one end-to-end submission on one driver.
 *
 *   launch → open form → participant section → next → each survey section
 *   (next between them) → submit → screenshot → close
 *
 * The driver is closed whatever happens. Errors never escape run(): they
 * become a failed SubmissionOutcome.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import type { SurveyDefinition, SurveySection, TextFieldDefinition } from '../config/survey.js';
import { resolveTiming, type InteractionTiming } from '../config/timing.js';
import type { BrowserDriver } from '../driver/types.js';
import { errorMessage } from '../errors.js';
import type { AnswerSet, SubmissionPlan, UserRecord } from '../generator/responseGenerator.js';
import { defaultRandom, type RandomSource } from '../generator/random.js';
import type { Logger } from '../monitoring/logger.js';
import { FieldInteractionEngine, countSweep } from './FieldInteractionEngine.js';
import { QuestionLocator } from './QuestionLocator.js';
import { SectionFlowController, type ConfirmationStatus } from './SectionFlowController.js';

export interface SubmissionOutcome {
  index: number;
  /** True for confirmed and unconfirmed submissions */
  succeeded: boolean;
  status: ConfirmationStatus;
  error?: string;
  screenshotPath?: string;
  durationMs: number;
}

export interface SubmissionRunnerOptions {
  survey: SurveyDefinition;
  logger: Logger;
  headless?: boolean;
  timing?: Partial<InteractionTiming>;
  random?: RandomSource;
  honorOptionHints?: boolean;
  /** Where final-state screenshots go; omit to skip them */
  screenshotDir?: string;
}

export function formatTextValue(user: UserRecord, field: TextFieldDefinition): string {
  return `${user[field.source]}${field.suffix ?? ''}`;
}

export class SubmissionRunner {
  private readonly timing: InteractionTiming;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly options: SubmissionRunnerOptions,
  ) {
    this.timing = resolveTiming(options.timing);
  }

  async run(formUrl: string, plan: SubmissionPlan): Promise<SubmissionOutcome> {
    const start = Date.now();
    const logger = this.options.logger;
    let status: ConfirmationStatus = 'failed';
    let error: string | undefined;

    try {
      await this.driver.launch({
        headless: this.options.headless ?? true,
        clickTimeoutMs: this.timing.clickTimeoutMs,
      });
      logger.info('Browser driver launched', { driver: this.driver.type });

      const locator = new QuestionLocator(this.driver, logger, { scrollSettleMs: this.timing.scrollSettleMs });
      const engine = new FieldInteractionEngine(this.driver, logger, {
        locator,
        timing: this.timing,
        random: this.options.random ?? defaultRandom,
        honorOptionHints: this.options.honorOptionHints,
      });
      const flow = new SectionFlowController(this.driver, logger, {
        locator,
        timing: this.timing,
        navigation: this.options.survey.navigation,
      });

      await flow.openForm(formUrl);
      await this.fillParticipantInfo(engine, plan.user);

      for (const section of this.options.survey.sections) {
        if (!(await flow.advanceSection())) {
          logger.warn('No Next button before section', { section: section.id });
        }
        await this.fillSection(engine, section, plan.answers.get(section.id));
      }

      const confirmation = await flow.submit();
      status = confirmation.status;
      error = confirmation.error;
    } catch (err) {
      status = 'failed';
      error = errorMessage(err);
      logger.error('Automation failed', { error });
    }

    const screenshotPath = await this.captureScreenshot(plan.index, status);
    await this.closeDriver();

    return {
      index: plan.index,
      succeeded: status !== 'failed',
      status,
      ...(error !== undefined ? { error } : {}),
      ...(screenshotPath ? { screenshotPath } : {}),
      durationMs: Date.now() - start,
    };
  }

  async fillParticipantInfo(engine: FieldInteractionEngine, user: UserRecord): Promise<void> {
    const { participant } = this.options.survey;
    const logger = this.options.logger;
    logger.info('Filling participant information and consent section...');

    await engine.checkBox(participant.consentLabel);
    for (const field of participant.textFields) {
      await engine.fillText(field.label, formatTextValue(user, field));
    }
    await engine.selectRadio(participant.genderLabel, user.gender);

    logger.info('Completed participant information section');
  }

  async fillSection(
    engine: FieldInteractionEngine,
    section: SurveySection,
    answers: AnswerSet | undefined,
  ): Promise<void> {
    const logger = this.options.logger;
    logger.info('Filling section', { section: section.id, title: section.title, mode: section.mode });

    if (section.mode === 'answers') {
      if (!answers) {
        throw new Error(`No answers generated for section '${section.id}'`);
      }
      for (const [question, answer] of answers) {
        await engine.selectLikert(question, answer);
      }
      logger.info('Completed section', { section: section.id });
      return;
    }

    const result = await engine.fillAllRadiosRandomly();
    const counts = countSweep(result);
    if (!result.completed || counts.failed > 0) {
      logger.warn('Some questions in section may not have been answered', {
        section: section.id,
        ...counts,
        error: result.error,
      });
    } else {
      logger.info('Completed section', { section: section.id, ...counts });
    }
  }

  private async captureScreenshot(index: number, status: ConfirmationStatus): Promise<string | undefined> {
    const dir = this.options.screenshotDir;
    if (!dir || !this.driver.isActive()) return undefined;

    const file = path.join(dir, `submission-${index}-${status === 'failed' ? 'error' : status}.png`);
    try {
      await mkdir(dir, { recursive: true });
      await this.driver.screenshot(file);
      this.options.logger.info('Screenshot saved', { path: file });
      return file;
    } catch (err) {
      this.options.logger.warn('Could not save screenshot', { path: file, error: errorMessage(err) });
      return undefined;
    }
  }

  private async closeDriver(): Promise<void> {
    try {
      await this.driver.close();
      this.options.logger.info('Browser closed.');
    } catch (err) {
      this.options.logger.warn('Error closing browser', { error: errorMessage(err) });
    }
  }
}
