/**
 * SubmissionOrchestrator: runs N independent submissions on a fixed-size
 * pool of async workers.
 *
 * Each submission gets a fresh plan, its own driver (never shared) and a
 * runner that always closes that driver. Failures are counted, never
 * propagated: one broken submission cannot stop its siblings.
 */

import { EventEmitter } from 'eventemitter3';
import type { SurveyDefinition } from '../config/survey.js';
import type { InteractionTiming } from '../config/timing.js';
import type { BrowserDriver } from '../driver/types.js';
import { SubmissionRunner, type SubmissionOutcome } from '../engine/SubmissionRunner.js';
import { FormPilotError, errorMessage } from '../errors.js';
import { createSeededRandom, defaultRandom, type RandomSource } from '../generator/random.js';
import { generateSubmissionPlan } from '../generator/responseGenerator.js';
import type { Logger } from '../monitoring/logger.js';
import { BatchTally, type TallySnapshot } from './BatchTally.js';

export interface SubmissionStartedEvent {
  index: number;
  worker: number;
}

export interface SubmissionFinishedEvent {
  outcome: SubmissionOutcome;
  worker: number;
  tally: TallySnapshot;
  /** Submissions expected in this batch */
  count: number;
}

export interface OrchestratorEvents {
  submissionStarted: (event: SubmissionStartedEvent) => void;
  submissionFinished: (event: SubmissionFinishedEvent) => void;
}

export type OrchestratorEvent = keyof OrchestratorEvents;

export interface SubmissionOrchestratorOptions {
  survey: SurveyDefinition;
  logger: Logger;
  /** Called once per submission; each call must return a new, unlaunched driver */
  createDriver: (index: number) => BrowserDriver;
  headless?: boolean;
  timing?: Partial<InteractionTiming>;
  /** Derive one reproducible random stream per submission index */
  seed?: number;
  honorOptionHints?: boolean;
  screenshotDir?: string;
}

export interface BatchResult extends TallySnapshot {
  /** Most submissions observed in flight at once */
  peakConcurrency: number;
  durationMs: number;
}

export class SubmissionOrchestrator {
  /** Progress events; a throwing listener is logged and ignored */
  readonly events = new EventEmitter<OrchestratorEvents>();

  constructor(private readonly options: SubmissionOrchestratorOptions) {}

  async runBatch(formUrl: string, count: number, maxConcurrency: number): Promise<BatchResult> {
    if (!Number.isInteger(count) || count < 0) {
      throw new FormPilotError(`count must be a non-negative integer, got ${count}`, 'invalid_batch_options');
    }
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new FormPilotError(
        `maxConcurrency must be a positive integer, got ${maxConcurrency}`,
        'invalid_batch_options',
      );
    }

    const logger = this.options.logger;
    const start = Date.now();
    const tally = new BatchTally();
    const workerCount = Math.min(maxConcurrency, count);
    let nextIndex = 0;
    let inFlight = 0;
    let peakConcurrency = 0;

    logger.info('batch_started', { formUrl, count, maxConcurrency, workers: workerCount });

    const worker = async (workerId: number): Promise<void> => {
      while (nextIndex < count) {
        const index = nextIndex++;
        inFlight++;
        peakConcurrency = Math.max(peakConcurrency, inFlight);
        this.emitSafely('submissionStarted', () => this.events.emit('submissionStarted', { index, worker: workerId }));

        const outcome = await this.runSubmission(formUrl, index, workerId);

        inFlight--;
        tally.record(outcome);
        this.emitSafely('submissionFinished', () =>
          this.events.emit('submissionFinished', { outcome, worker: workerId, tally: tally.snapshot(), count }),
        );
      }
    };

    await Promise.all(Array.from({ length: workerCount }, (_, workerId) => worker(workerId)));

    const result: BatchResult = {
      ...tally.snapshot(),
      peakConcurrency,
      durationMs: Date.now() - start,
    };
    logger.info('batch_completed', { ...result });
    return result;
  }

  private async runSubmission(formUrl: string, index: number, workerId: number): Promise<SubmissionOutcome> {
    const logger = this.options.logger.child({ submission: index, worker: workerId });
    const start = Date.now();

    try {
      const random = this.randomFor(index);
      const plan = generateSubmissionPlan(this.options.survey, random, index);
      const driver = this.options.createDriver(index);
      const runner = new SubmissionRunner(driver, {
        survey: this.options.survey,
        logger,
        headless: this.options.headless,
        timing: this.options.timing,
        random,
        honorOptionHints: this.options.honorOptionHints,
        screenshotDir: this.options.screenshotDir,
      });

      const outcome = await runner.run(formUrl, plan);
      if (outcome.succeeded) {
        logger.info('Submission finished', { status: outcome.status, durationMs: outcome.durationMs });
      } else {
        logger.error(`Submission ${index} failed`, { error: outcome.error });
      }
      return outcome;
    } catch (err) {
      const error = errorMessage(err);
      logger.error(`Submission ${index} failed with error`, { error });
      return { index, succeeded: false, status: 'failed', error, durationMs: Date.now() - start };
    }
  }

  private randomFor(index: number): RandomSource {
    if (this.options.seed === undefined) return defaultRandom;
    return createSeededRandom((this.options.seed ^ Math.imul(index + 1, 0x9e3779b1)) >>> 0);
  }

  private emitSafely(event: OrchestratorEvent, emit: () => void): void {
    try {
      emit();
    } catch (err) {
      this.options.logger.warn('Orchestrator event listener threw', { event, error: errorMessage(err) });
    }
  }
}
