#!/usr/bin/env node
/**
 * formpilot CLI: submit a batch of synthetic responses to one form.
 *
 * Usage:
 *   formpilot --url <formUrl> --count 125 --workers 4
 *   formpilot --driver mock --count 10 --seed 7
 */

import { getEnv } from '../config/env.js';
import { NO_DELAY_TIMING } from '../config/timing.js';
import { loadSurveyDefinition } from '../config/survey.js';
import { createDriver } from '../driver/index.js';
import { errorMessage } from '../errors.js';
import { createBatchLogger } from '../monitoring/logger.js';
import { SubmissionOrchestrator } from '../orchestrator/SubmissionOrchestrator.js';
import { CliArgumentError, USAGE, parseCliArgs, type CliArgs } from './args.js';
import { formatProgress, formatSummary } from './summary.js';

async function main(argv: readonly string[]): Promise<number> {
  const env = getEnv();

  let args: CliArgs;
  try {
    args = parseCliArgs(argv, env);
  } catch (err) {
    if (!(err instanceof CliArgumentError)) throw err;
    console.error(`Error: ${err.message}\n`);
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const logger = createBatchLogger({ level: env.FORMPILOT_LOG_LEVEL, file: env.FORMPILOT_LOG_FILE });

  try {
    const survey = loadSurveyDefinition(args.survey);
    const orchestrator = new SubmissionOrchestrator({
      survey,
      logger,
      createDriver: () => createDriver(args.driver, { survey }),
      headless: args.headless,
      timing: args.driver === 'mock' ? NO_DELAY_TIMING : undefined,
      seed: args.seed,
      honorOptionHints: args.honorHints,
      screenshotDir: args.screenshots,
    });

    orchestrator.events.on('submissionFinished', ({ tally, count }) => {
      logger.info(formatProgress(tally.total, count), { successful: tally.successful, failed: tally.failed });
    });

    console.log(`Starting automation to submit ${args.count} responses using ${args.workers} workers...`);
    const result = await orchestrator.runBatch(args.url, args.count, args.workers);
    console.log(`\n${formatSummary(result)}`);
    return 0;
  } catch (err) {
    logger.error('Fatal error', { error: errorMessage(err) });
    return 1;
  } finally {
    await logger.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal:', errorMessage(err));
    process.exitCode = 1;
  },
);
