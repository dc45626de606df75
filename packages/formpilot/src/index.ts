export * from './errors.js';
export * from './config/env.js';
export * from './config/timing.js';
export * from './config/survey.js';
export * from './driver/index.js';
export * from './engine/locatorStrategies.js';
export * from './engine/QuestionLocator.js';
export * from './engine/clickWithFallback.js';
export * from './engine/FieldInteractionEngine.js';
export * from './engine/SectionFlowController.js';
export * from './engine/SubmissionRunner.js';
export * from './generator/random.js';
export * from './generator/responseGenerator.js';
export * from './orchestrator/index.js';
export * from './monitoring/index.js';
export { formatSummary, formatProgress } from './cli/summary.js';
