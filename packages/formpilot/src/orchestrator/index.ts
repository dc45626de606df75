export { BatchTally, successRate, type TallySnapshot } from './BatchTally.js';
export {
  SubmissionOrchestrator,
  type SubmissionOrchestratorOptions,
  type BatchResult,
  type OrchestratorEvents,
  type OrchestratorEvent,
  type SubmissionStartedEvent,
  type SubmissionFinishedEvent,
} from './SubmissionOrchestrator.js';
