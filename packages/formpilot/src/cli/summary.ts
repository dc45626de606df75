import { successRate, type TallySnapshot } from '../orchestrator/BatchTally.js';

export function formatSummary(tally: TallySnapshot): string {
  return [
    'Automation completed:',
    `- Successful submissions: ${tally.successful}`,
    `  - confirmed: ${tally.confirmed}`,
    `  - unconfirmed (assumed successful): ${tally.unconfirmed}`,
    `- Failed submissions: ${tally.failed}`,
    `- Total attempts: ${tally.total}`,
    `- Success rate: ${successRate(tally).toFixed(2)}%`,
  ].join('\n');
}

export function formatProgress(completed: number, count: number): string {
  const pct = count === 0 ? 100 : Math.floor((completed / count) * 100);
  return `Submitting forms: ${completed}/${count} (${pct}%)`;
}
