import { BatchResult, RenameOutcome } from '../types/rename.types';

export function emptyBatchResult(): BatchResult {
  return { scanned: 0, renamed: 0, unchanged: 0, planned: 0, skipped: 0, failed: 0, aborted: false, outcomes: [] };
}

export function recordOutcome(result: BatchResult, outcome: RenameOutcome): void {
  result.outcomes.push(outcome);
  result[outcome.status]++;
}
