import type { IngestionJobState } from "@shared/schema";
import { InvalidJobTransitionError } from "@shared/domain/errors";

// queued -> parsing -> canonicalizing -> persisting -> completed
// Any working state may fail; failed and completed jobs may be re-queued.
const ALLOWED_TRANSITIONS: Record<IngestionJobState, readonly IngestionJobState[]> = {
  queued: ['parsing'],
  parsing: ['canonicalizing', 'failed'],
  canonicalizing: ['persisting', 'failed'],
  persisting: ['completed', 'failed'],
  completed: ['queued'],
  failed: ['queued'],
};

export function canTransition(from: IngestionJobState, to: IngestionJobState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: IngestionJobState, to: IngestionJobState): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(from, to);
  }
}

export function isTerminalState(state: IngestionJobState): boolean {
  return state === 'completed' || state === 'failed';
}
